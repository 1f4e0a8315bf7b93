#!/usr/bin/env node
/**
 * GeoMatch CLI - Unified Command Line Interface
 *
 * Matches user locations to the nearest facility of each requested category
 * using an OpenSearch geo index.
 *
 * Usage:
 *   geomatch match -i <input> -o <output> -c <categories>
 *   geomatch jobs <file>      - Run a YAML list of matching jobs
 *   geomatch categories       - Show the category radius table
 *   geomatch version          - Show version information
 *
 * Options:
 *   -d, --daemon       Run in background (daemon) mode
 *   -v, --version      Display version information
 *   -h, --help         Display help information
 */

import { version } from "@repo/geomatch-core/version";
import { Command, Option } from "commander";
import * as dotenv from "dotenv";
import {
    displayBanner,
    logError,
    setDaemonMode,
    theme,
} from "../service/helpers/terminalUI";
import { integerAtLeast } from "./options";
import type { JobsCommandOptions } from "./commands/jobs";
import type { MatchCommandOptions } from "./commands/match";

// Load environment variables
dotenv.config();

/**
 * Main CLI application instance.
 */
const program = new Command();

/**
 * Adds the sizing flags shared by `match` and `jobs`.
 */
const withRunOptions = (command: Command): Command =>
    command
        .option("-d, --daemon", "Run in background (daemon) mode", false)
        .option(
            "--chunk-size <points>",
            "Points read per chunk",
            integerAtLeast(1),
        )
        .option(
            "--batch-size <queries>",
            "Queries per backend round trip",
            integerAtLeast(1),
        )
        .option(
            "--concurrency <batches>",
            "Batches executed at once",
            integerAtLeast(1),
        )
        .option(
            "--flush-threshold <results>",
            "Results buffered before each write",
            integerAtLeast(1),
        )
        .option(
            "--max-retries <count>",
            "Retries of a batch after a transient failure",
            integerAtLeast(0),
        )
        .option("--index <name>", "Facility index name")
        .option("--categories-file <file>", "Category radius table (YAML)");

/**
 * Configures the CLI program with metadata and global options.
 */
program
    .name("geomatch")
    .description(
        theme.muted(
            "Nearest-facility matching for user locations, powered by OpenSearch",
        ),
    )
    .version(version, "-v, --version", "Display version information")
    .helpOption("-h, --help", "Display help information");

/**
 * Match Command - Matches one input file.
 */
withRunOptions(
    program
        .command("match")
        .description("Match the points of a CSV file to nearby facilities")
        .requiredOption("-i, --input <file>", "Input CSV (id, lat, lon)")
        .requiredOption("-o, --output <file>", "Output file")
        .requiredOption(
            "-c, --categories <names>",
            "Comma-separated categories (e.g., high_school,university)",
        )
        .addOption(
            new Option("-f, --format <format>", "Output format")
                .choices(["csv", "jsonl"])
                .default("csv"),
        )
        .option("--matched-only", "Write matched results only", false)
        .option("--bom", "Prefix CSV output with a UTF-8 byte order mark", false),
).action(async (options: MatchCommandOptions) => {
    // Set daemon mode based on CLI flag
    setDaemonMode(options.daemon);
    if (!options.daemon) {
        displayBanner(version);
    }

    try {
        const { runMatchCommand } = await import("./commands/match");
        await runMatchCommand(options);
    } catch (error) {
        logError("Failed to execute match command", error);
        process.exit(1);
    }
});

/**
 * Jobs Command - Runs a list of matching jobs.
 */
withRunOptions(
    program
        .command("jobs")
        .description("Run every matching job of a YAML job list")
        .argument("<file>", "Job list (YAML)")
        .option("--fail-fast", "Stop at the first failed job", false),
).action(async (file: string, options: JobsCommandOptions) => {
    setDaemonMode(options.daemon);
    if (!options.daemon) {
        displayBanner(version);
    }

    try {
        const { runJobsCommand } = await import("./commands/jobs");
        await runJobsCommand(file, options);
    } catch (error) {
        logError("Failed to execute jobs command", error);
        process.exit(1);
    }
});

/**
 * Categories Command - Displays the category radius table.
 */
program
    .command("categories")
    .description("Display the category radius table")
    .option("--file <file>", "Category radius table (YAML)")
    .action(async (options: { file?: string }) => {
        try {
            const { runCategoriesCommand } = await import(
                "./commands/categories"
            );
            runCategoriesCommand(options);
        } catch (error) {
            logError("Failed to read the category table", error);
            process.exit(1);
        }
    });

/**
 * Version Command - Displays detailed version information.
 */
program
    .command("version")
    .description("Display detailed version and environment information")
    .action(() => {
        displayBanner(version);
        console.log(`${theme.muted("Node.js:")}     ${process.version}`);
        console.log(`${theme.muted("Platform:")}    ${process.platform}`);
        console.log(`${theme.muted("Architecture:")} ${process.arch}`);
        console.log(
            `${theme.muted("Environment:")} ${process.env.NODE_ENV || "development"}`,
        );
    });

// Show banner and help if no command provided
if (process.argv.length === 2) {
    displayBanner(version);
    program.outputHelp();
    process.exit(0);
}

/**
 * Parse command line arguments and execute.
 */
program.parseAsync(process.argv).catch((error: unknown) => {
    logError("Unexpected error", error);
    process.exit(1);
});
