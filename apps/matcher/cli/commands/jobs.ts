/**
 * Jobs Command Implementation
 *
 * Runs every job of a YAML job list in order over one backend connection.
 * A job that fails is reported and the remaining jobs still run.
 */

import { loadMatcherConfig } from "../../service/config";
import { loadCategoryTable } from "../../service/helpers/categories";
import { loadJobFile } from "../../service/helpers/jobs";
import {
    displayBox,
    displayKeyValue,
    displaySection,
    formatDuration,
    formatNumber,
    getDaemonMode,
    logError,
    logInfo,
    logSuccess,
} from "../../service/helpers/terminalUI";
import { type RunOverrides, applyRunOverrides } from "../options";
import {
    connectWithSpinner,
    enableDefaultLoggers,
    executeJob,
} from "./match";

/**
 * Command options for the jobs command.
 */
export interface JobsCommandOptions extends RunOverrides {
    /** Run in daemon (background) mode */
    daemon: boolean;
    /** Stop at the first failed job */
    failFast: boolean;
}

/**
 * Executes the jobs command.
 *
 * @param file - The YAML job list.
 * @param options - Command options from the CLI.
 * @throws {Error} If the job list is invalid, the backend is unreachable or
 * any job failed.
 */
export async function runJobsCommand(
    file: string,
    options: JobsCommandOptions,
): Promise<void> {
    const startTime = Date.now();
    const isDaemon = getDaemonMode();
    enableDefaultLoggers();

    const config = applyRunOverrides(loadMatcherConfig(), options);
    const table = loadCategoryTable(config.categoriesFile);
    const jobs = loadJobFile(file);

    if (!isDaemon) {
        displaySection("Jobs");
        displayKeyValue(
            Object.fromEntries(
                jobs.map((job, i) => [
                    `${i + 1}. ${job.name}`,
                    `${job.categories.join(", ")} -> ${job.output}`,
                ]),
            ),
        );
    }

    const failed: string[] = [];
    let matched = 0;

    const client = await connectWithSpinner(config);
    try {
        for (const [i, job] of jobs.entries()) {
            logInfo(`Job ${i + 1}/${jobs.length}: ${job.name}`);
            try {
                const summary = await executeJob(client, job, config, table);
                matched += summary.matched;
            } catch (err) {
                failed.push(job.name);
                logError(`Job '${job.name}' failed`, err);
                if (options.failFast) break;
            }
        }
    } finally {
        await client.close();
    }

    const duration = formatDuration(Date.now() - startTime);
    if (failed.length > 0) {
        if (!isDaemon) {
            displayBox(`${failed.length} of ${jobs.length} jobs failed`, "error");
        }
        throw new Error(`Jobs failed: ${failed.join(", ")}`);
    }

    if (!isDaemon) {
        console.log();
        displayBox(`${jobs.length} jobs completed in ${duration}`, "success");
        console.log();
    }
    logSuccess(`${formatNumber(matched)} matches across ${jobs.length} jobs`);
}
