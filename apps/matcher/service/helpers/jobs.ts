import { readFileSync } from "node:fs";
import * as path from "node:path";
import { load } from "js-yaml";
import { z } from "zod";
import type { MatchJob } from "../types";

/**
 * Error raised when a job list cannot be read or is invalid.
 */
export class JobConfigError extends Error {
    /** File the job list was read from */
    readonly file: string;
    /** Individual validation problems */
    readonly issues: string[];

    constructor(message: string, file: string, issues: string[] = []) {
        super(
            issues.length > 0
                ? `${message}\n  - ${issues.join("\n  - ")}`
                : message,
        );
        this.name = "JobConfigError";
        this.file = file;
        this.issues = issues;
    }
}

const nonEmpty = z.string().trim().min(1);

const jobSchema = z.object({
    name: nonEmpty.optional(),
    input: nonEmpty,
    output: nonEmpty,
    /** A list, or one comma-separated string */
    categories: z.union([nonEmpty, z.array(nonEmpty).min(1)]),
    format: z.enum(["csv", "jsonl"]).default("csv"),
    matchedOnly: z.boolean().default(false),
    bom: z.boolean().default(false),
});

const jobFileSchema = z.object({
    jobs: z.array(jobSchema).min(1),
});

/**
 * Splits a comma-separated category list.
 *
 * @param value - e.g. `"high_school, university"`.
 * @returns The trimmed, non-empty names.
 */
export const splitCategoryList = (value: string): string[] =>
    value
        .split(",")
        .map((name) => name.trim())
        .filter((name) => name.length > 0);

/**
 * Validates a parsed job list. Relative paths are resolved against
 * `baseDir`.
 *
 * @param document - The parsed YAML document.
 * @param file - Source file name, for errors.
 * @param baseDir - Directory relative paths start from.
 * @returns The jobs, in file order.
 * @throws {JobConfigError} If the document is invalid.
 */
export const buildJobList = (
    document: unknown,
    file: string,
    baseDir: string,
): MatchJob[] => {
    const parsed = jobFileSchema.safeParse(document);
    if (!parsed.success) {
        throw new JobConfigError(
            `Invalid job list '${file}'`,
            file,
            parsed.error.issues.map(
                (issue) => `${issue.path.join(".")}: ${issue.message}`,
            ),
        );
    }

    return parsed.data.jobs.map((job) => {
        const input = path.resolve(baseDir, job.input);
        return {
            name: job.name ?? path.basename(input),
            input,
            output: path.resolve(baseDir, job.output),
            categories:
                typeof job.categories === "string"
                    ? splitCategoryList(job.categories)
                    : job.categories,
            format: job.format,
            matchedOnly: job.matchedOnly,
            bom: job.bom,
        };
    });
};

/**
 * Reads a YAML job list. Paths in it are relative to the file.
 *
 * @param file - Path to the YAML file.
 * @returns The jobs, in file order.
 * @throws {JobConfigError} If the file cannot be read or is invalid.
 */
export const loadJobFile = (file: string): MatchJob[] => {
    let document: unknown;
    try {
        document = load(readFileSync(file, "utf8"));
    } catch (err) {
        throw new JobConfigError(
            `Cannot read job list '${file}': ${err instanceof Error ? err.message : String(err)}`,
            file,
        );
    }
    return buildJobList(document, file, path.dirname(path.resolve(file)));
};
