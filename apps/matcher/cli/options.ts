/**
 * Parsing of CLI flags into matcher configuration overrides.
 */

import { InvalidArgumentError } from "commander";
import type { MatcherConfig } from "../service/config";

/**
 * Sizing flags shared by `match` and `jobs`.
 */
export type RunOverrides = {
    chunkSize?: number;
    batchSize?: number;
    concurrency?: number;
    flushThreshold?: number;
    maxRetries?: number;
    index?: string;
    categoriesFile?: string;
};

/**
 * Commander argument parser for integers of at least `min`.
 *
 * @param min - Smallest accepted value.
 * @returns The parser.
 */
export const integerAtLeast =
    (min: number) =>
    (value: string): number => {
        const parsed = Number(value);
        if (!Number.isInteger(parsed) || parsed < min) {
            throw new InvalidArgumentError(
                `Expected an integer of at least ${min}, got '${value}'.`,
            );
        }
        return parsed;
    };

/**
 * Applies CLI overrides on top of the environment configuration. The queue
 * capacity follows an overridden concurrency unless set explicitly.
 *
 * @param config - Configuration loaded from the environment.
 * @param overrides - Flags given on the command line.
 * @param env - The environment, to tell explicit settings from defaults.
 * @returns The effective configuration.
 */
export const applyRunOverrides = (
    config: MatcherConfig,
    overrides: RunOverrides,
    env: NodeJS.ProcessEnv = process.env,
): MatcherConfig => {
    const concurrency = overrides.concurrency ?? config.concurrency;
    const queueCapacity =
        overrides.concurrency !== undefined &&
        env.GEOMATCH_QUEUE_CAPACITY === undefined
            ? concurrency * 2
            : config.queueCapacity;

    return {
        ...config,
        chunkSize: overrides.chunkSize ?? config.chunkSize,
        batchSize: overrides.batchSize ?? config.batchSize,
        concurrency,
        queueCapacity,
        flushThreshold: overrides.flushThreshold ?? config.flushThreshold,
        maxRetries: overrides.maxRetries ?? config.maxRetries,
        indexName: overrides.index ?? config.indexName,
        categoriesFile: overrides.categoriesFile ?? config.categoriesFile,
    };
};
