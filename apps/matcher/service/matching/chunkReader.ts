/**
 * Reads the input dataset in bounded chunks of valid location points.
 *
 * The CSV source is parsed row by row with papaparse. Once a full chunk is
 * buffered the parser is paused until the chunk has been taken, so at most
 * one chunk of points (plus the rest of the current text block) is held in
 * memory. Reading is forward-only.
 *
 * @module chunkReader
 */

import * as fs from "node:fs";
import type { Readable } from "node:stream";
import debug from "debug";
import * as Papa from "papaparse";
import { type InputColumns, VERBOSE } from "../config";
import type { CategoryTable, Chunk, LocationPoint } from "../types";

const logger = debug("matcher:reader");
const error = debug("error:reader");

// ---------------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------------

export type ChunkReaderOptions = {
    /** Maximum points per chunk (C) */
    chunkSize: number;
    /** Categories requested for the run */
    categories: CategoryTable;
    /** Input column names; unset names keep their defaults */
    columns?: Partial<InputColumns>;
};

/**
 * Row counters kept by the reader.
 */
export type ReaderStats = {
    /** Data rows parsed */
    read: number;
    /** Rows dropped for a missing id or unusable coordinates */
    skippedInvalid: number;
    /** Rows dropped by the category or time filter */
    skippedFiltered: number;
};

type RowOutcome =
    | { kind: "point"; point: LocationPoint }
    | { kind: "invalid"; reason: string }
    | { kind: "filtered"; reason: string };

type Row = Record<string, unknown>;

const DEFAULT_COLUMNS: InputColumns = {
    id: "id",
    lat: "lat",
    lon: "lon",
    category: "category",
    timeType: "time_type",
};

// ---------------------------------------------------------------------------------
// Row validation
// ---------------------------------------------------------------------------------

/**
 * Reads a trimmed cell, treating a missing column as empty.
 */
const cell = (row: Row, column: string): string => {
    const value = row[column];
    return typeof value === "string" ? value.trim() : "";
};

/** Plain decimal notation; no exponents, hex or binary literals */
const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/**
 * Parses a coordinate, rejecting anything but a decimal number within the
 * allowed range.
 */
const parseCoordinate = (text: string, limit: number): number | undefined => {
    if (!DECIMAL.test(text)) return undefined;
    const value = Number(text);
    if (!Number.isFinite(value) || Math.abs(value) > limit) return undefined;
    return value;
};

/**
 * Decides the time type a row must carry, if any. A row restricted to one
 * category follows that category; otherwise the filter applies only when
 * every requested category declares the same time type.
 *
 * @param categories - Requested categories.
 * @param categoryFilter - Category named on the row.
 * @returns The required time type.
 */
export const requiredTimeType = (
    categories: CategoryTable,
    categoryFilter?: string,
): string | undefined => {
    if (categoryFilter !== undefined) {
        return categories.get(categoryFilter)?.timeType;
    }

    let required: string | undefined;
    for (const category of categories.values()) {
        if (category.timeType === undefined) return undefined;
        if (required !== undefined && required !== category.timeType) {
            return undefined;
        }
        required = category.timeType;
    }
    return required;
};

/**
 * Classifies one parsed row.
 *
 * @param row - The parsed row, keyed by header.
 * @param columns - Input column names.
 * @param categories - Requested categories.
 * @returns The point, or why the row is dropped.
 */
export const classifyRow = (
    row: Row,
    columns: InputColumns,
    categories: CategoryTable,
): RowOutcome => {
    const pointId = cell(row, columns.id);
    if (pointId === "") {
        return { kind: "invalid", reason: "missing id" };
    }

    const lat = parseCoordinate(cell(row, columns.lat), 90);
    const lon = parseCoordinate(cell(row, columns.lon), 180);
    if (lat === undefined || lon === undefined) {
        return {
            kind: "invalid",
            reason: `unusable coordinates for ${pointId}`,
        };
    }

    const category = cell(row, columns.category);
    if (category !== "" && !categories.has(category)) {
        return {
            kind: "filtered",
            reason: `category '${category}' not requested`,
        };
    }
    const categoryFilter = category === "" ? undefined : category;

    // Without a time column every row passes; with one, a blank cell does not
    const hasTimeColumn = row[columns.timeType] !== undefined;
    const timeType = cell(row, columns.timeType);
    const required = requiredTimeType(categories, categoryFilter);
    if (required !== undefined && hasTimeColumn && timeType !== required) {
        return {
            kind: "filtered",
            reason:
                timeType === ""
                    ? `time type missing, '${required}' required`
                    : `time type '${timeType}' is not '${required}'`,
        };
    }

    return {
        kind: "point",
        point: {
            pointId,
            lat,
            lon,
            ...(categoryFilter !== undefined && { categoryFilter }),
        },
    };
};

// ---------------------------------------------------------------------------------
// Reader
// ---------------------------------------------------------------------------------

/**
 * Pull-based reader yielding chunks of at most `chunkSize` valid points.
 */
export class ChunkReader implements AsyncIterable<Chunk> {
    private readonly chunkSize: number;
    private readonly categories: CategoryTable;
    private readonly columns: InputColumns;

    private readonly pending: LocationPoint[] = [];
    private readonly counters: ReaderStats = {
        read: 0,
        skippedInvalid: 0,
        skippedFiltered: 0,
    };

    private parser: Papa.Parser | undefined;
    private paused = false;
    private finished = false;
    private failure: Error | undefined;
    private wake: (() => void) | undefined;
    private sequence = 0;

    /**
     * @param source - CSV text stream with a header row.
     * @param options - Reader options.
     */
    constructor(
        private readonly source: Readable,
        options: ChunkReaderOptions,
    ) {
        if (!Number.isInteger(options.chunkSize) || options.chunkSize < 1) {
            throw new Error(
                `Chunk size must be a positive integer, got ${options.chunkSize}`,
            );
        }
        this.chunkSize = options.chunkSize;
        this.categories = options.categories;
        this.columns = { ...DEFAULT_COLUMNS, ...options.columns };

        this.start();
    }

    /**
     * Opens a reader over a UTF-8 CSV file.
     *
     * @param filePath - The input file.
     * @param options - Reader options.
     * @returns The reader.
     */
    static fromFile(
        filePath: string,
        options: ChunkReaderOptions,
    ): ChunkReader {
        return new ChunkReader(
            fs.createReadStream(filePath, { encoding: "utf8" }),
            options,
        );
    }

    /** Row counters so far. */
    get stats(): Readonly<ReaderStats> {
        return { ...this.counters };
    }

    /**
     * Reads the next chunk.
     *
     * @returns The chunk, or undefined once the input is exhausted.
     * @throws {Error} If the source cannot be read.
     */
    async next(): Promise<Chunk | undefined> {
        while (this.pending.length < this.chunkSize && !this.finished) {
            const rowsArrived = new Promise<void>((resolve) => {
                this.wake = resolve;
            });
            if (this.paused && this.parser) {
                this.paused = false;
                this.source.resume();
                this.parser.resume();
            }
            await rowsArrived;
        }

        if (this.failure) throw this.failure;
        if (this.pending.length === 0) return undefined;

        const points = this.pending.splice(0, this.chunkSize);
        this.sequence++;

        if (VERBOSE)
            logger(
                `chunk ${this.sequence}: ${points.length} points`,
                this.stats,
            );

        return { sequence: this.sequence, points };
    }

    async *[Symbol.asyncIterator](): AsyncIterator<Chunk> {
        while (true) {
            const chunk = await this.next();
            if (chunk === undefined) return;
            yield chunk;
        }
    }

    /**
     * Stops reading. Buffered points are discarded.
     */
    close(): void {
        if (this.finished) return;
        this.finished = true;
        this.parser?.abort();
        this.source.destroy();
        this.notify();
    }

    /**
     * Starts parsing. Rows flow until the first full chunk is buffered.
     */
    private start(): void {
        Papa.parse<Row>(this.source, {
            header: true,
            skipEmptyLines: true,
            transformHeader: (header: string) =>
                header.replace(/^\uFEFF/, "").trim(),
            step: (result: Papa.ParseStepResult<Row>, parser: Papa.Parser) => {
                this.parser = parser;
                this.accept(result.data);
                if (
                    this.pending.length >= this.chunkSize &&
                    !this.paused &&
                    !this.finished
                ) {
                    this.paused = true;
                    this.source.pause();
                    parser.pause();
                    this.notify();
                }
            },
            complete: () => {
                this.finished = true;
                this.notify();
            },
            error: (err: Error) => {
                error("failed to read input", err);
                this.failure = err;
                this.finished = true;
                this.notify();
            },
        });
    }

    private accept(row: Row): void {
        this.counters.read++;
        const outcome = classifyRow(row, this.columns, this.categories);

        switch (outcome.kind) {
            case "point":
                this.pending.push(outcome.point);
                return;
            case "invalid":
                this.counters.skippedInvalid++;
                if (VERBOSE)
                    logger(`skipped row ${this.counters.read}: ${outcome.reason}`);
                return;
            case "filtered":
                this.counters.skippedFiltered++;
                if (VERBOSE)
                    logger(`filtered row ${this.counters.read}: ${outcome.reason}`);
                return;
        }
    }

    private notify(): void {
        const wake = this.wake;
        this.wake = undefined;
        if (wake) wake();
    }
}
