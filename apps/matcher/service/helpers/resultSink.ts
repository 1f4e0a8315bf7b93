/**
 * Durable, append-only destinations for match results.
 *
 * Each sink truncates its file when opened and appends on every write. Rows
 * already written are never rewritten, so a run aborted after a flush leaves
 * a valid (partial) file behind.
 *
 * @module resultSink
 */

import * as fs from "node:fs";
import * as path from "node:path";
import debug from "debug";
import * as Papa from "papaparse";
import { VERBOSE } from "../config";
import type { CategoryTable, MatchResult } from "../types";

const logger = debug("matcher:sink");

const fsp = fs.promises;

// ---------------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------------

/**
 * Output value of a single column.
 */
export type OutputValue = string | number | null;

/**
 * One output row, keyed by column name.
 */
export type OutputRecord = Record<string, OutputValue>;

/**
 * A durable destination for results.
 */
export interface ResultSink {
    /** Path of the file written */
    readonly target: string;
    /** Creates (or truncates) the destination and writes any header. */
    open(): Promise<void>;
    /**
     * Appends rows in the given order.
     *
     * @returns Number of rows written after filtering.
     */
    write(rows: readonly MatchResult[]): Promise<number>;
    /** Releases the destination. */
    close(): Promise<void>;
}

/**
 * Options shared by every sink.
 */
export type ResultSinkOptions = {
    /** Path of the output file */
    target: string;
    /** Column names, in output order */
    columns: readonly string[];
    /** Write only matched results */
    matchedOnly?: boolean;
};

export type OutputFormat = "csv" | "jsonl";

// ---------------------------------------------------------------------------------
// Row shaping
// ---------------------------------------------------------------------------------

/** Columns every output starts with */
const LEADING_COLUMNS = [
    "point_id",
    "place_type",
    "status",
    "lat",
    "lon",
    "distance",
    "facility_code",
] as const;

/** Column written last */
const FAILURE_COLUMN = "failure_reason";

/**
 * Builds the output columns for a set of categories: the fixed leading
 * columns, the union of the categories' attribute fields and the failure
 * reason.
 *
 * @param categories - The categories of the run.
 * @returns Column names in output order.
 */
export const buildOutputColumns = (categories: CategoryTable): string[] => {
    const attributes: string[] = [];
    for (const category of categories.values()) {
        for (const attribute of category.attributes) {
            if (!attributes.includes(attribute)) attributes.push(attribute);
        }
    }
    return [...LEADING_COLUMNS, ...attributes, FAILURE_COLUMN];
};

/**
 * Flattens a result into an output record. Columns the result has no value
 * for are null.
 *
 * @param result - The result to flatten.
 * @param columns - Output columns.
 * @returns The record.
 */
export const toOutputRecord = (
    result: MatchResult,
    columns: readonly string[],
): OutputRecord => {
    const known: OutputRecord = {
        point_id: result.pointId,
        place_type: result.placeType,
        status: result.status,
        lat: result.lat,
        lon: result.lon,
        distance: result.distance ?? null,
        facility_code: result.facilityCode ?? null,
        [FAILURE_COLUMN]: result.failureReason ?? null,
    };

    const record: OutputRecord = {};
    for (const column of columns) {
        record[column] =
            column in known
                ? known[column]
                : (result.facilityAttrs?.[column] ?? null);
    }
    return record;
};

// ---------------------------------------------------------------------------------
// Sinks
// ---------------------------------------------------------------------------------

/**
 * Shared file handling for the sinks.
 */
abstract class FileResultSink implements ResultSink {
    readonly target: string;
    protected readonly columns: readonly string[];
    private readonly matchedOnly: boolean;
    private opened = false;

    constructor(options: ResultSinkOptions) {
        this.target = options.target;
        this.columns = options.columns;
        this.matchedOnly = options.matchedOnly ?? false;
    }

    async open(): Promise<void> {
        await fsp.mkdir(path.dirname(this.target), { recursive: true });
        await fsp.writeFile(this.target, this.preamble(), "utf8");
        this.opened = true;
        if (VERBOSE) logger(`opened ${this.target}`);
    }

    async write(rows: readonly MatchResult[]): Promise<number> {
        if (!this.opened) await this.open();

        const kept = this.matchedOnly
            ? rows.filter((row) => row.status === "matched")
            : rows;
        if (kept.length === 0) return 0;

        await fsp.appendFile(
            this.target,
            this.serialize(kept.map((row) => toOutputRecord(row, this.columns))),
            "utf8",
        );
        if (VERBOSE) logger(`appended ${kept.length} rows to ${this.target}`);
        return kept.length;
    }

    async close(): Promise<void> {
        if (!this.opened) await this.open();
    }

    /** Text written when the file is created. */
    protected abstract preamble(): string;

    /** Text appended for a group of records. */
    protected abstract serialize(records: OutputRecord[]): string;
}

/**
 * CSV output with a header row, written with papaparse.
 */
export class CsvResultSink extends FileResultSink {
    private readonly bom: boolean;

    /**
     * @param options - Sink options; `bom` prefixes the file with a UTF-8
     * byte order mark.
     */
    constructor(options: ResultSinkOptions & { bom?: boolean }) {
        super(options);
        this.bom = options.bom ?? false;
    }

    protected preamble(): string {
        const header = Papa.unparse([[...this.columns]], { newline: "\n" });
        return `${this.bom ? "\uFEFF" : ""}${header}\n`;
    }

    protected serialize(records: OutputRecord[]): string {
        const data = records.map((record) =>
            this.columns.map((column) => {
                const value = record[column];
                return value === null ? "" : String(value);
            }),
        );
        return `${Papa.unparse(data, { newline: "\n" })}\n`;
    }
}

/**
 * One JSON object per line.
 */
export class JsonLinesResultSink extends FileResultSink {
    protected preamble(): string {
        return "";
    }

    protected serialize(records: OutputRecord[]): string {
        return records.map((record) => `${JSON.stringify(record)}\n`).join("");
    }
}

/**
 * Creates the sink for an output format.
 *
 * @param format - Output format.
 * @param options - Sink options.
 * @returns The sink.
 */
export const createResultSink = (
    format: OutputFormat,
    options: ResultSinkOptions & { bom?: boolean },
): ResultSink =>
    format === "jsonl"
        ? new JsonLinesResultSink(options)
        : new CsvResultSink(options);
