import { readFileSync } from "node:fs";
import { parseDistance } from "@repo/geomatch-core/utils/distance";
import { load } from "js-yaml";
import { z } from "zod";
import type { CategoryDefinition, CategoryTable } from "../types";

/**
 * Error raised when the category radius table cannot be read or is invalid.
 */
export class CategoryConfigError extends Error {
    /** File the table was read from */
    readonly file: string;
    /** Individual validation problems */
    readonly issues: string[];

    constructor(message: string, file: string, issues: string[] = []) {
        super(
            issues.length > 0
                ? `${message}\n  - ${issues.join("\n  - ")}`
                : message,
        );
        this.name = "CategoryConfigError";
        this.file = file;
        this.issues = issues;
    }
}

const fieldName = z.string().min(1);

/**
 * Shape of one category entry in the YAML table.
 */
const categorySchema = z.object({
    radius: z.union([z.string().min(1), z.number().positive()]),
    codeField: fieldName,
    attributes: z.array(fieldName).default([]),
    timeType: z.string().min(1).optional(),
});

/**
 * The YAML table maps category names to their entries.
 */
const tableSchema = z.record(fieldName, categorySchema);

/**
 * Validates a parsed category document and converts radii to meters.
 *
 * @param document - The parsed YAML document.
 * @param file - Source file name, for errors.
 * @returns The category table.
 * @throws {CategoryConfigError} If the document is invalid.
 */
export const buildCategoryTable = (
    document: unknown,
    file: string,
): CategoryTable => {
    const parsed = tableSchema.safeParse(document);
    if (!parsed.success) {
        throw new CategoryConfigError(
            `Invalid category table '${file}'`,
            file,
            parsed.error.issues.map(
                (issue) => `${issue.path.join(".")}: ${issue.message}`,
            ),
        );
    }

    const table = new Map<string, CategoryDefinition>();
    const problems: string[] = [];

    for (const [name, entry] of Object.entries(parsed.data)) {
        try {
            table.set(name, {
                name,
                radiusMeters: parseDistance(entry.radius),
                codeField: entry.codeField,
                attributes: entry.attributes,
                ...(entry.timeType !== undefined && {
                    timeType: entry.timeType,
                }),
            });
        } catch (err) {
            problems.push(
                `${name}.radius: ${err instanceof Error ? err.message : String(err)}`,
            );
        }
    }

    if (problems.length > 0) {
        throw new CategoryConfigError(
            `Invalid category table '${file}'`,
            file,
            problems,
        );
    }
    if (table.size === 0) {
        throw new CategoryConfigError(
            `Category table '${file}' defines no categories`,
            file,
        );
    }

    return table;
};

/**
 * Reads the category radius table from a YAML file.
 *
 * @param file - Path to the YAML file.
 * @returns The category table.
 * @throws {CategoryConfigError} If the file cannot be read or is invalid.
 */
export const loadCategoryTable = (file: string): CategoryTable => {
    let document: unknown;
    try {
        document = load(readFileSync(file, "utf8"));
    } catch (err) {
        throw new CategoryConfigError(
            `Cannot read category table '${file}': ${err instanceof Error ? err.message : String(err)}`,
            file,
        );
    }
    return buildCategoryTable(document, file);
};

/**
 * Picks the requested categories out of the table, in request order.
 *
 * @param table - The full category table.
 * @param names - Requested category names.
 * @returns The table restricted to the requested categories.
 * @throws {CategoryConfigError} If a name is unknown or none is requested.
 */
export const selectCategories = (
    table: CategoryTable,
    names: readonly string[],
): CategoryTable => {
    const unique = [
        ...new Set(names.map((name) => name.trim()).filter(Boolean)),
    ];
    if (unique.length === 0) {
        throw new CategoryConfigError("No categories requested", "");
    }

    const unknown = unique.filter((name) => !table.has(name));
    if (unknown.length > 0) {
        throw new CategoryConfigError(
            `Unknown categories: ${unknown.join(", ")} (known: ${[...table.keys()].join(", ")})`,
            "",
        );
    }

    const selected = new Map<string, CategoryDefinition>();
    for (const name of unique) {
        const definition = table.get(name);
        if (definition) selected.set(name, definition);
    }
    return selected;
};
