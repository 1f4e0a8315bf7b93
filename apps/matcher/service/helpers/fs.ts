import * as fs from "node:fs";
import debug from "debug";
import { VERBOSE } from "../config";

const logger = debug("matcher:fs");
const error = debug("error:fs");

/**
 * Counts the lines in the given file.
 *
 * @alias countFileLines
 *
 * @param filePath - The path to the file to count the lines of.
 * @returns {Promise<number>} - A promise that resolves with the number of lines in the file.
 */
export const countLinesInFile = (filePath: string): Promise<number> => {
    return new Promise((resolve, reject) => {
        // Create a read stream from the file
        const readStream = fs.createReadStream(filePath, "utf-8");

        // Initialize the lines and last variables
        let lines = 0;
        let last: string | undefined = undefined;
        let empty = true;

        // On data, count the newlines in the chunk and remember its last character
        readStream.on("data", (chunk) => {
            const text =
                typeof chunk === "string" ? chunk : chunk.toString("utf-8");
            if (text.length === 0) return;
            empty = false;
            lines += text.split("\n").length - 1;
            last = text[text.length - 1];
        });

        // On end, count an unterminated last line
        readStream.on("end", () => {
            if (!empty && last !== "\n") ++lines;

            if (VERBOSE) logger(`${filePath} has ${lines} lines`);

            resolve(lines);
        });

        // On error, reject the promise
        readStream.on("error", (err) => {
            reject(err);
        });
    });
};

/**
 * Counts the data rows of a CSV file with a header row.
 *
 * @param filePath - The CSV file.
 * @returns Lines after the header (0 for an empty file).
 */
export const countCsvRows = async (filePath: string): Promise<number> => {
    const lines = await countLinesInFile(filePath);
    return Math.max(0, lines - 1);
};

/**
 * Checks if the given file exists.
 *
 * @alias fileExists
 *
 * @param filePath - The path to the file to check if it exists.
 * @returns {Promise<boolean>} - A promise that resolves with true if the file exists, false otherwise.
 */
export const fileExists = async (filePath: string): Promise<boolean> => {
    try {
        // Try to access the file
        await fs.promises.access(filePath, fs.constants.F_OK);

        // If there is no error, return true
        return true;
    } catch (err) {
        // If there is an error, log the error and return false
        error(err);
        return false;
    }
};
