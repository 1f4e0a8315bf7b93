/**
 * One input file matched against a set of categories.
 */
export type MatchJob = {
    /** Label used in logs and summaries (defaults to the input file name) */
    name: string;
    /** Input CSV */
    input: string;
    /** Output file, truncated when the job starts */
    output: string;
    /** Requested category names, in output order */
    categories: readonly string[];
    /** Output format */
    format: "csv" | "jsonl";
    /** Write only matched results */
    matchedOnly: boolean;
    /** Prefix CSV output with a UTF-8 byte order mark */
    bom: boolean;
};
