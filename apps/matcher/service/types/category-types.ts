/**
 * A facility category and how its matches are searched and reported.
 */
export type CategoryDefinition = {
    /** Category name, stored as `place_type` in the index */
    name: string;
    /** Search radius in meters */
    radiusMeters: number;
    /** Facility document field reported as the facility code */
    codeField: string;
    /** Facility document fields copied to the output */
    attributes: string[];
    /** Required value of the input's time column, when set */
    timeType?: string;
};

/**
 * Category radius table, keyed by category name.
 */
export type CategoryTable = ReadonlyMap<string, CategoryDefinition>;
