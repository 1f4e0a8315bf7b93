/**
 * Multipliers from the supported distance units to meters.
 */
const UNIT_TO_METERS: Record<string, number> = {
    m: 1,
    km: 1000,
};

/**
 * Parses a distance such as `"200m"`, `"0.3km"` or `250` into meters.
 *
 * Bare numbers (and numeric strings without a unit) are taken as meters.
 *
 * @param value - The distance to parse.
 * @returns The distance in meters.
 * @throws {Error} If the value is not a positive, finite distance.
 */
export const parseDistance = (value: string | number): number => {
    if (typeof value === "number") {
        if (!Number.isFinite(value) || value <= 0) {
            throw new Error(`Invalid distance '${value}'`);
        }
        return value;
    }

    const match = /^\s*(\d+(?:\.\d+)?)\s*(m|km)?\s*$/i.exec(value);
    if (match === null) {
        throw new Error(`Invalid distance '${value}'`);
    }

    const amount = Number.parseFloat(match[1]);
    const unit = (match[2] ?? "m").toLowerCase();
    const meters = amount * UNIT_TO_METERS[unit];

    if (meters <= 0) {
        throw new Error(`Invalid distance '${value}'`);
    }

    // Avoid 0.3km turning into 300.00000000000006
    return Math.round(meters * 1000) / 1000;
};

/**
 * Formats meters the way the backend expects a `geo_distance` radius.
 *
 * @param meters - Distance in meters.
 * @returns Distance string such as `"200m"`.
 */
export const formatDistance = (meters: number): string => `${meters}m`;
