/**
 * The current GeoMatch release.
 */
export const version = "1.0.0";
