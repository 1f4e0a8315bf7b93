export { version } from "./version";
export {
    type FailureKind,
    type GeoHit,
    type GeoQuery,
    type GeoQueryResult,
    type GeoSearchClient,
    GeoSearchError,
    TRANSIENT_FAILURES,
    isTransientFailure,
} from "./geo";
export { formatDistance, parseDistance } from "./utils/distance";
