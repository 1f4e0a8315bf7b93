export * from "./category-types";
export * from "./matching-types";
export * from "./job-types";
