export * from "./schema.js";
export * from "./dates.js";
export * from "./errors.js";
export * from "./validate.js";
export * from "./parse-record.js";
