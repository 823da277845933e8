/**
 * packages/utils - shared runtime helpers
 */

export * from "./logger";
export * from "./ring-buffer";
export * from "./backoff";
export * from "./cli-dashboard";
