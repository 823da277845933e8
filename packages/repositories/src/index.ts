/**
 * packages/repositories - Shared Repository Layer
 *
 * Interfaces live apart from their Postgres implementations so apps can swap
 * in fakes.
 */

export * from "./interfaces";
export * from "./postgres";
