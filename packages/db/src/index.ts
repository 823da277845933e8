export * from "./schema";

export { getDb, closeDb } from "./get-db";
export type { Db } from "./get-db";
