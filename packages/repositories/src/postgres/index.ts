export { createPostgresMarketDataRepository } from "./market-data-repository";
