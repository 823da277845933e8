export * from "./market-data-repository";
