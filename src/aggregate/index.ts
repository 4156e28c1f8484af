export * from "./regionAggregator";
export * from "./snapshot";
export * from "./types";
