export * from "./decode";
export * from "./factory";
export * from "./fetchClient";
export * from "./retryPolicy";
