export * from "./regions";
export * from "./rowNormalizer";
