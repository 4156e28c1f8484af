export * from "./apiRoundProbe";
export * from "./dateRoundResolver";
export * from "./factory";
export * from "./pageHint";
export * from "./probeRoundResolver";
export * from "./reconcilingRoundResolver";
export * from "./types";
