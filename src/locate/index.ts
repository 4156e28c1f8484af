export * from "./document";
export * from "./keywords";
export * from "./pagination";
export * from "./sectionLocator";
export * from "./strategies";
export * from "./tiers";
export * from "./types";
