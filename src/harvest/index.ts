export * from "./failures";
export * from "./paginatedHarvester";
export * from "./pipeline";
