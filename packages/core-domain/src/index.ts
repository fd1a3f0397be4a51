export * from "./entities/entry";
export * from "./entities/manifest";
export * from "./entities/change-set";
export * from "./entities/destination-state";
