export * from "./identifiers";
export * from "./conditions";
export * from "./definitions";
export * from "./instances";
export * from "./events";
