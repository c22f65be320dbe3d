export * from "./loadConfig";
export * from "./targets";
export * from "./types";
