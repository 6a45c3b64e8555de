export * from "./types";
export * from "./loadConfig";
