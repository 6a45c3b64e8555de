export * from "./types";
export * from "./recordStore";
