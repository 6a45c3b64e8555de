export * from "./types";
export * from "./logger";
export * from "./metrics";
export * from "./progress";
export * from "./runId";
