export * from "./types";
export * from "./title";
export * from "./arxivResolver";
