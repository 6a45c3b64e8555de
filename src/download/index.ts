export * from "./validity";
export * from "./references";
export * from "./outcomes";
export * from "./fetcher";
export * from "./scheduler";
export * from "./summary";
export * from "./archive";
export * from "./downloader";
