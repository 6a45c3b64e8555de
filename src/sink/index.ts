export * from "./types";
export * from "./localJsonSink";
