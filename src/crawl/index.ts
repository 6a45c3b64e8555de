export * from "./htmlParser";
export * from "./crawler";
