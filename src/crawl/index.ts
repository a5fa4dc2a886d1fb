export * from "./crawler";
export * from "./htmlParser";
