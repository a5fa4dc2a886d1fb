export * from "./csv";
export * from "./tocDownloader";
export * from "./tocParser";
