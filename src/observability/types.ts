export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

export interface LogFields {
  collection?: string;
  url?: string;
  pageUrl?: string;
  item?: string;
  start?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "pages_crawled"
  | "records_extracted"
  | "collections_crawled"
  | "toc_downloads_ok"
  | "toc_downloads_failed"
  | "toc_rows_written";

export type MetricTimerName = "page_fetch_ms" | "toc_download_ms";
