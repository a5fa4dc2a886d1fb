import { assertCollection, AppConfig } from "../config";
import { CrawlAbortedError } from "../core/errors";
import { PageFetcher } from "../core/fetch";
import { Logger, MetricsRegistry } from "../observability";
import { CollectionQuery, ResultRecord } from "../types";
import { parseResultsPage } from "./htmlParser";

export interface CrawlDependencies {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  fetchPage: PageFetcher;
}

export interface CrawlProgress {
  collection: string;
  pageIndex: number;
  start: number;
  retrieved: number;
  total: number;
}

export interface CrawlOptions {
  dryRun?: boolean;
  onPage?: (records: ResultRecord[], progress: CrawlProgress) => Promise<void>;
}

export interface CollectionCrawlResult {
  collection: CollectionQuery;
  records: ResultRecord[];
}

type CrawlState = "crawling" | "done";

export function buildResultsPageUrl(baseUrl: string, searchName: string, start: number): string {
  const separator = baseUrl.includes("?") ? "&" : "?";
  return `${baseUrl}${separator}col_cat=${searchName}&start=${start}`;
}

export async function crawlCollection(
  deps: CrawlDependencies,
  collection: CollectionQuery,
  options: CrawlOptions = {},
): Promise<ResultRecord[]> {
  assertCollection(collection);
  const { config, logger, metrics, fetchPage } = deps;
  const records: ResultRecord[] = [];
  let state: CrawlState = "crawling";
  let expectedTotal: number | undefined;
  let pageIndex = 0;

  logger.info("crawl_collection_start", { collection: collection.name, maxPages: config.maxPages });

  while (state === "crawling") {
    if (pageIndex >= config.maxPages) {
      logger.error("crawl_max_pages_reached", { collection: collection.name, maxPages: config.maxPages });
      throw new CrawlAbortedError("page_limit", records.length, expectedTotal ?? 0);
    }

    const start = records.length;
    const pageUrl = buildResultsPageUrl(config.baseUrl, collection.searchName, start);
    pageIndex += 1;
    logger.info("crawl_page_start", { collection: collection.name, pageUrl, start });

    const stopTimer = metrics.startTimer("page_fetch_ms");
    const page = await fetchPage(pageUrl);
    const durationMs = stopTimer();
    metrics.incrementCounter("pages_crawled", 1);

    const parsed = parseResultsPage(page.body, collection);
    const total = expectedTotal ?? parsed.totalResults;
    expectedTotal = total;
    if (parsed.totalResults !== total) {
      logger.warn("crawl_total_changed", { collection: collection.name, firstTotal: total, pageTotal: parsed.totalResults });
    }

    let pageRecords = parsed.records;
    const remaining = Math.max(total - records.length, 0);
    if (pageRecords.length > remaining) {
      logger.warn("crawl_page_overflow_trimmed", {
        collection: collection.name,
        pageUrl,
        received: pageRecords.length,
        kept: remaining,
      });
      pageRecords = pageRecords.slice(0, remaining);
    }

    records.push(...pageRecords);
    metrics.incrementCounter("records_extracted", pageRecords.length);

    const progress: CrawlProgress = {
      collection: collection.name,
      pageIndex,
      start,
      retrieved: records.length,
      total,
    };
    logger.info("crawl_page_complete", { ...progress, pageUrl, extractedOnPage: pageRecords.length, durationMs });

    if (options.dryRun) {
      for (const record of pageRecords) {
        logger.debug("crawl_record_dry_run", { collection: record.collection, id: record.id, resultNum: record.resultNum });
      }
    } else if (options.onPage) {
      await options.onPage(pageRecords, progress);
    }

    if (records.length >= total) {
      state = "done";
    } else if (pageRecords.length === 0) {
      logger.error("crawl_stalled", { collection: collection.name, pageUrl, retrieved: records.length, total });
      throw new CrawlAbortedError("stalled", records.length, total);
    }
  }

  metrics.incrementCounter("collections_crawled", 1);
  logger.info("crawl_collection_finished", { collection: collection.name, retrieved: records.length, pagesVisited: pageIndex });
  return records;
}

export async function crawlCollections(
  deps: CrawlDependencies,
  collections: CollectionQuery[],
  options: CrawlOptions = {},
): Promise<CollectionCrawlResult[]> {
  const results: CollectionCrawlResult[] = [];
  for (const collection of collections) {
    const records = await crawlCollection(deps, collection, options);
    results.push({ collection, records });
  }
  return results;
}
