import { AppConfig } from "../config";
import { crawlCollections } from "../crawl";
import { Logger, MetricsRegistry } from "../observability";
import { createSink } from "../sink";
import { runTocCsv as writeTocCsv, runTocDownload as downloadTocFiles } from "../toc";
import { CollectionQuery } from "../types";
import { ConfigError } from "./errors";
import { PageFetcher } from "./fetch";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  fetchPage: PageFetcher;
}

export interface CrawlCommandOptions {
  dryRun: boolean;
  collectionNames: string[];
}

export function selectCollections(config: AppConfig, names: string[]): CollectionQuery[] {
  if (names.length === 0) {
    return config.collections;
  }

  return names.map((name) => {
    const match = config.collections.find((collection) => collection.name === name || collection.searchName === name);
    if (!match) {
      throw new ConfigError(`Unknown collection: ${name}`);
    }
    return match;
  });
}

export async function runCrawl(ctx: CommandContext, options: CrawlCommandOptions): Promise<number> {
  const collections = selectCollections(ctx.config, options.collectionNames);
  const sink = options.dryRun ? undefined : createSink(ctx.config, ctx.runId);
  ctx.logger.info("crawl_start", {
    mode: options.dryRun ? "dry-run" : "normal",
    collections: collections.map((collection) => collection.name),
    output: sink?.location,
  });

  const results = await crawlCollections(
    { config: ctx.config, logger: ctx.logger, metrics: ctx.metrics, fetchPage: ctx.fetchPage },
    collections,
    {
      dryRun: options.dryRun,
      onPage: sink ? (pageRecords) => sink.publishRecords(pageRecords) : undefined,
    },
  );
  const retrieved = results.reduce((sum, result) => sum + result.records.length, 0);

  ctx.logger.info("crawl_complete", { collections: collections.length, retrieved });
  return retrieved;
}

export async function runTocDownload(ctx: CommandContext): Promise<void> {
  ctx.logger.info("toc_download_begin", { items: ctx.config.toc.items.length, outputDir: ctx.config.toc.outputDir });
  const summary = await downloadTocFiles({
    config: ctx.config,
    logger: ctx.logger,
    metrics: ctx.metrics,
    fetchPage: ctx.fetchPage,
  });
  ctx.logger.info("toc_download_complete", { ...summary });
}

export async function runTocCsv(ctx: CommandContext): Promise<void> {
  ctx.logger.info("toc_csv_begin", { outputDir: ctx.config.toc.outputDir });
  const summary = await writeTocCsv({ config: ctx.config, logger: ctx.logger, metrics: ctx.metrics });
  ctx.logger.info("toc_csv_complete", { ...summary });
}

export async function runToc(ctx: CommandContext): Promise<void> {
  await runTocDownload(ctx);
  await runTocCsv(ctx);
}

export function listCollections(ctx: CommandContext, write: (line: string) => void = console.log): void {
  for (const collection of ctx.config.collections) {
    write(`${collection.name}\t${collection.searchName}`);
  }
}
