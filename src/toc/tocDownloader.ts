import fs from "node:fs";
import path from "node:path";
import { AppConfig } from "../config";
import { errorMessage } from "../core/errors";
import { PageFetcher } from "../core/fetch";
import { Logger, MetricsRegistry } from "../observability";
import { TocRow, TOC_FIELDS } from "../types";
import { formatCsv } from "./csv";
import { parseTocXml } from "./tocParser";

interface TocDependencies {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
}

export interface TocDownloadDependencies extends TocDependencies {
  fetchPage: PageFetcher;
}

export interface TocDownloadSummary {
  processed: number;
  ok: number;
  failed: number;
}

export interface TocCsvSummary {
  files: number;
  rows: number;
  csvPath: string;
}

export function buildTocUrl(template: string, item: string): string {
  return template.split("{item}").join(encodeURIComponent(item));
}

export function tocFileName(item: string): string {
  return `${item.replace(/[^A-Za-z0-9._-]/g, "_")}.xml`;
}

async function writeAtomically(filePath: string, content: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.part`;
  try {
    await fs.promises.writeFile(tempPath, content, "utf-8");
    await fs.promises.rename(tempPath, filePath);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true });
    throw error;
  }
}

export async function runTocDownload(deps: TocDownloadDependencies): Promise<TocDownloadSummary> {
  const { config, logger, metrics, fetchPage } = deps;
  const outputDir = path.resolve(config.toc.outputDir);
  let ok = 0;
  let failed = 0;

  for (const item of config.toc.items) {
    const url = buildTocUrl(config.toc.endpointTemplate, item);
    const filePath = path.join(outputDir, tocFileName(item));
    const stopTimer = metrics.startTimer("toc_download_ms");
    logger.info("toc_download_start", { item, url });

    try {
      const page = await fetchPage(url);
      await writeAtomically(filePath, page.body);
      const durationMs = stopTimer();
      metrics.incrementCounter("toc_downloads_ok", 1);
      ok += 1;
      logger.info("toc_download_ok", { item, url, filePath, durationMs });
    } catch (error) {
      const durationMs = stopTimer();
      metrics.incrementCounter("toc_downloads_failed", 1);
      failed += 1;
      logger.warn("toc_download_failed", { item, url, durationMs, error: errorMessage(error) });
    }
  }

  return { processed: ok + failed, ok, failed };
}

export async function runTocCsv(deps: TocDependencies): Promise<TocCsvSummary> {
  const { config, logger, metrics } = deps;
  const outputDir = path.resolve(config.toc.outputDir);
  const csvPath = path.resolve(config.toc.csvPath);

  const entries = await fs.promises.readdir(outputDir);
  const xmlFiles = entries.filter((entry) => path.extname(entry).toLowerCase() === ".xml").sort();

  const rows: TocRow[] = [];
  for (const fileName of xmlFiles) {
    const xml = await fs.promises.readFile(path.join(outputDir, fileName), "utf-8");
    const fileRows = parseTocXml(xml);
    logger.debug("toc_file_parsed", { fileName, rows: fileRows.length });
    rows.push(...fileRows);
  }

  await fs.promises.mkdir(path.dirname(csvPath), { recursive: true });
  await fs.promises.writeFile(csvPath, formatCsv(TOC_FIELDS, rows), "utf-8");
  metrics.incrementCounter("toc_rows_written", rows.length);
  logger.info("toc_csv_written", { csvPath, files: xmlFiles.length, rows: rows.length });

  return { files: xmlFiles.length, rows: rows.length, csvPath };
}
