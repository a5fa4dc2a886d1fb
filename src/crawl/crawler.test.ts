import { describe, expect, it } from "vitest";
import { AppConfig, DEFAULT_CONFIG } from "../config";
import { CrawlAbortedError, SchemaError } from "../core/errors";
import { PageFetcher } from "../core/fetch";
import { Logger, MetricsRegistry } from "../observability";
import { CollectionQuery, ResultRecord } from "../types";
import { buildResultsPageUrl, crawlCollection, crawlCollections, CrawlDependencies } from "./crawler";

const collection: CollectionQuery = { name: "Test, Collection", searchName: "Test%2C+Collection" };

const HEADER_ROW =
  "<tr><th>#</th><th></th><th>Date</th><th>Author</th><th>Origin</th><th>Addressee</th><th>Destination</th><th>Repositories &amp; Versions</th></tr>";

function dataRow(num: string): string {
  return `<tr><td>${num}</td><td><a href="/forms/advanced/DOC${num}/view">Letter</a></td><td>1600</td><td>A</td><td>B</td><td>C</td><td>D</td><td>E</td></tr>`;
}

function resultsPage(total: number, nums: string[]): string {
  return `<span class="font-18">${total} results</span><table id="results">${HEADER_ROW}${nums.map(dataRow).join("")}</table>`;
}

function range(from: number, count: number): string[] {
  return Array.from({ length: count }, (_, index) => String(from + index));
}

function fakeFetcher(pagesByStart: Record<number, string>): { fetchPage: PageFetcher; requested: string[] } {
  const requested: string[] = [];
  const fetchPage: PageFetcher = async (url) => {
    requested.push(url);
    const start = Number(new URL(url).searchParams.get("start"));
    const body = pagesByStart[start];
    if (body === undefined) {
      throw new Error(`unexpected page request ${url}`);
    }
    return { url, status: 200, body };
  };
  return { fetchPage, requested };
}

function makeDeps(fetchPage: PageFetcher, overrides: Partial<AppConfig> = {}): CrawlDependencies {
  return {
    config: { ...DEFAULT_CONFIG, baseUrl: "http://catalog.test/search", maxPages: 10, ...overrides },
    logger: new Logger({ component: "test", runId: "run_test", minLevel: "error" }, () => undefined),
    metrics: new MetricsRegistry(),
    fetchPage,
  };
}

describe("buildResultsPageUrl", () => {
  it("appends the collection token and start offset", () => {
    expect(buildResultsPageUrl("http://catalog.test/search", "Test%2C+Collection", 10)).toBe(
      "http://catalog.test/search?col_cat=Test%2C+Collection&start=10",
    );
  });

  it("extends an existing query string", () => {
    expect(buildResultsPageUrl("http://catalog.test/search?lang=en", "abc", 0)).toBe(
      "http://catalog.test/search?lang=en&col_cat=abc&start=0",
    );
  });
});

describe("crawlCollection", () => {
  it("finishes after one page when the page holds every result", async () => {
    const { fetchPage, requested } = fakeFetcher({ 0: resultsPage(5, range(1, 5)) });
    const deps = makeDeps(fetchPage);

    const records = await crawlCollection(deps, collection);

    expect(records.map((record) => record.resultNum)).toEqual([1, 2, 3, 4, 5]);
    expect(requested).toEqual(["http://catalog.test/search?col_cat=Test%2C+Collection&start=0"]);
    expect(deps.metrics.getCounter("pages_crawled")).toBe(1);
    expect(deps.metrics.getCounter("collections_crawled")).toBe(1);
  });

  it("requests the next page from the accumulated count", async () => {
    const { fetchPage, requested } = fakeFetcher({
      0: resultsPage(12, range(1, 10)),
      10: resultsPage(12, range(11, 2)),
    });

    const records = await crawlCollection(makeDeps(fetchPage), collection);

    expect(records).toHaveLength(12);
    expect(requested).toEqual([
      "http://catalog.test/search?col_cat=Test%2C+Collection&start=0",
      "http://catalog.test/search?col_cat=Test%2C+Collection&start=10",
    ]);
    expect(records[11].id).toBe("DOC12");
  });

  it("hands every page to onPage before moving on", async () => {
    const { fetchPage } = fakeFetcher({
      0: resultsPage(12, range(1, 10)),
      10: resultsPage(12, range(11, 2)),
    });
    const seen: Array<{ count: number; start: number; retrieved: number }> = [];

    await crawlCollection(makeDeps(fetchPage), collection, {
      onPage: async (records, progress) => {
        seen.push({ count: records.length, start: progress.start, retrieved: progress.retrieved });
      },
    });

    expect(seen).toEqual([
      { count: 10, start: 0, retrieved: 10 },
      { count: 2, start: 10, retrieved: 12 },
    ]);
  });

  it("does not publish pages on a dry run", async () => {
    const { fetchPage } = fakeFetcher({ 0: resultsPage(2, range(1, 2)) });
    let published = 0;

    const records = await crawlCollection(makeDeps(fetchPage), collection, {
      dryRun: true,
      onPage: async () => {
        published += 1;
      },
    });

    expect(records).toHaveLength(2);
    expect(published).toBe(0);
  });

  it("aborts with a schema error and keeps earlier pages with the caller", async () => {
    const { fetchPage } = fakeFetcher({
      0: resultsPage(12, range(1, 10)),
      10: resultsPage(12, ["11", "twelve"]),
    });
    const published: ResultRecord[] = [];

    const crawl = crawlCollection(makeDeps(fetchPage), collection, {
      onPage: async (records) => {
        published.push(...records);
      },
    });

    await expect(crawl).rejects.toBeInstanceOf(SchemaError);
    expect(published).toHaveLength(10);
  });

  it("aborts when a page adds no records before the total is reached", async () => {
    const { fetchPage } = fakeFetcher({
      0: resultsPage(12, range(1, 10)),
      10: resultsPage(12, []),
    });

    const crawl = crawlCollection(makeDeps(fetchPage), collection);

    await expect(crawl).rejects.toMatchObject({ name: "CrawlAbortedError", reason: "stalled", retrieved: 10, total: 12 });
  });

  it("aborts once the page ceiling is reached", async () => {
    const { fetchPage, requested } = fakeFetcher({ 0: resultsPage(12, range(1, 10)) });

    const crawl = crawlCollection(makeDeps(fetchPage, { maxPages: 1 }), collection);

    await expect(crawl).rejects.toBeInstanceOf(CrawlAbortedError);
    await expect(crawl).rejects.toMatchObject({ reason: "page_limit" });
    expect(requested).toHaveLength(1);
  });

  it("never accumulates more than the first reported total", async () => {
    const { fetchPage } = fakeFetcher({ 0: resultsPage(3, range(1, 5)) });

    const records = await crawlCollection(makeDeps(fetchPage), collection);

    expect(records.map((record) => record.resultNum)).toEqual([1, 2, 3]);
  });

  it("fails fast when the collection has no search token", async () => {
    const { fetchPage, requested } = fakeFetcher({});

    await expect(crawlCollection(makeDeps(fetchPage), { name: "Nameless", searchName: "" })).rejects.toThrow(
      'Collection "Nameless" has no search token',
    );
    expect(requested).toEqual([]);
  });
});

describe("crawlCollections", () => {
  it("crawls each collection in order", async () => {
    const requested: string[] = [];
    const fetchPage: PageFetcher = async (url) => {
      requested.push(url);
      return { url, status: 200, body: resultsPage(1, ["1"]) };
    };
    const other: CollectionQuery = { name: "Other", searchName: "Other" };

    const results = await crawlCollections(makeDeps(fetchPage), [collection, other]);

    expect(results.map((result) => [result.collection.name, result.records.length])).toEqual([
      ["Test, Collection", 1],
      ["Other", 1],
    ]);
    expect(results[1].records[0].collection).toBe("Other");
    expect(requested[1]).toBe("http://catalog.test/search?col_cat=Other&start=0");
  });
});
