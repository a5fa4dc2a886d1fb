export class HarvestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class RetrievalError extends HarvestError {
  readonly url: string;
  readonly status: number;

  constructor(url: string, status: number) {
    super(`HTTP ${status} while fetching ${url}`);
    this.url = url;
    this.status = status;
  }
}

export class ParseError extends HarvestError {}

export interface SchemaIssue {
  field: string;
  problem: "missing" | "not_integer";
  value?: string;
}

export class SchemaError extends HarvestError {
  readonly issues: SchemaIssue[];
  readonly rowIndex?: number;

  constructor(issues: SchemaIssue[], rowIndex?: number) {
    const where = rowIndex === undefined ? "record" : `row ${rowIndex}`;
    const detail = issues
      .map((issue) => (issue.problem === "missing" ? `${issue.field} missing` : `${issue.field} not an integer (${JSON.stringify(issue.value)})`))
      .join("; ");
    super(`Invalid ${where}: ${detail}`);
    this.issues = issues;
    this.rowIndex = rowIndex;
  }
}

export type CrawlAbortReason = "page_limit" | "stalled";

export class CrawlAbortedError extends HarvestError {
  readonly reason: CrawlAbortReason;
  readonly retrieved: number;
  readonly total: number;

  constructor(reason: CrawlAbortReason, retrieved: number, total: number) {
    const why = reason === "page_limit" ? "page limit reached" : "page added no records";
    super(`Crawl aborted (${why}) after ${retrieved} of ${total} results`);
    this.reason = reason;
    this.retrieved = retrieved;
    this.total = total;
  }
}

export class ConfigError extends HarvestError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
