import { loadConfig } from "../config";
import { listCollections, runCrawl, runToc, runTocCsv, runTocDownload } from "../core/commands";
import { errorMessage } from "../core/errors";
import { createPageFetcher, FetchLike } from "../core/fetch";
import { createRateLimitPolicy, SleepFn } from "../core/rateLimit";
import { createRunId, Logger, LogWriter, MetricsRegistry } from "../observability";

export type CommandName = "crawl" | "toc-download" | "toc-csv" | "toc" | "collections";

export interface ParsedCliArgs {
  command: CommandName;
  dryRun: boolean;
  ignoreHttpsErrors: boolean;
  collectionNames: string[];
  maxPages?: number;
  configPath?: string;
}

export interface CliDependencies {
  env?: Record<string, string | undefined>;
  fetchFn?: FetchLike;
  sleepFn?: SleepFn;
  logWriter?: LogWriter;
  stdout?: (line: string) => void;
}

const HELP_TEXT = `
Usage:
  letters-harvester <command> [options]

Commands:
  crawl          Crawl catalog search results for the configured collections
  toc-download   Download the configured table-of-contents XML documents
  toc-csv        Flatten downloaded table-of-contents XML into one CSV file
  toc            toc-download followed by toc-csv
  collections    List the configured collections

Options:
  --config <path>        Optional path to JSON config file
  --collection <name>    Crawl only this collection (repeatable)
  --dry-run              Log extracted records instead of writing them
  --ignore-https-errors  Ignore TLS certificate errors (use only when required)
  --max-pages <n>        Abort a collection crawl after n result pages
  -h, --help             Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (!raw) {
    return undefined;
  }

  if (raw === "crawl" || raw === "toc-download" || raw === "toc-csv" || raw === "toc" || raw === "collections") {
    return raw;
  }

  return undefined;
}

function readOptionValues(argv: string[], flag: string): string[] {
  const values: string[] = [];
  argv.forEach((arg, index) => {
    const next = argv[index + 1];
    if (arg === flag && next !== undefined && !next.startsWith("--")) {
      values.push(next);
    }
  });
  return values;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const [configPath] = readOptionValues(argv, "--config");
  const [maxPagesRaw] = readOptionValues(argv, "--max-pages");
  const maxPagesParsed = maxPagesRaw ? Number.parseInt(maxPagesRaw, 10) : undefined;

  return {
    command,
    dryRun: argv.includes("--dry-run"),
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
    collectionNames: readOptionValues(argv, "--collection"),
    maxPages: maxPagesParsed !== undefined && Number.isFinite(maxPagesParsed) && maxPagesParsed > 0 ? maxPagesParsed : undefined,
    configPath,
  };
}

export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const stdout = deps.stdout ?? console.log;
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    stdout(HELP_TEXT.trim());
    return 0;
  }

  let config = loadConfig(parsed.configPath, deps.env ?? process.env);
  if (parsed.ignoreHttpsErrors) {
    config = {
      ...config,
      ignoreHttpsErrors: true,
    };
  }
  if (parsed.maxPages !== undefined) {
    config = {
      ...config,
      maxPages: parsed.maxPages,
    };
  }

  const runId = createRunId(parsed.command);
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId, minLevel: config.logLevel }, deps.logWriter);
  const fetchPage = createPageFetcher({
    config,
    rateLimit: createRateLimitPolicy(config.throttle, deps.sleepFn),
    fetchFn: deps.fetchFn,
  });
  const context = { runId, config, logger, metrics, fetchPage };

  logger.info("command_start", {
    command: parsed.command,
    dryRun: parsed.dryRun,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
    maxPages: config.maxPages,
    collections: parsed.collectionNames,
  });

  try {
    switch (parsed.command) {
      case "crawl":
        await runCrawl(
          { ...context, logger: logger.child("crawl") },
          { dryRun: parsed.dryRun, collectionNames: parsed.collectionNames },
        );
        break;
      case "toc-download":
        await runTocDownload({ ...context, logger: logger.child("toc") });
        break;
      case "toc-csv":
        await runTocCsv({ ...context, logger: logger.child("toc") });
        break;
      case "toc":
        await runToc({ ...context, logger: logger.child("toc") });
        break;
      case "collections":
        listCollections(context, stdout);
        return 0;
      default: {
        const unsupported: never = parsed.command;
        logger.error("command_unsupported", { command: String(unsupported) });
        return 1;
      }
    }

    logger.info("command_complete", { command: parsed.command });
    return 0;
  } catch (error) {
    logger.error("command_failed", {
      command: parsed.command,
      errorName: error instanceof Error ? error.name : "Error",
      error: errorMessage(error),
    });
    return 1;
  } finally {
    if (parsed.command !== "collections") {
      metrics.printSummary(runId, stdout);
    }
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
