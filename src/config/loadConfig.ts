import fs from "node:fs";
import path from "node:path";
import { ConfigError } from "../core/errors";
import { isLogLevel } from "../observability/types";
import { CollectionQuery } from "../types";
import { AppConfig, ConfigOverrides, SinkType, ThrottleMode } from "./types";

type Env = Record<string, string | undefined>;

const DEFAULT_CONFIG: AppConfig = {
  baseUrl: "http://emlo.bodleian.ox.ac.uk/forms/advanced",
  userAgent: "letters-harvester/0.1 (research crawl)",
  ignoreHttpsErrors: false,
  requestTimeoutMs: 20_000,
  maxPages: 500,
  logLevel: "info",
  sinkType: "local_jsonl",
  throttle: {
    mode: "jitter",
    minWaitMs: 3_000,
    randomWaitMs: 10_000,
    intervalMs: 5_000,
  },
  collections: [
    {
      name: "Scaliger, Joseph Justus",
      searchName: "Scaliger%2C+Joseph+Justus",
      category: ["classical scholar"],
      nationality: "French",
    },
  ],
  outputDirs: {
    records: "data/records",
  },
  toc: {
    endpointTemplate: "http://resources.huygens.knaw.nl/retroapp/service_heinsius/{item}/TableOfContents",
    items: [
      "01_158",
      "02_163",
      "03_169",
      "04_177",
      "05_183",
      "06_189",
      "07_194",
      "08_198",
      "09_204",
      "10_207",
      "11_214",
      "12_221",
      "13_224",
      "14_226",
      "15_227",
      "16_240",
      "17_243",
      "18_244",
      "19_247",
    ],
    outputDir: "data/toc",
    csvPath: "data/toc/heinbrieven.csv",
  },
};

function isConfigObject(value: unknown): value is ConfigOverrides {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Config file is not valid JSON: ${absolutePath}`, { cause: error });
  }

  if (!isConfigObject(parsed)) {
    throw new ConfigError(`Config file must contain a JSON object: ${absolutePath}`);
  }
  return parsed;
}

function toInt(value: string | undefined, fallback: number, min: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed >= min ? parsed : fallback;
}

function intSetting(value: unknown, fallback: number, min: number): number {
  return typeof value === "number" && Number.isInteger(value) && value >= min ? value : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function isThrottleMode(value: unknown): value is ThrottleMode {
  return value === "jitter" || value === "fixed_interval";
}

function isSinkType(value: unknown): value is SinkType {
  return value === "local_jsonl" || value === "local_csv";
}

function toSinkType(value: string | undefined, fallback: SinkType): SinkType {
  const normalized = value?.toLowerCase();
  return isSinkType(normalized) ? normalized : fallback;
}

function assertSettings(config: AppConfig): void {
  const items: unknown = config.toc.items;
  if (!Array.isArray(items) || !items.every((item) => typeof item === "string")) {
    throw new ConfigError("toc.items must be an array of strings");
  }
  if (!isThrottleMode(config.throttle.mode)) {
    throw new ConfigError(`Unsupported throttle mode: ${JSON.stringify(config.throttle.mode)}`);
  }
  if (!isSinkType(config.sinkType)) {
    throw new ConfigError(`Unsupported sink type: ${JSON.stringify(config.sinkType)}`);
  }
  if (!isLogLevel(config.logLevel)) {
    throw new ConfigError(`Unsupported log level: ${JSON.stringify(config.logLevel)}`);
  }
}

export function assertCollection(collection: Partial<CollectionQuery> | undefined): asserts collection is CollectionQuery {
  if (!collection || typeof collection.name !== "string" || collection.name.trim() === "") {
    throw new ConfigError("Collection name is not set");
  }
  if (typeof collection.searchName !== "string" || collection.searchName.trim() === "") {
    throw new ConfigError(`Collection "${collection.name}" has no search token`);
  }
}

export function loadConfig(configPath?: string, env: Env = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    throttle: {
      ...DEFAULT_CONFIG.throttle,
      ...(fileConfig.throttle ?? {}),
    },
    outputDirs: {
      ...DEFAULT_CONFIG.outputDirs,
      ...(fileConfig.outputDirs ?? {}),
    },
    toc: {
      ...DEFAULT_CONFIG.toc,
      ...(fileConfig.toc ?? {}),
    },
  };

  if (!Array.isArray(merged.collections)) {
    throw new ConfigError("collections must be an array");
  }
  for (const collection of merged.collections) {
    assertCollection(collection);
  }
  assertSettings(merged);

  // page ceiling and timeout are at least 1, waits at least 0
  const maxPages = intSetting(merged.maxPages, DEFAULT_CONFIG.maxPages, 1);
  const requestTimeoutMs = intSetting(merged.requestTimeoutMs, DEFAULT_CONFIG.requestTimeoutMs, 1);
  const minWaitMs = intSetting(merged.throttle.minWaitMs, DEFAULT_CONFIG.throttle.minWaitMs, 0);
  const randomWaitMs = intSetting(merged.throttle.randomWaitMs, DEFAULT_CONFIG.throttle.randomWaitMs, 0);
  const intervalMs = intSetting(merged.throttle.intervalMs, DEFAULT_CONFIG.throttle.intervalMs, 0);

  return {
    ...merged,
    baseUrl: env.BASE_URL ?? merged.baseUrl,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, requestTimeoutMs, 1),
    maxPages: toInt(env.MAX_PAGES, maxPages, 1),
    logLevel: isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : merged.logLevel,
    sinkType: toSinkType(env.SINK_TYPE, merged.sinkType),
    throttle: {
      mode: isThrottleMode(env.THROTTLE_MODE) ? env.THROTTLE_MODE : merged.throttle.mode,
      minWaitMs: toInt(env.THROTTLE_MIN_WAIT_MS, minWaitMs, 0),
      randomWaitMs: toInt(env.THROTTLE_RANDOM_WAIT_MS, randomWaitMs, 0),
      intervalMs: toInt(env.THROTTLE_INTERVAL_MS, intervalMs, 0),
    },
    outputDirs: {
      records: env.OUTPUT_RECORDS_DIR ?? merged.outputDirs.records,
    },
    toc: {
      ...merged.toc,
      endpointTemplate: env.TOC_ENDPOINT_TEMPLATE ?? merged.toc.endpointTemplate,
      outputDir: env.TOC_OUTPUT_DIR ?? merged.toc.outputDir,
      csvPath: env.TOC_CSV_PATH ?? merged.toc.csvPath,
    },
  };
}

export { DEFAULT_CONFIG };
