import { CollectionQuery } from "../types";
import { LogLevel } from "../observability/types";

export type ThrottleMode = "jitter" | "fixed_interval";

export type SinkType = "local_jsonl" | "local_csv";

export interface ThrottleConfig {
  mode: ThrottleMode;
  minWaitMs: number;
  randomWaitMs: number;
  intervalMs: number;
}

export interface TocConfig {
  endpointTemplate: string;
  items: string[];
  outputDir: string;
  csvPath: string;
}

export interface OutputDirs {
  records: string;
}

export interface AppConfig {
  baseUrl: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  maxPages: number;
  logLevel: LogLevel;
  sinkType: SinkType;
  throttle: ThrottleConfig;
  collections: CollectionQuery[];
  outputDirs: OutputDirs;
  toc: TocConfig;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "throttle" | "outputDirs" | "toc">> & {
  throttle?: Partial<ThrottleConfig>;
  outputDirs?: Partial<OutputDirs>;
  toc?: Partial<TocConfig>;
};
