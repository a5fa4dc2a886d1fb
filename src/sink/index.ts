import { AppConfig } from "../config";
import { LocalCsvSink } from "./localCsvSink";
import { LocalJsonlSink } from "./localJsonlSink";
import { RecordSink } from "./types";

export function createSink(config: AppConfig, runId: string): RecordSink {
  switch (config.sinkType) {
    case "local_jsonl":
      return new LocalJsonlSink(config.outputDirs.records, runId);
    case "local_csv":
      return new LocalCsvSink(config.outputDirs.records);
    default: {
      const unsupported: never = config.sinkType;
      throw new Error(`Unsupported sink type: ${String(unsupported)}`);
    }
  }
}

export * from "./types";
export { LocalCsvSink } from "./localCsvSink";
export { LocalJsonlSink } from "./localJsonlSink";
