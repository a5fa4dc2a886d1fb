import path from "node:path";
import { ResultRecord, toFlatRecord } from "../types";
import { BaseSink } from "./baseSink";

export class LocalJsonlSink extends BaseSink {
  private readonly runId: string;

  constructor(recordsDir: string, runId: string) {
    super(path.join(recordsDir, "records.jsonl"));
    this.runId = runId;
  }

  async publishRecords(records: ResultRecord[]): Promise<void> {
    const lines = records.map((record) =>
      JSON.stringify({
        runId: this.runId,
        resultNum: record.resultNum,
        ...toFlatRecord(record),
      }),
    );
    await this.appendContent(lines.length > 0 ? lines.join("\n") + "\n" : "");
  }
}
