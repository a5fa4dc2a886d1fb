import fs from "node:fs";
import path from "node:path";
import { formatCsvLine } from "../toc/csv";
import { FLAT_RECORD_FIELDS, ResultRecord, toFlatRecord } from "../types";
import { BaseSink } from "./baseSink";

export class LocalCsvSink extends BaseSink {
  private headerWritten: boolean;

  constructor(recordsDir: string) {
    super(path.join(recordsDir, "records.csv"));
    this.headerWritten = fs.existsSync(this.location) && fs.statSync(this.location).size > 0;
  }

  async publishRecords(records: ResultRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    let content = "";
    if (!this.headerWritten) {
      content += formatCsvLine(FLAT_RECORD_FIELDS);
      this.headerWritten = true;
    }
    for (const record of records) {
      const flat = toFlatRecord(record);
      content += formatCsvLine(FLAT_RECORD_FIELDS.map((field) => flat[field]));
    }
    await this.appendContent(content);
  }
}
