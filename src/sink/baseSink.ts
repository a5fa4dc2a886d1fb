import fs from "node:fs";
import path from "node:path";
import { ResultRecord } from "../types";
import { RecordSink } from "./types";

export abstract class BaseSink implements RecordSink {
  readonly location: string;

  protected constructor(filePath: string) {
    this.location = path.resolve(filePath);
    fs.mkdirSync(path.dirname(this.location), { recursive: true });
  }

  abstract publishRecords(records: ResultRecord[]): Promise<void>;

  protected async appendContent(content: string): Promise<void> {
    if (content.length === 0) {
      return;
    }
    await fs.promises.appendFile(this.location, content, "utf-8");
  }
}
