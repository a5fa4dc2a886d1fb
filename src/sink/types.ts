import { ResultRecord } from "../types";

export interface RecordSink {
  readonly location: string;
  publishRecords(records: ResultRecord[]): Promise<void>;
}
