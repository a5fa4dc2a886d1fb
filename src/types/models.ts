export interface CollectionQuery {
  name: string;
  searchName: string;
  category?: string[];
  nationality?: string;
}

export interface ResultRecord {
  readonly collection: string;
  readonly id: string;
  readonly resultNum: number;
  readonly type: string;
  readonly date: string;
  readonly author: string;
  readonly origin: string;
  readonly addressee: string;
  readonly destination: string;
  readonly repository: string;
}

export const FLAT_RECORD_FIELDS = [
  "id",
  "type",
  "collection",
  "date",
  "author",
  "addressee",
  "origin",
  "destination",
  "repository",
] as const;

export type FlatRecordField = (typeof FLAT_RECORD_FIELDS)[number];

export type FlatRecord = Record<FlatRecordField, string>;

export interface PageResult {
  totalResults: number;
  records: ResultRecord[];
}

export interface FetchedPage {
  url: string;
  status: number;
  contentType?: string;
  body: string;
}

export const TOC_FIELDS = ["n", "page", "from", "to", "d", "m", "y"] as const;

export type TocField = (typeof TOC_FIELDS)[number];

export type TocRow = Partial<Record<TocField, string>>;

export function toFlatRecord(record: ResultRecord): FlatRecord {
  return {
    id: record.id,
    type: record.type,
    collection: record.collection,
    date: record.date,
    author: record.author,
    addressee: record.addressee,
    origin: record.origin,
    destination: record.destination,
    repository: record.repository,
  };
}
