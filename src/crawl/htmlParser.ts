import { load } from "cheerio";
import { ParseError, SchemaError, SchemaIssue } from "../core/errors";
import { CollectionQuery, PageResult, ResultRecord } from "../types";

export type RowFields = Record<string, string>;

const BULLET_PATTERN = /•/g;

export const RESULT_NUM_COLUMN = "Result_num";
export const DOC_TYPE_COLUMN = "Doc_type";
export const DOC_ID_FIELD = "doc_id";

const REQUIRED_FIELDS = [
  RESULT_NUM_COLUMN,
  DOC_ID_FIELD,
  DOC_TYPE_COLUMN,
  "Date",
  "Author",
  "Origin",
  "Addressee",
  "Destination",
  "Repositories & Versions",
] as const;

export function cleanCellContent(text: string): string {
  return text.replace(BULLET_PATTERN, "").trim();
}

// The first two header cells carry no usable label in the markup.
export function deriveColumnNames(headerTexts: string[]): string[] {
  const columns = headerTexts.map(cleanCellContent);
  columns[0] = RESULT_NUM_COLUMN;
  columns[1] = DOC_TYPE_COLUMN;
  return columns;
}

export function extractDocumentId(href: string): string | undefined {
  const segment = href.split("?")[0].split("/")[3];
  return segment ? segment : undefined;
}

export function parseTotalResults(text: string): number {
  const countText = text.trim().split(" results")[0].replace(/,/g, "").trim();
  if (!/^\d+$/.test(countText)) {
    throw new ParseError(`Unparsable result count: ${JSON.stringify(text.trim())}`);
  }
  return Number.parseInt(countText, 10);
}

function parseInteger(value: string): number | undefined {
  return /^[+-]?\d+$/.test(value) ? Number.parseInt(value, 10) : undefined;
}

export function buildResultRecord(fields: RowFields, collection: CollectionQuery, rowIndex?: number): ResultRecord {
  const issues: SchemaIssue[] = [];
  for (const field of REQUIRED_FIELDS) {
    if (fields[field] === undefined) {
      issues.push({ field, problem: "missing" });
    }
  }

  const rawResultNum = fields[RESULT_NUM_COLUMN];
  const resultNum = rawResultNum === undefined ? undefined : parseInteger(rawResultNum);
  if (rawResultNum !== undefined && resultNum === undefined) {
    issues.push({ field: RESULT_NUM_COLUMN, problem: "not_integer", value: rawResultNum });
  }

  if (issues.length > 0 || resultNum === undefined) {
    throw new SchemaError(issues, rowIndex);
  }

  return {
    collection: collection.name,
    id: fields[DOC_ID_FIELD],
    resultNum,
    type: fields[DOC_TYPE_COLUMN],
    date: fields.Date,
    author: fields.Author,
    origin: fields.Origin,
    addressee: fields.Addressee,
    destination: fields.Destination,
    repository: fields["Repositories & Versions"],
  };
}

export function parseResultsPage(html: string, collection: CollectionQuery): PageResult {
  const $ = load(html);

  const totalSpan = $("span.font-18").first();
  if (totalSpan.length === 0) {
    throw new ParseError("Result count element not found");
  }
  const totalResults = parseTotalResults(totalSpan.text());

  const table = $("#results").first();
  if (table.length === 0) {
    if (totalResults === 0) {
      return { totalResults, records: [] };
    }
    throw new ParseError("Results table not found");
  }

  const rows = table.find("tr").toArray();
  const headerRow = rows.shift();
  if (!headerRow) {
    throw new ParseError("Results table has no header row");
  }

  const columns = deriveColumnNames(
    $(headerRow)
      .find("th")
      .toArray()
      .map((cell) => $(cell).text()),
  );

  const records = rows.map((row, index) => {
    const cells = $(row).find("td");
    const fields: RowFields = {};
    cells.each((cellIndex, cell) => {
      const column = columns[cellIndex];
      if (column !== undefined) {
        fields[column] = cleanCellContent($(cell).text());
      }
    });

    const href = cells.eq(1).find("a").first().attr("href");
    const docId = href ? extractDocumentId(href) : undefined;
    if (docId !== undefined) {
      fields[DOC_ID_FIELD] = docId;
    }

    return buildResultRecord(fields, collection, index + 1);
  });

  return { totalResults, records };
}
