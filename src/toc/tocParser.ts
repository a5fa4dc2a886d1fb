import { load } from "cheerio";
import { ParseError } from "../core/errors";
import { TOC_FIELDS, TocField, TocRow } from "../types";

function isTocField(tag: string): tag is TocField {
  return TOC_FIELDS.some((field) => field === tag);
}

/**
 * Flattens the `item` children of a table-of-contents document.
 *
 * `n` and `page` are read straight off the item; the `title` element contributes its
 * children by tag name, and its nested `date` element contributes `d`, `m` and `y`.
 * Tags outside {@link TOC_FIELDS} are dropped.
 */
export function parseTocXml(xml: string): TocRow[] {
  const $ = load(xml, { xml: true });
  const root = $.root().children().first();
  if (root.length === 0) {
    throw new ParseError("Table of contents has no root element");
  }

  return root
    .children("item")
    .toArray()
    .map((item) => {
      const row: TocRow = {};
      const assign = (tag: string, text: string): void => {
        if (isTocField(tag)) {
          row[tag] = text;
        }
      };

      for (const child of $(item).children().toArray()) {
        if (child.name === "n" || child.name === "page") {
          assign(child.name, $(child).text());
        } else if (child.name === "title") {
          for (const part of $(child).children().toArray()) {
            if (part.name === "date") {
              for (const datePart of $(part).children().toArray()) {
                assign(datePart.name, $(datePart).text());
              }
            } else {
              assign(part.name, $(part).text());
            }
          }
        }
      }

      return row;
    });
}
