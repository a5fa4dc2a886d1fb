import { describe, expect, it } from "vitest";
import { parseTocXml } from "./tocParser";

const TOC_XML = `<?xml version="1.0" encoding="UTF-8"?>
<toc>
  <item>
    <n>1</n>
    <page>12</page>
    <title>
      <from>Heinsius</from>
      <to>Vossius</to>
      <date><d>3</d><m>5</m><y>1650</y></date>
      <place>Leiden</place>
    </title>
    <extra>ignored</extra>
  </item>
  <item>
    <n>2</n>
    <page>14</page>
    <title><from>Gronovius</from><to>Heinsius</to></title>
  </item>
  <note>not an item</note>
</toc>`;

describe("parseTocXml", () => {
  it("flattens each item into the fixed fields", () => {
    expect(parseTocXml(TOC_XML)).toEqual([
      { n: "1", page: "12", from: "Heinsius", to: "Vossius", d: "3", m: "5", y: "1650" },
      { n: "2", page: "14", from: "Gronovius", to: "Heinsius" },
    ]);
  });

  it("returns no rows for a document without items", () => {
    expect(parseTocXml("<toc><note>empty</note></toc>")).toEqual([]);
  });

  it("rejects a document without a root element", () => {
    expect(() => parseTocXml("")).toThrow("Table of contents has no root element");
  });
});
