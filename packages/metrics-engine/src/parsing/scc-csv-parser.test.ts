import { describe, expect, it } from "vitest";
import { parseSccCsv, splitCsvLine } from "./scc-csv-parser.js";

const HEADER = "Language,Provider,Filename,Lines,Code,Comments,Blanks,Complexity,Bytes,ULOC";

describe("splitCsvLine", () => {
  it("honours quoted fields and escaped quotes", () => {
    expect(splitCsvLine('Go,"/repo/a,b.go","say ""hi""",3')).toEqual([
      "Go",
      "/repo/a,b.go",
      'say "hi"',
      "3",
    ]);
  });
});

describe("parseSccCsv", () => {
  it("keeps the size columns and drops filename, complexity and unique lines", () => {
    const raw = [
      HEADER,
      "TypeScript,/repo/src/index.ts,index.ts,120,90,20,10,7,3400,80",
      'Markdown,"/repo/docs/a, b.md","a, b.md",12,9,0,3,0,300,9',
      "",
    ].join("\n");

    expect(parseSccCsv(raw)).toEqual({
      ok: true,
      rows: [
        {
          language: "TypeScript",
          path: "/repo/src/index.ts",
          lines: 120,
          code: 90,
          comments: 20,
          blanks: 10,
          bytes: 3400,
        },
        {
          language: "Markdown",
          path: "/repo/docs/a, b.md",
          lines: 12,
          code: 9,
          comments: 0,
          blanks: 3,
          bytes: 300,
        },
      ],
    });
  });

  it("accepts a header-only or empty report", () => {
    expect(parseSccCsv(`${HEADER}\r\n`)).toEqual({ ok: true, rows: [] });
    expect(parseSccCsv("")).toEqual({ ok: true, rows: [] });
  });

  it("rejects unknown headers and non-numeric counts", () => {
    expect(parseSccCsv("Name,Size\nx,1")).toEqual({
      ok: false,
      reason: "unexpected header: Name,Size",
    });

    const result = parseSccCsv(`${HEADER}\nGo,/repo/a.go,a.go,ten,1,0,0,0,10,1`);
    expect(result).toEqual({ ok: false, reason: "unparsable row: Go,/repo/a.go,a.go,ten,1,0,0,0,10,1" });
  });
});
