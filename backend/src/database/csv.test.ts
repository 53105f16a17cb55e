import { encodeField, encodeRow, parseCsv } from "./csv";

describe("csv codec", () => {
  test("plain fields are written as-is", () => {
    expect(encodeRow(["Abe", "Fox", "1500", "0"])).toBe("Abe,Fox,1500,0");
  });

  test("fields with commas or quotes are quoted", () => {
    expect(encodeField("Mr. Game, Watch")).toBe('"Mr. Game, Watch"');
    expect(encodeField('The "Kid"')).toBe('"The ""Kid"""');
  });

  test("parses quoted fields and skips blank lines", () => {
    const text = 'Name,Character\r\n"Mr. Game, Watch","The ""Kid"""\n\nJT,Sheik\n';
    expect(parseCsv(text)).toEqual([
      ["Name", "Character"],
      ["Mr. Game, Watch", 'The "Kid"'],
      ["JT", "Sheik"],
    ]);
  });

  test("keeps empty trailing fields", () => {
    expect(parseCsv("a,,\n")).toEqual([["a", "", ""]]);
  });

  test("an unterminated quote is rejected", () => {
    expect(parseCsv('Name\n"Abe\n')).toBeNull();
  });
});
