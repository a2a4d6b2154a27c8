import { describe, expect, it } from "vitest";
import { normalizeOcrText } from "../core/textNormalizer.js";

describe("normalizeOcrText", () => {
  it("returns an empty string for empty input", () => {
    expect(normalizeOcrText("")).toBe("");
    expect(normalizeOcrText(" \n\t\n")).toBe("");
  });

  it("collapses whitespace, drops stray glyphs and empty lines", () => {
    expect(normalizeOcrText("  JOHN   DOE  \r\n\r\n| DOB : 15/08/1995 ")).toBe("JOHN DOE\nDOB : 15/08/1995");
  });

  it("folds full-width characters", () => {
    expect(normalizeOcrText("ＤＯＢ： １５/０８/１９９５")).toBe("DOB: 15/08/1995");
  });

  it("joins a label line with the value on the next line", () => {
    expect(normalizeOcrText("Name:\nJOHN DOE\nDOB:\n15/08/1995")).toBe("Name: JOHN DOE\nDOB: 15/08/1995");
    expect(normalizeOcrText("Aadhaar No.\n1234 5678 9012")).toBe("Aadhaar No. 1234 5678 9012");
  });

  it("joins document-date labels with their value", () => {
    expect(normalizeOcrText("Issue Date\n07/01/2016")).toBe("Issue Date 07/01/2016");
    expect(normalizeOcrText("Date of Issue:\n07/01/2016")).toBe("Date of Issue: 07/01/2016");
  });

  it("does not join two consecutive labels", () => {
    expect(normalizeOcrText("Name:\nDOB:\n15/08/1995")).toBe("Name:\nDOB: 15/08/1995");
  });

  it("preserves casing", () => {
    expect(normalizeOcrText("John doe")).toBe("John doe");
  });

  it("is idempotent", () => {
    const once = normalizeOcrText("GOVT OF INDIA\nName:\n JOHN  DOE \n\nDOB:\n15/08/1995");
    expect(normalizeOcrText(once)).toBe(once);
  });
});
