import { describe, expect, it } from "vitest";
import { createMcpServer } from "../mcp/server.js";
import type { McpToolResponse } from "../mcp/responses.js";
import { handleListVerificationFields, handleNormalizeDate, handleVerifyIdentityText } from "../mcp/tools/index.js";

function payloadOf(response: McpToolResponse): unknown {
  return JSON.parse(response.content[0].text);
}

const RAW_TEXT = "Name: JOHN DOE\nDOB: 15-08-1995\nAadhaar: 1234 5678 9012";

describe("verify_identity_text", () => {
  it("returns the report and a redacted summary", async () => {
    const response = await handleVerifyIdentityText({
      raw_text: RAW_TEXT,
      reference: { name: "John Doe", dob: "15/08/1995", id_number: "1234 5678 9012" },
      as_of: "2023-08-20",
      redacted: true,
    });

    expect(response.isError).toBeUndefined();
    expect(payloadOf(response)).toMatchObject({
      ok: true,
      data: {
        report: { allMatch: true, ageYears: 28, isTeen: false },
      },
    });
    expect(response.content[0].text).toContain("ID number: ********9012");
  });

  it("uses additional OCR passes", async () => {
    const response = await handleVerifyIdentityText({
      raw_text: "Name: JOHN DOE",
      additional_texts: ["DOB: 15/08/1995\nAadhaar: 1234 5678 9012"],
      reference: { name: "John Doe", dob: "1995-08-15", id_number: "123456789012" },
      as_of: "2023-08-20",
    });

    expect(payloadOf(response)).toMatchObject({ ok: true, data: { report: { allMatch: true } } });
  });

  it("rejects a malformed as_of", async () => {
    const response = await handleVerifyIdentityText({
      raw_text: RAW_TEXT,
      reference: {},
      as_of: "20/08/2023",
    });

    expect(response.isError).toBe(true);
    expect(payloadOf(response)).toEqual({
      ok: false,
      error_code: "INVALID_INPUT",
      message: 'as_of must be YYYY-MM-DD, got "20/08/2023"',
    });
  });
});

describe("normalize_date", () => {
  it("returns the canonical form", async () => {
    const response = await handleNormalizeDate({ value: "15 Aug 1995", reference_year: 2023 });
    expect(payloadOf(response)).toEqual({
      ok: true,
      data: { canonical: "1995-08-15", year: 1995, month: 8, day: 15 },
    });
  });

  it("reports unparseable dates", async () => {
    const response = await handleNormalizeDate({ value: "31/02/1995" });
    expect(response.isError).toBe(true);
    expect(payloadOf(response)).toEqual({
      ok: false,
      error_code: "DATE_PARSE_ERROR",
      message: 'Cannot parse date "31/02/1995": not a valid calendar date',
    });
  });
});

describe("list_verification_fields", () => {
  it("lists the three fields", async () => {
    const payload = payloadOf(await handleListVerificationFields());
    expect(payload).toMatchObject({
      ok: true,
      data: {
        fields: [{ field: "name" }, { field: "dob" }, { field: "idNumber" }],
        config: { nameThreshold: 0.8, idDigits: 12 },
      },
    });
  });
});

describe("createMcpServer", () => {
  it("builds a server without connecting it", () => {
    expect(createMcpServer().isConnected()).toBe(false);
  });
});
