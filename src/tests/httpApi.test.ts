import type { FastifyInstance } from "fastify";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { buildHttpApp } from "../mcp/server.js";

const API_KEY = "test-secret";

const VERIFY_BODY = {
  raw_text: "Name: JOHN DOE\nDOB: 15-08-1995\nAadhaar: 1234 5678 9012",
  reference: { name: "John Doe", dob: "15/08/1995", id_number: "1234 5678 9012" },
  as_of: "2023-08-20",
};

describe("HTTP API", () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = await buildHttpApp({ apiKeys: [API_KEY] });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it("serves /healthz without a key", async () => {
    const res = await app.inject({ method: "GET", url: "/healthz" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: "ok" });
    expect(res.headers["x-correlation-id"]).toBeTypeOf("string");
  });

  it("echoes the caller's correlation id", async () => {
    const res = await app.inject({ method: "GET", url: "/healthz", headers: { "x-correlation-id": "corr-123" } });
    expect(res.headers["x-correlation-id"]).toBe("corr-123");
  });

  it("requires an API key for /verify", async () => {
    const missing = await app.inject({ method: "POST", url: "/verify", payload: VERIFY_BODY });
    expect(missing.statusCode).toBe(401);
    expect(missing.json()).toEqual({ error: "Missing x-api-key header" });

    const wrong = await app.inject({
      method: "POST",
      url: "/verify",
      payload: VERIFY_BODY,
      headers: { "x-api-key": "wrong-key" },
    });
    expect(wrong.statusCode).toBe(401);
    expect(wrong.json()).toEqual({ error: "Invalid API key" });
  });

  it("verifies a document", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/verify",
      payload: VERIFY_BODY,
      headers: { "x-api-key": API_KEY },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      report: {
        allMatch: true,
        ageYears: 28,
        isTeen: false,
        extracted: { name: "JOHN DOE", dob: "1995-08-15", idNumber: "123456789012" },
      },
    });
  });

  it("returns 400 with issues for a malformed body", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/verify",
      payload: { raw_text: 42 },
      headers: { "x-api-key": API_KEY },
    });

    expect(res.statusCode).toBe(400);
    const body = res.json();
    expect(body.error).toBe("INVALID_INPUT");
    expect(body.issues.map((issue: { path: string }) => issue.path)).toEqual(["raw_text", "reference"]);
  });

  it("normalizes dates", async () => {
    const ok = await app.inject({
      method: "POST",
      url: "/dates/normalize",
      payload: { value: "Aug 15, 1995", reference_year: 2023 },
      headers: { "x-api-key": API_KEY },
    });
    expect(ok.statusCode).toBe(200);
    expect(ok.json()).toEqual({ canonical: "1995-08-15", year: 1995, month: 8, day: 15 });

    const bad = await app.inject({
      method: "POST",
      url: "/dates/normalize",
      payload: { value: "31/02/1995" },
      headers: { "x-api-key": API_KEY },
    });
    expect(bad.statusCode).toBe(400);
    expect(bad.json()).toEqual({
      error: "DATE_PARSE_ERROR",
      message: 'Cannot parse date "31/02/1995": not a valid calendar date',
    });
  });

  it("exposes verification metrics", async () => {
    const res = await app.inject({ method: "GET", url: "/metrics" });

    expect(res.statusCode).toBe(200);
    expect(res.body).toContain('id_verifications_total{outcome="match"}');
  });
});
