import { describe, expect, it } from "vitest";
import { DEFAULT_ENGINE_CONFIG, loadEngineConfig, resolveEngineConfig } from "../core/config.js";
import { InvalidInputError } from "../core/errors.js";

describe("loadEngineConfig", () => {
  it("falls back to the defaults", () => {
    expect(loadEngineConfig({})).toEqual(DEFAULT_ENGINE_CONFIG);
    expect(loadEngineConfig({ NAME_MATCH_THRESHOLD: "" })).toEqual(DEFAULT_ENGINE_CONFIG);
  });

  it("reads overrides from the environment", () => {
    const config = loadEngineConfig({
      NAME_MATCH_THRESHOLD: "0.9",
      TEEN_POLICY: "under18",
      ID_REJECT_LEADING_ZERO_OR_ONE: "1",
    });

    expect(config).toEqual({
      nameThreshold: 0.9,
      teenPolicy: { kind: "under", limit: 18 },
      idDigits: 12,
      rejectLeadingZeroOrOne: true,
    });
  });

  it("rejects invalid values", () => {
    expect(() => loadEngineConfig({ NAME_MATCH_THRESHOLD: "2" })).toThrow(InvalidInputError);
    expect(() => loadEngineConfig({ TEEN_POLICY: "adult" })).toThrow(InvalidInputError);
    expect(() => loadEngineConfig({ ID_REJECT_LEADING_ZERO_OR_ONE: "yes" })).toThrow(InvalidInputError);
  });
});

describe("resolveEngineConfig", () => {
  it("validates the teen band", () => {
    expect(() => resolveEngineConfig({ teenPolicy: { kind: "band", minAge: 20, maxAge: 10 } })).toThrow(
      InvalidInputError
    );
    expect(resolveEngineConfig({ teenPolicy: { kind: "band", minAge: 10, maxAge: 14 } }).teenPolicy).toEqual({
      kind: "band",
      minAge: 10,
      maxAge: 14,
    });
  });

  it("lists every issue with its path", () => {
    try {
      resolveEngineConfig({ nameThreshold: -1 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidInputError);
      if (error instanceof InvalidInputError) {
        expect(error.issues.map((issue) => issue.path)).toEqual(["nameThreshold"]);
      }
    }
  });
});
