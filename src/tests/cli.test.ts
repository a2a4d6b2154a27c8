import { fileURLToPath } from "url";
import { describe, expect, it } from "vitest";
import { InvalidInputError } from "../core/errors.js";
import { parseCliArgs, runCli } from "../scripts/verifyDocument.js";

const fixture = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

async function run(args: string[]): Promise<{ code: number; output: string }> {
  let output = "";
  const code = await runCli(args, (chunk) => {
    output += chunk;
  });
  return { code, output };
}

describe("parseCliArgs", () => {
  it("reads paths and flags", () => {
    expect(parseCliArgs(["--text=front.txt", "--text=pass2.txt", "--reference=ref.json", "--redact", "--json"])).toEqual({
      textPaths: ["front.txt", "pass2.txt"],
      referencePath: "ref.json",
      asOf: null,
      redact: true,
      debug: false,
      json: true,
    });
  });

  it("parses --as-of", () => {
    const options = parseCliArgs(["--text=a.txt", "--reference=r.json", "--as-of=2023-08-20"]);
    expect(options.asOf?.getFullYear()).toBe(2023);
  });

  it("rejects missing arguments and malformed dates", () => {
    expect(() => parseCliArgs(["--text=a.txt"])).toThrow(InvalidInputError);
    expect(() => parseCliArgs(["--reference=r.json"])).toThrow(InvalidInputError);
    expect(() => parseCliArgs(["--text=a.txt", "--reference=r.json", "--as-of=20/08/2023"])).toThrow(
      'Invalid --as-of value "20/08/2023" (expected YYYY-MM-DD)'
    );
  });
});

describe("runCli", () => {
  const text = `--text=${fixture("aadhaar_front.txt")}`;
  const asOf = "--as-of=2023-08-20";

  it("prints the summary and exits 0 when everything matches", async () => {
    const { code, output } = await run([text, `--reference=${fixture("reference.json")}`, asOf]);

    expect(code).toBe(0);
    expect(output.split("\n")).toContain("All details match: Yes");
    expect(output.split("\n")).toContain("Age: 28 (Not teen)");
    expect(output.split("\n")).toContain("ID number: 123456789012");
  });

  it("masks the ID with --redact", async () => {
    const { output } = await run([text, `--reference=${fixture("reference.json")}`, asOf, "--redact"]);
    expect(output.split("\n")).toContain("ID number: ********9012");
  });

  it("exits 2 on a mismatch", async () => {
    const { code, output } = await run([text, `--reference=${fixture("reference_mismatch.json")}`, asOf]);

    expect(code).toBe(2);
    expect(output.split("\n")).toContain("All details match: No");
  });

  it("writes the report as JSON with --json", async () => {
    const { output } = await run([text, `--reference=${fixture("reference.json")}`, asOf, "--json"]);
    const parsed: unknown = JSON.parse(output);

    expect(parsed).toMatchObject({ report: { allMatch: true, ageYears: 28, isTeen: false } });
  });

  it("prints the normalized text with --debug", async () => {
    const { output } = await run([text, `--reference=${fixture("reference.json")}`, asOf, "--debug"]);
    expect(output).toContain("Normalized OCR text:\nGOVERNMENT OF INDIA\nName: JOHN DOE\nDOB : 15/08/1995\nMALE\nAadhaar No. 1234 5678 9012\n");
  });

  it("exits 1 with an error line when a file is missing", async () => {
    const { code, output } = await run([`--text=${fixture("missing.txt")}`, `--reference=${fixture("reference.json")}`]);

    expect(code).toBe(1);
    expect(output.startsWith("Error: [INVALID_INPUT] Cannot read OCR text")).toBe(true);
  });
});
