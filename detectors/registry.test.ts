/**
 * Detector registry tests
 */

import { describe, it, expect } from "vitest";
import { ConfigurationError } from "../errors.js";
import { BUILTIN_DEFINITIONS } from "./definitions.js";
import { compileDetector, DetectorRegistry } from "./registry.js";
import type { DetectorDefinition } from "./types.js";

const EMAIL: DetectorDefinition = {
  name: "EMAIL",
  regex: String.raw`[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}`,
  normalize: "lowercase",
};

const URL_HTTP: DetectorDefinition = {
  name: "URL_HTTP",
  regex: String.raw`https?://[^\s<>"{}|\\^` + "`" + String.raw`\[\]]+`,
  flags: "IGNORECASE",
  normalize: "url",
};

// =============================================================================
// Compilation
// =============================================================================

describe("compileDetector", () => {
  it("always compiles a global pattern and maps flag names", () => {
    const spec = compileDetector({ name: "X", regex: "abc", flags: ["IGNORECASE", "multiline"] });
    expect(spec.pattern.flags).toBe("gim");
    expect(spec.group).toBe(0);
    expect(spec.description).toBe("");
  });

  it("turns a leading inline flag group into flags", () => {
    const spec = compileDetector({ name: "X", regex: "(?i)abc" });
    expect(spec.pattern.source).toBe("abc");
    expect(spec.pattern.flags).toBe("gi");
  });

  it("rewrites (?P<name>...) groups", () => {
    const spec = compileDetector({ name: "X", regex: String.raw`(?P<num>\d+)`, group: 1 });
    expect(spec.pattern.source).toBe(String.raw`(?<num>\d+)`);
  });

  it("rejects flags it cannot express", () => {
    expect(() => compileDetector({ name: "X", regex: "a", flags: "VERBOSE" })).toThrow(
      'Detector "X": unsupported flag "VERBOSE"',
    );
    expect(() => compileDetector({ name: "X", regex: "(?x)a" })).toThrow(
      'Detector "X": unsupported inline flag "x"',
    );
  });

  it("names the detector when the pattern does not compile", () => {
    expect(() => compileDetector({ name: "BAD", regex: "([a-z" })).toThrow(ConfigurationError);
    expect(() => compileDetector({ name: "BAD", regex: "([a-z" })).toThrow(
      /^Detector "BAD": invalid pattern \/\(\[a-z\/: /,
    );
  });

  it("rejects a capture group the pattern does not have", () => {
    expect(() => compileDetector({ name: "G", regex: "(a)", group: 2 })).toThrow(
      'Detector "G": capture group 2 requested but pattern has 1',
    );
  });

  it("rejects an unknown rule id", () => {
    expect(() => compileDetector({ name: "X", regex: "a", validate: "nope" })).toThrow(
      /unknown validate rule "nope"/,
    );
  });

  it("rejects an empty name", () => {
    expect(() => compileDetector({ name: "  ", regex: "a" })).toThrow("detector name must not be empty");
  });
});

// =============================================================================
// Registry
// =============================================================================

describe("DetectorRegistry", () => {
  it("keeps definition order and looks detectors up by name", () => {
    const registry = DetectorRegistry.load([EMAIL, URL_HTTP]);
    expect(registry.size).toBe(2);
    expect(registry.names()).toEqual(["EMAIL", "URL_HTTP"]);
    expect(registry.has("EMAIL")).toBe(true);
    expect(registry.get("URL_HTTP")?.pattern.flags).toBe("gi");
    expect(registry.get("PHONE")).toBeUndefined();
  });

  it("rejects duplicate names", () => {
    expect(() => DetectorRegistry.load([EMAIL, { ...EMAIL }])).toThrow(
      'Detector "EMAIL": duplicate detector name',
    );
  });

  it("rejects a spec whose pattern is not global", () => {
    const spec = { ...compileDetector(EMAIL), pattern: /a/ };
    expect(() => DetectorRegistry.fromSpecs([spec])).toThrow("pattern must carry the global flag");
  });
});

describe("DetectorRegistry.apply", () => {
  it("reports the raw and normalized email", () => {
    const registry = DetectorRegistry.load([EMAIL]);
    expect(registry.apply("Contact John.Doe@Example.COM today")).toEqual([
      { detector: "EMAIL", rawText: "John.Doe@Example.COM", normalizedText: "john.doe@example.com", index: 8 },
    ]);
  });

  it("returns the same result on every call", () => {
    const registry = DetectorRegistry.load([EMAIL]);
    const text = "a@example.com, b@example.com";
    const first = registry.apply(text);
    expect(first).toHaveLength(2);
    expect(registry.apply(text)).toEqual(first);
  });

  it("returns nothing for empty text", () => {
    expect(DetectorRegistry.load([EMAIL]).apply("")).toEqual([]);
  });

  it("lets different detectors report overlapping text", () => {
    const registry = DetectorRegistry.load([EMAIL, URL_HTTP]);
    const found = registry.apply("see https://x.example.com/u?m=ann@example.org now");
    expect(found.map((f) => [f.detector, f.rawText, f.index])).toEqual([
      ["EMAIL", "ann@example.org", 30],
      ["URL_HTTP", "https://x.example.com/u?m=ann@example.org", 4],
    ]);
  });

  it("reports the configured capture group and where it starts", () => {
    const registry = DetectorRegistry.load([
      {
        name: "STUDENT_ID",
        regex: String.raw`(?i)\bstudent(?:\s+id)?\s*[:#]?\s*(\d{7,9})\b`,
        group: 1,
        normalize: "strip-non-digits",
      },
    ]);
    expect(registry.apply("Student ID: 12345678")).toEqual([
      { detector: "STUDENT_ID", rawText: "12345678", normalizedText: "12345678", index: 12 },
    ]);
  });

  it("skips zero-length matches", () => {
    const registry = DetectorRegistry.load([{ name: "X_RUN", regex: "x*" }]);
    expect(registry.apply("abxxc")).toEqual([
      { detector: "X_RUN", rawText: "xx", normalizedText: "xx", index: 2 },
    ]);
  });

  it("drops candidates whose normalized value is empty", () => {
    const registry = DetectorRegistry.load([{ name: "DIGITS", regex: String.raw`\d+`, normalize: "nas" }]);
    expect(registry.apply("12345 and 123456782")).toEqual([
      { detector: "DIGITS", rawText: "123456782", normalizedText: "123-456-782", index: 10 },
    ]);
  });
});

describe("built-in NAS detector", () => {
  const registry = DetectorRegistry.load(BUILTIN_DEFINITIONS);

  it("accepts a checksum-valid number", () => {
    expect(registry.apply("SIN: 123 456 782.")).toEqual([
      { detector: "NAS", rawText: "123 456 782", normalizedText: "123-456-782", index: 5 },
    ]);
  });

  it("stops at nine digits when more follow after a separator", () => {
    expect(registry.apply("SIN 123 456 782 12")).toEqual([
      { detector: "NAS", rawText: "123 456 782", normalizedText: "123-456-782", index: 4 },
    ]);
  });

  it("does not take nine digits out of a longer run", () => {
    expect(registry.apply("ref 1234567821")).toEqual([]);
  });

  it("drops a number failing the checksum", () => {
    expect(registry.apply("SIN: 123 456 789")).toEqual([]);
  });

  it("matches against separator-normalized text", () => {
    expect(registry.apply("123\u2013456\u2013782")).toEqual([
      { detector: "NAS", rawText: "123-456-782", normalizedText: "123-456-782", index: 0 },
    ]);
  });

  it("reads digits from other scripts", () => {
    const arabicIndic = "\u0661\u0662\u0663 \u0664\u0665\u0666 \u0667\u0668\u0662";
    expect(registry.apply(arabicIndic)).toEqual([
      { detector: "NAS", rawText: arabicIndic, normalizedText: "123-456-782", index: 0 },
    ]);
  });
});
