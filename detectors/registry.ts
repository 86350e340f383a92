/**
 * Detector registry
 *
 * Compiles detector definitions once and runs every detector over a text
 * value. Detectors are independent of each other: each one scans the whole
 * text for leftmost, non-overlapping matches of its own pattern, and two
 * detectors may report the same substring (an address that is both an email
 * and part of a URL is reported by both).
 */

import { ConfigurationError } from "../errors.js";
import { normalizeSeparators, resolveNormalizer, resolveValidator } from "./rules.js";
import type { DetectionFragment, DetectorDefinition, DetectorSpec } from "./types.js";

// =============================================================================
// Pattern Compilation
// =============================================================================

const FLAG_NAMES: Record<string, string> = {
  IGNORECASE: "i",
  MULTILINE: "m",
  DOTALL: "s",
  UNICODE: "u",
};

// Leading inline flag group as written in many shared pattern files: "(?i)..."
const INLINE_FLAGS = /^\(\?([a-zA-Z]+)\)/;
const INLINE_FLAG_LETTERS: Record<string, string> = { i: "i", m: "m", s: "s", u: "u" };

function resolveFlags(def: DetectorDefinition): { source: string; flags: string } {
  const flags = new Set<string>(["g"]);
  let source = def.regex;

  const inline = INLINE_FLAGS.exec(source);
  if (inline) {
    for (const letter of inline[1]) {
      const flag = INLINE_FLAG_LETTERS[letter.toLowerCase()];
      if (!flag) {
        throw new ConfigurationError(`unsupported inline flag "${letter}"`, { detector: def.name });
      }
      flags.add(flag);
    }
    source = source.slice(inline[0].length);
  }

  const named = def.flags === undefined ? [] : Array.isArray(def.flags) ? def.flags : [def.flags];
  for (const name of named) {
    const flag = FLAG_NAMES[name.trim().toUpperCase()];
    if (!flag) {
      throw new ConfigurationError(`unsupported flag "${name}"`, { detector: def.name });
    }
    flags.add(flag);
  }

  // Named groups written as (?P<name>...) become (?<name>...)
  source = source.replace(/\(\?P</g, "(?<");

  return { source, flags: [...flags].join("") };
}

function countCaptureGroups(source: string, flags: string): number {
  const probe = new RegExp(`${source}|`, flags.replace("g", "")).exec("");
  return probe ? probe.length - 1 : 0;
}

/**
 * Compile one definition, resolving its rule ids against the built-in set.
 */
export function compileDetector(def: DetectorDefinition): DetectorSpec {
  const name = def.name.trim();
  if (!name) {
    throw new ConfigurationError("detector name must not be empty");
  }

  const { source, flags } = resolveFlags({ ...def, name });

  let pattern: RegExp;
  try {
    pattern = new RegExp(source, flags);
  } catch (error) {
    throw new ConfigurationError(
      `invalid pattern /${def.regex}/: ${error instanceof Error ? error.message : String(error)}`,
      { detector: name, cause: error },
    );
  }

  const group = def.group ?? 0;
  const available = countCaptureGroups(source, flags);
  if (!Number.isInteger(group) || group < 0 || group > available) {
    throw new ConfigurationError(
      `capture group ${group} requested but pattern has ${available}`,
      { detector: name },
    );
  }

  // Group offsets come from the match indices
  if (group > 0) pattern = new RegExp(pattern.source, `${pattern.flags}d`);

  return {
    name,
    pattern,
    group,
    normalize: resolveNormalizer(def.normalize, name),
    validate: resolveValidator(def.validate, name),
    description: def.desc ?? "",
  };
}

// =============================================================================
// Registry
// =============================================================================

export class DetectorRegistry {
  private readonly detectors: DetectorSpec[];
  private readonly byName: Map<string, DetectorSpec>;

  private constructor(detectors: DetectorSpec[]) {
    this.detectors = detectors;
    this.byName = new Map(detectors.map((d) => [d.name, d]));
  }

  /**
   * Build a registry from definitions, in order.
   * Throws ConfigurationError on the first bad pattern, unknown rule id or
   * duplicate name.
   */
  static load(definitions: readonly DetectorDefinition[]): DetectorRegistry {
    return DetectorRegistry.fromSpecs(definitions.map(compileDetector));
  }

  static fromSpecs(specs: readonly DetectorSpec[]): DetectorRegistry {
    const seen = new Set<string>();
    for (const spec of specs) {
      if (seen.has(spec.name)) {
        throw new ConfigurationError("duplicate detector name", { detector: spec.name });
      }
      if (!spec.pattern.global) {
        throw new ConfigurationError("pattern must carry the global flag", { detector: spec.name });
      }
      seen.add(spec.name);
    }
    return new DetectorRegistry([...specs]);
  }

  get size(): number {
    return this.detectors.length;
  }

  names(): string[] {
    return this.detectors.map((d) => d.name);
  }

  get(name: string): DetectorSpec | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  /**
   * Run every detector over `text`.
   *
   * The text is separator-normalized first; raw matches are substrings of
   * that normalized text. Candidates failing a validator are dropped, and so
   * are candidates whose normalized value is empty.
   */
  apply(text: string): DetectionFragment[] {
    const out: DetectionFragment[] = [];
    if (!text) return out;
    const content = normalizeSeparators(text);

    for (const detector of this.detectors) {
      const { pattern } = detector;
      pattern.lastIndex = 0;
      let m: RegExpExecArray | null;
      while ((m = pattern.exec(content)) !== null) {
        if (m[0].length === 0) {
          pattern.lastIndex++;
          continue;
        }
        const raw = m[detector.group];
        if (!raw) continue;
        if (detector.validate && !detector.validate(raw)) continue;
        const normalized = detector.normalize ? detector.normalize(raw) : raw;
        if (!normalized) continue;
        out.push({
          detector: detector.name,
          rawText: raw,
          normalizedText: normalized,
          index: m.indices ? m.indices[detector.group][0] : m.index,
        });
      }
    }

    return out;
  }
}
