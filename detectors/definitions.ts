/**
 * Detector definitions: the built-in set and YAML files
 *
 * File format, one entry per detector:
 *
 *   - name: EMAIL
 *     regex: '(?i)[a-z0-9._%+-]+@[a-z0-9.-]+\.[a-z]{2,}'
 *     normalize: lowercase
 *   - name: QC_RAMQ
 *     regex: '\b[A-Za-z]{4}[ -]?\d{4}[ -]?\d{4}\b'
 *     flags: [IGNORECASE]
 *     validate: ramq
 *     normalize: alnum-upper
 */

import { readFileSync } from "node:fs";
import { load as loadYaml } from "js-yaml";
import { z } from "zod";
import { ConfigurationError, describeError } from "../errors.js";
import type { DetectorDefinition } from "./types.js";

// =============================================================================
// Built-in Detectors
// =============================================================================

export const BUILTIN_DEFINITIONS: readonly DetectorDefinition[] = [
  {
    name: "NAS",
    // exactly nine digits from any script, up to three separators (space,
    // dash, underscore, dot, slash) between digits, no digit on either side
    regex: String.raw`(?<!\p{Nd})\p{Nd}(?:[\-\s_./]{0,3}\p{Nd}){8}(?!\p{Nd})`,
    flags: "UNICODE",
    validate: "sin",
    normalize: "sin",
    desc: "Canadian SIN as ###-###-###, Luhn-checked",
  },
];

// =============================================================================
// Schema
// =============================================================================

const ruleIds = z.union([z.string(), z.array(z.string())]);

const DefinitionSchema = z
  .object({
    name: z.string().trim().min(1),
    regex: z.string().min(1).optional(),
    pattern: z.string().min(1).optional(),
    flags: ruleIds.optional(),
    group: z.number().int().min(0).optional(),
    normalize: ruleIds.optional(),
    validate: ruleIds.optional(),
    desc: z.string().optional(),
  })
  .strict();

function entryName(entry: unknown, position: number): string {
  if (entry && typeof entry === "object" && "name" in entry && typeof entry.name === "string") {
    return entry.name;
  }
  return `#${position + 1}`;
}

/**
 * Validate parsed YAML/JSON content into definitions.
 * Errors name the offending entry.
 */
export function parseDefinitions(content: unknown, origin = "detector definitions"): DetectorDefinition[] {
  if (content === null || content === undefined) return [];
  if (!Array.isArray(content)) {
    throw new ConfigurationError(`${origin}: expected a list of detectors`);
  }

  return content.map((entry, position) => {
    const parsed = DefinitionSchema.safeParse(entry);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "entry"}: ${issue.message}`)
        .join("; ");
      throw new ConfigurationError(`${origin}: ${issues}`, { detector: entryName(entry, position) });
    }
    const { pattern, regex, ...rest } = parsed.data;
    const source = regex ?? pattern;
    if (source === undefined) {
      throw new ConfigurationError(`${origin}: "regex" is required`, { detector: rest.name });
    }
    return { ...rest, regex: source };
  });
}

export function loadDefinitionsFile(path: string): DetectorDefinition[] {
  let content: unknown;
  try {
    content = loadYaml(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ConfigurationError(`Failed to read detectors from ${path}: ${describeError(error)}`, {
      cause: error,
    });
  }
  return parseDefinitions(content, path);
}

/**
 * Combine definition lists in order. A later definition with the same name
 * replaces the earlier one in place, so a file can override a built-in.
 */
export function mergeDefinitions(...lists: ReadonlyArray<readonly DetectorDefinition[]>): DetectorDefinition[] {
  const merged = new Map<string, DetectorDefinition>();
  for (const list of lists) {
    for (const def of list) {
      merged.set(def.name.trim(), def);
    }
  }
  return [...merged.values()];
}
