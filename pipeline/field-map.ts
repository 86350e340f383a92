/**
 * Detector -> document field mapping for write-back
 */

import type { DetectorRegistry } from "../detectors/registry.js";
import { ConfigurationError } from "../errors.js";
import type { FieldMap } from "./types.js";

/**
 * Parse "NAS=nas_norm,EMAIL=emails" into a map.
 * Blank segments are skipped; a segment without "=" or with an empty side is
 * an error, and so is one detector mapped to two different fields.
 */
export function parseFieldMap(mapping: string | undefined): Map<string, string> {
  const map = new Map<string, string>();
  if (!mapping) return map;

  for (const part of mapping.split(",")) {
    if (!part.trim()) continue;
    const eq = part.indexOf("=");
    if (eq < 0) {
      throw new ConfigurationError(`Field map entry "${part.trim()}" is not DETECTOR=field`);
    }
    const detector = part.slice(0, eq).trim();
    const field = part.slice(eq + 1).trim();
    if (!detector || !field) {
      throw new ConfigurationError(`Field map entry "${part.trim()}" has an empty side`);
    }
    const previous = map.get(detector);
    if (previous !== undefined && previous !== field) {
      throw new ConfigurationError(`mapped to both "${previous}" and "${field}"`, { detector });
    }
    map.set(detector, field);
  }

  return map;
}

/**
 * Every mapped detector must exist; otherwise its values would silently
 * never be written.
 */
export function checkFieldMap(fieldMap: FieldMap, registry: DetectorRegistry): void {
  for (const detector of fieldMap.keys()) {
    if (!registry.has(detector)) {
      throw new ConfigurationError(
        `field map names an unknown detector (known: ${registry.names().join(", ")})`,
        { detector },
      );
    }
  }
}

export function targetFields(fieldMap: FieldMap): string[] {
  return [...new Set(fieldMap.values())];
}
