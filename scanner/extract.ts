/**
 * Field extraction
 *
 * Walks a document's source and yields every string leaf with its path.
 * Object keys join with ".", array positions are written "[i]":
 * `{ attachment: { pages: ["a", "b"] } }` yields `attachment.pages[0]` and
 * `attachment.pages[1]`.
 */

export type FieldValue = {
  path: string;
  value: string;
};

export type ExtractOptions = {
  /** Dotted paths to walk; the whole source when empty */
  roots?: readonly string[];
  /** Dotted paths (and everything under them) to skip */
  exclude?: readonly string[];
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Read a dotted path. A literal key containing dots ("pii.email") wins over
 * the nested reading, since scripted updates create such keys.
 */
export function getPath(source: Record<string, unknown>, path: string): unknown {
  if (Object.prototype.hasOwnProperty.call(source, path)) {
    return source[path];
  }
  return getNestedPath(source, path);
}

/**
 * Read a dotted path through nested objects only, ignoring a literal key
 * with the same name.
 */
export function getNestedPath(source: Record<string, unknown>, path: string): unknown {
  let current: unknown = source;
  for (const part of path.split(".")) {
    if (!isRecord(current) || !Object.prototype.hasOwnProperty.call(current, part)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

// "a.b[3].c" -> "a.b.c"
function schemaPath(path: string): string {
  return path.replace(/\[\d+\]/g, "");
}

function makeExcluder(exclude: readonly string[]): (path: string) => boolean {
  const excluded = new Set(exclude.filter(Boolean));
  if (excluded.size === 0) return () => false;
  return (path) => {
    const plain = schemaPath(path);
    if (excluded.has(plain)) return true;
    for (const entry of excluded) {
      if (plain.startsWith(`${entry}.`)) return true;
    }
    return false;
  };
}

function* walk(
  value: unknown,
  path: string,
  isExcluded: (path: string) => boolean,
): Generator<FieldValue> {
  if (path && isExcluded(path)) return;

  if (typeof value === "string") {
    if (value) yield { path, value };
    return;
  }

  if (Array.isArray(value)) {
    for (let i = 0; i < value.length; i++) {
      yield* walk(value[i], `${path}[${i}]`, isExcluded);
    }
    return;
  }

  if (isRecord(value)) {
    for (const [key, child] of Object.entries(value)) {
      yield* walk(child, path ? `${path}.${key}` : key, isExcluded);
    }
  }

  // numbers, booleans and nulls carry no text
}

export function* extractFields(
  source: Record<string, unknown>,
  options: ExtractOptions = {},
): Generator<FieldValue> {
  const isExcluded = makeExcluder(options.exclude ?? []);
  const roots = (options.roots ?? []).filter(Boolean);

  if (roots.length === 0) {
    yield* walk(source, "", isExcluded);
    return;
  }

  for (const root of roots) {
    const value = getPath(source, root);
    if (value !== undefined) {
      yield* walk(value, root, isExcluded);
    }
  }
}
