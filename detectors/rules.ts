/**
 * Built-in normalization and validation rules
 *
 * Detector definitions refer to these by id. The set is closed: an id that
 * is not listed here is rejected when the definitions are loaded.
 */

import { ConfigurationError } from "../errors.js";
import type { Normalizer, Validator } from "./types.js";

// =============================================================================
// Text Helpers
// =============================================================================

const UNICODE_DASHES = /[\u2010-\u2014\u2212]/g;
const UNICODE_SPACES = /[\u00A0\u2007\u2009\u202F\u200B]/g;
const HORIZONTAL_WS_RUN = /[ \t\r\f\v]+/g;

/**
 * Fold the separators found in scanned office documents: no-break and thin
 * spaces become a plain space, Unicode dashes become "-", and runs of
 * horizontal whitespace collapse to one space. Newlines are kept.
 */
export function normalizeSeparators(text: string): string {
  if (!text) return text;
  return text
    .replace(UNICODE_SPACES, " ")
    .replace(UNICODE_DASHES, "-")
    .replace(HORIZONTAL_WS_RUN, " ");
}

const DECIMAL_DIGIT = /\p{Nd}/u;

function isDecimalDigit(codePoint: number): boolean {
  return DECIMAL_DIGIT.test(String.fromCodePoint(codePoint));
}

/**
 * Keep decimal digits from any script, as ASCII. Everything else is dropped.
 *
 * Unicode lays out each script's digits as a contiguous run of ten starting
 * at zero, so a digit's value is its offset from the start of its run.
 */
export function toAsciiDigits(text: string): string {
  let out = "";
  for (const ch of text) {
    const cp = ch.codePointAt(0) ?? 0;
    if (cp >= 0x30 && cp <= 0x39) {
      out += ch;
      continue;
    }
    if (!isDecimalDigit(cp)) continue;
    let start = cp;
    while (start > 0 && isDecimalDigit(start - 1)) start--;
    out += String((cp - start) % 10);
  }
  return out;
}

function alnumUpper(text: string): string {
  return text.replace(/[^A-Za-z0-9]/g, "").toUpperCase();
}

function nanpDigits(text: string): string {
  const digits = toAsciiDigits(text);
  return digits.length === 11 && digits.startsWith("1") ? digits.slice(1) : digits;
}

// =============================================================================
// Checksums
// =============================================================================

export function luhnCheck(text: string): boolean {
  const digits = toAsciiDigits(text);
  if (digits.length < 2) return false;
  let sum = 0;
  let alternate = false;
  for (let i = digits.length - 1; i >= 0; i--) {
    let n = digits.charCodeAt(i) - 48;
    if (alternate) {
      n *= 2;
      if (n > 9) n -= 9;
    }
    sum += n;
    alternate = !alternate;
  }
  return sum % 10 === 0;
}

/**
 * ISO 7064 MOD 97-10 as used by IBAN: move the first four characters to the
 * end, expand letters to 10..35, and require a remainder of 1.
 */
export function mod97Check(text: string): boolean {
  const value = alnumUpper(text);
  if (value.length < 5) return false;
  const rearranged = value.slice(4) + value.slice(0, 4);
  let remainder = 0;
  for (const ch of rearranged) {
    const expanded = /[0-9]/.test(ch) ? ch : String(ch.charCodeAt(0) - 55);
    for (const digit of expanded) {
      remainder = (remainder * 10 + (digit.charCodeAt(0) - 48)) % 97;
    }
  }
  return remainder === 1;
}

// =============================================================================
// Quebec Identifiers
// =============================================================================

// 4 letters, 6 date digits, 2 sequence digits: "TREM 8551 1512"
const QC_ID_SHAPE = /^[A-Z]{4}(\d{2})(\d{2})(\d{2})\d{2}$/;

// Month carries +50 for women on both RAMQ and permanent codes
function isEncodedMonth(mm: number): boolean {
  return (mm >= 1 && mm <= 12) || (mm >= 51 && mm <= 62);
}

function isDay(dd: number): boolean {
  return dd >= 1 && dd <= 31;
}

/** RAMQ health insurance number: letters, then YYMMDD, then two digits */
export function ramqCheck(text: string): boolean {
  const m = QC_ID_SHAPE.exec(alnumUpper(text));
  if (!m) return false;
  return isEncodedMonth(Number(m[2])) && isDay(Number(m[3]));
}

/** Quebec permanent code: letters, then DDMMYY, then two digits */
export function qcPermCodeCheck(text: string): boolean {
  const m = QC_ID_SHAPE.exec(alnumUpper(text));
  if (!m) return false;
  return isDay(Number(m[1])) && isEncodedMonth(Number(m[2]));
}

// =============================================================================
// Rule Tables
// =============================================================================

const CA_POSTAL = /^[ABCEGHJ-NPRSTVXY]\d[ABCEGHJ-NPRSTV-Z]\d[ABCEGHJ-NPRSTV-Z]\d$/;
const TRAILING_URL_PUNCTUATION = /[.,;:!?)\]}'"]+$/;
const URL_PARTS = /^([a-z][a-z0-9+.-]*:\/\/)?([^/?#]*)(.*)$/is;

export const NORMALIZERS: Readonly<Record<string, Normalizer>> = {
  "trim": (s) => s.trim(),
  "lowercase": (s) => s.toLowerCase(),
  "uppercase": (s) => s.toUpperCase(),
  "strip-whitespace": (s) => s.replace(/\s+/g, ""),
  "strip-non-digits": toAsciiDigits,
  "alnum-upper": alnumUpper,
  "sin": (s) => {
    const d = toAsciiDigits(s);
    return d.length === 9 ? `${d.slice(0, 3)}-${d.slice(3, 6)}-${d.slice(6)}` : d;
  },
  // Digits as ###-###-###, or empty (dropped) when there are not exactly nine
  "nas": (s) => {
    const d = toAsciiDigits(s);
    return d.length === 9 ? `${d.slice(0, 3)}-${d.slice(3, 6)}-${d.slice(6)}` : "";
  },
  "phone-nanp": nanpDigits,
  "postal-ca": (s) => {
    const v = alnumUpper(s);
    return v.length === 6 ? `${v.slice(0, 3)} ${v.slice(3)}` : v;
  },
  "url": (s) => {
    const stripped = s.replace(TRAILING_URL_PUNCTUATION, "");
    const m = URL_PARTS.exec(stripped);
    if (!m) return stripped;
    return `${(m[1] ?? "").toLowerCase()}${m[2].toLowerCase()}${m[3]}`;
  },
};

export const VALIDATORS: Readonly<Record<string, Validator>> = {
  "luhn": luhnCheck,
  "mod-97": mod97Check,
  "sin": (s) => {
    const d = toAsciiDigits(s);
    return d.length === 9 && d[0] !== "0" && luhnCheck(d);
  },
  "phone-nanp": (s) => {
    const d = nanpDigits(s);
    return d.length === 10 && d[0] >= "2" && d[3] >= "2";
  },
  "postal-ca": (s) => CA_POSTAL.test(alnumUpper(s)),
  "ramq": ramqCheck,
  "qc-perm-code": qcPermCodeCheck,
};

// =============================================================================
// Resolution
// =============================================================================

function asIdList(ids: string | string[] | undefined): string[] {
  if (ids === undefined) return [];
  return (Array.isArray(ids) ? ids : [ids]).map((id) => id.trim()).filter(Boolean);
}

function lookup<T>(table: Readonly<Record<string, T>>, id: string, kind: string, detector: string): T {
  if (!Object.prototype.hasOwnProperty.call(table, id)) {
    throw new ConfigurationError(
      `unknown ${kind} rule "${id}" (known: ${Object.keys(table).join(", ")})`,
      { detector },
    );
  }
  return table[id];
}

/**
 * Compose the listed normalizers left to right.
 * Returns undefined when no id is given.
 */
export function resolveNormalizer(
  ids: string | string[] | undefined,
  detector: string,
): Normalizer | undefined {
  const fns = asIdList(ids).map((id) => lookup(NORMALIZERS, id, "normalize", detector));
  if (fns.length === 0) return undefined;
  if (fns.length === 1) return fns[0];
  return (text) => fns.reduce((acc, fn) => fn(acc), text);
}

/**
 * Combine the listed validators; a candidate must pass all of them.
 * Returns undefined when no id is given.
 */
export function resolveValidator(
  ids: string | string[] | undefined,
  detector: string,
): Validator | undefined {
  const fns = asIdList(ids).map((id) => lookup(VALIDATORS, id, "validate", detector));
  if (fns.length === 0) return undefined;
  if (fns.length === 1) return fns[0];
  return (text) => fns.every((fn) => fn(text));
}
