/**
 * ledgergate core — Canonical JSON
 *
 * The canonical serialization is the input to every entry hash, and the
 * entry hash is the compliance artifact. Two conformant implementations
 * given the same entry must produce the same bytes, so the encoding is
 * pinned down completely:
 *
 * - object keys sorted by code point, at every level
 * - `,` and `:` separators, no whitespace
 * - every string character outside printable ASCII (0x20–0x7E) written as a
 *   lowercase `\uXXXX` escape of its UTF-16 code unit
 * - `null`, `true`, `false`, integers and finite decimals as in JSON
 *
 * This is the byte-for-byte output of a sorted-key, compact, ASCII-only
 * JSON encoder.
 */

/**
 * Produces the canonical JSON string for a value.
 *
 * Object properties whose value is `undefined` are omitted and `undefined`
 * array slots become `null`, as with JSON.stringify. Values with a
 * `toJSON()` method (Dates) are encoded through it.
 *
 * @throws TypeError for non-finite numbers, bigints, functions and symbols
 */
export function canonicalize(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null';
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new TypeError(`Cannot canonicalize non-finite number: ${String(value)}`);
    }
    return JSON.stringify(value);
  }
  if (typeof value === 'string') {
    return encodeString(value);
  }
  if (Array.isArray(value)) {
    return '[' + value.map((v: unknown) => canonicalize(v)).join(',') + ']';
  }
  if (typeof value === 'object') {
    if (hasToJSON(value)) {
      return canonicalize(value.toJSON());
    }
    const obj = value as Record<string, unknown>;
    const pairs: string[] = [];
    for (const key of Object.keys(obj).sort(compareCodePoints)) {
      const v = obj[key];
      if (v === undefined) continue;
      pairs.push(`${encodeString(key)}:${canonicalize(v)}`);
    }
    return '{' + pairs.join(',') + '}';
  }
  throw new TypeError(`Cannot canonicalize value of type ${typeof value}`);
}

/**
 * Serialize an opaque payload for storage in input_data / output_data.
 *
 * Strings are stored unchanged; null and undefined mean "no payload";
 * anything else goes through the canonical encoder.
 */
export function serializePayload(value: unknown): string | null {
  if (value === undefined || value === null) return null;
  if (typeof value === 'string') return value;
  return canonicalize(value);
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

const NON_PRINTABLE_ASCII = /[^\x20-\x7e]/g;

function encodeString(s: string): string {
  // JSON.stringify handles quotes, backslashes and control characters
  // (\b \f \n \r \t and lowercase \u00XX); what it leaves above 0x7E
  // is escaped here.
  return JSON.stringify(s).replace(NON_PRINTABLE_ASCII, (ch) =>
    '\\u' + ch.charCodeAt(0).toString(16).padStart(4, '0'),
  );
}

/**
 * Code-point order for keys. Equivalent to UTF-16 code-unit order except
 * where astral characters sort against U+E000–U+FFFF.
 */
function compareCodePoints(a: string, b: string): number {
  const ia = a[Symbol.iterator]();
  const ib = b[Symbol.iterator]();
  for (;;) {
    const ca = ia.next();
    const cb = ib.next();
    if (ca.done === true) return cb.done === true ? 0 : -1;
    if (cb.done === true) return 1;
    const diff = (ca.value.codePointAt(0) ?? 0) - (cb.value.codePointAt(0) ?? 0);
    if (diff !== 0) return diff;
  }
}

function hasToJSON(value: object): value is { toJSON(): unknown } {
  return 'toJSON' in value && typeof value.toJSON === 'function';
}
