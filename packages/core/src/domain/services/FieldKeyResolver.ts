import type { Schema } from '../model/Schema.js';
import { hasColumn } from '../model/Schema.js';

/** Suffix given to array-like fields the schema does not know under any name. */
export const UNKNOWN_ARRAY_SUFFIX = '_tab';

/** Raw token of the record identifier line. */
export const IRN_TOKEN = 'irn:1';

/** Result of resolving a raw field token. */
export type FieldKey =
  | { readonly kind: 'field'; readonly field: string; readonly index?: number }
  | { readonly kind: 'irn' }
  | { readonly kind: 'skip'; readonly reason: 'rownum' | 'malformed-index'; readonly field?: string };

const TRAILING_DIGITS = /\d+$/;
const INDEX_SUFFIX = /^[+-]?\d+$/;

/**
 * Maps raw export tokens (`CatDisplayName`, `SecCanDisplay:2`, `AssRegistrationNumberRefLocal0`)
 * to canonical schema field names and zero-based list indices.
 */
export class FieldKeyResolver {
  private readonly schema: Schema;

  constructor(schema: Schema) {
    this.schema = schema;
  }

  resolve(token: string): FieldKey {
    if (token === 'rownum') return { kind: 'skip', reason: 'rownum' };
    if (token === IRN_TOKEN) return { kind: 'irn' };

    let name = token;
    let index: number | undefined;

    const colon = token.indexOf(':');
    if (colon !== -1) {
      name = token.slice(0, colon);
      const suffix = token.slice(colon + 1);
      // Source indices are 1-based
      const position = INDEX_SUFFIX.test(suffix) ? Number.parseInt(suffix, 10) - 1 : Number.NaN;
      if (Number.isNaN(position) || position < 0) {
        return { kind: 'skip', reason: 'malformed-index', field: name };
      }
      index = position;
    }

    const field = this.canonicalName(name);
    return index === undefined ? { kind: 'field', field } : { kind: 'field', field, index };
  }

  /** Resolve a de-indexed field name against the schema columns. */
  canonicalName(name: string): string {
    if (hasColumn(this.schema, name)) return name;

    const stripped = name.replace(TRAILING_DIGITS, '');
    if (stripped !== name && hasColumn(this.schema, stripped)) return stripped;

    return `${name}${UNKNOWN_ARRAY_SUFFIX}`;
  }
}
