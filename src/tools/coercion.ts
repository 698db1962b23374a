/**
 * Type coercion helpers for tool parameter schemas.
 *
 * Smaller local models often send numbers and booleans as strings
 * ("20", "true") or file content as an array of lines. These schemas
 * accept those shapes before Zod validation.
 */

import { z } from 'zod';

/**
 * A boolean schema that accepts "true"/"false" (and 1/0, yes/no) strings.
 */
export function coerceBoolean() {
  return z.preprocess(val => {
    if (typeof val === 'string') {
      const lower = val.toLowerCase().trim();
      if (lower === 'true' || lower === '1' || lower === 'yes') return true;
      if (lower === 'false' || lower === '0' || lower === 'no') return false;
    }
    return val;
  }, z.boolean());
}

/**
 * A number schema that accepts numeric strings ("20" becomes 20).
 */
export function coerceNumber() {
  return z.coerce.number();
}

/**
 * A string schema that accepts arrays by joining elements with newlines.
 */
export function coerceString() {
  return z.preprocess(val => {
    if (Array.isArray(val)) {
      return val.map(item => String(item)).join('\n');
    }
    return val;
  }, z.string());
}
