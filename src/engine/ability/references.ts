/**
 * Parameter reference resolution.
 *
 * A configured delta or ratio is either absent, a literal number, or a
 * string naming a slot of the contextual parameter list ("%0", "%3").
 * Every modifier kind resolves its numeric fields through this module.
 */

import type { ParamList } from '../types';
import { EngineError, failed, resolved, type Resolution } from '../errors';
import type { ParamReference } from './types';

const INDEX_PATTERN = /^[+-]?\d+$/;

/**
 * Resolve a configured value against a parameter list.
 *
 * Every `%` is stripped from a string reference and the remainder is
 * parsed as an integer index. A sign in the reference selects nothing:
 * "-%1" is index -1, which is out of range, not the negation of slot 1.
 *
 * @returns the number, `undefined` for an absent value, or an error
 */
export function resolveParamReference(
  reference: ParamReference,
  paramList: ParamList,
): Resolution<number | undefined> {
  if (reference === undefined) {
    return resolved(undefined);
  }

  if (typeof reference === 'number') {
    return resolved(reference);
  }

  const digits = reference.replace(/%/g, '').trim();
  if (!INDEX_PATTERN.test(digits)) {
    return failed(
      new EngineError('MalformedReference', `Malformed parameter reference "${reference}"`, {
        reference,
      }),
    );
  }

  const index = Number.parseInt(digits, 10);
  if (index > 0x7fffffff || index < -0x80000000) {
    return failed(
      new EngineError('MalformedReference', `Parameter reference "${reference}" overflows an index`, {
        reference,
      }),
    );
  }

  const value = index >= 0 ? paramList[index] : undefined;
  if (value === undefined) {
    return failed(
      new EngineError(
        'IndexOutOfRange',
        `Parameter index ${index} is out of range for a list of ${paramList.length}`,
        { reference, index, length: paramList.length },
      ),
    );
  }

  return resolved(value);
}

/**
 * Check whether a configured value is an indexed reference rather than a literal.
 */
export function isIndexedReference(reference: ParamReference): reference is string {
  return typeof reference === 'string';
}
