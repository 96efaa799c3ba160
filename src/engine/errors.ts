/**
 * Engine error kinds and the result shape returned by resolution steps.
 */

export type EngineErrorKind =
  | 'UnknownAbility'
  | 'UnknownSpecial'
  | 'UnknownSkill'
  | 'UnknownHash'
  | 'MalformedReference'
  | 'IndexOutOfRange'
  | 'HashCollision';

export class EngineError extends Error {
  constructor(
    public readonly kind: EngineErrorKind,
    message: string,
    public readonly details: Readonly<Record<string, unknown>> = {},
  ) {
    super(message);
    this.name = 'EngineError';
  }
}

/** Outcome of a fallible, non-throwing engine step */
export type Resolution<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: EngineError };

export function resolved<T>(value: T): Resolution<T> {
  return { ok: true, value };
}

export function failed<T>(error: EngineError): Resolution<T> {
  return { ok: false, error };
}
