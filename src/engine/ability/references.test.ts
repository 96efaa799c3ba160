import { describe, it, expect } from 'vitest';
import { isIndexedReference, resolveParamReference } from './references';

describe('resolveParamReference', () => {
  describe('literals', () => {
    it('returns an absent value as undefined', () => {
      expect(resolveParamReference(undefined, [1, 2])).toEqual({ ok: true, value: undefined });
    });

    it('returns a literal unchanged, even with an empty list', () => {
      expect(resolveParamReference(4.25, [])).toEqual({ ok: true, value: 4.25 });
      expect(resolveParamReference(-3, [])).toEqual({ ok: true, value: -3 });
      expect(resolveParamReference(0, [])).toEqual({ ok: true, value: 0 });
    });
  });

  describe('indexed references', () => {
    const params = [1.5, 2.5, 0.1];

    it('returns the referenced slot exactly', () => {
      expect(resolveParamReference('%0', params)).toEqual({ ok: true, value: 1.5 });
      expect(resolveParamReference('%1', params)).toEqual({ ok: true, value: 2.5 });
      expect(resolveParamReference('%2', params)).toEqual({ ok: true, value: 0.1 });
    });

    it('strips every marker before parsing', () => {
      expect(resolveParamReference('%%1', params)).toEqual({ ok: true, value: 2.5 });
      expect(resolveParamReference('1', params)).toEqual({ ok: true, value: 2.5 });
      expect(resolveParamReference('1%', params)).toEqual({ ok: true, value: 2.5 });
    });

    it('does not apply a leading plus sign to the value', () => {
      expect(resolveParamReference('+%1', params)).toEqual({ ok: true, value: 2.5 });
    });

    it('treats a leading minus as part of the index', () => {
      const result = resolveParamReference('-%1', params);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('IndexOutOfRange');
        expect(result.error.details).toEqual({ reference: '-%1', index: -1, length: 3 });
      }
    });

    it('tolerates surrounding whitespace', () => {
      expect(resolveParamReference(' %2 ', params)).toEqual({ ok: true, value: 0.1 });
    });
  });

  describe('errors', () => {
    it('fails with IndexOutOfRange past the end of the list', () => {
      const result = resolveParamReference('%3', [1, 2, 3]);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('IndexOutOfRange');
        expect(result.error.message).toBe('Parameter index 3 is out of range for a list of 3');
      }
    });

    it('fails with IndexOutOfRange for any index into an empty list', () => {
      const result = resolveParamReference('%0', []);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.kind).toBe('IndexOutOfRange');
    });

    it.each(['%abc', '', '%', '%1.5', '%1e2', '%0x1', '%1 2'])(
      'fails with MalformedReference for "%s"',
      (reference) => {
        const result = resolveParamReference(reference, [1, 2, 3]);
        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.error.kind).toBe('MalformedReference');
      },
    );

    it('fails with MalformedReference when the index overflows', () => {
      const result = resolveParamReference('%99999999999', [1]);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.kind).toBe('MalformedReference');
    });
  });
});

describe('isIndexedReference', () => {
  it('distinguishes references from literals', () => {
    expect(isIndexedReference('%0')).toBe(true);
    expect(isIndexedReference(0)).toBe(false);
    expect(isIndexedReference(undefined)).toBe(false);
  });
});
