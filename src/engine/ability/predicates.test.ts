import { describe, it, expect } from 'vitest';
import {
  compareWithLogic,
  describePredicate,
  evaluateAllPredicates,
  evaluatePredicate,
} from './predicates';
import type { LogicType, Predicate } from './types';
import { contextWithTarget, entity } from '../../test/helpers';

describe('compareWithLogic', () => {
  const cases: Array<[LogicType, number, number, boolean]> = [
    ['Equal', 3, 3, true],
    ['Equal', 3, 4, false],
    ['NotEqual', 3, 4, true],
    ['NotEqual', 3, 3, false],
    ['Greater', 4, 3, true],
    ['Greater', 3, 3, false],
    ['GreaterOrEqual', 3, 3, true],
    ['GreaterOrEqual', 2, 3, false],
    ['Less', 2, 3, true],
    ['Less', 3, 3, false],
    ['LessOrEqual', 3, 3, true],
    ['LessOrEqual', 4, 3, false],
  ];

  it.each(cases)('%s(%d, %d) is %s', (logic, actual, expected, result) => {
    expect(compareWithLogic(actual, logic, expected)).toBe(result);
  });

  it('is vacuously true without an operator', () => {
    expect(compareWithLogic(-100, undefined, 100)).toBe(true);
  });
});

describe('evaluatePredicate', () => {
  describe('ByTargetAltitude', () => {
    const atLeastFive: Predicate = { kind: 'ByTargetAltitude', logic: 'GreaterOrEqual', value: 5 };

    it('is true at the threshold', () => {
      expect(evaluatePredicate(atLeastFive, contextWithTarget(entity({ altitude: 5 })))).toBe(true);
    });

    it('is false just below the threshold', () => {
      expect(evaluatePredicate(atLeastFive, contextWithTarget(entity({ altitude: 4.999 })))).toBe(false);
    });

    it('is true for any altitude without an operator', () => {
      const predicate: Predicate = { kind: 'ByTargetAltitude', value: 5 };
      expect(evaluatePredicate(predicate, contextWithTarget(entity({ altitude: -20 })))).toBe(true);
    });

    it('inspects self when asked to', () => {
      const predicate: Predicate = { kind: 'ByTargetAltitude', target: 'Self', logic: 'Greater', value: 10 };
      const context = contextWithTarget(entity({ altitude: 0 }), entity({ altitude: 12 }));
      expect(evaluatePredicate(predicate, context)).toBe(true);
    });

    it('is false when the context has no target', () => {
      expect(evaluatePredicate(atLeastFive, { self: entity({ altitude: 50 }) })).toBe(false);
    });
  });

  describe('ByTargetHPRatio', () => {
    it('compares the target hp ratio', () => {
      const predicate: Predicate = { kind: 'ByTargetHPRatio', logic: 'Less', value: 0.5 };
      expect(evaluatePredicate(predicate, contextWithTarget(entity({ hpRatio: 0.3 })))).toBe(true);
      expect(evaluatePredicate(predicate, contextWithTarget(entity({ hpRatio: 0.5 })))).toBe(false);
    });
  });

  describe('ByHasAbilityState', () => {
    it('checks the designated entity for the state', () => {
      const predicate: Predicate = { kind: 'ByHasAbilityState', abilityState: 'ElementWet' };
      expect(evaluatePredicate(predicate, contextWithTarget(entity({ abilityStates: ['ElementWet'] })))).toBe(true);
      expect(evaluatePredicate(predicate, contextWithTarget(entity({ abilityStates: ['ElementFreeze'] })))).toBe(false);
    });
  });

  describe('composites', () => {
    const high: Predicate = { kind: 'ByTargetAltitude', logic: 'Greater', value: 10 };
    const frozen: Predicate = { kind: 'ByHasAbilityState', abilityState: 'ElementFreeze' };
    const context = contextWithTarget(entity({ altitude: 2, abilityStates: ['ElementFreeze'] }));

    it('ByAny holds when one child holds', () => {
      expect(evaluatePredicate({ kind: 'ByAny', predicates: [high, frozen] }, context)).toBe(true);
      expect(evaluatePredicate({ kind: 'ByAny', predicates: [high] }, context)).toBe(false);
      expect(evaluatePredicate({ kind: 'ByAny', predicates: [] }, context)).toBe(false);
    });

    it('ByNot holds when no child holds', () => {
      expect(evaluatePredicate({ kind: 'ByNot', predicates: [high] }, context)).toBe(true);
      expect(evaluatePredicate({ kind: 'ByNot', predicates: [high, frozen] }, context)).toBe(false);
      expect(evaluatePredicate({ kind: 'ByNot', predicates: [] }, context)).toBe(true);
    });
  });

  it('gives the same answer on repeated evaluation', () => {
    const predicate: Predicate = { kind: 'ByTargetAltitude', logic: 'Equal', value: 1 };
    const context = contextWithTarget(entity({ altitude: 1 }));
    const results = Array.from({ length: 5 }, () => evaluatePredicate(predicate, context));
    expect(results).toEqual([true, true, true, true, true]);
  });
});

describe('evaluateAllPredicates', () => {
  it('requires every predicate to hold', () => {
    const context = contextWithTarget(entity({ altitude: 6, hpRatio: 0.2 }));
    const low: Predicate = { kind: 'ByTargetHPRatio', logic: 'LessOrEqual', value: 0.25 };
    const high: Predicate = { kind: 'ByTargetAltitude', logic: 'Greater', value: 5 };
    const higher: Predicate = { kind: 'ByTargetAltitude', logic: 'Greater', value: 8 };

    expect(evaluateAllPredicates([low, high], context)).toBe(true);
    expect(evaluateAllPredicates([low, higher], context)).toBe(false);
    expect(evaluateAllPredicates([], context)).toBe(true);
  });
});

describe('describePredicate', () => {
  it('describes comparisons', () => {
    expect(describePredicate({ kind: 'ByTargetAltitude', logic: 'GreaterOrEqual', value: 5 })).toBe(
      'target altitude >= 5',
    );
    expect(describePredicate({ kind: 'ByTargetHPRatio', target: 'Self', logic: 'Less', value: 0.5 })).toBe(
      'self hp ratio < 0.5',
    );
    expect(describePredicate({ kind: 'ByTargetAltitude', value: 5 })).toBe('always');
  });

  it('describes composites', () => {
    expect(
      describePredicate({
        kind: 'ByNot',
        predicates: [{ kind: 'ByHasAbilityState', abilityState: 'MuteTaunt' }],
      }),
    ).toBe('none of (target has MuteTaunt)');
  });
});
