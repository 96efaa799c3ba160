/**
 * Predicate evaluation.
 *
 * Predicates are pure boolean functions of an already-resolved context.
 * They hold no state and are re-evaluated every time a gated modifier
 * is considered.
 */

import type {
  EntityState,
  LogicType,
  Predicate,
  PredicateContext,
  PredicateKind,
  PredicateTarget,
} from './types';

// =============================================================================
// Comparison
// =============================================================================

/**
 * Compare a contextual quantity against a reference value.
 * An absent operator is vacuously true.
 */
export function compareWithLogic(
  actual: number,
  logic: LogicType | undefined,
  expected: number,
): boolean {
  switch (logic) {
    case undefined:
      return true;
    case 'Equal':
      return actual === expected;
    case 'NotEqual':
      return actual !== expected;
    case 'Greater':
      return actual > expected;
    case 'GreaterOrEqual':
      return actual >= expected;
    case 'Less':
      return actual < expected;
    case 'LessOrEqual':
      return actual <= expected;
  }
}

function selectEntity(
  context: PredicateContext,
  target: PredicateTarget = 'Target',
): EntityState | undefined {
  return target === 'Self' ? context.self : context.target;
}

// =============================================================================
// Core Predicate Evaluator
// =============================================================================

/**
 * Evaluate a predicate against the given context.
 * A predicate whose designated entity is missing from the context is false.
 */
export function evaluatePredicate(predicate: Predicate, context: PredicateContext): boolean {
  switch (predicate.kind) {
    case 'ByTargetAltitude': {
      const entity = selectEntity(context, predicate.target);
      if (!entity) return false;
      return compareWithLogic(entity.altitude, predicate.logic, predicate.value);
    }

    case 'ByTargetHPRatio': {
      const entity = selectEntity(context, predicate.target);
      if (!entity) return false;
      return compareWithLogic(entity.hpRatio, predicate.logic, predicate.value);
    }

    case 'ByHasAbilityState': {
      const entity = selectEntity(context, predicate.target);
      if (!entity) return false;
      return entity.abilityStates.has(predicate.abilityState);
    }

    case 'ByAny':
      return predicate.predicates.some(p => evaluatePredicate(p, context));

    case 'ByNot':
      return !predicate.predicates.some(p => evaluatePredicate(p, context));
  }
}

/**
 * Evaluate a modifier gate: every predicate must hold.
 */
export function evaluateAllPredicates(
  predicates: readonly Predicate[],
  context: PredicateContext,
): boolean {
  return predicates.every(p => evaluatePredicate(p, context));
}

// =============================================================================
// Description Helpers (for logging)
// =============================================================================

const LOGIC_SYMBOLS: Record<LogicType, string> = {
  Equal: '==',
  NotEqual: '!=',
  Greater: '>',
  GreaterOrEqual: '>=',
  Less: '<',
  LessOrEqual: '<=',
};

const QUANTITY_LABELS: Record<Exclude<PredicateKind, 'ByHasAbilityState' | 'ByAny' | 'ByNot'>, string> = {
  ByTargetAltitude: 'altitude',
  ByTargetHPRatio: 'hp ratio',
};

/**
 * Get a human-readable description of a predicate.
 */
export function describePredicate(predicate: Predicate): string {
  switch (predicate.kind) {
    case 'ByTargetAltitude':
    case 'ByTargetHPRatio': {
      const who = predicate.target === 'Self' ? 'self' : 'target';
      if (!predicate.logic) return 'always';
      return `${who} ${QUANTITY_LABELS[predicate.kind]} ${LOGIC_SYMBOLS[predicate.logic]} ${predicate.value}`;
    }
    case 'ByHasAbilityState': {
      const who = predicate.target === 'Self' ? 'self' : 'target';
      return `${who} has ${predicate.abilityState}`;
    }
    case 'ByAny':
      return `any of (${predicate.predicates.map(describePredicate).join(', ')})`;
    case 'ByNot':
      return `none of (${predicate.predicates.map(describePredicate).join(', ')})`;
  }
}
