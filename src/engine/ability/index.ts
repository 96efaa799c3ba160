/**
 * Talent modifier and predicate engine exports.
 */

// Types
export * from './types';

// Depot
export * from './depot';

// Parameter references
export { resolveParamReference, isIndexedReference } from './references';

// Predicates
export * from './predicates';

// Modifiers
export * from './talents';

// Hash index and hashed overrides
export * from './hashIndex';
export { overrideSpecialByHash } from './overrides';

// Compilation
export * from './compiler';

// Raw record validation
export * from './schema';
