/**
 * @module zobrist-set/checked
 * Verification build. Same exports as the production entry point, except that
 * `ZobristHashSet` is the validating `CheckedZobristHashSet`.
 */

export { CheckedZobristHashSet as ZobristHashSet, CheckedZobristHashSet } from './zobrist-set';
export type { CheckedZobristHashSetOptions as ZobristHashSetOptions, CheckedZobristHashSetOptions } from './zobrist-set';
export { BoundedMembershipChecker } from './membership-checker';
export type { MembershipCheckerOptions } from './membership-checker';
export { FxHasher, hashValue, MASK_64 } from './hasher';
export type { Hash, Hashable, HashFunction } from './hasher';
export { SetBehaviorError, CheckerCapacityError } from './errors';
export { DEFAULT_CHECKER_CAPACITY } from './config';
