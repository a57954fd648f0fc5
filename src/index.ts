/**
 * @module zobrist-set
 * Production build: `ZobristHashSet` is the bare XOR accumulator.
 * Import `zobrist-set/checked` (or resolve with the `zobrist-check` condition)
 * to get the validating build under the same names.
 */

export { ZobristHashSet, CheckedZobristHashSet } from './zobrist-set';
export type { ZobristHashSetOptions, CheckedZobristHashSetOptions } from './zobrist-set';
export { BoundedMembershipChecker } from './membership-checker';
export type { MembershipCheckerOptions } from './membership-checker';
export { FxHasher, hashValue, MASK_64 } from './hasher';
export type { Hash, Hashable, HashFunction } from './hasher';
export { SetBehaviorError, CheckerCapacityError } from './errors';
export { DEFAULT_CHECKER_CAPACITY } from './config';
