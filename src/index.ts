/**
 * Sets and dictionaries over values that only support an equality test.
 * Lookups are linear scans; iteration follows insertion order, most recent first.
 */

export { structuralEquals, defaultEq, eqBy } from './equality';
export type { Eq, Structural } from './equality';

export { AssocDict, emptyDict } from './assoc-dict';
export type { Entry, DictOptions } from './assoc-dict';

export { AssocSet, emptySet, singleton, fromList, fromIterable } from './assoc-set';
export type { Unit, SetOptions } from './assoc-set';
