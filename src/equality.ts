/**
 * @module equality
 * @description
 * The single capability the collections need from their keys: an equality test.
 * No hash and no ordering is ever derived from it.
 */

// ============================================================================
// 1. TYPE DEFINITIONS
// ============================================================================

/**
 * An equality capability for values of type `T`.
 * Implementations must be reflexive, symmetric and transitive.
 */
export interface Eq<T> {
    equals(a: T, b: T): boolean;
}

/**
 * Values that decide their own equality.
 * `structuralEquals` defers to `equals` whenever the left operand implements it.
 */
export interface Structural {
    equals(other: unknown): boolean;
}

// ============================================================================
// 2. STRUCTURAL EQUALITY
// ============================================================================

/** `equals` must come from the prototype; an own `equals` field is plain data. */
function isStructural(v: object): v is Structural {
    if (Object.prototype.hasOwnProperty.call(v, 'equals')) return false;
    return 'equals' in v && typeof v.equals === 'function';
}

function isPlainObject(v: object): boolean {
    const proto = Object.getPrototypeOf(v);
    return proto === Object.prototype || proto === null;
}

function equalSequences(a: readonly unknown[], b: readonly unknown[]): boolean {
    const len = a.length;
    if (len !== b.length) return false;
    for (let i = 0; i < len; i++) {
        if (!structuralEquals(a[i], b[i])) return false;
    }
    return true;
}

function equalRecords(a: object, b: object): boolean {
    const keysA = Object.keys(a);
    if (keysA.length !== Object.keys(b).length) return false;
    for (const key of keysA) {
        if (!Object.prototype.hasOwnProperty.call(b, key)) return false;
        const va: unknown = Reflect.get(a, key);
        const vb: unknown = Reflect.get(b, key);
        if (!structuralEquals(va, vb)) return false;
    }
    return true;
}

/**
 * Deep equality over arbitrary values.
 *
 * Order of checks:
 * 1. Identity (`0` and `-0` are equal, `NaN` equals `NaN`)
 * 2. Objects inheriting an `equals` method (`Structural`)
 * 3. Arrays (length, then element-wise)
 * 4. Dates (timestamp)
 * 5. Plain objects (same own keys in any order, value-wise)
 *
 * Anything else, functions and class instances without `equals` included, is
 * compared by reference. Pass `eqBy` as `keyEq` to compare such values by a
 * projection instead, e.g. `eqBy((p: Point) => [p.x, p.y])`.
 */
export function structuralEquals(a: unknown, b: unknown): boolean {
    if (a === b) return true;
    if (typeof a !== typeof b) return false;
    if (typeof a === 'number') return Number.isNaN(a) && Number.isNaN(b);
    if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) return false;

    if (isStructural(a)) return a.equals(b);

    if (Array.isArray(a)) return Array.isArray(b) && equalSequences(a, b);
    if (Array.isArray(b)) return false;

    if (a instanceof Date || b instanceof Date) {
        return a instanceof Date && b instanceof Date && a.getTime() === b.getTime();
    }

    if (isPlainObject(a) && isPlainObject(b)) return equalRecords(a, b);
    return false;
}

/** The default capability, backed by `structuralEquals`. */
export const defaultEq: Eq<unknown> = { equals: structuralEquals };

/**
 * Compares values by a projection, e.g. `eqBy((u: User) => u.id)`.
 */
export function eqBy<T, P>(project: (value: T) => P, base: Eq<P> = defaultEq): Eq<T> {
    return { equals: (a, b) => base.equals(project(a), project(b)) };
}
