import { compareOids, type ObjectIdentifier } from './oid.js'
import type { RawValue, Value } from './values.js'

/**
 * An assignment of a value to a managed object.
 *
 * Request bindings carry only a name (their value is the `Null` placeholder);
 * decoded reply bindings also keep the raw value they were decoded from.
 */
export interface Binding {
	readonly oid: ObjectIdentifier
	readonly value: Value
	readonly raw?: RawValue
}

/**
 * Reports whether a precedes b in the MIB tree.
 *
 * Only the identifiers are compared. Equal identifiers are not less than each
 * other, and a strict prefix precedes every identifier extending it.
 */
export const less = (a: Binding, b: Binding): boolean => compareOids(a.oid, b.oid) < 0

/**
 * Comparator for `Array.prototype.sort` that puts bindings in MIB tree order.
 */
export const compareBindings = (a: Binding, b: Binding): number => compareOids(a.oid, b.oid)

/**
 * Returns a copy of the bindings in tree order. Bindings arrive in wire order.
 */
export const sortBindings = (bindings: readonly Binding[]): Binding[] => [...bindings].sort(compareBindings)
