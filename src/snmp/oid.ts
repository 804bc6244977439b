/**
 * Object identifier: the arcs of a managed object's position in the MIB tree.
 */
export type ObjectIdentifier = readonly number[]

/** iso.org, the root every SNMP managed object lives under */
export const ISO_ORG: ObjectIdentifier = Object.freeze([1, 3])

/**
 * Remove leading dots from an OID string and trim whitespace
 * @param oid - The OID string to trim
 * @returns The trimmed OID string
 */
export const trimOid = (oid: string): string => {
	oid = oid.trim()
	while (oid.startsWith('.')) {
		oid = oid.substring(1)
	}
	return oid
}

/**
 * Validate if a string is a valid SNMP OID in dotted form
 * @param value - The string to validate as an OID
 * @returns True if the value is a valid SNMP OID
 */
export const isValidSnmpOid = (value: string): boolean => /^(0|1|2)(\.(0|[1-9]\d*))+$/u.test(value)

/**
 * Parse dotted OID text such as `.1.3.6.1.2.1.1.1.0`.
 *
 * @throws {Error} If the text is not a valid OID or an arc exceeds 2^32-1
 */
export const parseOid = (text: string): ObjectIdentifier => {
	const oid = trimOid(text)
	if (!isValidSnmpOid(oid)) throw new Error(`Invalid OID: "${text}"`)
	const arcs = oid.split('.').map(Number)
	if (arcs.some((arc) => arc > 0xffffffff)) throw new Error(`Invalid OID: "${text}" has an arc out of range`)
	return Object.freeze(arcs)
}

export const formatOid = (oid: ObjectIdentifier): string => oid.join('.')

/**
 * Tests whether the instance falls within the MIB subtree rooted at prefix.
 */
export const hasPrefix = (instance: ObjectIdentifier, prefix: ObjectIdentifier): boolean => {
	if (instance.length < prefix.length) return false
	return prefix.every((arc, i) => instance[i] === arc)
}

/**
 * Orders identifiers arc by arc; a strict prefix sorts before its extensions.
 *
 * @returns A negative number, zero or a positive number, as for `Array.prototype.sort`
 */
export const compareOids = (a: ObjectIdentifier, b: ObjectIdentifier): number => {
	const n = Math.min(a.length, b.length)
	for (let i = 0; i < n; i++) {
		if (a[i] !== b[i]) return a[i] < b[i] ? -1 : 1
	}
	return a.length - b.length
}
