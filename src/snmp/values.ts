import asn1 from 'asn1-ber'
import type { Reader, Writer } from 'asn1-ber'
import snmp from 'net-snmp'
import type { Binding } from './binding.js'
import { DecodeError, TypeMismatchError, errorMessage } from './errors.js'
import { formatOid, isValidSnmpOid, type ObjectIdentifier } from './oid.js'

const { Ber } = asn1

export enum TagClass {
	Universal = 0,
	Application = 1,
	Context = 2,
	Private = 3,
}

const APPLICATION = 0x40
const CONSTRUCTED = 0x20

/**
 * One binding value as it appeared on the wire, before any interpretation.
 */
export interface RawValue {
	readonly class: TagClass
	readonly tag: number
	readonly constructed: boolean
	/** Content octets */
	readonly bytes: Buffer
	/** The complete encoding, identifier octet first */
	readonly fullBytes: Buffer
}

export type Value =
	| { readonly type: 'Null' }
	| { readonly type: 'NoSuchObject' }
	| { readonly type: 'NoSuchInstance' }
	| { readonly type: 'EndOfMibView' }
	/** A bigint only when the value lies outside the safe integer range */
	| { readonly type: 'Integer'; readonly value: number | bigint }
	| { readonly type: 'OctetString'; readonly value: Buffer; readonly text: string | null }
	| { readonly type: 'ObjectIdentifier'; readonly value: ObjectIdentifier }
	| { readonly type: 'IpAddress'; readonly value: string; readonly bytes: Buffer }
	| { readonly type: 'Counter32'; readonly value: number }
	| { readonly type: 'Unsigned32'; readonly value: number }
	| { readonly type: 'TimeTicks'; readonly value: number }
	| { readonly type: 'Counter64'; readonly value: bigint }
	| { readonly type: 'Opaque'; readonly value: Buffer }
	| {
			readonly type: 'Raw'
			readonly class: TagClass
			readonly tag: number
			readonly constructed: boolean
			readonly value: Buffer
	  }

export type ValueType = Value['type']

/** Placeholder value carried by every outbound request binding */
export const NULL = Object.freeze({ type: 'Null' } as const)

const UINT32_MAX = 0xffffffffn
const UINT64_MAX = 0xffffffffffffffffn
const INT64_MIN = -(1n << 63n)
const INT64_MAX = (1n << 63n) - 1n

/**
 * Reports whether the value is one of the three exception placeholders an
 * agent returns instead of a value.
 */
export const isException = (value: Value): boolean =>
	value.type === 'NoSuchObject' || value.type === 'NoSuchInstance' || value.type === 'EndOfMibView'

/**
 * Read one complete TLV from the reader without interpreting it.
 *
 * @throws {DecodeError} If the element is truncated or its header is malformed
 */
export const readRawValue = (reader: Reader): RawValue => {
	const rest = reader.buffer
	const start = reader.offset
	const identifier = reader.peek()
	if (identifier === null) throw new DecodeError('truncated value')
	if ((identifier & 0x1f) === 0x1f) throw new DecodeError(`unsupported tag 0x${identifier.toString(16)}`)
	let bytes: Buffer | null
	try {
		bytes = reader.readString(identifier, true)
	} catch (error) {
		throw new DecodeError(`malformed value: ${errorMessage(error)}`, { cause: error })
	}
	if (bytes === null) throw new DecodeError('truncated value')
	return {
		class: identifier >> 6,
		tag: identifier & 0x1f,
		constructed: (identifier & CONSTRUCTED) !== 0,
		bytes,
		fullBytes: rest.subarray(0, reader.offset - start),
	}
}

const retag = (raw: RawValue, identifier: number): RawValue => {
	const fullBytes = Buffer.from(raw.fullBytes)
	fullBytes[0] = identifier
	return {
		class: TagClass.Universal,
		tag: identifier,
		constructed: false,
		bytes: fullBytes.subarray(fullBytes.length - raw.bytes.length),
		fullBytes,
	}
}

/**
 * Rewrites SNMP application-class values as the universal types they are
 * implicitly tagged from, so a generic BER reader can parse them. Any other
 * value is returned unchanged, which makes the rewrite idempotent.
 */
export const normalizeClass = (raw: RawValue): RawValue => {
	if (raw.class !== TagClass.Application) return raw
	switch (APPLICATION | raw.tag) {
		// IpAddress ::= [APPLICATION 0] IMPLICIT OCTET STRING (SIZE (4))
		// Opaque ::= [APPLICATION 4] IMPLICIT OCTET STRING
		case snmp.ObjectType.IpAddress:
		case snmp.ObjectType.Opaque:
			return retag(raw, snmp.ObjectType.OctetString)
		// Counter32, Unsigned32, TimeTicks ::= [APPLICATION 1..3] IMPLICIT INTEGER (0..4294967295)
		// Counter64 ::= [APPLICATION 6] IMPLICIT INTEGER (0..18446744073709551615)
		case snmp.ObjectType.Counter:
		case snmp.ObjectType.Gauge:
		case snmp.ObjectType.TimeTicks:
		case snmp.ObjectType.Counter64:
			return retag(raw, snmp.ObjectType.Integer)
		default:
			return raw
	}
}

/**
 * Convert a buffer to an unsigned BigInt
 * @param buffer - The buffer to convert
 * @param start - Starting position in the buffer
 * @param end - Ending position in the buffer
 */
export const bufferToBigInt = (buffer: Buffer, start = 0, end = buffer.length): bigint => {
	const hex = buffer.subarray(start, end).toString('hex')
	return hex.length === 0 ? 0n : BigInt(`0x${hex}`)
}

/**
 * Minimal two's complement content octets of a BER INTEGER.
 */
export const integerBytes = (n: bigint): Buffer => {
	const bytes: number[] = []
	for (;;) {
		bytes.unshift(Number(n & 0xffn))
		const sign = bytes[0] & 0x80
		n >>= 8n
		if ((n === 0n && sign === 0) || (n === -1n && sign !== 0)) break
	}
	return Buffer.from(bytes)
}

const readUniversal = (normalized: RawValue, tag: number, expected: string): Buffer => {
	const reader = new Ber.Reader(normalized.fullBytes)
	if (reader.peek() !== tag) throw new TypeMismatchError(normalized.class, normalized.tag, expected)
	const content = reader.readString(tag, true)
	if (content === null) throw new DecodeError('truncated value')
	return content
}

const decodeInteger = (content: Buffer): bigint => {
	if (content.length === 0) throw new DecodeError('empty integer')
	const n = bufferToBigInt(content)
	return content[0] & 0x80 ? n - (1n << BigInt(content.length * 8)) : n
}

const toSafeNumber = (n: bigint): number => {
	if (n < BigInt(Number.MIN_SAFE_INTEGER) || n > BigInt(Number.MAX_SAFE_INTEGER)) {
		throw new DecodeError(`integer ${n} is not representable as a number`)
	}
	return Number(n)
}

const toInteger = (n: bigint): number | bigint => {
	if (n < INT64_MIN || n > INT64_MAX) {
		throw new DecodeError(`Integer value ${n} is out of range [${INT64_MIN}, ${INT64_MAX}]`)
	}
	return n < BigInt(Number.MIN_SAFE_INTEGER) || n > BigInt(Number.MAX_SAFE_INTEGER) ? n : Number(n)
}

const toUnsigned = (n: bigint, max: bigint, type: ValueType): bigint => {
	if (n < 0n || n > max) throw new DecodeError(`${type} value ${n} is out of range [0, ${max}]`)
	return n
}

/**
 * Parse the dotted text produced by the BER reader into an identifier.
 *
 * @throws {DecodeError} If the text is missing or not a valid OID
 */
export const oidFromText = (text: string | null): ObjectIdentifier => {
	if (text === null) throw new DecodeError('truncated object identifier')
	if (!isValidSnmpOid(text)) throw new DecodeError(`malformed object identifier "${text}"`)
	return Object.freeze(text.split('.').map(Number))
}

const decodeOid = (normalized: RawValue): ObjectIdentifier => {
	const reader = new Ber.Reader(normalized.fullBytes)
	if (reader.peek() !== snmp.ObjectType.OID) {
		throw new TypeMismatchError(normalized.class, normalized.tag, 'ObjectIdentifier')
	}
	try {
		return oidFromText(reader.readOID(snmp.ObjectType.OID))
	} catch (error) {
		if (error instanceof DecodeError) throw error
		throw new DecodeError(`malformed object identifier: ${errorMessage(error)}`, { cause: error })
	}
}

/**
 * Attempts to read bytes as a length-prefixed string of printable ASCII.
 *
 * The first element is taken as the declared length; the rest must be exactly
 * that long and lie within 0x20..0x7e. This is a heuristic: binary data that
 * happens to satisfy it is reported as text, so it must not be used to round
 * trip arbitrary octet strings.
 *
 * Applied to an encoded OCTET STRING minus its identifier octet, only strings
 * under 128 bytes can qualify: longer ones carry a long-form BER length.
 *
 * @returns The text, or null when the bytes do not look like one
 */
export const toPrintableString = (x: ArrayLike<number>): string | null => {
	const codes = Array.from(x)
	if (codes.length === 0) return null
	if (codes[0] !== codes.length - 1) return null
	const chars = codes.slice(1)
	if (chars.some((c) => c < 0x20 || c > 0x7e)) return null
	return String.fromCharCode(...chars)
}

/**
 * Decode a raw binding value into its variant.
 *
 * The variant is chosen by the identifier octet seen on the wire; the payload
 * is read from the class-normalized encoding. Tags this engine does not know
 * decode to `Raw`.
 *
 * @throws {DecodeError} If the payload is malformed for its type
 */
export const decodeValue = (raw: RawValue): Value => {
	const normalized = normalizeClass(raw)
	const identifier = raw.fullBytes[0]
	switch (identifier) {
		case snmp.ObjectType.Null:
			return NULL
		case snmp.ObjectType.NoSuchObject:
			return { type: 'NoSuchObject' }
		case snmp.ObjectType.NoSuchInstance:
			return { type: 'NoSuchInstance' }
		case snmp.ObjectType.EndOfMibView:
			return { type: 'EndOfMibView' }
		case snmp.ObjectType.Integer:
			return {
				type: 'Integer',
				value: toInteger(decodeInteger(readUniversal(normalized, snmp.ObjectType.Integer, 'Integer'))),
			}
		case snmp.ObjectType.OctetString: {
			const value = readUniversal(normalized, snmp.ObjectType.OctetString, 'OctetString')
			// the identifier octet is dropped so a short-form length leads the bytes;
			// a long-form length (128 bytes or more) never yields text
			return { type: 'OctetString', value, text: toPrintableString(normalized.fullBytes.subarray(1)) }
		}
		case snmp.ObjectType.OID:
			return { type: 'ObjectIdentifier', value: decodeOid(normalized) }
		case snmp.ObjectType.IpAddress: {
			const bytes = readUniversal(normalized, snmp.ObjectType.OctetString, 'IpAddress')
			if (bytes.length !== 4) throw new DecodeError(`IpAddress must be 4 bytes, got ${bytes.length}`)
			return { type: 'IpAddress', value: Array.from(bytes).join('.'), bytes }
		}
		case snmp.ObjectType.Counter:
		case snmp.ObjectType.Gauge:
		case snmp.ObjectType.TimeTicks: {
			const type =
				identifier === snmp.ObjectType.Counter
					? 'Counter32'
					: identifier === snmp.ObjectType.Gauge
						? 'Unsigned32'
						: 'TimeTicks'
			const n = decodeInteger(readUniversal(normalized, snmp.ObjectType.Integer, type))
			return { type, value: Number(toUnsigned(n, UINT32_MAX, type)) }
		}
		case snmp.ObjectType.Counter64: {
			const n = decodeInteger(readUniversal(normalized, snmp.ObjectType.Integer, 'Counter64'))
			return { type: 'Counter64', value: toUnsigned(n, UINT64_MAX, 'Counter64') }
		}
		case snmp.ObjectType.Opaque:
			return { type: 'Opaque', value: readUniversal(normalized, snmp.ObjectType.OctetString, 'Opaque') }
		default:
			return { type: 'Raw', class: raw.class, tag: raw.tag, constructed: raw.constructed, value: raw.bytes }
	}
}

export type DecodeTarget = 'number' | 'bigint' | 'bytes' | 'string' | 'oid'

/**
 * Decode a binding's raw payload into the requested target type, after class
 * normalization. Application integers (Counter32, TimeTicks, ...) therefore
 * satisfy `number`, and IpAddress/Opaque satisfy `bytes`.
 *
 * @throws {TypeMismatchError} If the normalized class/tag cannot hold the target type
 * @throws {DecodeError} If the payload is malformed or the binding was never decoded from the wire
 */
export function decodeBindingValue(binding: Binding, target: 'number'): number
export function decodeBindingValue(binding: Binding, target: 'bigint'): bigint
export function decodeBindingValue(binding: Binding, target: 'bytes'): Buffer
export function decodeBindingValue(binding: Binding, target: 'string'): string
export function decodeBindingValue(binding: Binding, target: 'oid'): ObjectIdentifier
export function decodeBindingValue(
	binding: Binding,
	target: DecodeTarget,
): number | bigint | Buffer | string | ObjectIdentifier {
	if (binding.raw === undefined) throw new DecodeError(`${formatOid(binding.oid)}: binding carries no encoded value`)
	const normalized = normalizeClass(binding.raw)
	switch (target) {
		case 'number':
			return toSafeNumber(decodeInteger(readUniversal(normalized, snmp.ObjectType.Integer, target)))
		case 'bigint':
			return decodeInteger(readUniversal(normalized, snmp.ObjectType.Integer, target))
		case 'bytes':
			return readUniversal(normalized, snmp.ObjectType.OctetString, target)
		case 'string': {
			readUniversal(normalized, snmp.ObjectType.OctetString, target)
			const text = toPrintableString(normalized.fullBytes.subarray(1))
			if (text === null) throw new DecodeError(`${formatOid(binding.oid)}: not a printable string`)
			return text
		}
		case 'oid':
			return decodeOid(normalized)
	}
}

const writeEmpty = (writer: Writer, identifier: number): void => {
	writer.writeByte(identifier)
	writer.writeByte(0)
}

const writeContent = (writer: Writer, identifier: number, bytes: Buffer): void => {
	if (bytes.length === 0) writeEmpty(writer, identifier)
	else writer.writeBuffer(bytes, identifier)
}

/**
 * Append the BER encoding of a value to the writer.
 */
export const writeValue = (writer: Writer, value: Value): void => {
	switch (value.type) {
		case 'Null':
			return writer.writeNull()
		case 'NoSuchObject':
			return writeEmpty(writer, snmp.ObjectType.NoSuchObject)
		case 'NoSuchInstance':
			return writeEmpty(writer, snmp.ObjectType.NoSuchInstance)
		case 'EndOfMibView':
			return writeEmpty(writer, snmp.ObjectType.EndOfMibView)
		case 'Integer':
			return writer.writeBuffer(integerBytes(BigInt(value.value)), snmp.ObjectType.Integer)
		case 'OctetString':
			return writeContent(writer, snmp.ObjectType.OctetString, value.value)
		case 'ObjectIdentifier':
			return writer.writeOID(formatOid(value.value), snmp.ObjectType.OID)
		case 'IpAddress':
			return writer.writeBuffer(value.bytes, snmp.ObjectType.IpAddress)
		case 'Counter32':
			return writer.writeBuffer(integerBytes(BigInt(value.value)), snmp.ObjectType.Counter)
		case 'Unsigned32':
			return writer.writeBuffer(integerBytes(BigInt(value.value)), snmp.ObjectType.Gauge)
		case 'TimeTicks':
			return writer.writeBuffer(integerBytes(BigInt(value.value)), snmp.ObjectType.TimeTicks)
		case 'Counter64':
			return writer.writeBuffer(integerBytes(value.value), snmp.ObjectType.Counter64)
		case 'Opaque':
			return writeContent(writer, snmp.ObjectType.Opaque, value.value)
		case 'Raw':
			return writeContent(writer, (value.class << 6) | (value.constructed ? CONSTRUCTED : 0) | value.tag, value.value)
	}
}

/**
 * Render a value for display, e.g. as a Companion variable
 */
export const formatValue = (value: Value): string | number => {
	switch (value.type) {
		case 'Counter32':
		case 'Unsigned32':
		case 'TimeTicks':
			return value.value
		case 'Integer':
			return typeof value.value === 'bigint' ? value.value.toString() : value.value
		case 'Counter64':
			return value.value.toString()
		case 'OctetString':
			return value.text ?? value.value.toString('base64')
		case 'ObjectIdentifier':
			return formatOid(value.value)
		case 'IpAddress':
			return value.value
		case 'Opaque':
		case 'Raw':
			return value.value.toString('base64')
		default:
			return value.type
	}
}
