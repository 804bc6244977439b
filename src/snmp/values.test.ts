import asn1 from 'asn1-ber'
import { describe, expect, it } from 'vitest'

import type { Binding } from './binding.js'
import { DecodeError, TypeMismatchError } from './errors.js'
import {
	NULL,
	TagClass,
	decodeBindingValue,
	decodeValue,
	formatValue,
	integerBytes,
	isException,
	normalizeClass,
	readRawValue,
	toPrintableString,
	writeValue,
	type Value,
} from './values.js'

const { Ber } = asn1

/** Read one TLV from the given bytes */
function raw(...bytes: number[]) {
	return readRawValue(new Ber.Reader(Buffer.from(bytes)))
}

function decode(...bytes: number[]): Value {
	return decodeValue(raw(...bytes))
}

function binding(...bytes: number[]): Binding {
	const r = raw(...bytes)
	return { oid: [1, 3, 6, 1], value: decodeValue(r), raw: r }
}

function encode(value: Value): number[] {
	const writer = new Ber.Writer()
	writeValue(writer, value)
	return [...writer.buffer]
}

// ---------------------------------------------------------------------------
// readRawValue
// ---------------------------------------------------------------------------
describe('readRawValue', () => {
	it('splits a universal value into its parts', () => {
		const r = raw(0x04, 0x04, 0x74, 0x65, 0x73, 0x74)
		expect(r.class).toBe(TagClass.Universal)
		expect(r.tag).toBe(4)
		expect(r.constructed).toBe(false)
		expect(r.bytes).toEqual(Buffer.from('test'))
		expect(r.fullBytes).toEqual(Buffer.from([0x04, 0x04, 0x74, 0x65, 0x73, 0x74]))
	})

	it('reports the application class of SNMP types', () => {
		const r = raw(0x41, 0x01, 0x05)
		expect(r.class).toBe(TagClass.Application)
		expect(r.tag).toBe(1)
	})

	it('keeps only the first element in fullBytes', () => {
		const r = raw(0x02, 0x01, 0x07, 0x05, 0x00)
		expect(r.fullBytes).toEqual(Buffer.from([0x02, 0x01, 0x07]))
	})

	it('rejects the high tag number form', () => {
		expect(() => raw(0x1f, 0x01, 0x00)).toThrow(new DecodeError('unsupported tag 0x1f'))
	})

	it('rejects a value shorter than its length', () => {
		expect(() => raw(0x04, 0x05, 0x74)).toThrow(new DecodeError('truncated value'))
	})

	it('rejects an empty input', () => {
		expect(() => raw()).toThrow(new DecodeError('truncated value'))
	})
})

// ---------------------------------------------------------------------------
// normalizeClass
// ---------------------------------------------------------------------------
describe('normalizeClass', () => {
	it.each([
		['Counter32', 0x41],
		['Unsigned32', 0x42],
		['TimeTicks', 0x43],
		['Counter64', 0x46],
	])('rewrites %s as a universal integer', (_name, identifier) => {
		const original = raw(identifier, 0x01, 0x05)
		const normalized = normalizeClass(original)
		expect(normalized.class).toBe(TagClass.Universal)
		expect(normalized.tag).toBe(0x02)
		expect(normalized.fullBytes).toEqual(Buffer.from([0x02, 0x01, 0x05]))
		expect(normalized.bytes).toEqual(Buffer.from([0x05]))
		expect(original.fullBytes[0]).toBe(identifier)
	})

	it.each([
		['IpAddress', 0x40],
		['Opaque', 0x44],
	])('rewrites %s as a universal octet string', (_name, identifier) => {
		const normalized = normalizeClass(raw(identifier, 0x02, 0xab, 0xcd))
		expect(normalized.class).toBe(TagClass.Universal)
		expect(normalized.tag).toBe(0x04)
		expect(normalized.fullBytes).toEqual(Buffer.from([0x04, 0x02, 0xab, 0xcd]))
	})

	it('passes other application tags through', () => {
		const r = raw(0x45, 0x01, 0x01)
		expect(normalizeClass(r)).toBe(r)
	})

	it('passes context-specific values through', () => {
		const r = raw(0x82, 0x00)
		expect(normalizeClass(r)).toBe(r)
	})

	it('is idempotent', () => {
		const once = normalizeClass(raw(0x43, 0x02, 0x01, 0x00))
		expect(normalizeClass(once)).toBe(once)
	})
})

// ---------------------------------------------------------------------------
// decodeValue
// ---------------------------------------------------------------------------
describe('decodeValue', () => {
	it('decodes integers', () => {
		expect(decode(0x02, 0x01, 0x2a)).toEqual({ type: 'Integer', value: 42 })
		expect(decode(0x02, 0x01, 0xff)).toEqual({ type: 'Integer', value: -1 })
		expect(decode(0x02, 0x02, 0x00, 0x80)).toEqual({ type: 'Integer', value: 128 })
	})

	it('rejects an empty integer', () => {
		expect(() => decode(0x02, 0x00)).toThrow(new DecodeError('empty integer'))
	})

	it('keeps integers beyond the safe range as bigint', () => {
		expect(decode(0x02, 0x08, 0x01, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00)).toEqual({
			type: 'Integer',
			value: 72057594037927936n,
		})
		expect(decode(0x02, 0x08, 0x7f, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff)).toEqual({
			type: 'Integer',
			value: 9223372036854775807n,
		})
		expect(decode(0x02, 0x08, 0x80, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00)).toEqual({
			type: 'Integer',
			value: -9223372036854775808n,
		})
	})

	it('keeps the largest safe integer as a number', () => {
		expect(decode(0x02, 0x07, 0x1f, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff)).toEqual({
			type: 'Integer',
			value: Number.MAX_SAFE_INTEGER,
		})
	})

	it('rejects an integer wider than 64 bits', () => {
		expect(() => decode(0x02, 0x09, 0x00, 0x80, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00)).toThrow(
			new DecodeError(
				'Integer value 9223372036854775808 is out of range [-9223372036854775808, 9223372036854775807]',
			),
		)
	})

	it('exposes a printable octet string as text', () => {
		expect(decode(0x04, 0x04, 0x74, 0x65, 0x73, 0x74)).toEqual({
			type: 'OctetString',
			value: Buffer.from('test'),
			text: 'test',
		})
	})

	it('leaves binary octet strings without text', () => {
		expect(decode(0x04, 0x03, 0x00, 0x01, 0x02)).toEqual({
			type: 'OctetString',
			value: Buffer.from([0x00, 0x01, 0x02]),
			text: null,
		})
	})

	it('decodes object identifiers', () => {
		expect(decode(0x06, 0x03, 0x2b, 0x06, 0x01)).toEqual({ type: 'ObjectIdentifier', value: [1, 3, 6, 1] })
	})

	it('decodes an IpAddress in dotted form', () => {
		expect(decode(0x40, 0x04, 0xc0, 0xa8, 0x01, 0x0a)).toEqual({
			type: 'IpAddress',
			value: '192.168.1.10',
			bytes: Buffer.from([0xc0, 0xa8, 0x01, 0x0a]),
		})
	})

	it('rejects an IpAddress that is not 4 bytes', () => {
		expect(() => decode(0x40, 0x03, 0xc0, 0xa8, 0x01)).toThrow(new DecodeError('IpAddress must be 4 bytes, got 3'))
	})

	it('decodes the unsigned 32 bit types', () => {
		expect(decode(0x41, 0x01, 0x05)).toEqual({ type: 'Counter32', value: 5 })
		expect(decode(0x42, 0x05, 0x00, 0xff, 0xff, 0xff, 0xff)).toEqual({ type: 'Unsigned32', value: 4294967295 })
		expect(decode(0x43, 0x02, 0x01, 0x00)).toEqual({ type: 'TimeTicks', value: 256 })
	})

	it('rejects a negative Counter32', () => {
		expect(() => decode(0x41, 0x01, 0xff)).toThrow(new DecodeError('Counter32 value -1 is out of range [0, 4294967295]'))
	})

	it('decodes Counter64 as a bigint', () => {
		expect(decode(0x46, 0x09, 0x00, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff)).toEqual({
			type: 'Counter64',
			value: 18446744073709551615n,
		})
	})

	it('decodes Opaque payloads as bytes', () => {
		expect(decode(0x44, 0x02, 0xab, 0xcd)).toEqual({ type: 'Opaque', value: Buffer.from([0xab, 0xcd]) })
	})

	it('decodes null and the exception values', () => {
		expect(decode(0x05, 0x00)).toBe(NULL)
		expect(decode(0x80, 0x00)).toEqual({ type: 'NoSuchObject' })
		expect(decode(0x81, 0x00)).toEqual({ type: 'NoSuchInstance' })
		expect(decode(0x82, 0x00)).toEqual({ type: 'EndOfMibView' })
	})

	it('falls back to Raw for unknown tags', () => {
		expect(decode(0x47, 0x01, 0x01)).toEqual({
			type: 'Raw',
			class: TagClass.Application,
			tag: 7,
			constructed: false,
			value: Buffer.from([0x01]),
		})
	})
})

describe('isException', () => {
	it('is true only for the three exception values', () => {
		expect(isException({ type: 'NoSuchObject' })).toBe(true)
		expect(isException({ type: 'NoSuchInstance' })).toBe(true)
		expect(isException({ type: 'EndOfMibView' })).toBe(true)
		expect(isException(NULL)).toBe(false)
		expect(isException({ type: 'Integer', value: 0 })).toBe(false)
	})
})

// ---------------------------------------------------------------------------
// decodeBindingValue
// ---------------------------------------------------------------------------
describe('decodeBindingValue', () => {
	it('decodes application integers as numbers', () => {
		expect(decodeBindingValue(binding(0x41, 0x01, 0x05), 'number')).toBe(5)
	})

	it('decodes Counter64 as a bigint', () => {
		expect(decodeBindingValue(binding(0x46, 0x02, 0x01, 0x00), 'bigint')).toBe(256n)
	})

	it('decodes an IpAddress as bytes', () => {
		expect(decodeBindingValue(binding(0x40, 0x04, 0x0a, 0x00, 0x00, 0x01), 'bytes')).toEqual(
			Buffer.from([0x0a, 0x00, 0x00, 0x01]),
		)
	})

	it('decodes printable octet strings as text', () => {
		expect(decodeBindingValue(binding(0x04, 0x02, 0x6f, 0x6b), 'string')).toBe('ok')
	})

	it('decodes object identifiers', () => {
		expect(decodeBindingValue(binding(0x06, 0x03, 0x2b, 0x06, 0x01), 'oid')).toEqual([1, 3, 6, 1])
	})

	it('fails with the observed class and tag on a shape mismatch', () => {
		const call = () => decodeBindingValue(binding(0x02, 0x01, 0x01), 'bytes')
		expect(call).toThrow(TypeMismatchError)
		expect(call).toThrow('type mismatch: {class:0 tag:2} vs. bytes')
	})

	it('reports the normalized class of application values', () => {
		try {
			decodeBindingValue(binding(0x43, 0x01, 0x01), 'oid')
			expect.unreachable()
		} catch (error) {
			expect(error).toBeInstanceOf(TypeMismatchError)
			if (error instanceof TypeMismatchError) {
				expect(error.observedClass).toBe(TagClass.Universal)
				expect(error.observedTag).toBe(2)
				expect(error.expected).toBe('ObjectIdentifier')
			}
		}
	})

	it('propagates other decode failures unchanged', () => {
		expect(() => decodeBindingValue(binding(0x04, 0x02, 0x00, 0x01), 'string')).toThrow(
			new DecodeError('1.3.6.1: not a printable string'),
		)
	})

	it('needs the raw value', () => {
		expect(() => decodeBindingValue({ oid: [1, 3, 6, 1], value: NULL }, 'number')).toThrow(
			new DecodeError('1.3.6.1: binding carries no encoded value'),
		)
	})
})

// ---------------------------------------------------------------------------
// toPrintableString
// ---------------------------------------------------------------------------
describe('toPrintableString', () => {
	it('reads a length-prefixed printable string', () => {
		expect(toPrintableString([0x04, 0x74, 0x65, 0x73, 0x74])).toBe('test')
	})

	it('accepts typed arrays', () => {
		expect(toPrintableString(new Uint8Array([0x02, 0x68, 0x69]))).toBe('hi')
	})

	it('rejects a length that does not match', () => {
		expect(toPrintableString([0x05, 0x74, 0x65, 0x73, 0x74])).toBeNull()
		expect(toPrintableString([0x03, 0x74, 0x65, 0x73, 0x74])).toBeNull()
	})

	it('rejects control characters', () => {
		expect(toPrintableString([0x03, 0x61, 0x0a, 0x62])).toBeNull()
	})

	it('rejects bytes above the printable range', () => {
		expect(toPrintableString([0x02, 0x61, 0x7f])).toBeNull()
	})

	it('rejects an empty input', () => {
		expect(toPrintableString([])).toBeNull()
	})

	it('returns every printable string of up to 255 characters', () => {
		for (let length = 0; length <= 255; length++) {
			const text = Array.from({ length }, (_, i) => String.fromCharCode(0x20 + (i % 95))).join('')
			const bytes = [length, ...Buffer.from(text, 'latin1')]
			expect(toPrintableString(bytes)).toBe(text)
		}
	})
})

// ---------------------------------------------------------------------------
// writeValue / integerBytes
// ---------------------------------------------------------------------------
describe('integerBytes', () => {
	it('produces minimal two’s complement octets', () => {
		expect([...integerBytes(0n)]).toEqual([0x00])
		expect([...integerBytes(127n)]).toEqual([0x7f])
		expect([...integerBytes(128n)]).toEqual([0x00, 0x80])
		expect([...integerBytes(-1n)]).toEqual([0xff])
		expect([...integerBytes(-129n)]).toEqual([0xff, 0x7f])
	})
})

describe('writeValue', () => {
	it('writes the null placeholder', () => {
		expect(encode(NULL)).toEqual([0x05, 0x00])
	})

	it('writes the exception values with empty contents', () => {
		expect(encode({ type: 'NoSuchObject' })).toEqual([0x80, 0x00])
		expect(encode({ type: 'EndOfMibView' })).toEqual([0x82, 0x00])
	})

	it('writes integers', () => {
		expect(encode({ type: 'Integer', value: -129 })).toEqual([0x02, 0x02, 0xff, 0x7f])
		expect(encode({ type: 'Integer', value: 2n ** 56n })).toEqual([
			0x02, 0x08, 0x01, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00,
		])
	})

	it('writes application integers with their own tags', () => {
		expect(encode({ type: 'Counter32', value: 5 })).toEqual([0x41, 0x01, 0x05])
		expect(encode({ type: 'Unsigned32', value: 255 })).toEqual([0x42, 0x02, 0x00, 0xff])
		expect(encode({ type: 'TimeTicks', value: 0 })).toEqual([0x43, 0x01, 0x00])
		expect(encode({ type: 'Counter64', value: 2n ** 63n })).toEqual([
			0x46, 0x09, 0x00, 0x80, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00,
		])
	})

	it('writes octet strings, including empty ones', () => {
		expect(encode({ type: 'OctetString', value: Buffer.from('ok'), text: 'ok' })).toEqual([0x04, 0x02, 0x6f, 0x6b])
		expect(encode({ type: 'OctetString', value: Buffer.alloc(0), text: null })).toEqual([0x04, 0x00])
	})

	it('writes IpAddress and object identifier values', () => {
		expect(encode({ type: 'IpAddress', value: '10.0.0.1', bytes: Buffer.from([10, 0, 0, 1]) })).toEqual([
			0x40, 0x04, 0x0a, 0x00, 0x00, 0x01,
		])
		expect(encode({ type: 'ObjectIdentifier', value: [1, 3, 6, 1, 4] })).toEqual([0x06, 0x04, 0x2b, 0x06, 0x01, 0x04])
	})

	it('writes Raw values with their original identifier', () => {
		expect(
			encode({ type: 'Raw', class: TagClass.Context, tag: 3, constructed: true, value: Buffer.from([0x01]) }),
		).toEqual([0xa3, 0x01, 0x01])
	})

	it('is read back by decodeValue', () => {
		expect(decode(...encode({ type: 'Integer', value: -129 }))).toEqual({ type: 'Integer', value: -129 })
	})
})

// ---------------------------------------------------------------------------
// formatValue
// ---------------------------------------------------------------------------
describe('formatValue', () => {
	it('returns numbers for the numeric types', () => {
		expect(formatValue({ type: 'Integer', value: 42 })).toBe(42)
		expect(formatValue({ type: 'TimeTicks', value: 360000 })).toBe(360000)
	})

	it('renders a bigint Integer as a decimal string', () => {
		expect(formatValue({ type: 'Integer', value: -9223372036854775808n })).toBe('-9223372036854775808')
	})

	it('renders Counter64 as a decimal string', () => {
		expect(formatValue({ type: 'Counter64', value: 18446744073709551615n })).toBe('18446744073709551615')
	})

	it('prefers the text of an octet string', () => {
		expect(formatValue({ type: 'OctetString', value: Buffer.from('test'), text: 'test' })).toBe('test')
	})

	it('renders binary payloads as base64', () => {
		expect(formatValue({ type: 'OctetString', value: Buffer.from([0, 1, 2]), text: null })).toBe('AAEC')
		expect(formatValue({ type: 'Opaque', value: Buffer.from([0xab, 0xcd]) })).toBe('q80=')
	})

	it('renders identifiers and addresses in dotted form', () => {
		expect(formatValue({ type: 'ObjectIdentifier', value: [1, 3, 6, 1] })).toBe('1.3.6.1')
		expect(formatValue({ type: 'IpAddress', value: '192.168.1.10', bytes: Buffer.from([192, 168, 1, 10]) })).toBe(
			'192.168.1.10',
		)
	})

	it('renders valueless variants by name', () => {
		expect(formatValue(NULL)).toBe('Null')
		expect(formatValue({ type: 'EndOfMibView' })).toBe('EndOfMibView')
	})
})
