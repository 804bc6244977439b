import asn1 from 'asn1-ber'
import type { Reader } from 'asn1-ber'
import snmp from 'net-snmp'
import type { Binding } from './binding.js'
import { DecodeError, EncodeError, errorMessage } from './errors.js'
import { formatOid } from './oid.js'
import { NULL, decodeValue, oidFromText, readRawValue, writeValue } from './values.js'

const { Ber } = asn1

const SEQUENCE = 0x30

/** Version field value of an SNMPv2c message */
export const VERSION_2C = 1

export enum Operation {
	Get = 'Get',
	GetNext = 'GetNext',
	GetBulk = 'GetBulk',
}

/**
 * An SNMP request to be sent over a Transport.
 */
export interface Request {
	id: number
	type: Operation
	bindings: Binding[]
	/** GetBulk only */
	nonRepeaters: number
	/** GetBulk only */
	maxRepetitions: number
}

/**
 * The response to an SNMP request, bindings in wire order.
 */
export interface Response {
	id: number
	errorStatus: number
	errorIndex: number
	bindings: Binding[]
}

/**
 * Any v2c PDU. GetBulk requests carry non-repeaters and max-repetitions in the
 * error-status and error-index positions.
 */
export interface Pdu {
	/** Context-specific PDU tag, one of `snmp.PduType` */
	type: number
	id: number
	errorStatus: number
	errorIndex: number
	bindings: Binding[]
}

export interface Message {
	version: number
	community: string
	pdu: Pdu
}

/**
 * Overwrite every binding value with the Null placeholder; requests carry only names.
 */
export const prepareRequest = (req: Request): void => {
	req.bindings.forEach((binding, i) => {
		req.bindings[i] = { oid: binding.oid, value: NULL }
	})
}

/**
 * Encode a complete message.
 *
 * @throws {EncodeError} If the codec rejects any field
 */
export const encodeMessage = (message: Message): Buffer => {
	const { pdu } = message
	try {
		const writer = new Ber.Writer()
		writer.startSequence(SEQUENCE)
		writer.writeInt(message.version)
		writer.writeString(message.community)
		writer.startSequence(pdu.type)
		writer.writeInt(pdu.id)
		writer.writeInt(pdu.errorStatus)
		writer.writeInt(pdu.errorIndex)
		writer.startSequence(SEQUENCE)
		for (const binding of pdu.bindings) {
			writer.startSequence(SEQUENCE)
			writer.writeOID(formatOid(binding.oid), snmp.ObjectType.OID)
			writeValue(writer, binding.value)
			writer.endSequence()
		}
		writer.endSequence()
		writer.endSequence()
		writer.endSequence()
		return writer.buffer
	} catch (error) {
		throw new EncodeError(`encode failed: ${errorMessage(error)}`, { cause: error })
	}
}

/**
 * Prepare and encode a request as an SNMPv2c message.
 *
 * @throws {EncodeError} On an unknown operation or an identifier the codec rejects
 */
export const encodeRequest = (req: Request, community: string): Buffer => {
	prepareRequest(req)
	let pdu: Pdu
	switch (req.type) {
		case Operation.Get:
			pdu = { type: snmp.PduType.GetRequest, id: req.id, errorStatus: 0, errorIndex: 0, bindings: req.bindings }
			break
		case Operation.GetNext:
			pdu = { type: snmp.PduType.GetNextRequest, id: req.id, errorStatus: 0, errorIndex: 0, bindings: req.bindings }
			break
		case Operation.GetBulk:
			pdu = {
				type: snmp.PduType.GetBulkRequest,
				id: req.id,
				errorStatus: req.nonRepeaters,
				errorIndex: req.maxRepetitions,
				bindings: req.bindings,
			}
			break
		default: {
			const unsupported: never = req.type
			throw new EncodeError(`unsupported type ${String(unsupported)}`)
		}
	}
	return encodeMessage({ version: VERSION_2C, community, pdu })
}

/**
 * Maps a request PDU tag back to its operation.
 */
export const operationOf = (pduType: number): Operation | undefined => {
	switch (pduType) {
		case snmp.PduType.GetRequest:
			return Operation.Get
		case snmp.PduType.GetNextRequest:
			return Operation.GetNext
		case snmp.PduType.GetBulkRequest:
			return Operation.GetBulk
		default:
			return undefined
	}
}

const read = <T>(what: string, fn: () => T | null): T => {
	let result: T | null
	try {
		result = fn()
	} catch (error) {
		throw new DecodeError(`malformed ${what}: ${errorMessage(error)}`, { cause: error })
	}
	if (result === null) throw new DecodeError(`truncated ${what}`)
	return result
}

/** Enters a constructed element and returns the offset where it ends. */
const enter = (reader: Reader, what: string, tag?: number): number => {
	read(what, () => reader.readSequence(tag))
	if (reader.length > reader.remain) throw new DecodeError(`truncated ${what}`)
	return reader.offset + reader.length
}

const readBindings = (reader: Reader): Binding[] => {
	const bindings: Binding[] = []
	const end = enter(reader, 'binding list', SEQUENCE)
	while (reader.offset < end) {
		const bindingEnd = enter(reader, 'binding', SEQUENCE)
		const oid = oidFromText(read('binding name', () => reader.readOID(snmp.ObjectType.OID)))
		const raw = readRawValue(reader)
		if (reader.offset !== bindingEnd) throw new DecodeError(`malformed binding ${formatOid(oid)}: length mismatch`)
		bindings.push({ oid, value: decodeValue(raw), raw })
	}
	if (reader.offset !== end) throw new DecodeError('malformed binding list: length mismatch')
	return bindings
}

/**
 * Decode an SNMPv2c message carrying any PDU.
 *
 * @throws {DecodeError} If the bytes are not a well-formed v2c message
 */
export const decodeMessage = (buf: Buffer): Message => {
	const reader = new Ber.Reader(buf)
	enter(reader, 'message', SEQUENCE)
	const version = read('version', () => reader.readInt(snmp.ObjectType.Integer))
	if (version !== VERSION_2C) throw new DecodeError(`unsupported version ${version}`)
	const community = read('community', () => reader.readString(snmp.ObjectType.OctetString, true)).toString()
	const type = reader.peek()
	// context-specific, constructed
	if (type === null || (type & 0xe0) !== 0xa0) {
		throw new DecodeError(`malformed pdu: unexpected tag 0x${(type ?? 0).toString(16)}`)
	}
	const pduEnd = enter(reader, 'pdu', type)
	const id = read('request id', () => reader.readInt(snmp.ObjectType.Integer))
	const errorStatus = read('error status', () => reader.readInt(snmp.ObjectType.Integer))
	const errorIndex = read('error index', () => reader.readInt(snmp.ObjectType.Integer))
	const bindings = readBindings(reader)
	if (reader.offset !== pduEnd) throw new DecodeError('malformed pdu: length mismatch')
	return { version, community, pdu: { type, id, errorStatus, errorIndex, bindings } }
}

/**
 * Decode a reply. Replies are always tagged as GetResponse PDUs.
 *
 * @throws {DecodeError} If the bytes are not a well-formed v2c response
 */
export const decodeResponse = (buf: Buffer): Response => {
	const { pdu } = decodeMessage(buf)
	if (pdu.type !== snmp.PduType.GetResponse) {
		throw new DecodeError(`unexpected pdu type 0x${pdu.type.toString(16)}`)
	}
	return { id: pdu.id, errorStatus: pdu.errorStatus, errorIndex: pdu.errorIndex, bindings: pdu.bindings }
}
