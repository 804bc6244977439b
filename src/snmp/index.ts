export { type Binding, compareBindings, less, sortBindings } from './binding.js'
export { check } from './check.js'
export { Client, type ClientOptions, type LogLevel } from './client.js'
export { errorStatusText } from './errorStatus.js'
export {
	DecodeError,
	EncodeError,
	SnmpError,
	TransportError,
	TypeMismatchError,
	ValidationError,
	ValidationErrorKind,
	errorMessage,
	type ValidationErrorDetails,
} from './errors.js'
export { MemoryConn, type CannedReply } from './memoryConn.js'
export {
	ISO_ORG,
	compareOids,
	formatOid,
	hasPrefix,
	isValidSnmpOid,
	parseOid,
	trimOid,
	type ObjectIdentifier,
} from './oid.js'
export {
	Operation,
	VERSION_2C,
	decodeMessage,
	decodeResponse,
	encodeMessage,
	encodeRequest,
	operationOf,
	prepareRequest,
	type Message,
	type Pdu,
	type Request,
	type Response,
} from './pdu.js'
export { nextRequestId, type RequestIdSource } from './requestId.js'
export {
	DEFAULT_PORT,
	MAX_RESPONSE_SIZE,
	READ_TIMEOUT_MS,
	Transport,
	UdpConn,
	dialUdp,
	splitHostPort,
	type Conn,
	type RoundTripper,
} from './transport.js'
export {
	NULL,
	TagClass,
	decodeBindingValue,
	decodeValue,
	formatValue,
	isException,
	normalizeClass,
	readRawValue,
	toPrintableString,
	type DecodeTarget,
	type RawValue,
	type Value,
	type ValueType,
} from './values.js'
