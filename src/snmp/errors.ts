import type { ObjectIdentifier } from './oid.js'
import { formatOid } from './oid.js'

/**
 * Base class of every error raised by the protocol engine.
 */
export class SnmpError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options)
		this.name = new.target.name
	}
}

/**
 * I/O failure, read deadline expiry, or a reply that filled the receive buffer.
 */
export class TransportError extends SnmpError {}

/**
 * The request could not be turned into bytes.
 */
export class EncodeError extends SnmpError {}

/**
 * The reply bytes could not be parsed.
 */
export class DecodeError extends SnmpError {}

/**
 * A binding value whose normalized class/tag does not fit the requested target type.
 */
export class TypeMismatchError extends DecodeError {
	readonly observedClass: number
	readonly observedTag: number
	readonly expected: string

	constructor(observedClass: number, observedTag: number, expected: string) {
		super(`type mismatch: {class:${observedClass} tag:${observedTag}} vs. ${expected}`)
		this.observedClass = observedClass
		this.observedTag = observedTag
		this.expected = expected
	}
}

export enum ValidationErrorKind {
	IdMismatch = 'IdMismatch',
	ServerError = 'ServerError',
	NoBindings = 'NoBindings',
	MissingBindings = 'MissingBindings',
	ExtraneousBindings = 'ExtraneousBindings',
	NoSuchObject = 'NoSuchObject',
	NoSuchInstance = 'NoSuchInstance',
	EndOfMibView = 'EndOfMibView',
	UnexpectedNull = 'UnexpectedNull',
	MissingPrefix = 'MissingPrefix',
	NotIncreasing = 'NotIncreasing',
}

export interface ValidationErrorDetails {
	oid?: ObjectIdentifier
	index?: number
	errorStatus?: number
}

/**
 * A well-formed reply that breaks a protocol rule. The message always starts
 * with `invalid response: `.
 */
export class ValidationError extends SnmpError {
	readonly kind: ValidationErrorKind
	readonly oid: ObjectIdentifier | undefined
	readonly index: number | undefined
	readonly errorStatus: number | undefined

	constructor(kind: ValidationErrorKind, reason: string, details: ValidationErrorDetails = {}) {
		const prefix = details.oid ? `${formatOid(details.oid)}: ` : ''
		super(`invalid response: ${prefix}${reason}`)
		this.kind = kind
		this.oid = details.oid
		this.index = details.index
		this.errorStatus = details.errorStatus
	}
}

/**
 * Render an unknown thrown value as text for logs and status messages
 */
export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error))
