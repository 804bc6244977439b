import type { Binding } from './binding.js'
import { errorStatusText } from './errorStatus.js'
import { ValidationError, ValidationErrorKind } from './errors.js'
import { ISO_ORG, hasPrefix } from './oid.js'
import { Operation, type Request, type Response } from './pdu.js'

const checkBinding = (binding: Binding, index: number): void => {
	const details = { oid: binding.oid, index }
	switch (binding.value.type) {
		case 'NoSuchObject':
			throw new ValidationError(ValidationErrorKind.NoSuchObject, 'no such object', details)
		case 'NoSuchInstance':
			throw new ValidationError(ValidationErrorKind.NoSuchInstance, 'no such instance', details)
		case 'EndOfMibView':
			throw new ValidationError(ValidationErrorKind.EndOfMibView, 'end of mib view', details)
		case 'Null':
			throw new ValidationError(ValidationErrorKind.UnexpectedNull, 'unexpected null', details)
	}
	if (!hasPrefix(binding.oid, ISO_ORG)) {
		throw new ValidationError(ValidationErrorKind.MissingPrefix, 'missing iso.org prefix', details)
	}
}

/**
 * Check a decoded response against the request it answers.
 *
 * Binding counts are compared, identifiers are not matched up position by
 * position. GetBulk replies may carry more bindings than were requested.
 *
 * @throws {ValidationError} On the first rule the response breaks
 */
export const check = (resp: Response, req: Request): void => {
	if (resp.id !== req.id) {
		throw new ValidationError(ValidationErrorKind.IdMismatch, `id mismatch: got ${resp.id}, expected ${req.id}`)
	}

	if (resp.errorStatus !== 0) {
		const text = errorStatusText(resp.errorStatus)
		const index = resp.errorIndex
		// error-index is 0-based and refers to the transmitted binding list
		const offending = index >= 0 && index < resp.bindings.length ? req.bindings.at(index) : undefined
		throw new ValidationError(
			ValidationErrorKind.ServerError,
			offending ? `server error: ${text} at index ${index}` : `server error: ${text}`,
			{ oid: offending?.oid, index: offending ? index : undefined, errorStatus: resp.errorStatus },
		)
	}

	const got = resp.bindings.length
	const want = req.bindings.length
	if (got === 0) throw new ValidationError(ValidationErrorKind.NoBindings, 'no bindings')
	if (got < want) {
		throw new ValidationError(ValidationErrorKind.MissingBindings, `missing bindings: got ${got}, expected ${want}`)
	}
	if (got > want && req.type !== Operation.GetBulk) {
		throw new ValidationError(
			ValidationErrorKind.ExtraneousBindings,
			`extraneous bindings: got ${got}, expected ${want}`,
		)
	}

	resp.bindings.forEach(checkBinding)
}
