import PQueue from 'p-queue'
import { less, type Binding } from './binding.js'
import { check } from './check.js'
import { TransportError, ValidationError, ValidationErrorKind } from './errors.js'
import { formatOid, hasPrefix, type ObjectIdentifier } from './oid.js'
import { Operation, type Request, type Response } from './pdu.js'
import { nextRequestId, type RequestIdSource } from './requestId.js'
import type { RoundTripper } from './transport.js'
import { NULL, isException } from './values.js'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface ClientOptions {
	/** Source of request ids, defaults to a CSPRNG */
	nextId?: RequestIdSource
	log?: (level: LogLevel, message: string) => void
}

/** Kinds that only say the agent has nothing more to return */
const exhausted = new Set([
	ValidationErrorKind.NoSuchObject,
	ValidationErrorKind.NoSuchInstance,
	ValidationErrorKind.EndOfMibView,
])

/**
 * Get, GetNext and GetBulk over one RoundTripper. Exchanges are run one at a
 * time, and every reply is validated against its request before it is returned.
 */
export class Client {
	private readonly transport: RoundTripper
	private readonly nextId: RequestIdSource
	private readonly log: (level: LogLevel, message: string) => void
	private readonly queue = new PQueue({ concurrency: 1 })
	/** Aborted by clear(); exchanges queued under it fail instead of starting */
	private dropped = new AbortController()

	constructor(transport: RoundTripper, options: ClientOptions = {}) {
		this.transport = transport
		this.nextId = options.nextId ?? nextRequestId
		this.log = options.log ?? (() => {})
	}

	/** Number of exchanges waiting for the transport, including the one in flight */
	get pending(): number {
		return this.queue.size + this.queue.pending
	}

	private async send(
		type: Operation,
		oids: readonly ObjectIdentifier[],
		nonRepeaters = 0,
		maxRepetitions = 0,
	): Promise<{ req: Request; resp: Response }> {
		const req: Request = {
			id: this.nextId(),
			type,
			bindings: oids.map((oid) => ({ oid, value: NULL })),
			nonRepeaters,
			maxRepetitions,
		}
		const { signal } = this.dropped
		const resp = await this.queue.add(
			async () => {
				if (signal.aborted) throw new TransportError('connection closed')
				this.log('debug', `${type} [${req.id}] ${oids.map(formatOid).join(', ')}`)
				return this.transport.roundTrip(req)
			},
			{ throwOnTimeout: true },
		)
		this.log('debug', `${type} [${resp.id}] returned ${resp.bindings.length} binding(s)`)
		return { req, resp }
	}

	private async exchange(
		type: Operation,
		oids: readonly ObjectIdentifier[],
		nonRepeaters = 0,
		maxRepetitions = 0,
	): Promise<Binding[]> {
		const { req, resp } = await this.send(type, oids, nonRepeaters, maxRepetitions)
		check(resp, req)
		return resp.bindings
	}

	/**
	 * Send a response through `check`, tolerating the exception values that end a walk.
	 */
	private checkWalkStep(resp: Response, req: Request): void {
		try {
			check(resp, req)
		} catch (error) {
			if (!(error instanceof ValidationError && exhausted.has(error.kind))) throw error
		}
	}

	/**
	 * Get the values of the given objects.
	 *
	 * @throws {SnmpError} On any failure of the exchange or an invalid response
	 */
	async get(...oids: ObjectIdentifier[]): Promise<Binding[]> {
		return this.exchange(Operation.Get, oids)
	}

	/**
	 * Get the objects that follow each of the given identifiers in the MIB tree.
	 */
	async getNext(...oids: ObjectIdentifier[]): Promise<Binding[]> {
		return this.exchange(Operation.GetNext, oids)
	}

	/**
	 * GetBulk: one successor for each of the first nonRepeaters identifiers,
	 * then up to maxRepetitions successors for each of the rest.
	 */
	async getBulk(nonRepeaters: number, maxRepetitions: number, ...oids: ObjectIdentifier[]): Promise<Binding[]> {
		return this.exchange(Operation.GetBulk, oids, nonRepeaters, maxRepetitions)
	}

	/**
	 * Walk the subtree under root with GetNext, one object per exchange.
	 *
	 * The walk ends at the first object outside the subtree, or when the agent
	 * reports the end of its MIB view.
	 *
	 * @throws {ValidationError} With kind NotIncreasing if the agent returns an identifier that does not advance
	 */
	async walk(root: ObjectIdentifier): Promise<Binding[]> {
		const found: Binding[] = []
		let cursor: Binding = { oid: root, value: NULL }
		for (;;) {
			const { req, resp } = await this.send(Operation.GetNext, [cursor.oid])
			this.checkWalkStep(resp, req)
			const next = resp.bindings[0]
			if (isException(next.value) || !hasPrefix(next.oid, root)) return found
			if (!less(cursor, next)) {
				throw new ValidationError(ValidationErrorKind.NotIncreasing, 'identifier did not increase', {
					oid: next.oid,
					index: 0,
				})
			}
			found.push(next)
			cursor = next
		}
	}

	/**
	 * Walk the subtree under root with GetBulk, up to maxRepetitions objects per exchange.
	 *
	 * @throws {ValidationError} With kind NotIncreasing if the agent returns an identifier that does not advance
	 */
	async bulkWalk(root: ObjectIdentifier, maxRepetitions: number): Promise<Binding[]> {
		const found: Binding[] = []
		let cursor: Binding = { oid: root, value: NULL }
		for (;;) {
			const { req, resp } = await this.send(Operation.GetBulk, [cursor.oid], 0, maxRepetitions)
			this.checkWalkStep(resp, req)
			for (const [index, next] of resp.bindings.entries()) {
				if (isException(next.value) || !hasPrefix(next.oid, root)) return found
				if (!less(cursor, next)) {
					throw new ValidationError(ValidationErrorKind.NotIncreasing, 'identifier did not increase', {
						oid: next.oid,
						index,
					})
				}
				found.push(next)
				cursor = next
			}
		}
	}

	/**
	 * Drop exchanges that have not started yet: each rejects with a
	 * TransportError instead of reaching the transport. The one in flight
	 * still settles.
	 */
	clear(): void {
		this.dropped.abort()
		this.dropped = new AbortController()
	}
}
