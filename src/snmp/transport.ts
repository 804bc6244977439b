import dgram from 'node:dgram'
import net from 'node:net'
import { SnmpError, TransportError, errorMessage } from './errors.js'
import { decodeResponse, encodeRequest, type Request, type Response } from './pdu.js'

/** Size of the receive buffer. A reply that fills it is treated as truncated. */
export const MAX_RESPONSE_SIZE = 10000
/** Read deadline, measured from the start of the read */
export const READ_TIMEOUT_MS = 5000
export const DEFAULT_PORT = 161
/** Datagrams held for later reads; beyond this the oldest is dropped */
export const MAX_QUEUED_DATAGRAMS = 16

/**
 * A connected, datagram oriented byte channel to one agent.
 */
export interface Conn {
	write(data: Buffer): Promise<void>
	/**
	 * Copy the next datagram into buf.
	 *
	 * @param deadline - Epoch milliseconds after which the read fails
	 * @returns The number of bytes copied
	 */
	read(buf: Buffer, deadline: number): Promise<number>
	close(): Promise<void>
}

/**
 * Anything that can carry one request to an agent and bring back its response.
 */
export interface RoundTripper {
	roundTrip(req: Request): Promise<Response>
}

const asTransportError = (what: string, error: unknown): SnmpError =>
	error instanceof SnmpError ? error : new TransportError(`${what}: ${errorMessage(error)}`, { cause: error })

/**
 * Sends requests over a Conn, one exchange at a time. Callers must not start a
 * second round trip before the first has settled: a read takes whatever
 * datagram arrives next.
 */
export class Transport implements RoundTripper {
	readonly conn: Conn
	readonly community: string

	constructor(conn: Conn, community: string) {
		this.conn = conn
		this.community = community
	}

	/**
	 * Encode and send the request, then read and decode one reply.
	 *
	 * @throws {EncodeError} If the request cannot be encoded
	 * @throws {TransportError} On write or read failure, timeout, or a reply that fills the buffer
	 * @throws {DecodeError} If the reply is malformed
	 */
	async roundTrip(req: Request): Promise<Response> {
		const data = encodeRequest(req, this.community)
		try {
			await this.conn.write(data)
		} catch (error) {
			throw asTransportError('write failed', error)
		}

		const buf = Buffer.alloc(MAX_RESPONSE_SIZE)
		let n: number
		try {
			n = await this.conn.read(buf, Date.now() + READ_TIMEOUT_MS)
		} catch (error) {
			throw asTransportError('read failed', error)
		}
		if (n >= MAX_RESPONSE_SIZE) throw new TransportError('response too big')

		return decodeResponse(buf.subarray(0, n))
	}
}

interface PendingRead {
	buf: Buffer
	timer: NodeJS.Timeout
	resolve: (n: number) => void
	reject: (error: Error) => void
}

/**
 * Conn over a connected UDP socket. Datagrams that arrive while no read is
 * pending are queued in arrival order, up to MAX_QUEUED_DATAGRAMS.
 */
export class UdpConn implements Conn {
	private readonly socket: dgram.Socket
	private inbox: Buffer[] = []
	private pending: PendingRead | null = null
	private failure: Error | null = null
	private closed = false

	constructor(socket: dgram.Socket) {
		this.socket = socket
		this.socket.on('message', this.messageHandler)
		this.socket.on('error', this.errorHandler)
	}

	private messageHandler = (msg: Buffer): void => {
		if (this.pending) {
			const { buf, timer, resolve } = this.pending
			this.pending = null
			clearTimeout(timer)
			resolve(msg.copy(buf))
		} else {
			this.inbox.push(Buffer.from(msg))
			if (this.inbox.length > MAX_QUEUED_DATAGRAMS) this.inbox.shift()
		}
	}

	private errorHandler = (err: Error): void => {
		this.failure = new TransportError(`socket error: ${err.message}`, { cause: err })
		this.settleWithError(this.failure)
	}

	private settleWithError(error: Error): void {
		if (!this.pending) return
		const { timer, reject } = this.pending
		this.pending = null
		clearTimeout(timer)
		reject(error)
	}

	async write(data: Buffer): Promise<void> {
		if (this.closed) throw new TransportError('connection closed')
		if (this.failure) throw this.failure
		return new Promise<void>((resolve, reject) => {
			this.socket.send(data, (error) => {
				if (error) reject(new TransportError(`write failed: ${error.message}`, { cause: error }))
				else resolve()
			})
		})
	}

	async read(buf: Buffer, deadline: number): Promise<number> {
		if (this.closed) throw new TransportError('connection closed')
		if (this.failure) throw this.failure
		if (this.pending) throw new TransportError('read already in progress')

		const queued = this.inbox.shift()
		if (queued) return queued.copy(buf)

		return new Promise<number>((resolve, reject) => {
			const timer = setTimeout(
				() => {
					this.pending = null
					reject(new TransportError('read timeout'))
				},
				Math.max(0, deadline - Date.now()),
			)
			this.pending = { buf, timer, resolve, reject }
		})
	}

	async close(): Promise<void> {
		if (this.closed) return
		this.closed = true
		this.settleWithError(new TransportError('connection closed'))
		this.inbox = []
		this.socket.off('message', this.messageHandler)
		return new Promise<void>((resolve) => {
			this.socket.close(() => resolve())
		})
	}
}

/**
 * Split `host`, `host:port` or `[v6host]:port` into its parts.
 *
 * @returns The port is undefined when the address does not name one
 * @throws {Error} If the port is not an integer in 1..65535
 */
export const splitHostPort = (address: string): { host: string; port: number | undefined } => {
	address = address.trim()
	let host = address
	let port: string | undefined
	const bracketed = /^\[([^\]]+)\](?::(\d+))?$/u.exec(address)
	if (bracketed) {
		host = bracketed[1]
		port = bracketed[2]
	} else if (net.isIPv6(address)) {
		host = address
	} else if (address.includes(':')) {
		const i = address.lastIndexOf(':')
		host = address.substring(0, i)
		port = address.substring(i + 1)
	}
	if (port === undefined) return { host, port: undefined }
	const n = Number(port)
	if (!Number.isInteger(n) || n < 1 || n > 65535) throw new Error(`Port out of range: ${port}`)
	return { host, port: n }
}

/**
 * Open a connected UDP socket to an agent.
 *
 * @param address - `host`, `host:port` or `[v6host]:port`
 * @param port - Used when the address names no port; defaults to 161
 * @throws {TransportError} If the address cannot be resolved or connected
 */
export const dialUdp = async (address: string, port = DEFAULT_PORT): Promise<UdpConn> => {
	let target: { host: string; port: number | undefined }
	try {
		target = splitHostPort(address)
	} catch (error) {
		throw new TransportError(`dial ${address}: ${errorMessage(error)}`, { cause: error })
	}
	const socket = dgram.createSocket(net.isIPv6(target.host) ? 'udp6' : 'udp4')
	return new Promise<UdpConn>((resolve, reject) => {
		const errorHandler = (err: Error) => {
			socket.close()
			reject(new TransportError(`dial ${address}: ${err.message}`, { cause: err }))
		}
		socket.once('error', errorHandler)
		socket.connect(target.port ?? port, target.host, () => {
			socket.removeListener('error', errorHandler)
			resolve(new UdpConn(socket))
		})
	})
}
