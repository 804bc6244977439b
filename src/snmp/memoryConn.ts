import { TransportError } from './errors.js'
import type { Conn } from './transport.js'

/**
 * What a MemoryConn answers with: fixed bytes, a failure, or bytes computed
 * from the datagram that was written before the read.
 */
export type CannedReply = Buffer | Error | ((request: Buffer) => Buffer)

/**
 * In-memory Conn that records every datagram written to it and replays canned
 * replies in order. A read with no reply left fails like a timeout.
 */
export class MemoryConn implements Conn {
	readonly written: Buffer[] = []
	private readonly replies: CannedReply[]
	private closed = false

	constructor(...replies: CannedReply[]) {
		this.replies = replies
	}

	get isClosed(): boolean {
		return this.closed
	}

	/** Queue further replies */
	push(...replies: CannedReply[]): void {
		this.replies.push(...replies)
	}

	async write(data: Buffer): Promise<void> {
		if (this.closed) throw new TransportError('connection closed')
		this.written.push(Buffer.from(data))
	}

	async read(buf: Buffer, _deadline: number): Promise<number> {
		if (this.closed) throw new TransportError('connection closed')
		const reply = this.replies.shift()
		if (reply === undefined) throw new TransportError('read timeout')
		if (reply instanceof Error) throw reply
		const bytes = typeof reply === 'function' ? reply(this.written[this.written.length - 1] ?? Buffer.alloc(0)) : reply
		return bytes.copy(buf)
	}

	async close(): Promise<void> {
		this.closed = true
	}
}
