declare module 'asn1-ber' {
	export class Reader {
		constructor(data: Buffer)
		/** Length of the element read by the last readSequence */
		readonly length: number
		readonly offset: number
		readonly remain: number
		readonly buffer: Buffer
		peek(): number | null
		readSequence(tag?: number): number | null
		readInt(tag?: number): number | null
		readString(tag: number, retbuf: true): Buffer | null
		readOID(tag?: number): string | null
	}

	export class Writer {
		constructor()
		readonly buffer: Buffer
		writeByte(b: number): void
		writeInt(i: number, tag?: number): void
		writeNull(): void
		writeString(s: string, tag?: number): void
		writeBuffer(buf: Buffer, tag: number): void
		writeOID(s: string, tag?: number): void
		startSequence(tag?: number): void
		endSequence(): void
	}

	export const Ber: {
		Reader: typeof Reader
		Writer: typeof Writer
	}
}
