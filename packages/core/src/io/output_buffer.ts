import type { Writable } from 'node:stream'

function writeChunk(output: Writable, data: string): Promise<void> {
    return new Promise((resolve, reject) => {
        output.write(data, (err) => {
            if (err) reject(err)
            else resolve()
        })
    })
}

/**
 * Collects escape sequences and text until `flush`, which hands everything to
 * the stream as a single write. Flushes are chained so that two callers never
 * interleave their bytes.
 */
export class OutputBuffer {
    private pending = ''
    private tail: Promise<void> = Promise.resolve()

    constructor(private readonly output: Writable) {}

    write(data: string): void {
        this.pending += data
    }

    flush(): Promise<void> {
        if (!this.pending) return this.tail
        const data = this.pending
        this.pending = ''
        const written = this.tail.then(() => writeChunk(this.output, data))
        // The ordering chain only waits for completion; the caller of this flush
        // receives the rejection through `written`.
        this.tail = written.then(
            () => undefined,
            () => undefined,
        )
        return written
    }
}

/** Counts payload bytes the way callers measure what they handed in. */
export function payloadBytes(payload: string | Uint8Array): number {
    return typeof payload === 'string' ? Buffer.byteLength(payload, 'utf8') : payload.byteLength
}

export function payloadText(payload: string | Uint8Array): string {
    return typeof payload === 'string' ? payload : Buffer.from(payload).toString('utf8')
}

/** Terminals in raw mode need an explicit carriage return with every line feed. */
export function toCrlf(text: string): string {
    return text.replace(/\n/g, '\r\n')
}
