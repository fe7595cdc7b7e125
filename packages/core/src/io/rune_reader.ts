import type { Readable } from 'node:stream'
import { StringDecoder } from 'node:string_decoder'
import type { RuneSource } from '../keys/key_decoder'

/**
 * Buffered UTF-8 reader over a byte stream. Code points split across chunks are
 * reassembled by the decoder; nothing is read ahead of what callers ask for
 * beyond the chunk already received.
 */
export class RuneReader implements RuneSource {
    private readonly decoder = new StringDecoder('utf8')
    private readonly chunks: AsyncIterator<unknown>
    private text = ''
    private offset = 0
    private done = false

    constructor(input: Readable) {
        this.chunks = input.iterator({ destroyOnReturn: false })
    }

    /** True once the stream has ended and every decoded rune was read. */
    get ended(): boolean {
        return this.done && this.offset >= this.text.length
    }

    async readRune(): Promise<string | null> {
        while (this.offset >= this.text.length) {
            if (this.done) return null
            await this.fill()
        }
        const code = this.text.codePointAt(this.offset)
        if (code === undefined) return null
        const rune = String.fromCodePoint(code)
        this.offset += rune.length
        return rune
    }

    /**
     * Reads up to and including `terminator`. Resolves `null` when the stream ends
     * first; whatever was consumed is discarded in that case.
     */
    async readUntil(terminator: string): Promise<string | null> {
        let out = ''
        while (true) {
            const r = await this.readRune()
            if (r === null) return null
            out += r
            if (r === terminator) return out
        }
    }

    /** Stops reading and detaches from the stream without destroying it. */
    async close(): Promise<void> {
        this.done = true
        this.text = ''
        this.offset = 0
        await this.chunks.return?.()
    }

    private async fill(): Promise<void> {
        const next = await this.chunks.next()
        if (next.done) {
            this.done = true
            this.append(this.decoder.end())
            return
        }
        this.append(this.decode(next.value))
    }

    private decode(chunk: unknown): string {
        if (typeof chunk === 'string') return chunk
        if (chunk instanceof Uint8Array) return this.decoder.write(Buffer.from(chunk))
        throw new TypeError(`unsupported chunk type: ${typeof chunk}`)
    }

    private append(decoded: string) {
        if (!decoded) return
        this.text = this.text.slice(this.offset) + decoded
        this.offset = 0
    }
}
