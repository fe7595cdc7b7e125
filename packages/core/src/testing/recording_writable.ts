import { Writable } from 'node:stream'

export type RecordingWritableOptions = {
    /** Zero-based index of the write that fails with `failure`. */
    failAt?: number
    failure?: Error
}

/** Writable that keeps every write it receives, one string per write call. */
export class RecordingWritable extends Writable {
    readonly writes: string[] = []
    private readonly failAt: number
    private readonly failure: Error
    private held: Array<() => void> | null = null

    constructor(options: RecordingWritableOptions = {}) {
        super({ decodeStrings: false })
        this.failAt = options.failAt ?? -1
        this.failure = options.failure ?? new Error('write failed')
    }

    override _write(chunk: unknown, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
        if (this.writes.length === this.failAt) {
            callback(this.failure)
            return
        }
        this.writes.push(Buffer.isBuffer(chunk) ? chunk.toString('utf8') : String(chunk))
        if (this.held) this.held.push(() => callback())
        else callback()
    }

    /** Records later writes but keeps their callbacks pending until `release`. */
    hold(): void {
        this.held ??= []
    }

    release(): void {
        const held = this.held ?? []
        this.held = null
        for (const done of held) done()
    }

    get text(): string {
        return this.writes.join('')
    }
}
