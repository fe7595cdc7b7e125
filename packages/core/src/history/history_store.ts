export type HistoryMove =
    | { type: 'moved' }
    | { type: 'boundary'; reason: 'beginning of history' | 'end of history' }

export type HistoryStoreOptions = {
    /** Maximum number of committed lines kept; the oldest are dropped first. */
    capacity?: number
}

/**
 * In-memory history. The last entry is always the scratch slot that holds the
 * line being edited; everything before it is committed.
 */
export class HistoryStore {
    private lines: string[] = ['']
    private pos = 0
    private readonly capacity: number

    constructor(options: HistoryStoreOptions = {}) {
        const capacity = options.capacity ?? Number.POSITIVE_INFINITY
        if (!(capacity > 0)) {
            throw new RangeError(`history capacity must be positive, got ${capacity}`)
        }
        this.capacity = capacity
    }

    /** Freezes the scratch slot as `line` and opens a new empty one. */
    add(line: string): void {
        this.lines[this.lines.length - 1] = line
        this.lines.push('')
        const overflow = this.lines.length - 1 - this.capacity
        if (overflow > 0) {
            this.lines.splice(0, overflow)
        }
        this.pos = this.lines.length - 1
    }

    /** Stores the live line, unless the user is browsing an older entry. */
    save(line: string): void {
        if (this.pos !== this.lines.length - 1) return
        this.lines[this.pos] = line
    }

    prev(): HistoryMove {
        if (this.pos <= 0) return { type: 'boundary', reason: 'beginning of history' }
        this.pos--
        return { type: 'moved' }
    }

    next(): HistoryMove {
        if (this.pos >= this.lines.length - 1) return { type: 'boundary', reason: 'end of history' }
        this.pos++
        return { type: 'moved' }
    }

    get(): string {
        return this.lines[this.pos] ?? ''
    }

    get position(): number {
        return this.pos
    }

    /** Committed lines, oldest first. */
    entries(): string[] {
        return this.lines.slice(0, -1)
    }

    get size(): number {
        return this.lines.length - 1
    }
}
