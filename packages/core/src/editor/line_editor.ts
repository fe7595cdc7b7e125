import type { Readable, Writable } from 'node:stream'
import {
    NO_COMPLETION,
    NO_HELP,
    NO_HINT,
    type CompletionCapability,
    type HelpCapability,
    type Hint,
    type HintCapability,
} from '../capabilities'
import {
    EMPTY_LINE,
    backspace,
    deleteForward,
    deletePreviousWord,
    insertRune,
    killToEnd,
    lineText,
    moveEnd,
    moveHome,
    moveLeft,
    moveRight,
    replaceLine,
    transpose,
    type EditStep,
    type LineState,
} from '../edit/line_state'
import { LineEditorError, errorMessage } from '../errors'
import { HistoryStore } from '../history/history_store'
import { parseCursorReport } from '../io/cursor_report'
import { OutputBuffer, payloadBytes, payloadText, toCrlf } from '../io/output_buffer'
import { RuneReader } from '../io/rune_reader'
import { HELP, TAB } from '../keys/key_codes'
import { decodeKey, type KeyCommand } from '../keys/key_decoder'
import { createEnvLogger, type Logger } from '../logger'
import { alignColumns, chunk } from '../render/columns'
import {
    BELL,
    CLEAR_SCREEN,
    eraseLine,
    moveBelowLine,
    normalizeGeometry,
    renderLine,
    type Geometry,
} from '../render/renderer'
import { defaultRuneWidth, type RuneWidth } from '../render/visual_width'

export const SAVE_CURSOR = '\u001b7'
export const RESTORE_CURSOR = '\u001b8'
export const REQUEST_POSITION = '\u001b[999;999H\u001b[6n'

const CANDIDATES_PER_ROW = 3

export type LineEditorOptions = {
    input: Readable
    output: Writable
    prompt?: string
    geometry?: Partial<Geometry>
    history?: HistoryStore
    completion?: CompletionCapability
    hint?: HintCapability
    help?: HelpCapability
    /** Columns per code point; defaults to 4 for tab and 1 for everything else. */
    widthOf?: RuneWidth
    logger?: Logger
}

export type ReadLineResult = {
    type: 'submitted' | 'interrupted' | 'end_of_input'
    line: string
}

/**
 * Readline-style editor over a pair of byte streams. Each `readLine` call is one
 * edit session: keys are decoded, applied to the line, and the line is redrawn
 * after every change until the user submits, interrupts, or the input ends.
 */
export class LineEditor {
    readonly history: HistoryStore

    private readonly reader: RuneReader
    private readonly out: OutputBuffer
    private readonly output: Writable
    private readonly completion: CompletionCapability
    private readonly hintCapability: HintCapability
    private readonly helpCapability: HelpCapability
    private readonly widthOf: RuneWidth
    private readonly logger: Logger
    private promptText: string
    private size: Geometry
    private state: LineState = EMPTY_LINE
    private inSession = false
    private drawing: Promise<void> = Promise.resolve()

    private readonly onOutputError = (err: Error) => {
        this.logger.debug('output stream error', { error: err.message })
    }

    constructor(options: LineEditorOptions) {
        this.reader = new RuneReader(options.input)
        this.output = options.output
        this.out = new OutputBuffer(options.output)
        this.promptText = options.prompt ?? '> '
        this.size = normalizeGeometry(options.geometry)
        this.history = options.history ?? new HistoryStore()
        this.completion = options.completion ?? NO_COMPLETION
        this.hintCapability = options.hint ?? NO_HINT
        this.helpCapability = options.help ?? NO_HELP
        this.widthOf = options.widthOf ?? defaultRuneWidth
        this.logger = options.logger ?? createEnvLogger()
        // Write failures reach callers through the write callbacks.
        this.output.on('error', this.onOutputError)
    }

    get prompt(): string {
        return this.promptText
    }

    /** Takes effect from the next render. */
    setPrompt(prompt: string): void {
        this.promptText = prompt
    }

    get geometry(): Geometry {
        return this.size
    }

    set geometry(next: Partial<Geometry>) {
        this.size = normalizeGeometry(next)
    }

    get lineState(): LineState {
        return this.state
    }

    /** True once the input stream has ended and every buffered key was read. */
    get inputEnded(): boolean {
        return this.reader.ended
    }

    /**
     * Releases the input stream (it is left open, not destroyed) and detaches
     * from the output stream. The editor must not be used afterwards.
     */
    async close(): Promise<void> {
        this.output.off('error', this.onOutputError)
        await this.reader.close()
    }

    /**
     * Reads one line. Interrupts and end of input are results, not errors; any
     * read or write failure rejects with a `LineEditorError` of code
     * `IO_FAILURE` carrying the partial line.
     */
    async readLine(): Promise<ReadLineResult> {
        if (this.inSession) {
            throw new LineEditorError('SESSION_IN_PROGRESS', 'another readLine call is still running')
        }
        this.inSession = true
        this.logger.debug('line session started', { prompt: this.promptText, ...this.size })
        try {
            await this.resetLine()
            while (true) {
                const command = await this.readKey()
                const result = await this.dispatch(command)
                if (result) return result
            }
        } finally {
            this.inSession = false
        }
    }

    /**
     * Asks the terminal for its size by parking the cursor at the far corner and
     * requesting a position report.
     */
    async probeGeometry(): Promise<Geometry> {
        this.out.write(SAVE_CURSOR + REQUEST_POSITION)
        await this.flush()

        const response = await this.io(() => this.reader.readUntil('R'))
        if (response === null) {
            throw new LineEditorError('END_OF_STREAM', 'input ended before the cursor position report')
        }

        this.out.write(RESTORE_CURSOR)
        await this.flush()

        const report = parseCursorReport(response)
        if (report.type === 'malformed') {
            this.logger.warn('malformed cursor position report', { reason: report.reason, response })
            throw new LineEditorError('MALFORMED_CURSOR_REPORT', `malformed cursor position report: ${report.reason}`)
        }

        this.size = { columns: report.columns, rows: report.rows }
        this.logger.debug('terminal geometry probed', { ...this.size })
        return this.size
    }

    /**
     * Prints `payload` above the line being edited, then redraws the line below
     * it. Resolves with the number of payload bytes.
     */
    async writeOut(payload: string | Uint8Array): Promise<number> {
        await this.exclusive(async () => {
            this.out.write(eraseLine(this.renderContext()))
            this.out.write(toCrlf(payloadText(payload)))
            this.startBelow()
            await this.flush()
            await this.redraw()
        })
        return payloadBytes(payload)
    }

    /** Writes `payload` as is, apart from line feeds becoming CR LF. */
    async write(payload: string | Uint8Array): Promise<number> {
        await this.exclusive(async () => {
            this.out.write(toCrlf(payloadText(payload)))
            await this.flush()
        })
        return payloadBytes(payload)
    }

    /**
     * Moves the cursor down to the last row of the drawn line, so that output
     * printed after a submit does not land on the line's own rows.
     */
    async moveToLastRow(): Promise<void> {
        await this.exclusive(async () => {
            this.out.write(moveBelowLine(this.renderContext()))
            await this.flush()
        })
    }

    private async dispatch(command: KeyCommand): Promise<ReadLineResult | null> {
        switch (command.type) {
            case 'submit':
                return this.finish('submitted')
            case 'interrupt':
                return this.finish('interrupted')
            case 'end_of_input':
                return this.finish('end_of_input')
            case 'delete_right_or_end':
                if (this.state.buffer.length === 0) return this.finish('end_of_input')
                await this.apply(deleteForward(this.state))
                return null
            case 'insert':
                await this.apply(insertRune(this.state, command.char))
                return null
            case 'complete':
                await this.complete()
                return null
            case 'help':
                await this.showHelp()
                return null
            case 'delete_left':
                await this.apply(backspace(this.state))
                return null
            case 'delete_right':
                await this.apply(deleteForward(this.state))
                return null
            case 'clear_screen':
                await this.refresh(() => CLEAR_SCREEN)
                return null
            case 'delete_prev_word':
                await this.apply(deletePreviousWord(this.state))
                return null
            case 'move_left':
                await this.apply(moveLeft(this.state))
                return null
            case 'move_right':
                await this.apply(moveRight(this.state))
                return null
            case 'move_home':
                await this.apply(moveHome(this.state))
                return null
            case 'move_end':
                await this.apply(moveEnd(this.state))
                return null
            case 'kill_to_end':
                await this.apply(killToEnd(this.state))
                return null
            case 'transpose':
                await this.apply(transpose(this.state))
                return null
            case 'history_prev':
                await this.historyPrev()
                return null
            case 'history_next':
                await this.historyNext()
                return null
            case 'reset_line':
                await this.resetLine()
                return null
            case 'ignored':
                this.logger.debug('ignored escape sequence', { sequence: JSON.stringify(command.sequence) })
                return null
        }
    }

    private finish(type: ReadLineResult['type']): ReadLineResult {
        return { type, line: lineText(this.state) }
    }

    private async apply(step: EditStep): Promise<void> {
        if (step.type === 'bell') {
            await this.beep()
            return
        }
        this.state = step.state
        await this.refresh()
    }

    private async historyPrev(): Promise<void> {
        this.history.save(lineText(this.state))
        const move = this.history.prev()
        if (move.type === 'boundary') {
            await this.beep()
            return
        }
        this.state = replaceLine(this.state, this.history.get())
        await this.refresh()
    }

    private async historyNext(): Promise<void> {
        const move = this.history.next()
        if (move.type === 'boundary') {
            await this.beep()
            return
        }
        this.state = replaceLine(this.state, this.history.get())
        await this.refresh()
    }

    private async complete(): Promise<void> {
        if (this.completion.type === 'none') {
            await this.apply(insertRune(this.state, TAB))
            return
        }

        const candidates = this.completion.complete(lineText(this.state))
        const [only] = candidates
        if (only === undefined) {
            await this.beep()
            return
        }
        if (candidates.length === 1) {
            this.state = replaceLine(this.state, only)
            await this.refresh()
            return
        }

        await this.printBelow(alignColumns(chunk(candidates, CANDIDATES_PER_ROW), { indent: 4, padding: 4 }))
    }

    private async showHelp(): Promise<void> {
        if (this.helpCapability.type === 'none') {
            await this.apply(insertRune(this.state, HELP))
            return
        }

        const entries = this.helpCapability.help(lineText(this.state))
        if (entries.length === 0) {
            await this.beep()
            return
        }

        await this.printBelow(alignColumns(entries, { indent: 2, padding: 3 }))
    }

    /** Prints `text` under the drawn line and redraws the line after it. */
    private printBelow(text: string): Promise<void> {
        return this.refresh(() => {
            const below = moveBelowLine(this.renderContext()) + text
            this.startBelow()
            return below
        })
    }

    /** The cursor sits at column 0 of an empty row: nothing above it is ours to clear. */
    private startBelow() {
        this.state = { ...this.state, previousCursor: 0, maxRows: 0 }
    }

    private currentHint(): Hint | null {
        if (this.hintCapability.type === 'none') return null
        return this.hintCapability.hint(lineText(this.state))
    }

    private async resetLine(): Promise<void> {
        this.state = EMPTY_LINE
        await this.refresh()
    }

    private renderContext() {
        return { prompt: this.promptText, state: this.state, geometry: this.size, widthOf: this.widthOf }
    }

    /**
     * Runs `op` once every earlier screen update has been flushed. Redraws read
     * and commit `previousCursor` / `maxRows` inside it, so a `writeOut` never
     * interleaves with a render.
     */
    private exclusive<T>(op: () => Promise<T>): Promise<T> {
        const run = this.drawing.then(op)
        this.drawing = run.then(
            () => undefined,
            () => undefined,
        )
        return run
    }

    /** `before` is evaluated inside the update, right ahead of the redraw. */
    private refresh(before?: () => string): Promise<void> {
        return this.exclusive(async () => {
            if (before) this.out.write(before())
            await this.redraw()
        })
    }

    private async redraw(): Promise<void> {
        const rendered = this.state
        const plan = renderLine({ ...this.renderContext(), hint: this.currentHint() })
        this.out.write(plan.output)
        await this.flush()
        this.state = { ...this.state, previousCursor: rendered.cursor, maxRows: plan.maxRows }
    }

    private beep(): Promise<void> {
        return this.exclusive(async () => {
            this.out.write(BELL)
            await this.flush()
        })
    }

    private readKey(): Promise<KeyCommand> {
        return this.io(() => decodeKey(this.reader))
    }

    private flush(): Promise<void> {
        return this.io(() => this.out.flush())
    }

    private async io<T>(op: () => Promise<T>): Promise<T> {
        try {
            return await op()
        } catch (err) {
            if (err instanceof LineEditorError) throw err
            const line = lineText(this.state)
            this.logger.error('terminal I/O failed', { error: errorMessage(err), line })
            throw new LineEditorError('IO_FAILURE', `terminal I/O failed: ${errorMessage(err)}`, {
                line,
                cause: err,
            })
        }
    }
}
