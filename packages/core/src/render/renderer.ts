import type { Hint } from '../capabilities'
import type { LineState } from '../edit/line_state'
import { styleText } from './styles'
import { promptWidth, runesWidth, type RuneWidth } from './visual_width'

export type Geometry = {
    columns: number
    rows: number
}

export const DEFAULT_GEOMETRY: Geometry = { columns: 80, rows: 24 }

/** Zero or unset dimensions fall back to 80x24. */
export function normalizeGeometry(geometry?: Partial<Geometry>): Geometry {
    const columns = geometry?.columns
    const rows = geometry?.rows
    return {
        columns: columns && columns > 0 ? Math.floor(columns) : DEFAULT_GEOMETRY.columns,
        rows: rows && rows > 0 ? Math.floor(rows) : DEFAULT_GEOMETRY.rows,
    }
}

export type RenderInput = {
    prompt: string
    state: LineState
    hint: Hint | null
    geometry: Geometry
    widthOf: RuneWidth
}

export type RenderPlan = {
    /** Bytes to write, in order, as one flush. */
    output: string
    /** `maxRows` to commit once the output has been written. */
    maxRows: number
}

export const CLEAR_TO_EOL = '\u001b[0K'
export const CLEAR_LINE = '\u001b[2K'
export const CLEAR_SCREEN = '\u001b[H\u001b[2J'
export const BELL = '\u0007'

export const cursorUp = (n: number) => `\u001b[${n}A`
export const cursorDown = (n: number) => `\u001b[${n}B`
export const cursorRight = (n: number) => `\u001b[${n}C`

/**
 * Redraws the prompt line from scratch.
 *
 * Rows are 0-based: a line of `w` columns ends on row `floor(w / cols)`. The
 * old block is cleared bottom-up starting from its lowest row (`maxRows`), the
 * line is rewritten from its first row, and the cursor is walked back up to
 * where the edit cursor sits.
 */
function climbBlock(maxRows: number, cursorRow: number): string {
    let out = ''
    if (maxRows - cursorRow > 0) {
        out += cursorDown(maxRows - cursorRow)
    }
    for (let i = 0; i < maxRows; i++) {
        out += CLEAR_LINE + cursorUp(1)
    }
    return out
}

function lastCursorRow(prompt: string, state: LineState, geometry: Geometry, widthOf: RuneWidth): number {
    const ocw = runesWidth(state.buffer, widthOf, state.previousCursor)
    return Math.floor((promptWidth(prompt) + ocw) / geometry.columns)
}

/**
 * Wipes every row of the drawn line and leaves the cursor at column 0 of its
 * first row.
 */
export function eraseLine(input: Omit<RenderInput, 'hint'>): string {
    const row = lastCursorRow(input.prompt, input.state, input.geometry, input.widthOf)
    return `${climbBlock(input.state.maxRows, row)}\r${CLEAR_TO_EOL}`
}

/** Moves from the last rendered cursor position to the lowest row of the line. */
export function moveBelowLine(input: Omit<RenderInput, 'hint'>): string {
    const row = lastCursorRow(input.prompt, input.state, input.geometry, input.widthOf)
    const down = input.state.maxRows - row
    return down > 0 ? cursorDown(down) : ''
}

export function renderLine(input: RenderInput): RenderPlan {
    const { prompt, state, hint, widthOf } = input
    const cols = input.geometry.columns
    const hintText = hint?.text ?? ''

    const pw = promptWidth(prompt)
    const bw = runesWidth(state.buffer, widthOf)
    const cw = runesWidth(state.buffer, widthOf, state.cursor)
    const ocw = runesWidth(state.buffer, widthOf, state.previousCursor)
    const hw = runesWidth(hintText, widthOf)

    const end = pw + bw + hw
    const endRow = Math.floor(end / cols)
    const cursorCol = (pw + cw) % cols
    const cursorRow = Math.floor((pw + cw) / cols)
    const oldCursorRow = Math.floor((pw + ocw) / cols)

    const maxRows = Math.max(state.maxRows, endRow)

    let out = climbBlock(state.maxRows, oldCursorRow)
    out += '\r'
    out += prompt
    out += state.buffer.join('')
    out += styleText(hintText, hint?.style)
    out += CLEAR_TO_EOL

    // Terminals park the cursor on the last column instead of wrapping when a
    // write ends exactly at the edge; move to the next row explicitly.
    if (end > 0 && end % cols === 0) {
        out += '\n\r'
    }

    if (endRow - cursorRow > 0) {
        out += cursorUp(endRow - cursorRow)
    }
    out += '\r'
    if (cursorCol > 0) {
        out += cursorRight(cursorCol)
    }

    return { output: out, maxRows }
}
