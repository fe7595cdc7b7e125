/**
 * Edit state of one line: the buffer (one element per code point), the cursor,
 * and the bookkeeping the renderer needs to redraw wrapped rows.
 *
 * Every primitive is pure. It either returns the next state or asks for a bell,
 * in which case the caller keeps the previous state.
 */
export type LineState = {
    readonly buffer: readonly string[]
    readonly cursor: number
    /** Cursor as of the last successful render. */
    readonly previousCursor: number
    /** Lowest terminal row (0-based) the line has reached since the last reset. */
    readonly maxRows: number
}

export type EditStep = { type: 'edit'; state: LineState } | { type: 'bell' }

export const EMPTY_LINE: LineState = { buffer: [], cursor: 0, previousCursor: 0, maxRows: 0 }

const BELL: EditStep = { type: 'bell' }

function edit(state: LineState, buffer: readonly string[], cursor: number): EditStep {
    return { type: 'edit', state: { ...state, buffer, cursor } }
}

export function toRunes(text: string): string[] {
    return Array.from(text)
}

export function lineText(state: LineState): string {
    return state.buffer.join('')
}

export function insertRune(state: LineState, rune: string): EditStep {
    const { buffer, cursor } = state
    return edit(state, [...buffer.slice(0, cursor), rune, ...buffer.slice(cursor)], cursor + 1)
}

export function backspace(state: LineState): EditStep {
    const { buffer, cursor } = state
    if (cursor === 0) return BELL
    return edit(state, [...buffer.slice(0, cursor - 1), ...buffer.slice(cursor)], cursor - 1)
}

export function deleteForward(state: LineState): EditStep {
    const { buffer, cursor } = state
    if (cursor === buffer.length) return BELL
    return edit(state, [...buffer.slice(0, cursor), ...buffer.slice(cursor + 1)], cursor)
}

/**
 * Swaps the rune before the cursor with the one under it. At the end of the line
 * the last two runes are swapped and the cursor stays put.
 */
export function transpose(state: LineState): EditStep {
    const { buffer, cursor } = state
    const at = cursor === buffer.length ? buffer.length - 1 : cursor
    if (at <= 0) return BELL

    const next = [...buffer]
    const left = next[at - 1] ?? ''
    next[at - 1] = next[at] ?? ''
    next[at] = left
    return edit(state, next, cursor < buffer.length ? cursor + 1 : cursor)
}

export function moveLeft(state: LineState): EditStep {
    if (state.cursor === 0) return BELL
    return edit(state, state.buffer, state.cursor - 1)
}

export function moveRight(state: LineState): EditStep {
    if (state.cursor === state.buffer.length) return BELL
    return edit(state, state.buffer, state.cursor + 1)
}

export function moveHome(state: LineState): EditStep {
    if (state.cursor === 0) return BELL
    return edit(state, state.buffer, 0)
}

export function moveEnd(state: LineState): EditStep {
    if (state.cursor === state.buffer.length) return BELL
    return edit(state, state.buffer, state.buffer.length)
}

export function killToEnd(state: LineState): EditStep {
    return edit(state, state.buffer.slice(0, state.cursor), state.cursor)
}

/**
 * Walks left from the cursor over spaces, then over the word before them, and
 * truncates the line where the word starts. Text right of the cursor goes too.
 */
export function deletePreviousWord(state: LineState): EditStep {
    const { buffer, cursor } = state
    let inWord = false
    let start = 0
    for (let i = cursor - 1; i >= 0; i--) {
        if (buffer[i] !== ' ') {
            inWord = true
            continue
        }
        if (!inWord) continue
        start = i + 1
        break
    }
    return edit(state, buffer.slice(0, start), start)
}

/** Loads `text` into the buffer with the cursor at its end. */
export function replaceLine(state: LineState, text: string): LineState {
    const buffer = toRunes(text)
    return { ...state, buffer, cursor: buffer.length }
}
