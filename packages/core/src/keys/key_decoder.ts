import {
    BACKSPACE,
    CTRL_A,
    CTRL_B,
    CTRL_C,
    CTRL_D,
    CTRL_E,
    CTRL_F,
    CTRL_H,
    CTRL_K,
    CTRL_L,
    CTRL_N,
    CTRL_P,
    CTRL_T,
    CTRL_U,
    CTRL_W,
    ENTER,
    ESC,
    HELP,
    TAB,
} from './key_codes'

/** Anything that hands out one code point at a time; `null` means the stream ended. */
export type RuneSource = {
    readRune(): Promise<string | null>
}

export type KeyCommand =
    | { type: 'insert'; char: string }
    | { type: 'submit' }
    | { type: 'complete' }
    | { type: 'help' }
    | { type: 'delete_left' }
    | { type: 'delete_right' }
    | { type: 'delete_right_or_end' }
    | { type: 'interrupt' }
    | { type: 'clear_screen' }
    | { type: 'delete_prev_word' }
    | { type: 'move_left' }
    | { type: 'move_right' }
    | { type: 'move_home' }
    | { type: 'move_end' }
    | { type: 'history_prev' }
    | { type: 'history_next' }
    | { type: 'reset_line' }
    | { type: 'kill_to_end' }
    | { type: 'transpose' }
    | { type: 'ignored'; sequence: string }
    | { type: 'end_of_input' }

type SimpleCommand = Exclude<KeyCommand, { type: 'insert' } | { type: 'ignored' }>

const NORMAL_KEYS: ReadonlyMap<string, SimpleCommand> = new Map<string, SimpleCommand>([
    [ENTER, { type: 'submit' }],
    [TAB, { type: 'complete' }],
    [HELP, { type: 'help' }],
    [BACKSPACE, { type: 'delete_left' }],
    [CTRL_H, { type: 'delete_left' }],
    [CTRL_C, { type: 'interrupt' }],
    [CTRL_D, { type: 'delete_right_or_end' }],
    [CTRL_L, { type: 'clear_screen' }],
    [CTRL_W, { type: 'delete_prev_word' }],
    [CTRL_B, { type: 'move_left' }],
    [CTRL_F, { type: 'move_right' }],
    [CTRL_P, { type: 'history_prev' }],
    [CTRL_N, { type: 'history_next' }],
    [CTRL_U, { type: 'reset_line' }],
    [CTRL_K, { type: 'kill_to_end' }],
    [CTRL_A, { type: 'move_home' }],
    [CTRL_E, { type: 'move_end' }],
    [CTRL_T, { type: 'transpose' }],
])

const CSI_FINALS: ReadonlyMap<string, SimpleCommand> = new Map<string, SimpleCommand>([
    ['A', { type: 'history_prev' }],
    ['B', { type: 'history_next' }],
    ['C', { type: 'move_right' }],
    ['D', { type: 'move_left' }],
    ['H', { type: 'move_home' }],
    ['F', { type: 'move_end' }],
])

const SS3_FINALS: ReadonlyMap<string, SimpleCommand> = new Map<string, SimpleCommand>([
    ['H', { type: 'move_home' }],
    ['F', { type: 'move_end' }],
])

// Single-parameter CSI sequences we do not handle (e.g. `ESC [ 2 ~`). Exactly one
// trailing byte is swallowed; longer payloads are not resynchronized.
const SKIPPED_CSI_PARAMS = new Set(['0', '1', '2', '4', '5', '6', '7', '8', '9'])

const END: KeyCommand = { type: 'end_of_input' }

function ignored(sequence: string): KeyCommand {
    return { type: 'ignored', sequence }
}

/**
 * Reads exactly one logical command from `source`, consuming as many code points
 * as the escape sequence needs. Read errors propagate untouched; a stream that
 * ends, even in the middle of a sequence, decodes as `end_of_input`.
 */
export async function decodeKey(source: RuneSource): Promise<KeyCommand> {
    const r = await source.readRune()
    if (r === null) return END
    if (r !== ESC) {
        return NORMAL_KEYS.get(r) ?? { type: 'insert', char: r }
    }

    const r1 = await source.readRune()
    if (r1 === null) return END
    if (r1 === '[') return decodeCsi(source)
    if (r1 === 'O') {
        const r2 = await source.readRune()
        if (r2 === null) return END
        return SS3_FINALS.get(r2) ?? ignored(`${ESC}O${r2}`)
    }
    return ignored(`${ESC}${r1}`)
}

async function decodeCsi(source: RuneSource): Promise<KeyCommand> {
    const r2 = await source.readRune()
    if (r2 === null) return END

    if (SKIPPED_CSI_PARAMS.has(r2)) {
        const tail = await source.readRune()
        if (tail === null) return END
        return ignored(`${ESC}[${r2}${tail}`)
    }

    if (r2 === '3') {
        const r3 = await source.readRune()
        if (r3 === null) return END
        return r3 === '~' ? { type: 'delete_right' } : ignored(`${ESC}[3${r3}`)
    }

    return CSI_FINALS.get(r2) ?? ignored(`${ESC}[${r2}`)
}
