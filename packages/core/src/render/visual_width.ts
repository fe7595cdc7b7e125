import stringWidth from 'string-width'

/** Number of terminal columns a single code point occupies. */
export type RuneWidth = (rune: string) => number

export const TAB_WIDTH = 4

export const defaultRuneWidth: RuneWidth = (rune) => (rune === '\t' ? TAB_WIDTH : 1)

/** East-Asian wide and emoji code points count double; the table lives in string-width. */
export const wideRuneWidth: RuneWidth = (rune) => (rune === '\t' ? TAB_WIDTH : stringWidth(rune))

export function runesWidth(runes: Iterable<string>, widthOf: RuneWidth, limit = Number.POSITIVE_INFINITY): number {
    let width = 0
    let index = 0
    for (const rune of runes) {
        if (index >= limit) break
        width += widthOf(rune)
        index++
    }
    return width
}

/**
 * Width of a prompt that may carry colour codes: from ESC up to and including
 * the next ASCII letter nothing is counted.
 */
export function promptWidth(prompt: string): number {
    let width = 0
    let inEscape = false
    for (const rune of prompt) {
        if (inEscape) {
            if (/^[a-zA-Z]$/.test(rune)) inEscape = false
            continue
        }
        if (rune === '\u001b') {
            inEscape = true
            continue
        }
        width++
    }
    return width
}
