import stringWidth from 'string-width'

export type ColumnLayout = {
    /** Spaces printed before the first cell of every row. */
    indent: number
    /** Spaces added after the widest cell of each column. */
    padding: number
}

/**
 * Lays `rows` out as a left-aligned table below the prompt. Every row starts on
 * a fresh line at column 0 (`\n\r`); every cell, the last one included, is
 * padded to its column width; the block ends with a line feed.
 */
export function alignColumns(rows: readonly (readonly string[])[], layout: ColumnLayout): string {
    const widths: number[] = []
    for (const row of rows) {
        row.forEach((cell, col) => {
            widths[col] = Math.max(widths[col] ?? 0, stringWidth(cell))
        })
    }

    const indent = ' '.repeat(layout.indent)
    let out = ''
    for (const row of rows) {
        out += `\n\r${indent}`
        row.forEach((cell, col) => {
            const target = (widths[col] ?? 0) + layout.padding
            out += cell + ' '.repeat(Math.max(0, target - stringWidth(cell)))
        })
    }
    return `${out}\n`
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
    const out: T[][] = []
    for (let i = 0; i < items.length; i += size) {
        out.push(items.slice(i, i + size))
    }
    return out
}
