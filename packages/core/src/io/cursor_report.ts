export type CursorReport =
    | { type: 'report'; rows: number; columns: number }
    | { type: 'malformed'; reason: string }

const CSI = '\u001b['

function parseField(field: string): number | null {
    if (!/^\d+$/.test(field)) return null
    const value = Number.parseInt(field, 10)
    return value > 0 ? value : null
}

/**
 * Parses a device status report (`ESC [ rows ; cols R`). Anything the terminal
 * sent before the report, such as keys typed while the probe was in flight, is
 * skipped.
 */
export function parseCursorReport(response: string): CursorReport {
    const start = response.lastIndexOf(CSI)
    if (start === -1) {
        return { type: 'malformed', reason: 'missing control sequence introducer' }
    }
    if (!response.endsWith('R')) {
        return { type: 'malformed', reason: 'missing R terminator' }
    }

    const body = response.slice(start + CSI.length, -1)
    const fields = body.split(';')
    if (fields.length !== 2) {
        return { type: 'malformed', reason: `expected 2 fields, got ${fields.length}` }
    }

    const rows = parseField(fields[0] ?? '')
    const columns = parseField(fields[1] ?? '')
    if (rows === null || columns === null) {
        return { type: 'malformed', reason: `invalid position "${body}"` }
    }
    return { type: 'report', rows, columns }
}
