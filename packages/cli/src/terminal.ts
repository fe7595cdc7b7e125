import type { Geometry } from '@vtline/core'

/** Terminals known not to understand the escape sequences the editor emits. */
export const UNSUPPORTED_TERMS = ['dumb', 'cons25', 'emacs'] as const

export function isUnsupportedTerm(term: string | undefined): boolean {
    const name = term?.toLowerCase() ?? ''
    return UNSUPPORTED_TERMS.some((unsupported) => unsupported === name)
}

export function canEdit(stdin: NodeJS.ReadStream, env: NodeJS.ProcessEnv = process.env): boolean {
    return Boolean(stdin.isTTY) && !isUnsupportedTerm(env.TERM)
}

/** Puts the TTY in raw mode; call the returned function to restore it. */
export function enableRawMode(stdin: NodeJS.ReadStream): () => void {
    const wasRaw = stdin.isRaw
    stdin.setRawMode(true)
    return () => {
        stdin.setRawMode(wasRaw)
    }
}

/** Size the TTY reports; zero when it reports nothing. */
export function ttyGeometry(stdout: NodeJS.WriteStream): Geometry {
    return {
        columns: stdout.isTTY ? stdout.columns : 0,
        rows: stdout.isTTY ? stdout.rows : 0,
    }
}
