export type LineEditorErrorCode =
    | 'IO_FAILURE'
    | 'END_OF_STREAM'
    | 'MALFORMED_CURSOR_REPORT'
    | 'SESSION_IN_PROGRESS'
    | 'CONFIG_ERROR'

export class LineEditorError extends Error {
    /** The buffer contents when the session was aborted, if one was running. */
    readonly line: string | undefined

    constructor(
        readonly code: LineEditorErrorCode,
        message: string,
        options?: { line?: string; cause?: unknown },
    ) {
        super(message, options?.cause === undefined ? undefined : { cause: options.cause })
        this.name = 'LineEditorError'
        this.line = options?.line
    }
}

export function isLineEditorError(err: unknown, code?: LineEditorErrorCode): err is LineEditorError {
    return err instanceof LineEditorError && (code === undefined || err.code === code)
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err)
}
