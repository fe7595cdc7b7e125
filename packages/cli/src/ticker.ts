import { errorMessage, type LineEditor, type Logger } from '@vtline/core'

export type TickerOptions = {
    seconds: number
    logger: Logger
    now?: () => Date
}

function formatTick(date: Date): string {
    return `[${date.toISOString().slice(11, 19)}] tick\n`
}

/** Prints a timestamp above the line being edited every `seconds`. Returns a stop function. */
export function startTicker(editor: LineEditor, options: TickerOptions): () => void {
    const now = options.now ?? (() => new Date())
    const timer = setInterval(() => {
        editor.writeOut(formatTick(now())).catch((err: unknown) => {
            options.logger.warn('tick output failed', { error: errorMessage(err) })
            clearInterval(timer)
        })
    }, options.seconds * 1000)
    timer.unref()
    return () => clearInterval(timer)
}
