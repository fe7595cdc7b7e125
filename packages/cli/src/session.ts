import type { Readable, Writable } from 'node:stream'
import { HistoryStore, LineEditor, isLineEditorError, type Geometry, type Logger } from '@vtline/core'
import { runRepl } from './repl'
import { hasFixedGeometry, type SessionSettings } from './settings'
import { startTicker } from './ticker'

export type SessionStreams = {
    input: Readable
    output: Writable
    /** Size reported by a local TTY, if there is one. */
    geometry?: Geometry
}

export function createEditor(streams: SessionStreams, settings: SessionSettings, logger: Logger): LineEditor {
    return new LineEditor({
        input: streams.input,
        output: streams.output,
        prompt: settings.prompt,
        geometry: hasFixedGeometry(settings) ? settings.geometry : streams.geometry,
        history: new HistoryStore({ capacity: settings.historySize }),
        completion: settings.completion,
        hint: settings.hint,
        help: settings.help,
        widthOf: settings.widthOf,
        logger,
    })
}

function shouldProbe(streams: SessionStreams, settings: SessionSettings): boolean {
    if (!settings.probe || hasFixedGeometry(settings)) return false
    return !(streams.geometry && streams.geometry.columns > 0)
}

/** Asks the terminal for its size; a garbled answer keeps the default size. */
async function probe(editor: LineEditor, logger: Logger): Promise<void> {
    try {
        await editor.probeGeometry()
    } catch (err) {
        if (!isLineEditorError(err, 'MALFORMED_CURSOR_REPORT')) throw err
        logger.warn('geometry probe failed, keeping default size', { error: err.message })
    }
}

/** One editor, one REPL, until exit or end of input. Resolves with the lines handled. */
export async function runSession(streams: SessionStreams, settings: SessionSettings, logger: Logger): Promise<number> {
    const editor = createEditor(streams, settings, logger)
    try {
        if (shouldProbe(streams, settings)) {
            await probe(editor, logger)
        }
        const stopTicker = settings.tickSeconds ? startTicker(editor, { seconds: settings.tickSeconds, logger }) : null
        try {
            return await runRepl(editor, { helpEntries: settings.helpEntries, logger })
        } finally {
            stopTicker?.()
        }
    } finally {
        await editor.close()
    }
}
