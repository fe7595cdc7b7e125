import { createInterface } from 'node:readline'
import type { Readable, Writable } from 'node:stream'
import { HistoryStore, alignColumns, type HelpEntry, type LineEditor, type Logger } from '@vtline/core'

export type ReplOptions = {
    helpEntries?: readonly HelpEntry[]
    logger?: Logger
}

type Print = (text: string) => Promise<unknown>

type CommandOutcome = 'continue' | 'exit'

function formatHistory(entries: readonly string[]): string {
    return entries.map((entry, i) => `${String(i + 1).padStart(4)}  ${entry}\n`).join('')
}

function formatHelp(entries: readonly HelpEntry[]): string {
    // alignColumns starts rows with CR for raw terminals; print() adds its own.
    return alignColumns(entries, { indent: 2, padding: 3 }).replace(/\n\r/g, '\n').slice(1)
}

/** Records the line and runs it. Blank lines are skipped by the callers. */
async function runCommand(line: string, history: HistoryStore, print: Print, options: ReplOptions): Promise<CommandOutcome> {
    history.add(line)
    switch (line.trim()) {
        case 'exit':
            return 'exit'
        case 'history':
            await print(formatHistory(history.entries()))
            return 'continue'
        case 'help':
            await print(formatHelp(options.helpEntries ?? []))
            return 'continue'
        default:
            await print(`${line}\n`)
            return 'continue'
    }
}

/**
 * Interactive loop over a line editor. Resolves with the number of non-blank
 * lines handled once the user types `exit` or the input ends.
 */
export async function runRepl(editor: LineEditor, options: ReplOptions = {}): Promise<number> {
    const print: Print = (text) => editor.write(text)
    let handled = 0

    while (true) {
        const result = await editor.readLine()
        await editor.moveToLastRow()
        if (result.type === 'interrupted') {
            await print('^C\n')
            continue
        }

        if (result.type === 'end_of_input') {
            // The peer may already be gone when the stream itself ended.
            if (!editor.inputEnded) await print('\n')
            options.logger?.debug('repl input ended', { handled })
            return handled
        }
        await print('\n')
        if (!result.line.trim()) continue

        handled++
        const outcome = await runCommand(result.line, editor.history, print, options)
        if (outcome === 'exit') return handled
    }
}

export type PlainReplOptions = ReplOptions & {
    historySize?: number
}

/** Same commands without editing, for dumb terminals and pipes. */
export async function runPlainRepl(input: Readable, output: Writable, options: PlainReplOptions = {}): Promise<number> {
    const history = new HistoryStore({ capacity: options.historySize })
    const print: Print = (text) =>
        new Promise<void>((resolve, reject) => {
            output.write(text, (err) => (err ? reject(err) : resolve()))
        })
    const lines = createInterface({ input, crlfDelay: Number.POSITIVE_INFINITY, terminal: false })
    let handled = 0

    try {
        for await (const line of lines) {
            if (!line.trim()) continue
            handled++
            const outcome = await runCommand(line, history, print, options)
            if (outcome === 'exit') break
        }
    } finally {
        lines.close()
    }
    return handled
}
