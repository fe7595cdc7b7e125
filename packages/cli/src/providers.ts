import {
    NO_COMPLETION,
    NO_HELP,
    NO_HINT,
    completionFrom,
    helpFrom,
    hintFrom,
    type CompletionCapability,
    type HelpCapability,
    type HelpEntry,
    type HintCapability,
    type TextStyle,
    type VtlineConfig,
} from '@vtline/core'

export type Providers = {
    completion: CompletionCapability
    hint: HintCapability
    help: HelpCapability
    /** Everything `help` prints: shell commands first, then configured entries. */
    helpEntries: readonly HelpEntry[]
}

export const COMMAND_HELP: readonly HelpEntry[] = [
    ['exit', 'leave the shell'],
    ['history', 'list entered lines'],
    ['help', 'show this table'],
]

/** Offers every word that starts with the whole line; no words means tab inserts itself. */
export function createWordCompleter(words: readonly string[]): CompletionCapability {
    if (words.length === 0) return NO_COMPLETION
    const unique = [...new Set(words)]
    return completionFrom((line) => unique.filter((word) => word.startsWith(line)))
}

export function createHintTable(table: Readonly<Record<string, string>>, style?: TextStyle): HintCapability {
    const hints = new Map(Object.entries(table))
    if (hints.size === 0) return NO_HINT
    return hintFrom((line) => {
        const text = hints.get(line)
        return text ? { text, style } : null
    })
}

export function createHelp(entries: readonly HelpEntry[]): HelpCapability {
    if (entries.length === 0) return NO_HELP
    return helpFrom(() => entries)
}

export function providersFromConfig(config: VtlineConfig): Providers {
    const configured = config.help.map((entry): HelpEntry => [entry.key, entry.description])
    return {
        completion: createWordCompleter(config.completion.words),
        hint: createHintTable(config.hints.table, config.hints.style),
        help: createHelp(configured),
        helpEntries: [...COMMAND_HELP, ...configured],
    }
}
