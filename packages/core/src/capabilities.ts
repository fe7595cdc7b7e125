import type { TextStyle } from './render/styles'

/** Suggestion drawn after the buffer; never part of the submitted line. */
export type Hint = {
    text: string
    style?: TextStyle
}

export type HelpEntry = readonly [key: string, description: string]

export type CompletionCapability =
    | { type: 'none' }
    | { type: 'provider'; complete: (line: string) => readonly string[] }

export type HintCapability =
    | { type: 'none' }
    | { type: 'provider'; hint: (line: string) => Hint | null }

export type HelpCapability =
    | { type: 'none' }
    | { type: 'provider'; help: (line: string) => readonly HelpEntry[] }

export const NO_COMPLETION: CompletionCapability = { type: 'none' }
export const NO_HINT: HintCapability = { type: 'none' }
export const NO_HELP: HelpCapability = { type: 'none' }

export function completionFrom(complete: (line: string) => readonly string[]): CompletionCapability {
    return { type: 'provider', complete }
}

export function hintFrom(hint: (line: string) => Hint | null): HintCapability {
    return { type: 'provider', hint }
}

export function helpFrom(help: (line: string) => readonly HelpEntry[]): HelpCapability {
    return { type: 'provider', help }
}
