export const COLOR_NAMES = ['black', 'red', 'green', 'yellow', 'blue', 'magenta', 'cyan', 'white'] as const

export type ColorName = (typeof COLOR_NAMES)[number]

export type TextStyle = {
    color?: ColorName
    bold?: boolean
}

const SGR_FG: Record<ColorName, string> = {
    black: '30',
    red: '31',
    green: '32',
    yellow: '33',
    blue: '34',
    magenta: '35',
    cyan: '36',
    white: '37',
}

export const SGR_RESET = '\u001b[0m'

export function sgr(style: TextStyle): string {
    const codes: string[] = []
    if (style.bold) codes.push('1')
    if (style.color) codes.push(SGR_FG[style.color])
    return codes.length ? `\u001b[${codes.join(';')}m` : ''
}

/** Wraps `text` in the style's SGR codes; unstyled text is returned as is. */
export function styleText(text: string, style?: TextStyle): string {
    if (!style || !text) return text
    const open = sgr(style)
    return open ? `${open}${text}${SGR_RESET}` : text
}
