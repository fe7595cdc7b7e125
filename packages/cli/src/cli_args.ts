export type CliOptions = {
    prompt: string | null
    /** TCP port to serve editors on; null runs on the local terminal. */
    listen: number | null
    probe: boolean
    tickSeconds: number | null
    showVersion: boolean
    showHelp: boolean
}

export type ParsedArgs = {
    options: CliOptions
    errors: string[]
}

export const USAGE = `Usage: vtline [options]

Options:
  --prompt <text>      prompt to draw before the line
  -l, --listen <port>  serve one editor per TCP connection
  --no-probe           do not ask the terminal for its size
  --tick <seconds>     print a timestamp line every few seconds
  -v, --version        print the version
  -h, --help           print this help
`

function parsePort(value: string): number | null {
    if (!/^\d+$/.test(value)) return null
    const port = Number(value)
    return port <= 65535 ? port : null
}

function parseSeconds(value: string): number | null {
    const seconds = Number(value)
    return Number.isFinite(seconds) && seconds > 0 ? seconds : null
}

/** Minimal argv parsing for vtline flags. */
export function parseArgs(argv: string[]): ParsedArgs {
    const options: CliOptions = {
        prompt: null,
        listen: null,
        probe: true,
        tickSeconds: null,
        showVersion: false,
        showHelp: false,
    }
    const errors: string[] = []

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i]
        if (arg === undefined) continue

        if (arg === '--version' || arg === '-v') {
            options.showVersion = true
            continue
        }
        if (arg === '--help' || arg === '-h') {
            options.showHelp = true
            continue
        }
        if (arg === '--no-probe') {
            options.probe = false
            continue
        }

        if (arg === '--prompt' || arg === '--listen' || arg === '-l' || arg === '--tick') {
            const value = argv[i + 1]
            if (value === undefined) {
                errors.push(`${arg} needs a value`)
                continue
            }
            i++
            if (arg === '--prompt') {
                options.prompt = value
            } else if (arg === '--tick') {
                options.tickSeconds = parseSeconds(value)
                if (options.tickSeconds === null) errors.push(`invalid tick interval "${value}"`)
            } else {
                options.listen = parsePort(value)
                if (options.listen === null) errors.push(`invalid port "${value}"`)
            }
            continue
        }

        errors.push(`unknown argument "${arg}"`)
    }

    return { options, errors }
}
