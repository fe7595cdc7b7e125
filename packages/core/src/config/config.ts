/** @file Reads ~/.vtline/config.toml and validates it against the schema below. */
import { readFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { join } from 'node:path'
import { parse } from 'toml'
import { z } from 'zod'
import { LineEditorError, errorMessage } from '../errors'
import { LOG_LEVELS } from '../logger'
import { COLOR_NAMES } from '../render/styles'

const DEFAULT_VTLINE_HOME = join(homedir(), '.vtline')
export const CONFIG_FILE = 'config.toml'

const styleSchema = z
    .object({
        color: z.enum(COLOR_NAMES).optional(),
        bold: z.boolean().optional(),
    })
    .strict()

const configSchema = z
    .object({
        prompt: z.string().default('> '),
        columns: z.number().int().nonnegative().default(0),
        rows: z.number().int().nonnegative().default(0),
        probe_geometry: z.boolean().default(true),
        wide_chars: z.boolean().default(false),
        history_size: z.number().int().positive().default(500),
        log_level: z.enum(LOG_LEVELS).default('warn'),
        log_file: z.string().default(''),
        completion: z
            .object({ words: z.array(z.string()).default([]) })
            .strict()
            .default({}),
        hints: z
            .object({
                style: styleSchema.default({ color: 'magenta' }),
                table: z.record(z.string()).default({}),
            })
            .strict()
            .default({}),
        help: z
            .array(z.object({ key: z.string(), description: z.string() }).strict())
            .default([]),
    })
    .strict()

export type VtlineConfig = z.infer<typeof configSchema>

export type LoadedConfig = {
    config: VtlineConfig
    home: string
    configPath: string
    /** False when no config file exists and defaults were used. */
    exists: boolean
}

export const DEFAULT_CONFIG: VtlineConfig = configSchema.parse({})

function expandHome(path: string) {
    if (path.startsWith('~')) {
        return join(homedir(), path.slice(1))
    }
    return path
}

export function resolveVtlineHome(env: NodeJS.ProcessEnv = process.env): string {
    return env.VTLINE_HOME ? expandHome(env.VTLINE_HOME) : DEFAULT_VTLINE_HOME
}

/** Validates already-parsed TOML. Unknown keys are rejected so typos surface. */
export function parseVtlineConfig(raw: unknown, source = CONFIG_FILE): VtlineConfig {
    const result = configSchema.safeParse(raw)
    if (!result.success) {
        const problems = result.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ')
        throw new LineEditorError('CONFIG_ERROR', `invalid config ${source}: ${problems}`)
    }
    return result.data
}

export async function loadVtlineConfig(env: NodeJS.ProcessEnv = process.env): Promise<LoadedConfig> {
    const home = resolveVtlineHome(env)
    const configPath = join(home, CONFIG_FILE)

    let text: string
    try {
        text = await readFile(configPath, 'utf8')
    } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
            return { config: DEFAULT_CONFIG, home, configPath, exists: false }
        }
        throw new LineEditorError('CONFIG_ERROR', `cannot read ${configPath}: ${errorMessage(err)}`, {
            cause: err,
        })
    }

    let raw: unknown
    try {
        raw = parse(text)
    } catch (err) {
        throw new LineEditorError('CONFIG_ERROR', `cannot parse ${configPath}: ${errorMessage(err)}`, {
            cause: err,
        })
    }

    return { config: parseVtlineConfig(raw, configPath), home, configPath, exists: true }
}
