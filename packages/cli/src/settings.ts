import { defaultRuneWidth, wideRuneWidth, type Geometry, type RuneWidth, type VtlineConfig } from '@vtline/core'
import type { CliOptions } from './cli_args'
import { providersFromConfig, type Providers } from './providers'

/** Everything a session needs, merged from config.toml and the command line. */
export type SessionSettings = Providers & {
    prompt: string
    /** Fixed size from config; zero fields mean "ask the terminal". */
    geometry: Geometry
    probe: boolean
    widthOf: RuneWidth
    historySize: number
    tickSeconds: number | null
}

export function resolveSettings(config: VtlineConfig, options: CliOptions): SessionSettings {
    return {
        ...providersFromConfig(config),
        prompt: options.prompt ?? config.prompt,
        geometry: { columns: config.columns, rows: config.rows },
        probe: options.probe && config.probe_geometry,
        widthOf: config.wide_chars ? wideRuneWidth : defaultRuneWidth,
        historySize: config.history_size,
        tickSeconds: options.tickSeconds,
    }
}

/** True when config.toml pins both dimensions, so the terminal is never asked. */
export function hasFixedGeometry(settings: SessionSettings): boolean {
    return settings.geometry.columns > 0 && settings.geometry.rows > 0
}
