// CLI entry: local raw-mode editor, plain line mode, or a TCP line server.
import { stdin, stdout, stderr } from 'node:process'
import { createLogger, errorMessage, loadVtlineConfig, type Logger } from '@vtline/core'
import { parseArgs, USAGE, type CliOptions } from './cli_args'
import { runPlainRepl } from './repl'
import { createLineServer, listen } from './server'
import { runSession } from './session'
import { resolveSettings, type SessionSettings } from './settings'
import { canEdit, enableRawMode, ttyGeometry } from './terminal'
import { findLocalPackageInfoSync } from './version'

async function runLocal(settings: SessionSettings, logger: Logger): Promise<number> {
    if (!canEdit(stdin)) {
        logger.info('terminal cannot be edited, reading plain lines', { term: process.env.TERM })
        return runPlainRepl(stdin, stdout, { helpEntries: settings.helpEntries, historySize: settings.historySize })
    }

    const restore = enableRawMode(stdin)
    try {
        return await runSession({ input: stdin, output: stdout, geometry: ttyGeometry(stdout) }, settings, logger)
    } finally {
        restore()
        stdin.pause()
    }
}

async function runServer(port: number, settings: SessionSettings, logger: Logger): Promise<void> {
    const server = createLineServer(settings, logger)
    const address = await listen(server, port)
    stdout.write(`vtline listening on ${address.address}:${address.port}\n`)
    logger.info('server listening', { ...address })

    await new Promise<void>((resolve) => {
        process.once('SIGINT', () => {
            logger.info('server shutting down')
            server.close(() => resolve())
        })
    })
}

async function main(options: CliOptions) {
    if (options.showHelp) {
        stdout.write(USAGE)
        return
    }
    if (options.showVersion) {
        stdout.write(`${findLocalPackageInfoSync()?.version ?? 'unknown'}\n`)
        return
    }

    const loaded = await loadVtlineConfig()
    const logger = createLogger({ level: loaded.config.log_level, file: loaded.config.log_file })
    logger.debug('config loaded', { path: loaded.configPath, exists: loaded.exists })
    const settings = resolveSettings(loaded.config, options)

    if (options.listen !== null) {
        await runServer(options.listen, settings, logger)
        return
    }
    const handled = await runLocal(settings, logger)
    logger.debug('session finished', { handled })
}

const parsed = parseArgs(process.argv.slice(2))
if (parsed.errors.length) {
    stderr.write(`${parsed.errors.map((error) => `vtline: ${error}`).join('\n')}\n\n${USAGE}`)
    process.exitCode = 2
} else {
    main(parsed.options).catch((err: unknown) => {
        stderr.write(`vtline: ${errorMessage(err)}\n`)
        process.exitCode = 1
    })
}
