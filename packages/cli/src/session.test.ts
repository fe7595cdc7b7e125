import assert from 'node:assert'
import { Duplex, PassThrough, Readable } from 'node:stream'
import { describe, test, vi } from 'vitest'
import { DEFAULT_CONFIG, createLogger, parseVtlineConfig } from '@vtline/core'
import { RecordingWritable } from '@vtline/core/testing/recording_writable'
import { parseArgs } from './cli_args'
import { serveConnection } from './server'
import { runSession } from './session'
import { resolveSettings } from './settings'

const logger = createLogger()
const PROBE = '\u001b7\u001b[999;999H\u001b[6n'

describe('runSession', () => {
    test('probes the terminal size before the first prompt', async () => {
        const output = new RecordingWritable()
        const settings = resolveSettings(DEFAULT_CONFIG, parseArgs([]).options)
        const handled = await runSession(
            { input: Readable.from([Buffer.from('\u001b[30;60Rhi\rexit\r')]), output },
            settings,
            logger,
        )
        assert.strictEqual(handled, 2)
        assert.deepStrictEqual(output.writes.slice(0, 3), [PROBE, '\u001b8', '\r> \u001b[0K\r\u001b[2C'])
    })

    test('keeps going after a garbled size report', async () => {
        const output = new RecordingWritable()
        const settings = resolveSettings(DEFAULT_CONFIG, parseArgs([]).options)
        const handled = await runSession({ input: Readable.from([Buffer.from('\u001b[5Rexit\r')]), output }, settings, logger)
        assert.strictEqual(handled, 1)
    })

    test('skips the probe when the size is known', async () => {
        const output = new RecordingWritable()
        const config = parseVtlineConfig({ prompt: '$ ' })
        const settings = resolveSettings(config, parseArgs([]).options)
        await runSession(
            { input: Readable.from([Buffer.from('exit\r')]), output, geometry: { columns: 100, rows: 40 } },
            settings,
            logger,
        )
        assert.strictEqual(output.writes[0], '\r$ \u001b[0K\r\u001b[2C')
    })
})

describe('serveConnection', () => {
    test('runs a session over the socket and ends it', async () => {
        const fromClient = new PassThrough()
        const toClient = new RecordingWritable()
        const socket = Duplex.from({ readable: fromClient, writable: toClient })
        const settings = resolveSettings(DEFAULT_CONFIG, parseArgs(['--no-probe']).options)
        const end = vi.spyOn(socket, 'end')

        fromClient.end('yo\rexit\r')
        await serveConnection(socket, 'test-peer', settings, logger)

        assert.strictEqual(end.mock.calls.length, 1)
        assert.ok(toClient.writes.includes('yo\r\n'))
    })

    test('treats the client hanging up as a normal close', async () => {
        const fromClient = new PassThrough()
        const toClient = new RecordingWritable()
        const socket = Duplex.from({ readable: fromClient, writable: toClient })
        const settings = resolveSettings(DEFAULT_CONFIG, parseArgs(['--no-probe']).options)
        const sessionLogger = createLogger()
        const warn = vi.spyOn(sessionLogger, 'warn')
        const end = vi.spyOn(socket, 'end')

        fromClient.end('yo\r')
        await serveConnection(socket, 'test-peer', settings, sessionLogger)

        assert.strictEqual(warn.mock.calls.length, 0)
        assert.strictEqual(end.mock.calls.length, 1)
        assert.deepStrictEqual(toClient.writes.slice(-2), ['yo\r\n', '\r> \u001b[0K\r\u001b[2C'])
    })
})
