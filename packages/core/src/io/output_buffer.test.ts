import assert from 'node:assert'
import { describe, test } from 'vitest'
import { OutputBuffer, payloadBytes, payloadText, toCrlf } from '@vtline/core/io/output_buffer'
import { RecordingWritable } from '@vtline/core/testing/recording_writable'

describe('OutputBuffer', () => {
    test('hands buffered bytes to the stream as one write', async () => {
        const output = new RecordingWritable()
        const out = new OutputBuffer(output)
        out.write('\r> ')
        out.write('abc')
        await out.flush()
        await out.flush()
        assert.deepStrictEqual(output.writes, ['\r> abc'])
    })

    test('keeps flushes in order', async () => {
        const output = new RecordingWritable()
        const out = new OutputBuffer(output)
        out.write('x')
        const first = out.flush()
        out.write('y')
        const second = out.flush()
        await Promise.all([first, second])
        assert.deepStrictEqual(output.writes, ['x', 'y'])
    })

    test('rejects the flush whose write failed', async () => {
        const output = new RecordingWritable({ failAt: 0, failure: new Error('EPIPE') })
        output.on('error', (err) => assert.strictEqual(err.message, 'EPIPE'))
        const out = new OutputBuffer(output)
        out.write('a')
        await assert.rejects(out.flush(), /EPIPE/)
    })
})

describe('payload helpers', () => {
    test('count bytes and decode text', () => {
        assert.strictEqual(payloadBytes('é'), 2)
        assert.strictEqual(payloadBytes(new Uint8Array(3)), 3)
        assert.strictEqual(payloadText(Buffer.from('hi')), 'hi')
        assert.strictEqual(toCrlf('a\nb\n'), 'a\r\nb\r\n')
    })
})
