import assert from 'node:assert'
import { describe, test } from 'vitest'
import { EMPTY_LINE, toRunes, type LineState } from '@vtline/core/edit/line_state'
import {
    eraseLine,
    moveBelowLine,
    normalizeGeometry,
    renderLine,
    type RenderInput,
} from '@vtline/core/render/renderer'
import { defaultRuneWidth, wideRuneWidth } from '@vtline/core/render/visual_width'

function line(text: string, cursor: number, previousCursor = 0, maxRows = 0): LineState {
    return { buffer: toRunes(text), cursor, previousCursor, maxRows }
}

function input(state: LineState, overrides: Partial<RenderInput> = {}): RenderInput {
    return {
        prompt: '> ',
        state,
        hint: null,
        geometry: { columns: 80, rows: 24 },
        widthOf: defaultRuneWidth,
        ...overrides,
    }
}

const narrow = { geometry: { columns: 10, rows: 5 } }

describe('renderLine', () => {
    test('draws a single row and places the cursor', () => {
        assert.deepStrictEqual(renderLine(input(line('foo', 3))), {
            output: '\r> foo\u001b[0K\r\u001b[5C',
            maxRows: 0,
        })
        assert.deepStrictEqual(renderLine(input(EMPTY_LINE, { prompt: '' })), {
            output: '\r\u001b[0K\r',
            maxRows: 0,
        })
    })

    test('ignores colour codes in the prompt when placing the cursor', () => {
        const plan = renderLine(input(line('ab', 2), { prompt: '\u001b[32m> \u001b[0m' }))
        assert.strictEqual(plan.output, '\r\u001b[32m> \u001b[0mab\u001b[0K\r\u001b[4C')
    })

    test('counts wide runes twice', () => {
        const plan = renderLine(input(line('你好', 1), { widthOf: wideRuneWidth }))
        assert.strictEqual(plan.output, '\r> 你好\u001b[0K\r\u001b[4C')
    })

    test('moves to a fresh row when the line ends exactly at the edge', () => {
        assert.deepStrictEqual(renderLine(input(line('abcdefgh', 8), narrow)), {
            output: '\r> abcdefgh\u001b[0K\n\r\r',
            maxRows: 1,
        })
    })

    test('clears the wrapped block before redrawing', () => {
        assert.deepStrictEqual(renderLine(input(line('abcdefghi', 9, 8, 1), narrow)), {
            output: '\u001b[2K\u001b[1A\r> abcdefghi\u001b[0K\r\u001b[1C',
            maxRows: 1,
        })
        assert.deepStrictEqual(renderLine(input(line('abcdefghi', 0, 9, 1), narrow)), {
            output: '\u001b[2K\u001b[1A\r> abcdefghi\u001b[0K\u001b[1A\r\u001b[2C',
            maxRows: 1,
        })
    })

    test('is idempotent for an unchanged state', () => {
        const state = line('', 0, 0, 1)
        const first = renderLine(input(state, narrow))
        const second = renderLine(input({ ...state, maxRows: first.maxRows }, narrow))
        assert.strictEqual(first.output, '\u001b[1B\u001b[2K\u001b[1A\r> \u001b[0K\r\u001b[2C')
        assert.strictEqual(second.output, first.output)
    })

    test('counts the hint toward wrapping but keeps the cursor in the buffer', () => {
        const plan = renderLine(input(line('abcd', 4), { ...narrow, hint: { text: 'efgh' } }))
        assert.deepStrictEqual(plan, {
            output: '\r> abcdefgh\u001b[0K\n\r\u001b[1A\r\u001b[6C',
            maxRows: 1,
        })
    })
})

describe('eraseLine and moveBelowLine', () => {
    const drawn = { prompt: '> ', geometry: { columns: 10, rows: 5 }, widthOf: defaultRuneWidth }

    test('eraseLine clears every row and returns to the first one', () => {
        assert.strictEqual(eraseLine({ ...drawn, state: line('abcdefghi', 9, 9, 1) }), '\u001b[2K\u001b[1A\r\u001b[0K')
        assert.strictEqual(eraseLine({ ...drawn, state: line('abc', 3, 3, 0) }), '\r\u001b[0K')
    })

    test('moveBelowLine walks down to the last row of the line', () => {
        assert.strictEqual(moveBelowLine({ ...drawn, state: line('abcdefghi', 0, 0, 1) }), '\u001b[1B')
        assert.strictEqual(moveBelowLine({ ...drawn, state: line('abcdefghi', 9, 9, 1) }), '')
    })
})

describe('normalizeGeometry', () => {
    test('falls back to 80x24 for missing or zero sizes', () => {
        assert.deepStrictEqual(normalizeGeometry(), { columns: 80, rows: 24 })
        assert.deepStrictEqual(normalizeGeometry({ columns: 0, rows: 30 }), { columns: 80, rows: 30 })
        assert.deepStrictEqual(normalizeGeometry({ columns: 100.7 }), { columns: 100, rows: 24 })
    })
})
