import assert from 'node:assert'
import { describe, test } from 'vitest'
import { alignColumns, chunk } from '@vtline/core/render/columns'
import { sgr, styleText } from '@vtline/core/render/styles'

describe('alignColumns', () => {
    test('pads every cell to its column width plus padding', () => {
        const out = alignColumns([['a', 'bb'], ['ccc']], { indent: 1, padding: 1 })
        assert.strictEqual(out, '\n\r a   bb \n\r ccc \n')
    })

    test('measures wide cells by display width', () => {
        const out = alignColumns([['你', 'x'], ['ab', 'y']], { indent: 0, padding: 1 })
        assert.strictEqual(out, '\n\r你 x \n\rab y \n')
    })

    test('chunk splits into rows of at most size items', () => {
        assert.deepStrictEqual(chunk([1, 2, 3, 4, 5], 2), [[1, 2], [3, 4], [5]])
        assert.deepStrictEqual(chunk([], 3), [])
    })
})

describe('styles', () => {
    test('sgr puts bold before the colour', () => {
        assert.strictEqual(sgr({ bold: true, color: 'red' }), '\u001b[1;31m')
        assert.strictEqual(sgr({}), '')
    })

    test('styleText leaves plain or empty text alone', () => {
        assert.strictEqual(styleText('x'), 'x')
        assert.strictEqual(styleText('x', {}), 'x')
        assert.strictEqual(styleText('', { color: 'red' }), '')
        assert.strictEqual(styleText('x', { color: 'cyan' }), '\u001b[36mx\u001b[0m')
    })
})
