import assert from 'node:assert'
import { describe, test } from 'vitest'
import { defaultRuneWidth, promptWidth, runesWidth, wideRuneWidth } from '@vtline/core/render/visual_width'

describe('visual width', () => {
    test('tabs count four columns, everything else one by default', () => {
        assert.strictEqual(runesWidth(['a', '\t', '你'], defaultRuneWidth), 6)
        assert.strictEqual(runesWidth(['a', '\t', '你'], defaultRuneWidth, 1), 1)
    })

    test('wide runes count two columns with the wide table', () => {
        assert.strictEqual(wideRuneWidth('你'), 2)
        assert.strictEqual(wideRuneWidth('a'), 1)
        assert.strictEqual(wideRuneWidth('\t'), 4)
    })

    test('prompt width skips escape sequences', () => {
        assert.strictEqual(promptWidth('> '), 2)
        assert.strictEqual(promptWidth('\u001b[1;32m>>\u001b[0m '), 3)
    })
})
