import assert from 'node:assert'
import { describe, test } from 'vitest'
import { DEFAULT_CONFIG, parseVtlineConfig, type CompletionCapability, type HintCapability } from '@vtline/core'
import { COMMAND_HELP, createHintTable, createWordCompleter, providersFromConfig } from './providers'

function complete(capability: CompletionCapability, line: string): readonly string[] {
    assert.strictEqual(capability.type, 'provider')
    return capability.type === 'provider' ? capability.complete(line) : []
}

function hint(capability: HintCapability, line: string) {
    assert.strictEqual(capability.type, 'provider')
    return capability.type === 'provider' ? capability.hint(line) : null
}

describe('createWordCompleter', () => {
    test('offers words starting with the line, once each', () => {
        const completer = createWordCompleter(['history', 'help', 'exit', 'help'])
        assert.deepStrictEqual(complete(completer, 'h'), ['history', 'help'])
        assert.deepStrictEqual(complete(completer, 'x'), [])
    })

    test('is absent without words', () => {
        assert.deepStrictEqual(createWordCompleter([]), { type: 'none' })
    })
})

describe('createHintTable', () => {
    test('hints only on an exact key match', () => {
        const table = createHintTable({ hel: 'p', hist: 'ory' }, { color: 'cyan' })
        assert.deepStrictEqual(hint(table, 'hel'), { text: 'p', style: { color: 'cyan' } })
        assert.strictEqual(hint(table, 'he'), null)
    })
})

describe('providersFromConfig', () => {
    test('turns off every capability with the default config', () => {
        const providers = providersFromConfig(DEFAULT_CONFIG)
        assert.strictEqual(providers.completion.type, 'none')
        assert.strictEqual(providers.hint.type, 'none')
        assert.strictEqual(providers.help.type, 'none')
        assert.deepStrictEqual(providers.helpEntries, COMMAND_HELP)
    })

    test('appends configured help after the shell commands', () => {
        const config = parseVtlineConfig({ help: [{ key: 'Ctrl-L', description: 'clear screen' }] })
        const providers = providersFromConfig(config)
        assert.deepStrictEqual(providers.helpEntries.at(-1), ['Ctrl-L', 'clear screen'])
        assert.strictEqual(providers.help.type, 'provider')
        if (providers.help.type === 'provider') {
            assert.deepStrictEqual(providers.help.help(''), [['Ctrl-L', 'clear screen']])
        }
    })
})
