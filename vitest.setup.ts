import { mkdtempSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

if (!process.env.VTLINE_HOME) {
    process.env.VTLINE_HOME = mkdtempSync(join(tmpdir(), 'vtline-test-'))
}
