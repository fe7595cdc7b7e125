import { existsSync, readFileSync, statSync } from 'node:fs'
import { dirname, join, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'

export const PACKAGE_NAME = 'vtline'

const packageInfoSchema = z.object({
    name: z.string().min(1),
    version: z.string().min(1),
})

export type PackageInfo = z.infer<typeof packageInfoSchema>

function resolveStartDir(): string {
    // import.meta.url is not a file URL when bundled into some hosts.
    if (import.meta.url.startsWith('file:')) {
        return dirname(fileURLToPath(import.meta.url))
    }
    const start = resolve(process.argv[1] ?? process.cwd())
    try {
        return statSync(start).isFile() ? dirname(start) : start
    } catch {
        return process.cwd()
    }
}

export function readPackageInfoSync(dir: string): PackageInfo | null {
    const pkgPath = join(dir, 'package.json')
    if (!existsSync(pkgPath)) return null
    try {
        const parsed = packageInfoSchema.safeParse(JSON.parse(readFileSync(pkgPath, 'utf8')))
        return parsed.success ? parsed.data : null
    } catch {
        return null
    }
}

/** Walks up from this module to the root package.json of the project. */
export function findLocalPackageInfoSync(startDir = resolveStartDir()): PackageInfo | null {
    let dir = startDir
    while (true) {
        const info = readPackageInfoSync(dir)
        if (info && info.name === PACKAGE_NAME) {
            return info
        }
        const parent = dirname(dir)
        if (parent === dir) break
        dir = parent
    }
    return null
}
