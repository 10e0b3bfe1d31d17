import { readFileSync } from 'node:fs'
import { dirname, join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { describe, expect, it } from 'vitest'

const rootDir = join(dirname(fileURLToPath(import.meta.url)), '..')

function readJson(relativePath: string): unknown {
  return JSON.parse(readFileSync(join(rootDir, relativePath), 'utf8'))
}

describe('build layout', () => {
  it('points the installed core package at compiled output for runtime imports', () => {
    expect(readJson('packages/core/package.json')).toMatchObject({
      exports: { '.': { types: './src/index.ts', import: './dist/index.js' } },
      scripts: { build: 'tsc -p tsconfig.json' },
    })
    expect(readJson('packages/core/tsconfig.json')).toMatchObject({
      compilerOptions: { rootDir: 'src', outDir: 'dist', declaration: true },
    })
  })

  it('builds the core before the CLI and emits the bin where package.json names it', () => {
    expect(readJson('package.json')).toMatchObject({
      bin: { clipsift: 'dist/cli.js' },
      scripts: { build: 'tsc -p packages/core/tsconfig.json && tsc -p tsconfig.build.json' },
    })
    expect(readJson('tsconfig.build.json')).toMatchObject({
      compilerOptions: {
        rootDir: 'src',
        outDir: 'dist',
        paths: { '@clipsift/core': ['./packages/core/dist/index.d.ts'] },
      },
      include: ['src/**/*.ts'],
    })
  })
})
