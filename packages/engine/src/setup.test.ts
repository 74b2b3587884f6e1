import { chmod, mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { afterEach, beforeEach, describe, expect, test } from 'vitest'

import {
  InsecureURLError,
  type KernelSetupOptions,
  MissingAssetError,
  PairingLengthError,
  PrerequisiteMissingError,
  UnsupportedStandardError,
  asTargetRef,
  createRecordingLogger,
  deriveKernelId,
} from '@cling-kernel-setup/core'

import { StaticBuildGraph } from './graph.js'
import { type SetupContext, type SetupResult, setupKernel } from './setup.js'
import type { TagFileFetcher } from './tagfiles.js'

let workDir: string
let sourceDir: string
let binaryDir: string
let xcppPath: string
let fetched: string[]

const fetcher: TagFileFetcher = {
  async fetch(url) {
    fetched.push(url)
    return new TextEncoder().encode('<tagfile/>')
  },
}

function context(overrides: Partial<SetupContext> = {}): SetupContext {
  return {
    projectName: 'adder',
    sourceDir,
    binaryDir,
    graph: new StaticBuildGraph([
      {
        name: asTargetRef('adder'),
        kind: 'shared-library',
        file: join(binaryDir, 'libadder.so'),
        cxxStandard: 14,
        properties: { INTERFACE_INCLUDE_DIRECTORIES: [join(sourceDir, 'include')] },
      },
    ]),
    env: { PATH: '', CKS_XCPP_PATH: xcppPath },
    fetcher,
    logger: createRecordingLogger(),
    ...overrides,
  }
}

function expectGenerated(result: SetupResult) {
  if (result.status !== 'generated') {
    throw new Error(`expected a generated kernel, got ${result.status}`)
  }
  return result.kernel
}

async function listOutput(): Promise<string[]> {
  return readdir(binaryDir).catch(() => [])
}

beforeEach(async () => {
  workDir = await mkdtemp(join(tmpdir(), 'cks-setup-'))
  sourceDir = join(workDir, 'adder')
  binaryDir = join(sourceDir, 'build')
  xcppPath = join(workDir, 'xeus', 'bin', 'xcpp')
  fetched = []

  await mkdir(join(sourceDir, 'assets'), { recursive: true })
  await writeFile(join(sourceDir, 'assets', 'logo-32x32.png'), 'png')
  await mkdir(join(workDir, 'xeus', 'bin'), { recursive: true })
  await writeFile(xcppPath, '')
  await chmod(xcppPath, 0o755)
})

afterEach(async () => {
  await rm(workDir, { recursive: true, force: true })
})

describe('setupKernel', () => {
  test('generates the header and manifest', async () => {
    const kernel = expectGenerated(await setupKernel({ targets: ['adder'] }, context()))

    expect(kernel.displayName).toBe('C++17 (adder)')
    expect(kernel.kernelId).toBe(deriveKernelId('C++17 (adder)'))
    expect(kernel.prefix).toBe(join(workDir, 'xeus'))
    expect(kernel.outputDir).toBe(binaryDir)

    expect(await readFile(join(binaryDir, 'xeus_cling.hh'), 'utf-8')).toBe(
      `#pragma cling add_include_path("${join(sourceDir, 'include')}")\n` +
        `#pragma cling load("${join(binaryDir, 'libadder.so')}")\n`
    )

    const manifest: unknown = JSON.parse(await readFile(join(binaryDir, 'kernel.json'), 'utf-8'))
    expect(manifest).toEqual({
      display_name: 'C++17 (adder)',
      argv: [
        xcppPath,
        '-f',
        '{connection_file}',
        '-std=c++17',
        '-include',
        join(binaryDir, 'xeus_cling.hh'),
      ],
      language: 'C++17',
    })
    expect(kernel.files).toEqual([join(binaryDir, 'xeus_cling.hh'), join(binaryDir, 'kernel.json')])
  })

  test('running twice produces the same files', async () => {
    const options: KernelSetupOptions = {
      targets: ['adder'],
      doxygenUrls: ['https://docs.example.com/adder'],
      doxygenTagfiles: ['adder.tag'],
    }
    const firstKernel = expectGenerated(await setupKernel(options, context()))
    const firstHeader = await readFile(join(binaryDir, 'xeus_cling.hh'), 'utf-8')
    const first = await readFile(join(binaryDir, 'kernel.json'), 'utf-8')
    const firstFragment = await readFile(join(binaryDir, 'adder.tag.json'), 'utf-8')

    const secondKernel = expectGenerated(await setupKernel(options, context()))

    expect(secondKernel.kernelId).toBe(firstKernel.kernelId)
    expect(await readFile(join(binaryDir, 'xeus_cling.hh'), 'utf-8')).toBe(firstHeader)
    expect(await readFile(join(binaryDir, 'kernel.json'), 'utf-8')).toBe(first)
    expect(await readFile(join(binaryDir, 'adder.tag.json'), 'utf-8')).toBe(firstFragment)
    expect((await listOutput()).sort()).toEqual([
      'adder.tag',
      'adder.tag.json',
      'kernel.json',
      'xeus_cling.hh',
    ])
  })

  test('downloads documentation and copies logos', async () => {
    const kernel = expectGenerated(
      await setupKernel(
        {
          doxygenUrls: ['https://docs.example.com/adder'],
          doxygenTagfiles: ['adder.tag'],
          kernelLogoFiles: ['assets/logo-32x32.png'],
        },
        context()
      )
    )

    expect(fetched).toEqual(['https://docs.example.com/adder/adder.tag'])
    expect(kernel.documentation.fragmentFiles).toEqual([join(binaryDir, 'adder.tag.json')])
    expect(kernel.logoFiles).toEqual([join(binaryDir, 'logo-32x32.png')])
    expect(await readFile(join(binaryDir, 'logo-32x32.png'), 'utf-8')).toBe('png')
    expect(JSON.parse(await readFile(join(binaryDir, 'adder.tag.json'), 'utf-8'))).toEqual({
      url: 'https://docs.example.com/adder/',
      tagfile: 'adder.tag',
    })
  })

  test('skips quietly without the interpreter', async () => {
    const logger = createRecordingLogger()
    const result = await setupKernel(
      { targets: ['adder'] },
      context({ env: { PATH: '' }, logger })
    )

    expect(result).toEqual({
      status: 'skipped',
      reason: 'The interpreter xcpp was not found, skipping kernel setup',
    })
    expect(logger.warnings).toEqual([])
    expect(await listOutput()).toEqual([])
  })

  test('fails without the interpreter when required', async () => {
    await expect(
      setupKernel({ targets: ['missing'], required: true }, context({ env: { PATH: '' } }))
    ).rejects.toThrow(PrerequisiteMissingError)
  })

  test('a dry run writes nothing', async () => {
    const result = await setupKernel({ targets: ['adder'] }, context({ dryRun: true }))

    expect(result.status).toBe('planned')
    expect(await listOutput()).toEqual([])
  })

  test('an unsupported standard fails', async () => {
    await expect(setupKernel({ cxxStandard: 20 }, context())).rejects.toThrow(
      UnsupportedStandardError
    )
  })

  test('mismatched documentation lists fail before any download', async () => {
    await expect(
      setupKernel(
        {
          doxygenUrls: ['https://a.example.com/', 'https://b.example.com/'],
          doxygenTagfiles: ['a.tag'],
        },
        context()
      )
    ).rejects.toThrow(PairingLengthError)
    expect(fetched).toEqual([])
    expect(await listOutput()).toEqual([])
  })

  test('an insecure documentation URL leaves no files behind', async () => {
    await expect(
      setupKernel(
        {
          targets: ['adder'],
          doxygenUrls: ['http://docs.example.com/'],
          doxygenTagfiles: ['adder.tag'],
        },
        context()
      )
    ).rejects.toThrow(InsecureURLError)
    expect(await listOutput()).toEqual([])
  })

  test('a missing logo file fails before anything is written', async () => {
    await expect(
      setupKernel({ kernelLogoFiles: ['assets/logo-64x64.png'] }, context())
    ).rejects.toThrow(MissingAssetError)
    expect(await listOutput()).toEqual([])
  })
})
