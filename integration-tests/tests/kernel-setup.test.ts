/**
 * Integration tests for kernel generation and installation.
 *
 * WHY: Exercises the whole path a build takes: kernel-setup.toml and the
 * build graph export are read from disk, the kernel is generated into a
 * build directory and then installed into a xeus-cling prefix.
 */

import { readFile, readdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'

import { afterEach, beforeEach, describe, expect, test } from 'vitest'

import { generateProject } from '@cling-kernel-setup/cli'
import {
  InsecureURLError,
  UnknownTargetError,
  createRecordingLogger,
  deriveKernelId,
} from '@cling-kernel-setup/core'
import { type GeneratedKernel, type SetupResult, installKernel } from '@cling-kernel-setup/engine'

import {
  ADDER_CONFIG,
  ADDER_GRAPH,
  ADDER_PROJECT_DIR,
  ADDER_TYPO_CONFIG,
  type Workspace,
  cleanupWorkspace,
  createStubFetcher,
  createStubRunner,
  createWorkspace,
} from './setup.js'

let workspace: Workspace

beforeEach(async () => {
  workspace = await createWorkspace()
})

afterEach(async () => {
  await cleanupWorkspace(workspace)
})

function generatedKernel(result: SetupResult): GeneratedKernel {
  if (result.status !== 'generated') {
    throw new Error(`expected a generated kernel, got ${result.status}`)
  }
  return result.kernel
}

describe('generate', () => {
  test('generates the adder kernel from the fixture project', async () => {
    const fetcher = createStubFetcher()
    const kernel = generatedKernel(
      await generateProject(
        { config: ADDER_CONFIG, buildDir: workspace.buildDir, env: workspace.env, fetcher },
        createRecordingLogger()
      )
    )
    const build = workspace.buildDir

    expect(kernel.displayName).toBe('C++17 (adder)')
    expect(kernel.kernelId).toBe(deriveKernelId('C++17 (adder)'))

    expect(await readFile(join(build, 'xeus_cling.hh'), 'utf-8')).toBe(
      [
        '#pragma cling add_include_path("include")',
        '#pragma cling add_include_path("/opt/adder/include")',
        `#pragma cling load("${join(ADDER_PROJECT_DIR, 'graph', 'lib', 'libadder.so')}")`,
        '#include<adder/adder.hh>',
        '',
      ].join('\n')
    )

    expect(JSON.parse(await readFile(join(build, 'kernel.json'), 'utf-8'))).toEqual({
      display_name: 'C++17 (adder)',
      argv: [
        workspace.xcppPath,
        '-f',
        '{connection_file}',
        '-std=c++17',
        '-fno-exceptions',
        '-DADDER_KERNEL',
        '-DCARRY_LOOKAHEAD',
        '-include',
        join(build, 'xeus_cling.hh'),
      ],
      language: 'C++17',
    })

    expect(fetcher.urls).toEqual(['https://docs.example.com/std/std.tag'])
    expect(kernel.documentation.tagFiles).toEqual([
      join(ADDER_PROJECT_DIR, 'docs', 'adder.tag'),
      join(build, 'std.tag'),
    ])
    expect(JSON.parse(await readFile(join(build, 'adder.tag.json'), 'utf-8'))).toEqual({
      url: 'https://docs.example.com/adder/',
      tagfile: 'adder.tag',
    })
    expect((await readdir(build)).sort()).toEqual([
      'adder.tag.json',
      'kernel.json',
      'logo-32x32.png',
      'std.tag',
      'std.tag.json',
      'xeus_cling.hh',
    ])
  })

  test('reports unknown keys as warnings', async () => {
    const logger = createRecordingLogger()

    await generateProject(
      {
        config: ADDER_TYPO_CONFIG,
        buildDir: workspace.buildDir,
        env: workspace.env,
        fetcher: createStubFetcher(),
      },
      logger
    )

    expect(logger.warnings.map((w) => `[${w.code}] ${w.message}`)).toEqual([
      '[W101] Unrecognized option "kernel.include_directorys": this often indicates a typo',
    ])
  })

  test('an insecure URL aborts before anything is written', async () => {
    const config = join(workspace.root, 'kernel-setup.toml')
    await writeFile(
      config,
      [
        '[project]',
        'name = "adder"',
        `graph = ${JSON.stringify(ADDER_GRAPH)}`,
        '',
        '[kernel]',
        'targets = ["adder"]',
        'doxygen_urls = ["http://docs.example.com/adder"]',
        'doxygen_tagfiles = ["adder.tag"]',
      ].join('\n')
    )

    await expect(
      generateProject(
        { config, env: workspace.env, fetcher: createStubFetcher() },
        createRecordingLogger()
      )
    ).rejects.toThrow(InsecureURLError)
    await expect(readdir(workspace.buildDir)).rejects.toThrow()
  })

  test('a target missing from the graph fails', async () => {
    const config = join(workspace.root, 'kernel-setup.toml')
    await writeFile(
      config,
      ['[project]', `graph = ${JSON.stringify(ADDER_GRAPH)}`, '', '[kernel]', 'targets = ["subtract"]'].join(
        '\n'
      )
    )

    await expect(
      generateProject({ config, env: workspace.env }, createRecordingLogger())
    ).rejects.toThrow(UnknownTargetError)
  })
})

describe('install', () => {
  test('installs documentation into the prefix and registers the kernelspec', async () => {
    const kernel = generatedKernel(
      await generateProject(
        {
          config: ADDER_CONFIG,
          buildDir: workspace.buildDir,
          env: workspace.env,
          fetcher: createStubFetcher(),
        },
        createRecordingLogger()
      )
    )
    const runner = createStubRunner()

    const result = await installKernel(kernel, {
      jupyterPath: '/usr/local/bin/jupyter',
      runner,
      logger: createRecordingLogger(),
    })

    expect(kernel.prefix).toBe(workspace.prefix)
    expect((await readdir(join(workspace.prefix, 'etc', 'xeus-cling', 'tags.d'))).sort()).toEqual([
      'adder.tag.json',
      'std.tag.json',
    ])
    expect((await readdir(join(workspace.prefix, 'share', 'xeus-cling', 'tagfiles'))).sort()).toEqual([
      'adder.tag',
      'std.tag',
    ])
    expect(runner.commands).toEqual([
      [
        '/usr/local/bin/jupyter',
        'kernelspec',
        'install',
        workspace.buildDir,
        '--sys-prefix',
        `--name=${kernel.kernelId}`,
      ],
    ])
    expect(result.registration?.registered).toBe(true)
  })
})
