import { describe, expect, test } from 'vitest'

import { type KernelSetupOptions, asTargetRef, deriveKernelId } from '@cling-kernel-setup/core'

import { collectTargetProperties, createSessionRequest } from './collect.js'
import { type ComposedArtifacts, composeArtifacts } from './compose.js'
import { StaticBuildGraph } from './graph.js'
import {
  formatHeaderTemplate,
  formatManifestTemplate,
  renderHeader,
  renderManifest,
  serializeManifest,
} from './render.js'

const graph = new StaticBuildGraph([
  {
    name: asTargetRef('adder'),
    kind: 'shared-library',
    file: '/work/build/libadder.so',
    properties: {
      INTERFACE_INCLUDE_DIRECTORIES: ['/work/include'],
      INTERFACE_COMPILE_DEFINITIONS: ['ADDER_API=1'],
    },
  },
  {
    name: asTargetRef('carry'),
    kind: 'shared-library',
    file: '/work/build/libcarry.so',
    properties: {},
  },
])

function compose(options: KernelSetupOptions): ComposedArtifacts {
  const request = collectTargetProperties(
    createSessionRequest(options, {
      projectName: 'adder',
      sourceDir: '/work',
      binaryDir: '/work/build',
    }),
    graph
  )
  return composeArtifacts(request, { interpreterPath: '/opt/xeus/bin/xcpp' })
}

const options: KernelSetupOptions = {
  targets: ['adder'],
  includeDirectories: ['/opt/include'],
  compileDefinitions: ['NDEBUG'],
  setupHeaders: ['adder.hh'],
}

describe('renderHeader', () => {
  test('writes one directive per resolved value', () => {
    const { header } = compose(options)

    expect(header.path).toBe('/work/build/xeus_cling.hh')
    expect(renderHeader(header, graph)).toBe(
      [
        '#pragma cling add_include_path("/opt/include")',
        '#pragma cling add_include_path("/work/include")',
        '#pragma cling load("/work/build/libadder.so")',
        '#include<adder.hh>',
        '',
      ].join('\n')
    )
  })

  test('library directories come before loads', () => {
    const { header } = compose({ libraryDirectories: ['/opt/lib'], linkLibraries: ['m'] })
    expect(renderHeader(header, graph)).toBe(
      '#pragma cling add_library_path("/opt/lib")\n#pragma cling load("m")\n'
    )
  })

  test('a target without include directories adds no include path', () => {
    const { header } = compose({ targets: ['carry'] })
    expect(renderHeader(header, graph)).toBe('#pragma cling load("/work/build/libcarry.so")\n')
  })

  test('an empty request renders an empty header', () => {
    expect(renderHeader(compose({}).header, graph)).toBe('')
  })

  test('the template keeps deferred values as placeholders', () => {
    expect(formatHeaderTemplate(compose({ targets: ['adder'] }).header)).toBe(
      [
        '#pragma cling add_include_path("$<TARGET_PROPERTY:adder,INTERFACE_INCLUDE_DIRECTORIES>")',
        '#pragma cling load("$<TARGET_FILE:adder>")',
        '',
      ].join('\n')
    )
  })
})

describe('renderManifest', () => {
  test('builds the interpreter command line', () => {
    const { manifest, displayName, kernelId } = compose(options)

    expect(displayName).toBe('C++17 (adder)')
    expect(kernelId).toBe(deriveKernelId('C++17 (adder)'))
    expect(manifest.path).toBe('/work/build/kernel.json')
    expect(renderManifest(manifest, graph)).toEqual({
      display_name: 'C++17 (adder)',
      argv: [
        '/opt/xeus/bin/xcpp',
        '-f',
        '{connection_file}',
        '-std=c++17',
        '-DNDEBUG',
        '-DADDER_API=1',
        '-include',
        '/work/build/xeus_cling.hh',
      ],
      language: 'C++17',
    })
  })

  test('unset target compile options add no arguments', () => {
    const rendered = renderManifest(compose({ targets: ['adder'], cxxStandard: 14 }).manifest, graph)
    expect(rendered.argv).toEqual([
      '/opt/xeus/bin/xcpp',
      '-f',
      '{connection_file}',
      '-std=c++14',
      '-DADDER_API=1',
      '-include',
      '/work/build/xeus_cling.hh',
    ])
    expect(rendered.language).toBe('C++14')
  })

  test('compile flags are passed as given', () => {
    const rendered = renderManifest(compose({ compileFlags: ['-O2', '-fno-rtti'] }).manifest, graph)
    expect(rendered.argv.slice(4, 6)).toEqual(['-O2', '-fno-rtti'])
  })

  test('a kernel name replaces the default display name', () => {
    const composed = compose({ kernelName: 'Adder' })
    expect(composed.displayName).toBe('Adder')
    expect(composed.kernelId).toBe(deriveKernelId('Adder'))
    expect(renderManifest(composed.manifest, graph).display_name).toBe('Adder')
  })

  test('an empty kernel name falls back to the default display name', () => {
    const composed = compose({ kernelName: '' })
    expect(composed.displayName).toBe('C++17 (adder)')
    expect(composed.kernelId).toBe(deriveKernelId('C++17 (adder)'))
  })

  test.each([11, 14, 17])('C++%i sets the flag, language and default name', (level) => {
    const rendered = renderManifest(compose({ cxxStandard: level }).manifest, graph)
    expect(rendered.argv[3]).toBe(`-std=c++${level}`)
    expect(rendered.language).toBe(`C++${level}`)
    expect(rendered.display_name).toBe(`C++${level} (adder)`)
  })

  test('the template keeps deferred flags as placeholders', () => {
    const template = formatManifestTemplate(compose({ targets: ['adder'] }).manifest)
    expect(template.argv.slice(4, 6)).toEqual([
      '$<TARGET_PROPERTY:adder,INTERFACE_COMPILE_OPTIONS>',
      '-D$<TARGET_PROPERTY:adder,INTERFACE_COMPILE_DEFINITIONS>',
    ])
  })

  test('serializes as indented JSON with a trailing newline', () => {
    const manifest = { display_name: 'Adder', argv: ['xcpp'], language: 'C++17' }
    expect(serializeManifest(manifest)).toBe(
      '{\n  "display_name": "Adder",\n  "argv": [\n    "xcpp"\n  ],\n  "language": "C++17"\n}\n'
    )
  })
})
