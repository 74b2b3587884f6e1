import { describe, expect, test } from 'vitest'

import { parseGraphToml } from './graph-toml.js'

describe('parseGraphToml', () => {
  test('reads targets and upper-cases property names', () => {
    const graph = parseGraphToml(
      [
        '[targets.adder]',
        'type = "SHARED_LIBRARY"',
        'file = "lib/libadder.so"',
        'cxx_standard = 17',
        'interface_include_directories = ["/src/adder/include"]',
        'interface_link_libraries = "m"',
        '',
        '[targets.tool]',
        'type = "executable"',
      ].join('\n'),
      '/work/build/build-graph.toml'
    )

    expect(graph.path).toBe('/work/build/build-graph.toml')
    expect(graph.targets).toEqual([
      {
        name: 'adder',
        kind: 'shared-library',
        file: '/work/build/lib/libadder.so',
        cxxStandard: 17,
        properties: {
          INTERFACE_INCLUDE_DIRECTORIES: ['/src/adder/include'],
          INTERFACE_LINK_LIBRARIES: ['m'],
        },
      },
      { name: 'tool', kind: 'executable', properties: {} },
    ])
  })

  test('an empty file has no targets', () => {
    expect(parseGraphToml('', '/work/build-graph.toml').targets).toEqual([])
  })

  test('rejects unknown target types', () => {
    expect(() =>
      parseGraphToml('[targets.adder]\ntype = "PLUGIN"\n', '/work/build-graph.toml')
    ).toThrow('targets.adder.type: unknown target type "PLUGIN"')
  })

  test('rejects a missing type', () => {
    expect(() => parseGraphToml('[targets.adder]\nfile = "x"\n', '/work/build-graph.toml')).toThrow(
      'targets.adder.type: missing target type'
    )
  })

  test('rejects an unknown standard', () => {
    expect(() =>
      parseGraphToml(
        '[targets.adder]\ntype = "SHARED_LIBRARY"\ncxx_standard = 16\n',
        '/work/build-graph.toml'
      )
    ).toThrow('targets.adder.cxx_standard: expected a C++ standard level')
  })
})
