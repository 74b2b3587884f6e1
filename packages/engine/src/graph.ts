/**
 * StaticBuildGraph - BuildGraph backed by an exported target table.
 *
 * WHY: The host build system hands over a snapshot of its targets
 * (build-graph.toml). This class answers target lookups and resolves
 * deferred expressions against that snapshot the way the host would:
 * `INTERFACE_*` properties are collected transitively through
 * `INTERFACE_LINK_LIBRARIES` entries that name other targets.
 */

import {
  type BuildGraph,
  type BuildGraphFile,
  type DeferredExpression,
  type GraphTargetDefinition,
  TARGET_PROPERTIES,
  type TargetInfo,
  type TargetRef,
  UnresolvableExpressionError,
  formatExpression,
  readGraphToml,
} from '@cling-kernel-setup/core'

export class StaticBuildGraph implements BuildGraph {
  private readonly targets: Map<string, GraphTargetDefinition>

  constructor(targets: readonly GraphTargetDefinition[]) {
    this.targets = new Map(targets.map((target) => [target.name, target]))
  }

  static fromFile(file: BuildGraphFile): StaticBuildGraph {
    return new StaticBuildGraph(file.targets)
  }

  static async load(path: string): Promise<StaticBuildGraph> {
    return StaticBuildGraph.fromFile(await readGraphToml(path))
  }

  getTarget(ref: TargetRef): TargetInfo | undefined {
    const target = this.targets.get(ref)
    if (!target) {
      return undefined
    }
    return { name: target.name, kind: target.kind, cxxStandard: target.cxxStandard }
  }

  resolve(expression: DeferredExpression): string[] {
    const target = this.targets.get(expression.target)
    if (!target) {
      throw new UnresolvableExpressionError(
        formatExpression(expression),
        `target ${expression.target} does not exist`
      )
    }

    switch (expression.kind) {
      case 'target-file':
        if (!target.file) {
          throw new UnresolvableExpressionError(
            formatExpression(expression),
            `target ${target.name} has no build artifact`
          )
        }
        return [target.file]
      case 'target-property':
        return this.collectProperty(target, expression.property.toUpperCase())
    }
  }

  /**
   * Own values first, then each linked target's values depth-first.
   * Every target contributes at most once.
   */
  private collectProperty(root: GraphTargetDefinition, property: string): string[] {
    const transitive =
      property.startsWith('INTERFACE_') && property !== TARGET_PROPERTIES.LINK_LIBRARIES
    if (!transitive) {
      return [...(root.properties[property] ?? [])]
    }

    const values: string[] = []
    const visited = new Set<string>()

    const visit = (target: GraphTargetDefinition): void => {
      if (visited.has(target.name)) return
      visited.add(target.name)

      values.push(...(target.properties[property] ?? []))

      for (const dependency of target.properties[TARGET_PROPERTIES.LINK_LIBRARIES] ?? []) {
        const linked = this.targets.get(dependency)
        if (linked) {
          visit(linked)
        }
      }
    }

    visit(root)
    return values
  }
}
