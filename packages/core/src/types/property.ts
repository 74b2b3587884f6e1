/**
 * Resolved property values.
 *
 * WHY: Many values a kernel needs (a library's final file path, the include
 * directories a target exports) are only known once the host build graph has
 * been generated. Such values travel through aggregation and composition as
 * deferred expressions and are only resolved by the renderer.
 *
 * Deferred forms accepted in configuration:
 * - `$<TARGET_FILE:tgt>`
 * - `$<TARGET_PROPERTY:tgt,PROPERTY>`
 */

/** An expression the host build graph resolves at generation time */
export type DeferredExpression =
  | { kind: 'target-file'; target: string }
  | { kind: 'target-property'; target: string; property: string }

/** A value that is either known now or resolved later */
export type ResolvedProperty =
  | { kind: 'literal'; value: string }
  | { kind: 'deferred'; expression: DeferredExpression }

/**
 * Resolves deferred expressions to lists of values.
 * Unset properties resolve to an empty list.
 */
export interface PropertyResolver {
  resolve(expression: DeferredExpression): string[]
}

const TARGET_FILE_PATTERN = /^\$<TARGET_FILE:([^,<>$\s]+)>$/
const TARGET_PROPERTY_PATTERN = /^\$<TARGET_PROPERTY:([^,<>$\s]+),([A-Za-z0-9_]+)>$/

export function literal(value: string): ResolvedProperty {
  return { kind: 'literal', value }
}

export function deferred(expression: DeferredExpression): ResolvedProperty {
  return { kind: 'deferred', expression }
}

export function targetFile(target: string): ResolvedProperty {
  return deferred({ kind: 'target-file', target })
}

export function targetProperty(target: string, property: string): ResolvedProperty {
  return deferred({ kind: 'target-property', target, property })
}

/**
 * Parse a configured string into a property value.
 * Only the exact deferred forms are recognized; everything else is literal.
 */
export function parsePropertyValue(raw: string): ResolvedProperty {
  const fileMatch = TARGET_FILE_PATTERN.exec(raw)
  if (fileMatch?.[1]) {
    return targetFile(fileMatch[1])
  }

  const propertyMatch = TARGET_PROPERTY_PATTERN.exec(raw)
  if (propertyMatch?.[1] && propertyMatch[2]) {
    return targetProperty(propertyMatch[1], propertyMatch[2])
  }

  return literal(raw)
}

export function formatExpression(expression: DeferredExpression): string {
  switch (expression.kind) {
    case 'target-file':
      return `$<TARGET_FILE:${expression.target}>`
    case 'target-property':
      return `$<TARGET_PROPERTY:${expression.target},${expression.property}>`
  }
}

/**
 * Render a property in placeholder form without resolving it.
 */
export function formatProperty(property: ResolvedProperty): string {
  return property.kind === 'literal' ? property.value : formatExpression(property.expression)
}

/**
 * Resolve a property to the list of non-empty values it stands for.
 *
 * Deferred lists are joined and split again so that an unset property
 * contributes no entries instead of one empty entry.
 */
export function resolveProperty(property: ResolvedProperty, resolver: PropertyResolver): string[] {
  const values =
    property.kind === 'literal' ? [property.value] : resolver.resolve(property.expression)
  return values
    .join(';')
    .split(';')
    .filter((value) => value.length > 0)
}
