/**
 * C++ language standard levels.
 *
 * WHY: The interpreter only understands a subset of the standards a build
 * target may declare. Targets are compared by release order, not by number
 * (C++98 predates C++11).
 */

/** Every standard a build target may declare, in release order */
export const CXX_STANDARDS = [98, 11, 14, 17, 20, 23] as const

/** A standard level a build target may declare */
export type CxxStandard = (typeof CXX_STANDARDS)[number]

/** Standards the interpreter can run a session with */
export const CLING_STANDARDS = [11, 14, 17] as const

/** A standard level a kernel session may be generated for */
export type ClingStandard = (typeof CLING_STANDARDS)[number]

/** Session standard when none is configured */
export const DEFAULT_CXX_STANDARD: ClingStandard = 17

const STANDARD_PATTERN = /^(?:c\+\+)?(\d{2})$/i

export function isCxxStandard(value: number): value is CxxStandard {
  switch (value) {
    case 98:
    case 11:
    case 14:
    case 17:
    case 20:
    case 23:
      return true
    default:
      return false
  }
}

export function isClingStandard(value: CxxStandard): value is ClingStandard {
  switch (value) {
    case 11:
    case 14:
    case 17:
      return true
    case 98:
    case 20:
    case 23:
      return false
  }
}

/**
 * Position of a standard in release order.
 */
export function standardRank(value: CxxStandard): number {
  switch (value) {
    case 98:
      return 0
    case 11:
      return 1
    case 14:
      return 2
    case 17:
      return 3
    case 20:
      return 4
    case 23:
      return 5
  }
}

/**
 * True when `required` is a strictly newer standard than `available`.
 */
export function isNewerStandard(required: CxxStandard, available: CxxStandard): boolean {
  return standardRank(required) > standardRank(available)
}

/**
 * Read a standard level from a number, a numeric string or a `c++NN` string.
 * Returns undefined when the value does not name a C++ standard.
 */
export function parseCxxStandard(value: number | string): CxxStandard | undefined {
  let numeric: number
  if (typeof value === 'number') {
    numeric = value
  } else {
    const match = STANDARD_PATTERN.exec(value.trim())
    if (!match?.[1]) {
      return undefined
    }
    numeric = Number(match[1])
  }
  return isCxxStandard(numeric) ? numeric : undefined
}
