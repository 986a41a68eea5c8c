/**
 * Range sets and search arguments ("Sarg"): a column predicate expressed
 * as a union of disjoint intervals, optionally admitting NULL
 */

import { ContractError } from "../errors.js"

export type SargValue = string | number | bigint | boolean

export interface Bound {
  readonly value: SargValue
  readonly closed: boolean
}

/** An interval; a missing bound is unbounded on that side. */
export interface Range {
  readonly lower?: Bound
  readonly upper?: Bound
}

export type RangeKind =
  | "all"
  | "atLeast"
  | "atMost"
  | "greaterThan"
  | "lessThan"
  | "singleton"
  | "closed"
  | "closedOpen"
  | "openClosed"
  | "open"

export function compareValues(a: SargValue, b: SargValue): number {
  if (typeof a === "string" && typeof b === "string") {
    return a < b ? -1 : a > b ? 1 : 0
  }
  if (typeof a === "boolean" && typeof b === "boolean") {
    return Number(a) - Number(b)
  }
  if (
    (typeof a === "number" || typeof a === "bigint") &&
    (typeof b === "number" || typeof b === "bigint")
  ) {
    return a < b ? -1 : a > b ? 1 : 0
  }
  throw new ContractError(`Cannot compare ${typeof a} with ${typeof b}`)
}

export const Ranges = {
  all(): Range {
    return {}
  },
  atLeast(value: SargValue): Range {
    return { lower: { value, closed: true } }
  },
  atMost(value: SargValue): Range {
    return { upper: { value, closed: true } }
  },
  greaterThan(value: SargValue): Range {
    return { lower: { value, closed: false } }
  },
  lessThan(value: SargValue): Range {
    return { upper: { value, closed: false } }
  },
  singleton(value: SargValue): Range {
    return { lower: { value, closed: true }, upper: { value, closed: true } }
  },
  closed(lower: SargValue, upper: SargValue): Range {
    return {
      lower: { value: lower, closed: true },
      upper: { value: upper, closed: true },
    }
  },
  closedOpen(lower: SargValue, upper: SargValue): Range {
    return {
      lower: { value: lower, closed: true },
      upper: { value: upper, closed: false },
    }
  },
  openClosed(lower: SargValue, upper: SargValue): Range {
    return {
      lower: { value: lower, closed: false },
      upper: { value: upper, closed: true },
    }
  },
  open(lower: SargValue, upper: SargValue): Range {
    return {
      lower: { value: lower, closed: false },
      upper: { value: upper, closed: false },
    }
  },
}

export function classify(range: Range): RangeKind {
  const { lower, upper } = range
  if (!lower && !upper) return "all"
  if (!upper) return lower?.closed ? "atLeast" : "greaterThan"
  if (!lower) return upper.closed ? "atMost" : "lessThan"
  if (lower.closed && upper.closed) {
    return compareValues(lower.value, upper.value) === 0
      ? "singleton"
      : "closed"
  }
  if (lower.closed) return "closedOpen"
  if (upper.closed) return "openClosed"
  return "open"
}

function isEmpty(range: Range): boolean {
  const { lower, upper } = range
  if (!lower || !upper) return false
  const cmp = compareValues(lower.value, upper.value)
  return cmp > 0 || (cmp === 0 && !(lower.closed && upper.closed))
}

// Unbounded sorts first; at equal values a closed lower bound starts earlier
function compareLower(a: Range, b: Range): number {
  if (!a.lower) return b.lower ? -1 : 0
  if (!b.lower) return 1
  const cmp = compareValues(a.lower.value, b.lower.value)
  if (cmp !== 0) return cmp
  return Number(!a.lower.closed) - Number(!b.lower.closed)
}

// True when `next` starts inside or right at the end of `range`
function connected(range: Range, next: Range): boolean {
  if (!range.upper || !next.lower) return true
  const cmp = compareValues(range.upper.value, next.lower.value)
  return cmp > 0 || (cmp === 0 && (range.upper.closed || next.lower.closed))
}

function maxUpper(a: Bound | undefined, b: Bound | undefined): Bound | undefined {
  if (!a || !b) return undefined
  const cmp = compareValues(a.value, b.value)
  if (cmp !== 0) return cmp > 0 ? a : b
  return { value: a.value, closed: a.closed || b.closed }
}

/** A normalized, sorted list of disjoint, non-empty ranges. */
export class RangeSet {
  readonly ranges: readonly Range[]

  constructor(ranges: readonly Range[]) {
    const sorted = ranges.filter((r) => !isEmpty(r)).sort(compareLower)
    const merged: Range[] = []
    for (const range of sorted) {
      const last = merged.at(-1)
      if (last && connected(last, range)) {
        merged[merged.length - 1] = {
          lower: last.lower,
          upper: maxUpper(last.upper, range.upper),
        }
      } else {
        merged.push(range)
      }
    }
    this.ranges = merged
  }

  static of(...ranges: Range[]): RangeSet {
    return new RangeSet(ranges)
  }

  static ofPoints(values: readonly SargValue[]): RangeSet {
    return new RangeSet(values.map((v) => Ranges.singleton(v)))
  }

  get isEmpty(): boolean {
    return this.ranges.length === 0
  }

  get isAll(): boolean {
    const [first] = this.ranges
    return this.ranges.length === 1 && first !== undefined && classify(first) === "all"
  }

  /** True when every range is a single value. */
  get isPoints(): boolean {
    return this.ranges.every((r) => classify(r) === "singleton")
  }

  get points(): SargValue[] {
    const values: SargValue[] = []
    for (const range of this.ranges) {
      if (classify(range) === "singleton" && range.lower) {
        values.push(range.lower.value)
      }
    }
    return values
  }

  contains(value: SargValue): boolean {
    return this.ranges.some((range) => {
      const { lower, upper } = range
      if (lower) {
        const cmp = compareValues(value, lower.value)
        if (cmp < 0 || (cmp === 0 && !lower.closed)) return false
      }
      if (upper) {
        const cmp = compareValues(value, upper.value)
        if (cmp > 0 || (cmp === 0 && !upper.closed)) return false
      }
      return true
    })
  }
}

/** A search argument: the range set plus whether NULL also matches. */
export interface Sarg {
  readonly rangeSet: RangeSet
  readonly containsNull: boolean
}

export function sargOf(ranges: readonly Range[], containsNull = false): Sarg {
  return { rangeSet: new RangeSet(ranges), containsNull }
}

export function sargOfPoints(
  values: readonly SargValue[],
  containsNull = false,
): Sarg {
  return { rangeSet: RangeSet.ofPoints(values), containsNull }
}
