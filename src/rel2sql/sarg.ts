/**
 * Expansion of `SEARCH(x, sarg)` into comparisons
 */

import type { Dialect } from "../dialect.js"
import * as exp from "../expressions.js"
import { makeLiteral } from "../rel/rex.js"
import { classify, type Range, type Sarg, type SargValue } from "../rel/range-set.js"
import type { SqlType } from "../rel/types.js"
import { literalToSql } from "./literals.js"

type Comparison = typeof exp.EQ | typeof exp.GT | typeof exp.GTE | typeof exp.LT | typeof exp.LTE

/**
 * `operand` tested against every range of `sarg`, OR-ed together: a point
 * set becomes `=` or `IN`, other ranges become one or two comparisons, and
 * a sarg admitting NULL adds `IS NULL`. An empty sarg is `FALSE`.
 */
export function sargToSql(
  dialect: Dialect,
  operand: exp.Expression,
  sarg: Sarg,
  type: SqlType,
): exp.Expression {
  const literal = (value: SargValue) => literalToSql(dialect, makeLiteral(value, type))
  const compare = (ctor: Comparison, value: SargValue) =>
    new ctor({ this: operand.copy(), expression: literal(value) })

  const terms: exp.Expression[] = []
  if (sarg.containsNull) {
    terms.push(new exp.Is({ this: operand.copy(), expression: new exp.Null() }))
  }

  const { rangeSet } = sarg
  if (rangeSet.isPoints) {
    const points = rangeSet.points
    const [point] = points
    if (points.length === 1 && point !== undefined) {
      terms.push(compare(exp.EQ, point))
    } else if (points.length > 1) {
      terms.push(new exp.In({ this: operand.copy(), expressions: points.map(literal) }))
    }
  } else {
    for (const range of rangeSet.ranges) {
      terms.push(rangeToSql(range, compare))
    }
  }
  return exp.or(...terms)
}

function rangeToSql(
  range: Range,
  compare: (ctor: Comparison, value: SargValue) => exp.Expression,
): exp.Expression {
  const { lower, upper } = range
  const kind = classify(range)
  if (kind === "all") return exp.Boolean.of(true)
  if (kind === "singleton" && lower) return compare(exp.EQ, lower.value)
  const terms: exp.Expression[] = []
  if (lower) terms.push(compare(lower.closed ? exp.GTE : exp.GT, lower.value))
  if (upper) terms.push(compare(upper.closed ? exp.LTE : exp.LT, upper.value))
  return exp.and(...terms)
}
