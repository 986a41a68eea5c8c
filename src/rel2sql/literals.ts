/**
 * Literal translation
 */

import { type Dialect, withPrecision } from "../dialect.js"
import { ContractError } from "../errors.js"
import * as exp from "../expressions.js"
import type { RexLiteral } from "../rel/rex.js"

export function literalToSql(dialect: Dialect, literal: RexLiteral): exp.Expression {
  const { value, type } = literal
  switch (value.family) {
    case "null":
      return new exp.Null()
    case "character":
      return exp.Literal.string(value.value)
    case "exact":
    case "approx":
      return exp.Literal.number(value.value)
    case "boolean":
      return exp.Boolean.of(value.value)
    case "interval":
      return new exp.Interval({
        this: exp.Literal.string(value.value),
        unit: new exp.Var({ this: value.qualifier }),
        negative: value.negative,
      })
    case "date":
      return dialect.dateLiteral(value.value)
    case "time":
      return dialect.timeLiteral(value.value, type.precision ?? 0)
    case "timestamp":
      if (type.name === "TIMESTAMP_WITH_LOCAL_TIME_ZONE") {
        return new exp.TypedLiteral({
          this: exp.Literal.string(withPrecision(value.value, type.precision ?? 0)),
          kind: "TIMESTAMP",
        })
      }
      return dialect.timestampLiteral(value.value, type.precision ?? 0)
    case "binary":
      return new exp.HexString({ this: value.value })
    case "symbol":
      return new exp.Var({ this: value.value })
    case "row":
      return new exp.Anonymous({
        this: "ROW",
        expressions: value.values.map((v) => literalToSql(dialect, v)),
      })
    case "sarg":
      throw new ContractError("A search argument is only valid inside SEARCH")
  }
}
