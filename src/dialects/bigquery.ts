/**
 * BigQuery dialect
 */

import {
  Dialect,
  type DialectCapabilities,
  type TargetFunctionRule,
} from "../dialect.js"
import * as exp from "../expressions.js"
import { Generator } from "../generator.js"
import { libraryOperator } from "../rel/library-operators.js"
import type { SqlType } from "../rel/types.js"

export class BigQueryGenerator extends Generator {
  static override IDENTIFIER_START = "`"
  static override IDENTIFIER_END = "`"
  static override STRING_ESCAPE = "\\"

  static override FEATURES = {
    ...Generator.FEATURES,
    NULL_ORDERING_SUPPORTED: true,
    LIMIT_FETCH: "LIMIT" as const,
  }

  static override TYPE_MAPPING: Map<string, string> = new Map([
    ...Generator.TYPE_MAPPING,
    ["TINYINT", "INT64"],
    ["SMALLINT", "INT64"],
    ["INTEGER", "INT64"],
    ["BIGINT", "INT64"],
    ["DECIMAL", "NUMERIC"],
    ["FLOAT", "FLOAT64"],
    ["REAL", "FLOAT64"],
    ["DOUBLE", "FLOAT64"],
    ["BOOLEAN", "BOOL"],
    ["CHAR", "STRING"],
    ["VARCHAR", "STRING"],
    ["BINARY", "BYTES"],
    ["VARBINARY", "BYTES"],
    ["TIMESTAMP", "DATETIME"],
    ["TIMESTAMP WITH LOCAL TIME ZONE", "TIMESTAMP"],
  ])

  /** `INTERVAL 1 DAY`: the quantity is a plain integer when it can be. */
  protected override interval_sql(expression: exp.Interval): string {
    const quantity = expression.arg("this")
    if (
      quantity instanceof exp.Literal &&
      quantity.isString &&
      /^\d+$/.test(quantity.value)
    ) {
      const sign = expression.args.negative === true ? "-" : ""
      return `INTERVAL ${sign}${quantity.value} ${this.sql(expression, "unit")}`
    }
    return super.interval_sql(expression)
  }
}

export class BigQueryDialect extends Dialect {
  static override readonly dialectName = "bigquery"

  static override CAPABILITIES: DialectCapabilities = {
    ...Dialect.CAPABILITIES,
    supportsQualify: true,
    supportsAggregateFilter: false,
    supportsNestedAggregations: false,
    supportsNestedAnalyticalFunctions: false,
    supportsAnalyticalFunctionInAggregate: false,
    supportsAliasedValues: false,
    groupByAlias: true,
    havingAlias: true,
    nullCollation: "low",
    library: "BIG_QUERY",
  }

  static override TARGET_FUNCTIONS: readonly TargetFunctionRule[] = [
    { kind: "PLUS", left: "DATE", right: "INTERVAL", operator: libraryOperator("DATE_ADD") },
    { kind: "MINUS", left: "DATE", right: "INTERVAL", operator: libraryOperator("DATE_SUB") },
    {
      kind: "PLUS",
      left: "TIMESTAMP",
      right: "INTERVAL",
      operator: libraryOperator("TIMESTAMP_ADD"),
    },
    {
      kind: "MINUS",
      left: "TIMESTAMP",
      right: "INTERVAL",
      operator: libraryOperator("TIMESTAMP_SUB"),
    },
  ]

  protected static override GeneratorClass = BigQueryGenerator

  // STRING and BYTES take no length in a CAST
  override typeSpec(type: SqlType): exp.DataType {
    switch (type.name) {
      case "CHAR":
      case "VARCHAR":
      case "BINARY":
      case "VARBINARY":
        return exp.DataType.build(type.name)
      default:
        return super.typeSpec(type)
    }
  }

  override timestampLiteral(value: string, precision: number): exp.Expression {
    return super.timestampLiteral(value, Math.min(precision, 6))
  }
}

Dialect.register(BigQueryDialect)
