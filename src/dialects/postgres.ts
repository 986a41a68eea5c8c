/**
 * PostgreSQL dialect
 */

import { Dialect, type DialectCapabilities } from "../dialect.js"
import * as exp from "../expressions.js"
import { Generator } from "../generator.js"

export class PostgresGenerator extends Generator {
  static override FEATURES = {
    ...Generator.FEATURES,
    LIMIT_FETCH: "LIMIT" as const,
  }

  static override TYPE_MAPPING: Map<string, string> = new Map([
    ...Generator.TYPE_MAPPING,
    ["TINYINT", "SMALLINT"],
    ["FLOAT", "REAL"],
    ["DOUBLE", "DOUBLE PRECISION"],
    ["BINARY", "BYTEA"],
    ["VARBINARY", "BYTEA"],
    ["TIMESTAMP WITH LOCAL TIME ZONE", "TIMESTAMPTZ"],
  ])
}

export class PostgresDialect extends Dialect {
  static override readonly dialectName = "postgres"

  static override CAPABILITIES: DialectCapabilities = {
    ...Dialect.CAPABILITIES,
    supportsNestedAggregations: false,
    requiresAliasForFromItems: true,
    nullCollation: "high",
    library: "POSTGRESQL",
  }

  protected static override GeneratorClass = PostgresGenerator

  override timestampLiteral(value: string, precision: number): exp.Expression {
    // Postgres keeps at most microseconds
    return super.timestampLiteral(value, Math.min(precision, 6))
  }
}

Dialect.register(PostgresDialect)
