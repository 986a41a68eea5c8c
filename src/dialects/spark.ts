/**
 * Spark SQL dialect
 */

import { Dialect, type DialectCapabilities } from "../dialect.js"
import { Generator } from "../generator.js"

export class SparkGenerator extends Generator {
  static override IDENTIFIER_START = "`"
  static override IDENTIFIER_END = "`"
  static override STRING_ESCAPE = "\\"

  static override FEATURES = {
    ...Generator.FEATURES,
    LIMIT_FETCH: "LIMIT" as const,
  }

  static override TYPE_MAPPING: Map<string, string> = new Map([
    ...Generator.TYPE_MAPPING,
    ["VARCHAR", "STRING"],
    ["INTEGER", "INT"],
    ["VARBINARY", "BINARY"],
  ])
}

export class SparkDialect extends Dialect {
  static override readonly dialectName = "spark"

  static override CAPABILITIES: DialectCapabilities = {
    ...Dialect.CAPABILITIES,
    supportsNestedAggregations: false,
    groupByAlias: true,
    havingAlias: true,
    nullCollation: "low",
    crossJoinStyle: "CROSS",
    library: "SPARK",
  }

  protected static override GeneratorClass = SparkGenerator
}

Dialect.register(SparkDialect)
