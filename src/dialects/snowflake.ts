/**
 * Snowflake dialect
 */

import { Dialect, type DialectCapabilities } from "../dialect.js"
import { Generator } from "../generator.js"

export class SnowflakeGenerator extends Generator {
  static override FEATURES = {
    ...Generator.FEATURES,
    LIMIT_FETCH: "LIMIT" as const,
  }

  static override TYPE_MAPPING: Map<string, string> = new Map([
    ...Generator.TYPE_MAPPING,
    ["TIMESTAMP WITH LOCAL TIME ZONE", "TIMESTAMP_LTZ"],
    ["TIMESTAMP", "TIMESTAMP_NTZ"],
  ])
}

export class SnowflakeDialect extends Dialect {
  static override readonly dialectName = "snowflake"

  static override CAPABILITIES: DialectCapabilities = {
    ...Dialect.CAPABILITIES,
    supportsQualify: true,
    supportsAggregateFilter: false,
    supportsNestedAggregations: false,
    groupByAlias: true,
    havingAlias: true,
    nullCollation: "high",
    library: "SNOWFLAKE",
  }

  protected static override GeneratorClass = SnowflakeGenerator
}

Dialect.register(SnowflakeDialect)
