/**
 * MySQL dialect
 */

import { Dialect, type DialectCapabilities } from "../dialect.js"
import * as exp from "../expressions.js"
import { Generator } from "../generator.js"
import type { SqlType } from "../rel/types.js"

export class MySQLGenerator extends Generator {
  static override IDENTIFIER_START = "`"
  static override IDENTIFIER_END = "`"
  static override STRING_ESCAPE = "\\"

  static override FEATURES = {
    ...Generator.FEATURES,
    NULL_ORDERING_SUPPORTED: false,
    LIMIT_FETCH: "LIMIT" as const,
  }

  // CAST targets MySQL accepts
  static override TYPE_MAPPING: Map<string, string> = new Map([
    ...Generator.TYPE_MAPPING,
    ["VARCHAR", "CHAR"],
    ["TINYINT", "SIGNED"],
    ["SMALLINT", "SIGNED"],
    ["INTEGER", "SIGNED"],
    ["BIGINT", "SIGNED"],
    ["BOOLEAN", "SIGNED"],
    ["TIMESTAMP", "DATETIME"],
    ["VARBINARY", "BINARY"],
  ])
}

export class MySQLDialect extends Dialect {
  static override readonly dialectName = "mysql"

  static override CAPABILITIES: DialectCapabilities = {
    ...Dialect.CAPABILITIES,
    supportsAggregateFilter: false,
    supportsNestedAggregations: false,
    supportsAliasedValues: false,
    supportsGroupingSets: false,
    requiresAliasForFromItems: true,
    supportsNullsOrdering: false,
    groupByAlias: true,
    havingAlias: true,
    nullCollation: "low",
    library: "MYSQL",
  }

  protected static override GeneratorClass = MySQLGenerator

  override typeSpec(type: SqlType): exp.DataType {
    // Floating point casts need MySQL 8.0.17+, which only names DOUBLE
    if (type.name === "FLOAT" || type.name === "REAL") {
      return exp.DataType.build("DOUBLE")
    }
    return super.typeSpec(type)
  }
}

Dialect.register(MySQLDialect)
