/**
 * rel2sql-ts - converts relational algebra trees to SQL for a target dialect
 */

export { Dialect, type DialectCapabilities, type DialectOptions } from "./dialect.js"
export {
  ContractError,
  UnknownDialectError,
  UnsupportedError,
  UnsupportedLevel,
} from "./errors.js"
export { Expression } from "./expressions.js"
export type { GenerateOptions } from "./generator.js"
export { Generator } from "./generator.js"
export { stripTrivialAliases } from "./transforms.js"
export { RelToSqlConverter } from "./rel2sql/converter.js"
export { Result, Builder, SqlImplementor } from "./rel2sql/implementor.js"
export { Clause } from "./rel2sql/clause.js"
export * as rel from "./rel/rel.js"
export * as rex from "./rel/rex.js"
export * as types from "./rel/types.js"
export { RangeSet, Ranges, type Sarg, sargOf, sargOfPoints } from "./rel/range-set.js"
export { SqlStdOperatorTable } from "./rel/operators.js"
export { dialects } from "./dialects/index.js"

import { Dialect } from "./dialect.js"
import { UnsupportedLevel } from "./errors.js"
import { Expression } from "./expressions.js"
import type { GenerateOptions } from "./generator.js"
import type { RelNode } from "./rel/rel.js"
import { RelToSqlConverter } from "./rel2sql/converter.js"
import { stripTrivialAliases } from "./transforms.js"

function toUnsupportedLevel(level: unknown): UnsupportedLevel | undefined {
  return Object.values(UnsupportedLevel).find((l) => l === level)
}

// Initialize Expression.sql() method
Expression.setSqlImpl((expr, options) => {
  const requested = options?.dialect
  const dialect = Dialect.get(
    requested instanceof Dialect || typeof requested === "string" ? requested : undefined,
  )
  const genOptions: GenerateOptions = {}
  if (options?.identify !== undefined) {
    genOptions.identify = options.identify
  }
  const level = toUnsupportedLevel(options?.unsupportedLevel)
  if (level) {
    genOptions.unsupportedLevel = level
  }
  return dialect.generate(expr, genOptions)
})

export interface RelToSqlOptions {
  dialect?: string | Dialect
  /** Drop `AS EXPR$n` aliases from the outermost select lists */
  stripTrivialAliases?: boolean
  /**
   * SQL to write for input fields by name, matched case-insensitively;
   * for columns an enclosing query knows under another name
   */
  fieldMap?: ReadonlyMap<string, Expression>
}

export interface RelToSqlStringOptions extends RelToSqlOptions {
  identify?: boolean
  unsupportedLevel?: UnsupportedLevel
}

/**
 * Convert a relational algebra tree to a SQL statement tree
 */
export function relToSql(rel: RelNode, options: RelToSqlOptions = {}): Expression {
  const dialect = Dialect.get(options.dialect)
  const converter = new RelToSqlConverter(dialect)
  for (const [name, node] of options.fieldMap ?? []) {
    converter.mapField(name, node)
  }
  const statement = converter.visitRoot(rel).asStatement()
  return options.stripTrivialAliases ? stripTrivialAliases(statement) : statement
}

/**
 * Convert a relational algebra tree to SQL text
 */
export function relToSqlString(rel: RelNode, options: RelToSqlStringOptions = {}): string {
  const dialect = Dialect.get(options.dialect)
  const genOptions: GenerateOptions = {}
  if (options.identify !== undefined) {
    genOptions.identify = options.identify
  }
  if (options.unsupportedLevel !== undefined) {
    genOptions.unsupportedLevel = options.unsupportedLevel
  }
  return dialect.generate(relToSql(rel, { ...options, dialect }), genOptions)
}
