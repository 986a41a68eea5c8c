/**
 * Dialect system: capability descriptors, literal and operator factories,
 * and the registry of target dialects
 */

import { UnknownDialectError, UnsupportedError } from "./errors.js"
import * as exp from "./expressions.js"
import { type GenerateOptions, Generator } from "./generator.js"
import { substitute } from "./rel/library-operators.js"
import type { SqlKind, SqlLibrary, SqlOperator } from "./rel/operators.js"
import { isSqlLibrary } from "./rel/operators.js"
import type { Direction, NullDirection, RexCall } from "./rel/rex.js"
import {
  isCharacter,
  type SqlType,
  type TypeFamily,
  typeFamily,
} from "./rel/types.js"

/** Where NULL sorts relative to other values when no NULLS clause is given. */
export type NullCollation = "high" | "low" | "first" | "last"

export type CrossJoinStyle = "CROSS" | "COMMA"

export interface DialectCapabilities {
  supportsQualify: boolean
  supportsAggregateFilter: boolean
  supportsNestedAggregations: boolean
  /** Aggregate expressions may appear in GROUP BY */
  supportsAggInGroupBy: boolean
  supportsNestedAnalyticalFunctions: boolean
  supportsAnalyticalFunctionInAggregate: boolean
  /** `(VALUES …) AS t (c1, c2)` is accepted as a FROM item */
  supportsAliasedValues: boolean
  supportsGroupingSets: boolean
  requiresAliasForFromItems: boolean
  /** `FROM emp` may be referenced as `emp.col` */
  hasImplicitTableAlias: boolean
  supportsIdenticalTableAndColumnName: boolean
  supportsImplicitTypeCoercion: boolean
  supportsNullsOrdering: boolean
  /** GROUP BY may reference select-list aliases */
  groupByAlias: boolean
  /** HAVING may reference select-list aliases */
  havingAlias: boolean
  /** ORDER BY may reference select-list aliases */
  sortByAlias: boolean
  nullCollation: NullCollation
  crossJoinStyle: CrossJoinStyle
  library: SqlLibrary
}

type BooleanCapability = {
  [K in keyof DialectCapabilities]: DialectCapabilities[K] extends boolean
    ? K
    : never
}[keyof DialectCapabilities]

const BOOLEAN_CAPABILITIES: readonly BooleanCapability[] = [
  "supportsQualify",
  "supportsAggregateFilter",
  "supportsNestedAggregations",
  "supportsAggInGroupBy",
  "supportsNestedAnalyticalFunctions",
  "supportsAnalyticalFunctionInAggregate",
  "supportsAliasedValues",
  "supportsGroupingSets",
  "requiresAliasForFromItems",
  "hasImplicitTableAlias",
  "supportsIdenticalTableAndColumnName",
  "supportsImplicitTypeCoercion",
  "supportsNullsOrdering",
  "groupByAlias",
  "havingAlias",
  "sortByAlias",
]

export const DEFAULT_CAPABILITIES: DialectCapabilities = {
  supportsQualify: false,
  supportsAggregateFilter: true,
  supportsNestedAggregations: true,
  supportsAggInGroupBy: true,
  supportsNestedAnalyticalFunctions: true,
  supportsAnalyticalFunctionInAggregate: true,
  supportsAliasedValues: true,
  supportsGroupingSets: true,
  requiresAliasForFromItems: false,
  hasImplicitTableAlias: true,
  supportsIdenticalTableAndColumnName: true,
  supportsImplicitTypeCoercion: true,
  supportsNullsOrdering: true,
  groupByAlias: false,
  havingAlias: false,
  sortByAlias: true,
  nullCollation: "high",
  crossJoinStyle: "CROSS",
  library: "STANDARD",
}

/**
 * Replaces `PLUS`/`MINUS` by a named function when the operand type
 * families match, e.g. `DATE + INTERVAL` → `DATE_ADD(d, i)`.
 */
export interface TargetFunctionRule {
  readonly kind: Extract<SqlKind, "PLUS" | "MINUS">
  readonly left: TypeFamily
  readonly right: TypeFamily
  readonly operator: SqlOperator
}

export interface DialectOptions {
  generator?: GenerateOptions
  capabilities?: Partial<DialectCapabilities>
}

const NULL_COLLATIONS: readonly NullCollation[] = ["high", "low", "first", "last"]
const CROSS_JOIN_STYLES: readonly CrossJoinStyle[] = ["CROSS", "COMMA"]

function parseSetting(key: string, value: string): Partial<DialectCapabilities> {
  const setting: Partial<DialectCapabilities> = {}
  const booleanKey = BOOLEAN_CAPABILITIES.find((k) => k === key)
  if (booleanKey && (value === "true" || value === "false")) {
    setting[booleanKey] = value === "true"
    return setting
  }
  const nullCollation = NULL_COLLATIONS.find((c) => c === value)
  if (key === "nullCollation" && nullCollation) {
    setting.nullCollation = nullCollation
    return setting
  }
  const crossJoinStyle = CROSS_JOIN_STYLES.find((s) => s === value)
  if (key === "crossJoinStyle" && crossJoinStyle) {
    setting.crossJoinStyle = crossJoinStyle
    return setting
  }
  if (key === "library" && isSqlLibrary(value)) {
    setting.library = value
    return setting
  }
  throw new Error(`Invalid dialect setting: ${key}=${value}`)
}

// Registry of dialects
const DIALECTS: Map<string, Dialect> = new Map()

export class Dialect {
  static readonly dialectName: string = "ansi"

  static CAPABILITIES: DialectCapabilities = { ...DEFAULT_CAPABILITIES }

  static TARGET_FUNCTIONS: readonly TargetFunctionRule[] = []

  protected static GeneratorClass: typeof Generator = Generator

  constructor(protected options: DialectOptions = {}) {}

  get name(): string {
    return (this.constructor as typeof Dialect).dialectName
  }

  get capabilities(): DialectCapabilities {
    return {
      ...(this.constructor as typeof Dialect).CAPABILITIES,
      ...this.options.capabilities,
    }
  }

  /** A copy of this dialect with some capabilities overridden. */
  withCapabilities(overrides: Partial<DialectCapabilities>): this {
    const clone: this = Object.create(Object.getPrototypeOf(this))
    Object.assign(clone, this)
    clone.options = {
      ...this.options,
      capabilities: { ...this.options.capabilities, ...overrides },
    }
    return clone
  }

  protected get GeneratorClass(): typeof Generator {
    return (this.constructor as typeof Dialect).GeneratorClass
  }

  createGenerator(options?: GenerateOptions): Generator {
    return new this.GeneratorClass({
      ...this.options.generator,
      dialect: this.name,
      ...options,
    })
  }

  generate(expression: exp.Expression, options?: GenerateOptions): string {
    return this.createGenerator(options).generate(expression)
  }

  // ==================== Null ordering ====================

  /** The null direction a sort key gets when no NULLS clause is written. */
  defaultNullDirection(direction: Direction): NullDirection {
    switch (this.capabilities.nullCollation) {
      case "high":
        return direction === "DESC" ? "FIRST" : "LAST"
      case "low":
        return direction === "DESC" ? "LAST" : "FIRST"
      case "first":
        return "FIRST"
      case "last":
        return "LAST"
    }
  }

  isDefaultNullOrder(nullsFirst: boolean, desc: boolean): boolean {
    switch (this.capabilities.nullCollation) {
      case "high":
        return nullsFirst === desc
      case "low":
        return nullsFirst === !desc
      case "first":
        return nullsFirst
      case "last":
        return !nullsFirst
    }
  }

  /**
   * An extra leading sort key reproducing the requested null placement on
   * a dialect without `NULLS FIRST/LAST`; undefined when none is needed.
   */
  emulateNullDirection(
    node: exp.Expression,
    nullsFirst: boolean,
    desc: boolean,
  ): exp.Expression | undefined {
    if (this.capabilities.supportsNullsOrdering) return undefined
    if (this.isDefaultNullOrder(nullsFirst, desc)) return undefined
    const isNull = new exp.Is({ this: node.copy(), expression: new exp.Null() })
    return nullsFirst ? new exp.Ordered({ this: isNull, desc: true }) : isNull
  }

  // ==================== Literals ====================

  dateLiteral(value: string): exp.Expression {
    return new exp.TypedLiteral({ this: exp.Literal.string(value), kind: "DATE" })
  }

  timeLiteral(value: string, precision: number): exp.Expression {
    return new exp.TypedLiteral({
      this: exp.Literal.string(withPrecision(value, precision)),
      kind: "TIME",
    })
  }

  timestampLiteral(value: string, precision: number): exp.Expression {
    return new exp.TypedLiteral({
      this: exp.Literal.string(withPrecision(value, precision)),
      kind: "TIMESTAMP",
    })
  }

  // ==================== Types and casts ====================

  /** The data type node naming `type` in a CAST. */
  typeSpec(type: SqlType): exp.DataType {
    switch (type.name) {
      case "CHAR":
      case "VARCHAR":
      case "BINARY":
      case "VARBINARY":
        return exp.DataType.build(
          type.name,
          type.precision === undefined ? [] : [type.precision],
        )
      case "DECIMAL":
        return exp.DataType.build(
          "DECIMAL",
          type.precision === undefined
            ? []
            : [type.precision, type.scale ?? 0],
        )
      case "TIMESTAMP_WITH_LOCAL_TIME_ZONE":
        return exp.DataType.build("TIMESTAMP WITH LOCAL TIME ZONE")
      case "INTERVAL_YEAR_MONTH":
      case "INTERVAL_DAY_TIME":
        return exp.DataType.build(`INTERVAL ${type.qualifier ?? ""}`.trim())
      default:
        return exp.DataType.build(type.name)
    }
  }

  castCall(node: exp.Expression, to: SqlType): exp.Expression {
    return new exp.Cast({ this: node, to: this.typeSpec(to) })
  }

  /** Whether `cast` may be dropped from a comparison, leaving its character operand to coercion. */
  supportsImplicitTypeCoercion(cast: RexCall): boolean {
    const [operand] = cast.operands
    return (
      this.capabilities.supportsImplicitTypeCoercion &&
      operand !== undefined &&
      isCharacter(operand.type)
    )
  }

  // ==================== Operators ====================

  /** The operator to emit for a `PLUS`/`MINUS` call over operands of these types. */
  targetFunction(op: SqlOperator, operandTypes: readonly SqlType[]): SqlOperator {
    const [left, right] = operandTypes
    if (!left || !right) return op
    const rules = (this.constructor as typeof Dialect).TARGET_FUNCTIONS
    const rule = rules.find(
      (r) =>
        r.kind === op.kind &&
        r.left === typeFamily(left) &&
        r.right === typeFamily(right),
    )
    return rule ? rule.operator : op
  }

  /**
   * The operator to emit for a library function call, substituting an
   * equivalent when the dialect's library lacks it.
   */
  operatorForOtherFunction(op: SqlOperator): SqlOperator {
    const replacement = substitute(op, this.capabilities.library)
    if (!replacement) {
      throw UnsupportedError.of(`Function ${op.name}`, this.name)
    }
    return replacement
  }

  // Static methods for dialect registry

  static register(dialectClass: typeof Dialect): void {
    const instance = new dialectClass()
    DIALECTS.set(instance.name.toLowerCase(), instance)
  }

  /**
   * Resolves a dialect by instance or name. Names may carry comma separated
   * capability settings: `"mysql, supportsAggregateFilter=true"`.
   */
  static get(dialect?: string | Dialect): Dialect {
    if (dialect instanceof Dialect) {
      return dialect
    }
    if (dialect === undefined || dialect.trim() === "") {
      return Dialect.getOrThrow("ansi")
    }

    const [dialectName = "", ...kvStrings] = dialect.split(",")
    const found = Dialect.getOrThrow(dialectName.trim())

    let overrides: Partial<DialectCapabilities> = {}
    for (const kv of kvStrings) {
      const [key = "", value = ""] = kv.split("=").map((s) => s.trim())
      overrides = { ...overrides, ...parseSetting(key, value) }
    }
    return kvStrings.length > 0 ? found.withCapabilities(overrides) : found
  }

  static getOrThrow(dialect: string): Dialect {
    const found = DIALECTS.get(dialect.toLowerCase())
    if (!found) {
      throw new UnknownDialectError(dialect)
    }
    return found
  }

  static list(): string[] {
    return [...DIALECTS.keys()].sort()
  }
}

/** Pads or trims the fractional seconds of a time value to `precision` digits. */
export function withPrecision(value: string, precision: number): string {
  const dot = value.indexOf(".")
  const whole = dot < 0 ? value : value.slice(0, dot)
  const fraction = dot < 0 ? "" : value.slice(dot + 1)
  if (precision <= 0) return whole
  return `${whole}.${fraction.padEnd(precision, "0").slice(0, precision)}`
}

// Register base dialect
Dialect.register(Dialect)
