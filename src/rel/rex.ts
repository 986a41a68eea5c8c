/**
 * Scalar expressions ("rex") appearing inside algebra nodes
 */

import { ContractError } from "../errors.js"
import { isPredicate, type SqlOperator, SqlStdOperatorTable } from "./operators.js"
import type { Sarg, SargValue } from "./range-set.js"
import type { RelNode } from "./rel.js"
import { type SqlType, SqlTypes, typeFamily } from "./types.js"

export type Direction = "ASC" | "DESC"
export type NullDirection = "FIRST" | "LAST" | "UNSPECIFIED"

/** Identifies a correlation variable, e.g. `$cor0`. */
export type CorrelationId = string

export type LiteralValue =
  | { readonly family: "null" }
  | { readonly family: "character"; readonly value: string }
  /** Canonical plain decimal text, e.g. `12.50` */
  | { readonly family: "exact"; readonly value: string }
  | { readonly family: "approx"; readonly value: string }
  | { readonly family: "boolean"; readonly value: boolean }
  | {
      readonly family: "interval"
      readonly value: string
      readonly negative: boolean
      readonly qualifier: string
    }
  | { readonly family: "date"; readonly value: string }
  | { readonly family: "time"; readonly value: string }
  | { readonly family: "timestamp"; readonly value: string }
  | { readonly family: "binary"; readonly value: string }
  | { readonly family: "symbol"; readonly value: string }
  | { readonly family: "row"; readonly values: readonly RexLiteral[] }
  | { readonly family: "sarg"; readonly sarg: Sarg }

export interface RexInputRef {
  readonly kind: "inputRef"
  readonly index: number
  readonly type: SqlType
}

/** A reference into a shared expression list. */
export interface RexLocalRef {
  readonly kind: "localRef"
  readonly index: number
  readonly exprs: readonly RexNode[]
  readonly type: SqlType
}

export interface RexLiteral {
  readonly kind: "literal"
  readonly value: LiteralValue
  readonly type: SqlType
}

export interface RexCall {
  readonly kind: "call"
  readonly op: SqlOperator
  readonly operands: readonly RexNode[]
  readonly type: SqlType
}

export type RexWindowBound =
  | { readonly kind: "unboundedPreceding" }
  | { readonly kind: "unboundedFollowing" }
  | { readonly kind: "currentRow" }
  | { readonly kind: "preceding"; readonly offset: RexNode }
  | { readonly kind: "following"; readonly offset: RexNode }

export interface RexFieldCollation {
  readonly expr: RexNode
  readonly direction: Direction
  readonly nullDirection: NullDirection
}

export interface RexWindow {
  readonly partitionKeys: readonly RexNode[]
  readonly orderKeys: readonly RexFieldCollation[]
  readonly isRows: boolean
  readonly lowerBound?: RexWindowBound
  readonly upperBound?: RexWindowBound
}

/** An aggregate or ranking function evaluated over a window. */
export interface RexOver {
  readonly kind: "over"
  readonly op: SqlOperator
  readonly operands: readonly RexNode[]
  readonly window: RexWindow
  readonly distinct: boolean
  readonly type: SqlType
}

export interface RexFieldAccess {
  readonly kind: "fieldAccess"
  readonly expr: RexNode
  readonly field: { readonly name: string; readonly index: number }
  readonly type: SqlType
}

/** The current row of an enclosing relation, referenced from a subquery. */
export interface RexCorrelVariable {
  readonly kind: "correlVariable"
  readonly id: CorrelationId
  readonly type: SqlType
}

export interface RexSubQuery {
  readonly kind: "subQuery"
  /** IN, NOT_IN, EXISTS or SCALAR_QUERY */
  readonly op: SqlOperator
  readonly operands: readonly RexNode[]
  readonly rel: RelNode
  readonly type: SqlType
}

export interface RexDynamicParam {
  readonly kind: "dynamicParam"
  readonly index: number
  readonly type: SqlType
}

/** A column of a MATCH_RECOGNIZE pattern variable, `alpha.col`. */
export interface RexPatternFieldRef {
  readonly kind: "patternFieldRef"
  readonly alpha: string
  readonly index: number
  readonly type: SqlType
}

export type RexNode =
  | RexInputRef
  | RexLocalRef
  | RexLiteral
  | RexCall
  | RexOver
  | RexFieldAccess
  | RexCorrelVariable
  | RexSubQuery
  | RexDynamicParam
  | RexPatternFieldRef

// ==================== Builders ====================

export function inputRef(index: number, type: SqlType = SqlTypes.ANY): RexInputRef {
  return { kind: "inputRef", index, type }
}

export function localRef(index: number, exprs: readonly RexNode[]): RexLocalRef {
  const expr = exprs[index]
  if (!expr) {
    throw new ContractError(`Local reference ${index} out of range ${exprs.length}`)
  }
  return { kind: "localRef", index, exprs, type: expr.type }
}

/**
 * Rewrites scientific notation as plain decimal text: `1.5E-3` → `0.0015`,
 * `1e+21` → `1000000000000000000000`.
 */
export function toPlainString(text: string): string {
  const match = /^([+-]?)(\d*)(?:\.(\d*))?[eE]([+-]?\d+)$/.exec(text)
  if (!match) return text
  const sign = match[1] === "-" ? "-" : ""
  const intPart = match[2] ?? ""
  const fracPart = match[3] ?? ""
  let digits = intPart + fracPart
  let point = intPart.length + Number(match[4])
  if (point <= 0) {
    digits = "0".repeat(1 - point) + digits
    point = 1
  }
  if (point >= digits.length) {
    digits += "0".repeat(point - digits.length)
    return sign + trimLeadingZeros(digits)
  }
  return `${sign}${trimLeadingZeros(digits.slice(0, point))}.${digits.slice(point)}`
}

function trimLeadingZeros(digits: string): string {
  const trimmed = digits.replace(/^0+/, "")
  return trimmed === "" ? "0" : trimmed
}

function literalOf(value: LiteralValue, type: SqlType): RexLiteral {
  return { kind: "literal", value, type }
}

export function nullLiteral(type: SqlType = SqlTypes.NULL): RexLiteral {
  return literalOf({ family: "null" }, type)
}

export function charLiteral(value: string, type?: SqlType): RexLiteral {
  return literalOf(
    { family: "character", value },
    type ?? { name: "CHAR", precision: value.length },
  )
}

export function exactLiteral(
  value: number | bigint | string,
  type: SqlType = SqlTypes.INTEGER,
): RexLiteral {
  return literalOf({ family: "exact", value: toPlainString(String(value)) }, type)
}

export function approxLiteral(
  value: number | string,
  type: SqlType = SqlTypes.DOUBLE,
): RexLiteral {
  return literalOf({ family: "approx", value: toPlainString(String(value)) }, type)
}

export function booleanLiteral(value: boolean): RexLiteral {
  return literalOf({ family: "boolean", value }, SqlTypes.BOOLEAN)
}

export function dateLiteral(value: string): RexLiteral {
  return literalOf({ family: "date", value }, SqlTypes.DATE)
}

export function timeLiteral(value: string, precision = 0): RexLiteral {
  return literalOf({ family: "time", value }, { name: "TIME", precision })
}

export function timestampLiteral(
  value: string,
  precision = 0,
  withLocalTimeZone = false,
): RexLiteral {
  return literalOf(
    { family: "timestamp", value },
    {
      name: withLocalTimeZone ? "TIMESTAMP_WITH_LOCAL_TIME_ZONE" : "TIMESTAMP",
      precision,
    },
  )
}

/** `INTERVAL '1-2' YEAR TO MONTH`; `value` is the text between the quotes. */
export function intervalLiteral(
  value: string,
  qualifier: string,
  negative = false,
): RexLiteral {
  const yearMonth = /^(YEAR|MONTH)/.test(qualifier)
  return literalOf(
    { family: "interval", value, negative, qualifier },
    { name: yearMonth ? "INTERVAL_YEAR_MONTH" : "INTERVAL_DAY_TIME", qualifier },
  )
}

export function binaryLiteral(hex: string): RexLiteral {
  return literalOf(
    { family: "binary", value: hex.toUpperCase() },
    { name: "BINARY", precision: hex.length / 2 },
  )
}

export function symbolLiteral(value: string): RexLiteral {
  return literalOf({ family: "symbol", value }, SqlTypes.SYMBOL)
}

export function rowLiteral(values: readonly RexLiteral[]): RexLiteral {
  return literalOf(
    { family: "row", values },
    {
      name: "ROW",
      fields: values.map((v, i) => ({ name: `EXPR$${i}`, type: v.type })),
    },
  )
}

export function sargLiteral(sarg: Sarg, type: SqlType): RexLiteral {
  return literalOf({ family: "sarg", sarg }, { name: "SARG", component: type })
}

/** A literal of `type` holding a range-set endpoint. */
export function makeLiteral(value: SargValue, type: SqlType): RexLiteral {
  switch (typeFamily(type)) {
    case "CHARACTER":
      return charLiteral(String(value), type)
    case "BOOLEAN":
      return booleanLiteral(value === true || value === "true")
    case "DATE":
      return dateLiteral(String(value))
    case "TIME":
      return timeLiteral(String(value), type.precision ?? 0)
    case "TIMESTAMP":
      return literalOf({ family: "timestamp", value: String(value) }, type)
    case "NUMERIC":
      return ["FLOAT", "REAL", "DOUBLE"].includes(type.name)
        ? literalOf({ family: "approx", value: toPlainString(String(value)) }, type)
        : exactLiteral(typeof value === "boolean" ? Number(value) : value, type)
    default:
      throw new ContractError(`Cannot make a ${type.name} literal from ${String(value)}`)
  }
}

export function call(
  op: SqlOperator,
  operands: readonly RexNode[],
  type?: SqlType,
): RexCall {
  const derived =
    type ??
    (isPredicate(op) ? SqlTypes.BOOLEAN : (operands[0]?.type ?? SqlTypes.ANY))
  return { kind: "call", op, operands, type: derived }
}

export function cast(operand: RexNode, type: SqlType): RexCall {
  return call(SqlStdOperatorTable.CAST, [operand], type)
}

/** `SEARCH(operand, sarg)`: the range-set predicate. */
export function search(operand: RexNode, sarg: Sarg): RexCall {
  return call(SqlStdOperatorTable.SEARCH, [
    operand,
    sargLiteral(sarg, operand.type),
  ])
}

export function not(operand: RexNode): RexCall {
  return call(SqlStdOperatorTable.NOT, [operand])
}

export function and(...operands: RexNode[]): RexCall {
  return call(SqlStdOperatorTable.AND, operands)
}

export function or(...operands: RexNode[]): RexCall {
  return call(SqlStdOperatorTable.OR, operands)
}

export function equals(left: RexNode, right: RexNode): RexCall {
  return call(SqlStdOperatorTable.EQUALS, [left, right])
}

export function windowOf(spec: Partial<RexWindow> = {}): RexWindow {
  return {
    partitionKeys: spec.partitionKeys ?? [],
    orderKeys: spec.orderKeys ?? [],
    isRows: spec.isRows ?? false,
    lowerBound: spec.lowerBound,
    upperBound: spec.upperBound,
  }
}

export function fieldCollation(
  expr: RexNode,
  direction: Direction = "ASC",
  nullDirection?: NullDirection,
): RexFieldCollation {
  return {
    expr,
    direction,
    nullDirection: nullDirection ?? (direction === "ASC" ? "LAST" : "FIRST"),
  }
}

export function over(
  op: SqlOperator,
  operands: readonly RexNode[],
  window: RexWindow,
  options: { distinct?: boolean; type?: SqlType } = {},
): RexOver {
  return {
    kind: "over",
    op,
    operands,
    window,
    distinct: options.distinct ?? false,
    type: options.type ?? operands[0]?.type ?? SqlTypes.BIGINT,
  }
}

export function fieldAccess(expr: RexNode, name: string): RexFieldAccess {
  const fields = expr.type.fields ?? []
  const index = fields.findIndex((f) => f.name === name)
  const field = fields[index]
  if (!field) {
    throw new ContractError(`Field ${name} not found in ${expr.type.name}`)
  }
  return { kind: "fieldAccess", expr, field: { name, index }, type: field.type }
}

export function correlVariable(id: CorrelationId, type: SqlType): RexCorrelVariable {
  return { kind: "correlVariable", id, type }
}

export function inSubQuery(operands: readonly RexNode[], rel: RelNode): RexSubQuery {
  return {
    kind: "subQuery",
    op: SqlStdOperatorTable.IN,
    operands,
    rel,
    type: SqlTypes.BOOLEAN,
  }
}

export function exists(rel: RelNode): RexSubQuery {
  return {
    kind: "subQuery",
    op: SqlStdOperatorTable.EXISTS,
    operands: [],
    rel,
    type: SqlTypes.BOOLEAN,
  }
}

export function scalarQuery(rel: RelNode): RexSubQuery {
  return {
    kind: "subQuery",
    op: SqlStdOperatorTable.SCALAR_QUERY,
    operands: [],
    rel,
    type: rel.rowType.fields[0]?.type ?? SqlTypes.ANY,
  }
}

export function dynamicParam(index: number, type: SqlType = SqlTypes.ANY): RexDynamicParam {
  return { kind: "dynamicParam", index, type }
}

export function patternFieldRef(
  alpha: string,
  index: number,
  type: SqlType = SqlTypes.ANY,
): RexPatternFieldRef {
  return { kind: "patternFieldRef", alpha, index, type }
}

// Patterns of a MATCH_RECOGNIZE; a pattern variable is a character literal

export function patternConcat(...items: RexNode[]): RexCall {
  return call(SqlStdOperatorTable.PATTERN_CONCAT, items, SqlTypes.ANY)
}

export function patternAlter(...items: RexNode[]): RexCall {
  return call(SqlStdOperatorTable.PATTERN_ALTER, items, SqlTypes.ANY)
}

/** `pattern{min,max}`; a `max` of -1 leaves the repetition unbounded. */
export function patternQuantifier(
  pattern: RexNode,
  min: number,
  max = -1,
  reluctant = false,
): RexCall {
  return call(
    SqlStdOperatorTable.PATTERN_QUANTIFIER,
    [pattern, exactLiteral(min), exactLiteral(max), booleanLiteral(reluctant)],
    SqlTypes.ANY,
  )
}

// ==================== Inspection ====================

/** Immediate scalar children of `node`; does not enter subqueries. */
export function operandsOf(node: RexNode): readonly RexNode[] {
  switch (node.kind) {
    case "call":
      return node.operands
    case "over":
      return [
        ...node.operands,
        ...node.window.partitionKeys,
        ...node.window.orderKeys.map((k) => k.expr),
      ]
    case "fieldAccess":
      return [node.expr]
    case "localRef": {
      const target = node.exprs[node.index]
      return target ? [target] : []
    }
    case "subQuery":
      return node.operands
    default:
      return []
  }
}

/** True when `predicate` holds for `node` or any scalar descendant. */
export function containsRex(
  node: RexNode,
  predicate: (n: RexNode) => boolean,
): boolean {
  if (predicate(node)) return true
  return operandsOf(node).some((child) => containsRex(child, predicate))
}

export function containsOver(node: RexNode): boolean {
  return containsRex(node, (n) => n.kind === "over")
}

export function isLiteralTrue(node: RexNode): boolean {
  return (
    node.kind === "literal" &&
    node.value.family === "boolean" &&
    node.value.value
  )
}
