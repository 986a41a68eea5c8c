/**
 * Relational algebra nodes and builders that derive their row types
 */

import { ContractError } from "../errors.js"
import type { SqlOperator } from "./operators.js"
import type {
  CorrelationId,
  Direction,
  NullDirection,
  RexLiteral,
  RexNode,
  RexWindowBound,
} from "./rex.js"
import {
  type RelField,
  type RowType,
  type SqlType,
  SqlTypes,
  uniquify,
} from "./types.js"

export type JoinType = "INNER" | "LEFT" | "RIGHT" | "FULL" | "SEMI" | "ANTI"
export type SetOpKind = "UNION" | "INTERSECT" | "EXCEPT"

/** Sort key over an input field. */
export interface FieldCollation {
  readonly fieldIndex: number
  readonly direction: Direction
  readonly nullDirection: NullDirection
}

export interface AggregateCall {
  readonly op: SqlOperator
  readonly distinct: boolean
  /** Input field ordinals */
  readonly args: readonly number[]
  /** Ordinal of a BOOLEAN input field restricting the rows aggregated */
  readonly filterArg?: number
  /** `WITHIN GROUP (ORDER BY …)` */
  readonly collation: readonly FieldCollation[]
  readonly name?: string
  readonly type?: SqlType
}

export interface WinAggCall {
  readonly op: SqlOperator
  readonly operands: readonly RexNode[]
  readonly distinct: boolean
  readonly type: SqlType
}

/** Calls sharing one window definition in a Window node. */
export interface WindowGroup {
  readonly keys: readonly number[]
  readonly orderKeys: readonly FieldCollation[]
  readonly isRows: boolean
  readonly lowerBound?: RexWindowBound
  readonly upperBound?: RexWindowBound
  readonly aggCalls: readonly WinAggCall[]
}

export interface TableScan {
  readonly kind: "scan"
  readonly table: readonly string[]
  readonly rowType: RowType
}

export interface Filter {
  readonly kind: "filter"
  readonly input: RelNode
  readonly condition: RexNode
  readonly variablesSet: readonly CorrelationId[]
  readonly rowType: RowType
}

export interface Project {
  readonly kind: "project"
  readonly input: RelNode
  readonly projects: readonly RexNode[]
  readonly distinct: boolean
  readonly variablesSet: readonly CorrelationId[]
  readonly rowType: RowType
}

export interface Aggregate {
  readonly kind: "aggregate"
  readonly input: RelNode
  readonly groupSet: readonly number[]
  /** Grouping sets; a single set equal to `groupSet` for a plain GROUP BY */
  readonly groupSets: readonly (readonly number[])[]
  readonly aggCalls: readonly AggregateCall[]
  readonly rowType: RowType
}

export interface Join {
  readonly kind: "join"
  readonly left: RelNode
  readonly right: RelNode
  readonly condition: RexNode
  readonly joinType: JoinType
  readonly variablesSet: readonly CorrelationId[]
  readonly rowType: RowType
}

export interface SetOp {
  readonly kind: "setOp"
  readonly op: SetOpKind
  readonly all: boolean
  readonly inputs: readonly RelNode[]
  readonly rowType: RowType
}

export interface Sort {
  readonly kind: "sort"
  readonly input: RelNode
  readonly collation: readonly FieldCollation[]
  readonly offset?: RexNode
  readonly fetch?: RexNode
  readonly rowType: RowType
}

export interface Window {
  readonly kind: "window"
  readonly input: RelNode
  readonly groups: readonly WindowGroup[]
  /** Literals referenced by ordinals past the input's fields */
  readonly constants: readonly RexLiteral[]
  readonly rowType: RowType
}

export interface TableFunctionScan {
  readonly kind: "tableFunctionScan"
  readonly inputs: readonly RelNode[]
  readonly call: RexNode
  readonly rowType: RowType
}

export interface Values {
  readonly kind: "values"
  readonly tuples: readonly (readonly RexLiteral[])[]
  readonly rowType: RowType
}

/** Where the next match attempt starts once a row pattern has matched. */
export type AfterMatch =
  | "SKIP TO NEXT ROW"
  | "SKIP PAST LAST ROW"
  | { readonly skipTo: "FIRST" | "LAST"; readonly variable: string }

/** Row pattern recognition over the input (`MATCH_RECOGNIZE`). */
export interface Match {
  readonly kind: "match"
  readonly input: RelNode
  readonly pattern: RexNode
  readonly strictStart: boolean
  readonly strictEnd: boolean
  /** Condition per pattern variable, in DEFINE order */
  readonly patternDefinitions: ReadonlyMap<string, RexNode>
  readonly measures: ReadonlyMap<string, RexNode>
  readonly after: AfterMatch
  readonly subsets: ReadonlyMap<string, readonly string[]>
  readonly allRows: boolean
  readonly partitionKeys: readonly number[]
  readonly orderKeys: readonly FieldCollation[]
  /** `WITHIN` interval */
  readonly interval?: RexLiteral
  readonly rowType: RowType
}

export type RelNode =
  | TableScan
  | Filter
  | Project
  | Aggregate
  | Join
  | SetOp
  | Sort
  | Window
  | TableFunctionScan
  | Values
  | Match

export type FieldSpec = readonly (readonly [string, SqlType])[]

function toRowType(fields: FieldSpec | RowType): RowType {
  if ("fields" in fields) return fields
  return { fields: fields.map(([name, type]) => ({ name, type })) }
}

/** Renames duplicate field names with a numeric suffix. */
function uniqueFields(fields: readonly RelField[]): RelField[] {
  const used = new Set<string>()
  return fields.map((field) => ({ ...field, name: uniquify(field.name, used) }))
}

function inputField(input: RelNode, ordinal: number): RelField {
  const field = input.rowType.fields[ordinal]
  if (!field) {
    throw new ContractError(
      `Field ordinal ${ordinal} out of range ${input.rowType.fields.length}`,
    )
  }
  return field
}

// ==================== Builders ====================

export function scan(
  table: string | readonly string[],
  fields: FieldSpec | RowType,
): TableScan {
  return {
    kind: "scan",
    table: typeof table === "string" ? [table] : table,
    rowType: toRowType(fields),
  }
}

export function filter(
  input: RelNode,
  condition: RexNode,
  variablesSet: readonly CorrelationId[] = [],
): Filter {
  return { kind: "filter", input, condition, variablesSet, rowType: input.rowType }
}

export function project(
  input: RelNode,
  projects: readonly RexNode[],
  names: readonly string[],
  options: { distinct?: boolean; variablesSet?: readonly CorrelationId[] } = {},
): Project {
  if (names.length !== projects.length) {
    throw new ContractError(
      `${projects.length} projections but ${names.length} names`,
    )
  }
  return {
    kind: "project",
    input,
    projects,
    distinct: options.distinct ?? false,
    variablesSet: options.variablesSet ?? [],
    rowType: {
      fields: projects.map((p, i) => ({ name: names[i] ?? `$f${i}`, type: p.type })),
    },
  }
}

export function aggCall(
  op: SqlOperator,
  args: readonly number[],
  options: {
    distinct?: boolean
    filterArg?: number
    collation?: readonly FieldCollation[]
    name?: string
    type?: SqlType
  } = {},
): AggregateCall {
  return {
    op,
    distinct: options.distinct ?? false,
    args,
    filterArg: options.filterArg,
    collation: options.collation ?? [],
    name: options.name,
    type: options.type,
  }
}

export function aggregate(
  input: RelNode,
  groupSet: readonly number[],
  aggCalls: readonly AggregateCall[],
  groupSets?: readonly (readonly number[])[],
): Aggregate {
  const keys = [...groupSet].sort((a, b) => a - b)
  const groupFields = keys.map((k) => inputField(input, k))
  const callFields = aggCalls.map((c, i): RelField => {
    const firstArg = c.args[0]
    const type =
      c.type ??
      (c.op.kind === "COUNT"
        ? SqlTypes.BIGINT
        : firstArg === undefined
          ? SqlTypes.ANY
          : inputField(input, firstArg).type)
    return { name: c.name ?? `$f${keys.length + i}`, type }
  })
  return {
    kind: "aggregate",
    input,
    groupSet: keys,
    groupSets: groupSets ?? [keys],
    aggCalls,
    rowType: { fields: uniqueFields([...groupFields, ...callFields]) },
  }
}

export function join(
  left: RelNode,
  right: RelNode,
  condition: RexNode,
  joinType: JoinType = "INNER",
  variablesSet: readonly CorrelationId[] = [],
): Join {
  const fields =
    joinType === "SEMI" || joinType === "ANTI"
      ? left.rowType.fields
      : uniqueFields([...left.rowType.fields, ...right.rowType.fields])
  return {
    kind: "join",
    left,
    right,
    condition,
    joinType,
    variablesSet,
    rowType: { fields },
  }
}

export function setOp(
  op: SetOpKind,
  inputs: readonly RelNode[],
  all = false,
): SetOp {
  const [first] = inputs
  if (!first || inputs.length < 2) {
    throw new ContractError(`${op} needs at least two inputs`)
  }
  return { kind: "setOp", op, all, inputs, rowType: first.rowType }
}

export function collation(
  fieldIndex: number,
  direction: Direction = "ASC",
  nullDirection?: NullDirection,
): FieldCollation {
  return {
    fieldIndex,
    direction,
    nullDirection: nullDirection ?? (direction === "ASC" ? "LAST" : "FIRST"),
  }
}

export function sort(
  input: RelNode,
  collations: readonly FieldCollation[],
  options: { offset?: RexNode; fetch?: RexNode } = {},
): Sort {
  return {
    kind: "sort",
    input,
    collation: collations,
    offset: options.offset,
    fetch: options.fetch,
    rowType: input.rowType,
  }
}

export function window(
  input: RelNode,
  groups: readonly WindowGroup[],
  constants: readonly RexLiteral[] = [],
  names: readonly string[] = [],
): Window {
  const callFields: RelField[] = []
  groups.forEach((group, g) =>
    group.aggCalls.forEach((c, i) => {
      callFields.push({
        name: names[callFields.length] ?? `w${g}$o${i}`,
        type: c.type,
      })
    }),
  )
  return {
    kind: "window",
    input,
    groups,
    constants,
    rowType: { fields: [...input.rowType.fields, ...callFields] },
  }
}

export function tableFunctionScan(
  call: RexNode,
  fields: FieldSpec | RowType,
  inputs: readonly RelNode[] = [],
): TableFunctionScan {
  return { kind: "tableFunctionScan", inputs, call, rowType: toRowType(fields) }
}

export function values(
  fields: FieldSpec | RowType,
  tuples: readonly (readonly RexLiteral[])[],
): Values {
  const rowType = toRowType(fields)
  for (const tuple of tuples) {
    if (tuple.length !== rowType.fields.length) {
      throw new ContractError(
        `Tuple of ${tuple.length} values for ${rowType.fields.length} fields`,
      )
    }
  }
  return { kind: "values", tuples, rowType }
}

export function match(
  input: RelNode,
  pattern: RexNode,
  patternDefinitions: ReadonlyMap<string, RexNode>,
  options: {
    measures?: ReadonlyMap<string, RexNode>
    strictStart?: boolean
    strictEnd?: boolean
    after?: AfterMatch
    subsets?: ReadonlyMap<string, readonly string[]>
    allRows?: boolean
    partitionKeys?: readonly number[]
    orderKeys?: readonly FieldCollation[]
    interval?: RexLiteral
  } = {},
): Match {
  const measures = options.measures ?? new Map<string, RexNode>()
  const partitionKeys = options.partitionKeys ?? []
  const allRows = options.allRows ?? false
  // ONE ROW PER MATCH keeps only the partition keys and the measures
  const kept = allRows
    ? input.rowType.fields
    : partitionKeys.map((k) => inputField(input, k))
  const measureFields = [...measures].map(([name, rex]): RelField => ({ name, type: rex.type }))
  return {
    kind: "match",
    input,
    pattern,
    strictStart: options.strictStart ?? false,
    strictEnd: options.strictEnd ?? false,
    patternDefinitions,
    measures,
    after: options.after ?? "SKIP TO NEXT ROW",
    subsets: options.subsets ?? new Map<string, readonly string[]>(),
    allRows,
    partitionKeys,
    orderKeys: options.orderKeys ?? [],
    interval: options.interval,
    rowType: { fields: uniqueFields([...kept, ...measureFields]) },
  }
}

/** Inputs of `rel`, left to right. */
export function inputsOf(rel: RelNode): readonly RelNode[] {
  switch (rel.kind) {
    case "scan":
    case "values":
      return []
    case "join":
      return [rel.left, rel.right]
    case "setOp":
    case "tableFunctionScan":
      return rel.inputs
    default:
      return [rel.input]
  }
}
