/**
 * Scalar expression translation: rex trees, aggregate calls and window
 * groups to SQL nodes
 */

import type { Dialect } from "../dialect.js"
import { ContractError } from "../errors.js"
import * as exp from "../expressions.js"
import { type SqlOperator, SqlStdOperatorTable } from "../rel/operators.js"
import type { AggregateCall, FieldCollation, WindowGroup } from "../rel/rel.js"
import type {
  Direction,
  NullDirection,
  RexCall,
  RexFieldAccess,
  RexLiteral,
  RexNode,
  RexOver,
  RexSubQuery,
  RexWindowBound,
} from "../rel/rex.js"
import type { Context } from "./context.js"
import { literalToSql } from "./literals.js"
import { sargToSql } from "./sarg.js"

type BinaryClass =
  | typeof exp.EQ
  | typeof exp.NEQ
  | typeof exp.GT
  | typeof exp.GTE
  | typeof exp.LT
  | typeof exp.LTE
  | typeof exp.Add
  | typeof exp.Sub
  | typeof exp.Mul
  | typeof exp.Div
  | typeof exp.DPipe

const BINARY_OPERATORS: Partial<Record<SqlOperator["kind"], BinaryClass>> = {
  EQUALS: exp.EQ,
  NOT_EQUALS: exp.NEQ,
  GREATER_THAN: exp.GT,
  GREATER_THAN_OR_EQUAL: exp.GTE,
  LESS_THAN: exp.LT,
  LESS_THAN_OR_EQUAL: exp.LTE,
  PLUS: exp.Add,
  MINUS: exp.Sub,
  TIMES: exp.Mul,
  DIVIDE: exp.Div,
  CONCAT: exp.DPipe,
}

// Comparisons whose CAST of a character operand may be left to the database
const CAST_STRIPPABLE: ReadonlySet<SqlOperator["kind"]> = new Set<SqlOperator["kind"]>([
  "EQUALS",
  "IS_NOT_DISTINCT_FROM",
  "NOT_EQUALS",
  "GREATER_THAN",
  "GREATER_THAN_OR_EQUAL",
  "LESS_THAN",
  "LESS_THAN_OR_EQUAL",
])

// Operators NOT folds into by flipping their negation
const NEGATABLE: ReadonlySet<string> = new Set<SqlOperator["kind"]>([
  "IN",
  "NOT_IN",
  "LIKE",
  "SIMILAR",
])

/** The kind of a rex node: its operator's kind for calls. */
export function rexKind(rex: RexNode): string {
  switch (rex.kind) {
    case "call":
    case "over":
    case "subQuery":
      return rex.op.kind
    default:
      return rex.kind
  }
}

export function rexToSql(ctx: Context, rex: RexNode): exp.Expression {
  switch (rex.kind) {
    case "inputRef":
      return ctx.field(rex.index)
    case "localRef": {
      const target = rex.exprs[rex.index]
      if (!target) throw new ContractError(`Local reference ${rex.index} out of range`)
      return ctx.toSql(target)
    }
    case "literal":
      return literalToSql(ctx.dialect, rex)
    case "fieldAccess":
      return fieldAccessToSql(ctx, rex)
    case "patternFieldRef": {
      const node = ctx.field(rex.index)
      if (!(node instanceof exp.Column)) {
        throw new ContractError(`Pattern field ${rex.index} does not resolve to a column`)
      }
      return exp.column(node.name, rex.alpha)
    }
    case "dynamicParam":
      return new exp.Placeholder({ index: rex.index })
    case "correlVariable":
      throw new ContractError(`Correlation variable ${rex.id} used without a field`)
    case "subQuery":
      return subQueryToSql(ctx, rex)
    case "over":
      return overToSql(ctx, rex)
    case "call":
      return callToSql(ctx, rex)
  }
}

function fieldAccessToSql(ctx: Context, rex: RexFieldAccess): exp.Expression {
  // Outermost access first
  const accesses: RexFieldAccess[] = []
  let root: RexNode = rex
  while (root.kind === "fieldAccess") {
    accesses.push(root)
    root = root.expr
  }

  let node: exp.Expression
  if (root.kind === "correlVariable") {
    const innermost = accesses.pop()
    if (!innermost) throw new ContractError("Empty field access chain")
    node = ctx.implementor.correlationContext(root.id).field(innermost.field.index)
  } else {
    node = ctx.toSql(root)
  }
  for (const access of accesses.reverse()) {
    node = new exp.Dot({ this: node, expression: exp.identifier(access.field.name) })
  }
  return node
}

function subQueryToSql(ctx: Context, rex: RexSubQuery): exp.Expression {
  const query = ctx.implementor.subQuery(rex.rel)
  switch (rex.op.kind) {
    case "IN":
    case "NOT_IN": {
      const [only] = rex.operands
      const operand =
        rex.operands.length === 1 && only
          ? ctx.toSql(only)
          : new exp.Tuple({ expressions: rex.operands.map((o) => ctx.toSql(o)) })
      return new exp.In({
        this: operand,
        query: new exp.Subquery({ this: query }),
        negated: rex.op.kind === "NOT_IN",
      })
    }
    case "EXISTS":
      return new exp.Exists({ this: query })
    case "SCALAR_QUERY":
      return new exp.Subquery({ this: query })
    default:
      throw new ContractError(`Unknown subquery operator ${rex.op.name}`)
  }
}

function callToSql(ctx: Context, rex: RexCall): exp.Expression {
  switch (rex.op.kind) {
    case "AND":
      return exp.and(...rex.operands.map((o) => ctx.toSql(o)))
    case "OR":
      return exp.or(...rex.operands.map((o) => ctx.toSql(o)))
    case "NOT":
      return notToSql(ctx, rex)
    case "CASE":
      return caseToSql(ctx, rex)
    case "SEARCH":
      return searchToSql(ctx, rex)
    case "CAST":
      return castToSql(ctx, rex)
    case "PATTERN_CONCAT":
      return new exp.PatternConcat({ expressions: rex.operands.map((o) => ctx.toSql(o)) })
    case "PATTERN_ALTER":
      return new exp.PatternAlternation({ expressions: rex.operands.map((o) => ctx.toSql(o)) })
    case "PATTERN_QUANTIFIER":
      return quantifierToSql(ctx, rex)
    default: {
      const call = stripCastFromString(rex, ctx.dialect)
      const operands = call.operands.map((o) => ctx.toSql(o))
      return operatorCall(retarget(ctx.dialect, call), operands)
    }
  }
}

function notToSql(ctx: Context, rex: RexCall): exp.Expression {
  const [operand] = rex.operands
  if (!operand) throw new ContractError("NOT without an operand")
  if (operand.kind === "call" && operand.op.kind === "NOT") {
    const [inner] = operand.operands
    if (inner) return ctx.toSql(inner)
  }
  const node = ctx.toSql(operand)
  if (
    NEGATABLE.has(rexKind(operand)) &&
    (node instanceof exp.In || node instanceof exp.Like || node instanceof exp.SimilarTo)
  ) {
    node.set("negated", !node.negated)
    return node
  }
  return new exp.Not({ this: node })
}

function caseToSql(ctx: Context, rex: RexCall): exp.Expression {
  const nodes = rex.operands.map((o) => ctx.toSql(o))
  // CASE value WHEN … has the value first, making the count even
  const switched = nodes.length % 2 === 0
  const fallback = nodes.pop()
  const value = switched ? nodes.shift() : undefined
  const ifs: exp.If[] = []
  for (let i = 0; i + 1 < nodes.length; i += 2) {
    ifs.push(new exp.If({ this: nodes[i], true: nodes[i + 1] }))
  }
  return new exp.Case({ this: value, ifs, default: fallback })
}

function quantifierToSql(ctx: Context, rex: RexCall): exp.Expression {
  const [pattern, min, max, reluctant] = rex.operands
  if (!pattern) throw new ContractError("Pattern quantifier without a pattern")
  return new exp.PatternQuantifier({
    this: ctx.toSql(pattern),
    min: integerOf(min),
    max: integerOf(max),
    reluctant:
      reluctant?.kind === "literal" &&
      reluctant.value.family === "boolean" &&
      reluctant.value.value,
  })
}

function integerOf(rex: RexNode | undefined): number {
  if (rex?.kind !== "literal" || rex.value.family !== "exact") {
    throw new ContractError("Pattern quantifier bounds must be exact literals")
  }
  return Number(rex.value.value)
}

function searchToSql(ctx: Context, rex: RexCall): exp.Expression {
  const [operand, sarg] = rex.operands
  if (!operand || sarg?.kind !== "literal" || sarg.value.family !== "sarg") {
    throw new ContractError("SEARCH takes an operand and a search argument")
  }
  const component = sarg.type.component
  if (!component) throw new ContractError("Search argument without a value type")
  return sargToSql(ctx.dialect, ctx.toSql(operand), sarg.value.sarg, component)
}

function castToSql(ctx: Context, rex: RexCall): exp.Expression {
  const [operand] = rex.operands
  if (!operand) throw new ContractError("CAST without an operand")
  if (rex.type.name === "CURSOR") {
    if (operand.kind !== "inputRef") {
      throw new ContractError("A CURSOR cast applies to an input field")
    }
    return new exp.Cursor({ this: ctx.field(operand.index) })
  }
  return ctx.dialect.castCall(ctx.toSql(operand), rex.type)
}

/**
 * Drops the CAST from one side of a comparison when the dialect coerces
 * the other side implicitly: `CAST(c AS INTEGER) = 1` becomes `c = 1`.
 */
export function stripCastFromString(call: RexCall, dialect: Dialect): RexCall {
  if (!CAST_STRIPPABLE.has(call.op.kind)) return call
  const [left, right] = call.operands
  if (!left || !right) return call
  const isCast = (rex: RexNode): rex is RexCall =>
    rex.kind === "call" && rex.op.kind === "CAST"
  if (isCast(left) && !isCast(right)) {
    const [inner] = left.operands
    if (!inner || !dialect.supportsImplicitTypeCoercion(left)) return call
    return { ...call, operands: [inner, right] }
  }
  if (isCast(right) && !isCast(left)) {
    const [inner] = right.operands
    if (!inner || !dialect.supportsImplicitTypeCoercion(right)) return call
    return { ...call, operands: [left, inner] }
  }
  return call
}

/** The operator actually emitted for `call` on `dialect`. */
function retarget(dialect: Dialect, call: { op: SqlOperator; operands: readonly RexNode[] }): SqlOperator {
  return retargetOperator(
    dialect,
    call.op,
    call.operands.map((o) => o.type),
  )
}

function retargetOperator(
  dialect: Dialect,
  op: SqlOperator,
  operandTypes: readonly RexNode["type"][],
): SqlOperator {
  switch (op.kind) {
    case "SUM0":
      return SqlStdOperatorTable.SUM
    case "PLUS":
    case "MINUS":
      return dialect.targetFunction(op, operandTypes)
    case "OTHER_FUNCTION":
      return dialect.operatorForOtherFunction(op)
    default:
      return op
  }
}

function binary(ctor: BinaryClass, operands: readonly exp.Expression[]): exp.Expression {
  const [left, right] = operands
  if (operands.length !== 2 || !left || !right) {
    throw new ContractError(`Binary operator with ${operands.length} operands`)
  }
  return new ctor({ this: left, expression: right })
}

/** A call of `op` over already translated operands. */
export function operatorCall(op: SqlOperator, operands: exp.Expression[]): exp.Expression {
  if (op.syntax === "function") {
    return op.isAggregate
      ? new exp.AggFunc({ this: op.name, expressions: operands })
      : new exp.Anonymous({ this: op.name, expressions: operands })
  }

  const ctor = BINARY_OPERATORS[op.kind]
  if (ctor) return binary(ctor, operands)

  const [first, second, third] = operands
  if (!first) throw new ContractError(`${op.name} without operands`)
  switch (op.kind) {
    case "AND":
      return exp.and(...operands)
    case "OR":
      return exp.or(...operands)
    case "NOT":
      return new exp.Not({ this: first })
    case "MINUS_PREFIX":
      return new exp.Neg({ this: first })
    case "IS_NULL":
    case "IS_NOT_NULL":
      return new exp.Is({
        this: first,
        expression: new exp.Null(),
        negated: op.kind === "IS_NOT_NULL",
      })
    case "IS_TRUE":
    case "IS_NOT_TRUE":
      return new exp.Is({
        this: first,
        expression: exp.Boolean.of(true),
        negated: op.kind === "IS_NOT_TRUE",
      })
    case "IS_FALSE":
    case "IS_NOT_FALSE":
      return new exp.Is({
        this: first,
        expression: exp.Boolean.of(false),
        negated: op.kind === "IS_NOT_FALSE",
      })
    case "IS_DISTINCT_FROM":
    case "IS_NOT_DISTINCT_FROM":
      return new exp.IsDistinctFrom({
        this: first,
        expression: second,
        negated: op.kind === "IS_NOT_DISTINCT_FROM",
      })
    case "LIKE":
      return new exp.Like({
        this: first,
        expression: second,
        escape: third,
        negated: op.negated === true,
      })
    case "SIMILAR":
      return new exp.SimilarTo({
        this: first,
        expression: second,
        escape: third,
        negated: op.negated === true,
      })
    case "IN":
    case "NOT_IN":
      return new exp.In({
        this: first,
        expressions: operands.slice(1),
        negated: op.kind === "NOT_IN",
      })
    case "ITEM":
      return new exp.Bracket({ this: first, expressions: operands.slice(1) })
    case "ROW":
      return new exp.Anonymous({ this: "ROW", expressions: operands })
    default:
      throw new ContractError(`Cannot translate operator ${op.name}`)
  }
}

// ==================== Windows ====================

interface Frame {
  readonly isRows: boolean
  readonly lowerBound?: RexWindowBound
  readonly upperBound?: RexWindowBound
}

function boundToSql(
  ctx: Context,
  bound: RexWindowBound,
): [string | exp.Expression, string | undefined] {
  switch (bound.kind) {
    case "unboundedPreceding":
      return ["UNBOUNDED", "PRECEDING"]
    case "unboundedFollowing":
      return ["UNBOUNDED", "FOLLOWING"]
    case "currentRow":
      return ["CURRENT ROW", undefined]
    case "preceding":
      return [ctx.toSql(bound.offset), "PRECEDING"]
    case "following":
      return [ctx.toSql(bound.offset), "FOLLOWING"]
  }
}

function frameToSql(ctx: Context, op: SqlOperator, frame: Frame): exp.WindowSpec | undefined {
  if (!op.allowsFraming || !frame.lowerBound) return undefined
  const [start, startSide] = boundToSql(ctx, frame.lowerBound)
  const spec = new exp.WindowSpec({
    kind: frame.isRows ? "ROWS" : "RANGE",
    start,
    start_side: startSide,
  })
  if (frame.upperBound) {
    const [end, endSide] = boundToSql(ctx, frame.upperBound)
    spec.set("end", end)
    spec.set("end_side", endSide)
  }
  return spec
}

interface WindowParts {
  readonly partitions: readonly exp.Expression[]
  readonly order: readonly exp.Expression[]
  readonly spec?: exp.WindowSpec
}

function windowedCall(
  op: SqlOperator,
  operands: exp.Expression[],
  distinct: boolean,
  parts: WindowParts,
): exp.Expression {
  if (op.kind === "SUM0") {
    const sum = windowedCall(SqlStdOperatorTable.SUM, operands, distinct, parts)
    return new exp.Anonymous({
      this: "COALESCE",
      expressions: [sum, exp.Literal.number(0)],
    })
  }
  return new exp.Window({
    this: new exp.AggFunc({ this: op.name, expressions: operands, distinct }),
    partition_by: parts.partitions.map((p) => p.copy()),
    order:
      parts.order.length > 0
        ? new exp.Order({ expressions: parts.order.map((o) => o.copy()) })
        : undefined,
    spec: parts.spec?.copy(),
  })
}

function overToSql(ctx: Context, rex: RexOver): exp.Expression {
  const { window } = rex
  const partitions = window.partitionKeys.map((k) => ctx.toSql(k))
  const order: exp.Expression[] = []
  for (const key of window.orderKeys) {
    const node = ctx.toSql(key.expr)
    pushOrderItem(ctx, order, node, node, key.direction, key.nullDirection)
  }
  const op = rex.op.kind === "OTHER_FUNCTION" ? retarget(ctx.dialect, rex) : rex.op
  return windowedCall(
    op,
    rex.operands.map((o) => ctx.toSql(o)),
    rex.distinct,
    { partitions, order, spec: frameToSql(ctx, rex.op, window) },
  )
}

export function windowGroupToSql(
  ctx: Context,
  group: WindowGroup,
  constants: readonly RexLiteral[],
  inputFieldCount: number,
): exp.Expression[] {
  const partitions = group.keys.map((k) => ctx.field(k))
  const order: exp.Expression[] = []
  for (const collation of group.orderKeys) addOrderItem(ctx, order, collation)

  // Ordinals past the input's fields refer to the window's constants
  const resolve = (operand: RexNode): RexNode => {
    if (operand.kind !== "inputRef" || operand.index < inputFieldCount) return operand
    const constant = constants[operand.index - inputFieldCount]
    if (!constant) throw new ContractError(`Window constant ${operand.index} out of range`)
    return constant
  }

  return group.aggCalls.map((call) => {
    const op =
      call.op.kind === "OTHER_FUNCTION"
        ? retargetOperator(ctx.dialect, call.op, call.operands.map((o) => o.type))
        : call.op
    return windowedCall(
      op,
      call.operands.map((o) => ctx.toSql(resolve(o))),
      call.distinct,
      { partitions, order, spec: frameToSql(ctx, call.op, group) },
    )
  })
}

// ==================== Sorting ====================

function pushOrderItem(
  ctx: Context,
  items: exp.Expression[],
  emulated: exp.Expression,
  node: exp.Expression,
  direction: Direction,
  nullDirection: NullDirection,
): void {
  const desc = direction === "DESC"
  let nulls = nullDirection
  if (nulls !== "UNSPECIFIED") {
    const emulation = ctx.dialect.emulateNullDirection(emulated, nulls === "FIRST", desc)
    if (emulation) {
      items.push(emulation)
      nulls = "UNSPECIFIED"
    }
  }
  const ordered = new exp.Ordered({ this: node, desc })
  if (nulls !== "UNSPECIFIED" && nulls !== ctx.dialect.defaultNullDirection(direction)) {
    ordered.set("nulls_first", nulls === "FIRST")
  }
  items.push(ordered)
}

/**
 * Appends the ORDER BY item for `collation`, preceded by a null-ordering
 * key when the dialect cannot write `NULLS FIRST/LAST`.
 */
export function addOrderItem(
  ctx: Context,
  items: exp.Expression[],
  collation: FieldCollation,
): void {
  pushOrderItem(
    ctx,
    items,
    ctx.field(collation.fieldIndex),
    ctx.orderField(collation.fieldIndex),
    collation.direction,
    collation.nullDirection,
  )
}

// ==================== Aggregates ====================

function aggregateToSql(
  ctx: Context,
  op: SqlOperator,
  distinct: boolean,
  operands: exp.Expression[],
  filterArg: number | undefined,
  collation: readonly FieldCollation[],
): exp.Expression {
  if (op.kind === "SUM0") {
    const sum = aggregateToSql(
      ctx,
      SqlStdOperatorTable.SUM,
      distinct,
      operands,
      filterArg,
      collation,
    )
    return new exp.Anonymous({
      this: "COALESCE",
      expressions: [sum, exp.Literal.number(0)],
    })
  }

  if (filterArg !== undefined && !ctx.dialect.capabilities.supportsAggregateFilter) {
    // AGG(x) FILTER (WHERE f) → AGG(CASE WHEN f THEN x END)
    const [first, ...rest] = operands
    const conditional = new exp.Case({
      ifs: [
        new exp.If({
          this: ctx.field(filterArg),
          true: first ?? exp.Literal.number(1),
        }),
      ],
    })
    return aggregateToSql(ctx, op, distinct, [conditional, ...rest], undefined, collation)
  }

  const args = op.kind === "COUNT" && operands.length === 0 ? [new exp.Star()] : operands
  const name = op.kind === "OTHER_FUNCTION" ? ctx.dialect.operatorForOtherFunction(op).name : op.name
  let node: exp.Expression = new exp.AggFunc({ this: name, expressions: args, distinct })
  if (filterArg !== undefined) {
    node = new exp.Filter({
      this: node,
      expression: new exp.Where({ this: ctx.field(filterArg) }),
    })
  }
  if (collation.length > 0) {
    const items: exp.Expression[] = []
    for (const key of collation) addOrderItem(ctx, items, key)
    node = new exp.WithinGroup({
      this: node,
      expression: new exp.Order({ expressions: items }),
    })
  }
  return node
}

export function aggregateCallToSql(ctx: Context, call: AggregateCall): exp.Expression {
  return aggregateToSql(
    ctx,
    call.op,
    call.distinct,
    call.args.map((a) => ctx.field(a)),
    call.filterArg,
    call.collation,
  )
}
