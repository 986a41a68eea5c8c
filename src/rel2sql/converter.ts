/**
 * Converts a relational algebra tree to a SQL AST, one visit per node kind
 */

import { ContractError, UnsupportedError } from "../errors.js"
import * as exp from "../expressions.js"
import {
  type Aggregate,
  type Filter,
  inputsOf,
  type Join,
  type Match,
  type Project,
  type RelNode,
  type SetOp,
  type Sort,
  type TableFunctionScan,
  type TableScan,
  type Values,
  type Window,
} from "../rel/rel.js"
import { containsOver, isLiteralTrue, type RexNode } from "../rel/rex.js"
import type { SqlType } from "../rel/types.js"
import { Clause } from "./clause.js"
import type { Context } from "./context.js"
import { type Result, SqlImplementor } from "./implementor.js"
import { alwaysFalse, asFromItem, tableAlias } from "./nodes.js"

type GroupKind = "SIMPLE" | "ROLLUP" | "CUBE" | "OTHER"

const SET_OPERATIONS = {
  UNION: exp.Union,
  INTERSECT: exp.Intersect,
  EXCEPT: exp.Except,
} as const

function sameKeys(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((key, i) => key === b[i])
}

function sorted(keys: readonly number[]): number[] {
  return [...keys].sort((a, b) => a - b)
}

/**
 * Keys of ROLLUP(k1, …, kn) when `sets` are its prefixes, longest first;
 * undefined otherwise.
 */
export function rollupKeys(
  groupSet: readonly number[],
  sets: readonly (readonly number[])[],
): number[] | undefined {
  if (sets.length !== groupSet.length + 1) return undefined
  const bySize = [...sets].map(sorted).sort((a, b) => b.length - a.length)
  const [largest] = bySize
  if (!largest || !sameKeys(largest, sorted(groupSet))) return undefined
  const removed: number[] = []
  for (let i = 1; i < bySize.length; i++) {
    const previous = bySize[i - 1] ?? []
    const current = bySize[i] ?? []
    if (current.length !== previous.length - 1) return undefined
    const dropped = previous.filter((k) => !current.includes(k))
    const [key] = dropped
    if (dropped.length !== 1 || key === undefined) return undefined
    removed.push(key)
  }
  return removed.reverse()
}

function isCube(groupSet: readonly number[], sets: readonly (readonly number[])[]): boolean {
  if (sets.length !== 2 ** groupSet.length) return false
  const seen = new Set<string>()
  for (const set of sets) {
    if (!set.every((k) => groupSet.includes(k))) return false
    seen.add(sorted(set).join(","))
  }
  return seen.size === sets.length
}

export function groupKind(rel: Aggregate): GroupKind {
  const [only] = rel.groupSets
  if (rel.groupSets.length === 1 && only && sameKeys(sorted(only), rel.groupSet)) {
    return "SIMPLE"
  }
  if (rollupKeys(rel.groupSet, rel.groupSets)) return "ROLLUP"
  if (isCube(rel.groupSet, rel.groupSets)) return "CUBE"
  return "OTHER"
}

/**
 * Walks an algebra tree bottom-up, building on each input's SQL or
 * wrapping it in a subquery where the new clauses would not fit.
 */
export class RelToSqlConverter extends SqlImplementor {
  // Nodes being visited, root first
  private readonly stack: RelNode[] = []

  visitRoot(rel: RelNode): Result {
    return this.dispatch(rel)
  }

  /** Visits input `i` of `parent`, recording the clauses `parent` will add. */
  visitInput(
    parent: RelNode,
    i: number,
    expected: readonly Clause[] = [],
    ignoreClauses = false,
  ): Result {
    const input = this.inputOf(parent, i)
    return this.dispatch(input).withExpectedClauses(ignoreClauses, new Set(expected), parent)
  }

  private inputOf(parent: RelNode, i: number): RelNode {
    const input = inputsOf(parent)[i]
    if (!input) throw new ContractError(`A ${parent.kind} node has no input ${i}`)
    return input
  }

  private dispatch(rel: RelNode): Result {
    this.stack.push(rel)
    try {
      return this.visit(rel)
    } finally {
      this.stack.pop()
    }
  }

  private visit(rel: RelNode): Result {
    switch (rel.kind) {
      case "scan":
        return this.visitScan(rel)
      case "filter":
        return this.visitFilter(rel)
      case "project":
        return this.visitProject(rel)
      case "aggregate":
        return this.visitAggregate(rel)
      case "join":
        return rel.joinType === "SEMI" || rel.joinType === "ANTI"
          ? this.visitSemiJoin(rel)
          : this.visitJoin(rel)
      case "setOp":
        return this.visitSetOp(rel)
      case "sort":
        return this.visitSort(rel)
      case "window":
        return this.visitWindow(rel)
      case "tableFunctionScan":
        return this.visitTableFunctionScan(rel)
      case "values":
        return this.visitValues(rel)
      case "match":
        return this.visitMatch(rel)
    }
  }

  private get isRoot(): boolean {
    return this.stack.length === 1
  }

  // ==================== Visits ====================

  protected visitScan(rel: TableScan): Result {
    return this.result(exp.Table.fromParts(rel.table), [Clause.FROM], rel, undefined)
  }

  protected visitFilter(rel: Filter): Result {
    const { input } = rel
    if (input.kind === "aggregate") {
      const x = this.visitInput(rel, 0, [Clause.HAVING], input.input.kind === "project")
      this.registerCorrelation(rel.variablesSet, x)
      const builder = x.builder(rel)
      const condition = builder.context.toSql(rel.condition)
      const existing = builder.select.clause("having")
      builder.setHaving(existing ? exp.and(existing, condition) : condition)
      return builder.result()
    }

    if (this.isQualifyFilter(rel)) {
      const x = this.visitInput(rel, 0, [Clause.QUALIFY])
      this.registerCorrelation(rel.variablesSet, x)
      const builder = x.builder(rel)
      const condition = builder.context.toSql(rel.condition)
      const existing = builder.select.clause("qualify")
      builder.setQualify(existing ? exp.and(existing, condition) : condition)
      return builder.result()
    }

    const x = this.visitInput(rel, 0, [Clause.WHERE])
    this.registerCorrelation(rel.variablesSet, x)
    const builder = x.builder(rel)
    builder.setWhere(builder.context.toSql(rel.condition))
    return builder.result()
  }

  private isQualifyFilter(rel: Filter): boolean {
    return (
      this.dialect.capabilities.supportsQualify &&
      rel.input.kind === "project" &&
      rel.input.projects.some(containsOver) &&
      !containsOver(rel.condition)
    )
  }

  protected visitProject(rel: Project): Result {
    const x = this.visitInput(rel, 0, [Clause.SELECT])
    this.registerCorrelation(rel.variablesSet, x)
    const builder = x.builder(rel)
    if (!isStar(rel)) {
      const list: exp.Expression[] = []
      rel.projects.forEach((rex, i) => {
        const type = rel.rowType.fields[i]?.type
        let node = builder.context.toSql(rex)
        if (node instanceof exp.Null && type) node = this.castNull(node, type)
        this.addSelect(list, node, rel.rowType)
      })
      builder.setSelect(list)
    }
    if (rel.distinct) builder.setDistinct()
    return builder.result()
  }

  protected visitAggregate(rel: Aggregate): Result {
    const x = this.visitInput(rel, 0, [Clause.GROUP_BY], rel.input.kind === "project")
    const builder = x.builder(rel)
    const { context } = builder
    const list: exp.Expression[] = []
    for (const key of rel.groupSet) this.addSelect(list, context.field(key), rel.rowType)
    const groupBy = this.groupByList(context, rel)
    for (const call of rel.aggCalls) {
      this.addSelect(list, context.aggregateCall(call), rel.rowType)
    }
    // No keys and no calls: one row per group, but nothing to select
    if (list.length === 0) list.push(exp.Literal.number(1))
    builder.setSelect(list)
    // GROUP BY () keeps a keyless, call-less aggregate from returning every row
    if (groupBy.length > 0 || rel.aggCalls.length === 0) builder.setGroupBy(groupBy)
    return builder.result()
  }

  private groupByList(context: Context, rel: Aggregate): exp.Expression[] {
    const kind = groupKind(rel)
    if (kind !== "SIMPLE" && !this.dialect.capabilities.supportsGroupingSets) {
      throw UnsupportedError.of(
        kind === "OTHER" ? "GROUPING SETS" : kind,
        this.dialect.name,
      )
    }
    const fields = (keys: readonly number[]) => keys.map((k) => context.groupField(k))
    switch (kind) {
      case "SIMPLE":
        return fields(rel.groupSet)
      case "ROLLUP":
        return [
          new exp.Rollup({
            expressions: fields(rollupKeys(rel.groupSet, rel.groupSets) ?? rel.groupSet),
          }),
        ]
      case "CUBE":
        return [new exp.Cube({ expressions: fields(rel.groupSet) })]
      case "OTHER":
        return [
          new exp.GroupingSets({
            expressions: rel.groupSets.map((set) => {
              const [only] = set
              return set.length === 1 && only !== undefined
                ? context.groupField(only)
                : new exp.Tuple({ expressions: fields(set) })
            }),
          }),
        ]
    }
  }

  protected visitJoin(rel: Join): Result {
    const left = this.visitInput(rel, 0).resetAlias()
    const right = this.visitInput(rel, 1).resetAlias()
    this.registerCorrelation(rel.variablesSet, left)
    const leftContext = left.qualifiedContext()
    const rightContext = right.qualifiedContext()

    let join: exp.Join
    if (isLiteralTrue(rel.condition) && rel.joinType === "INNER") {
      join = new exp.Join({
        this: left.asFrom(),
        expression: right.asFrom(),
        kind: this.dialect.capabilities.crossJoinStyle,
      })
    } else {
      join = new exp.Join({
        this: left.asFrom(),
        expression: right.asFrom(),
        kind: rel.joinType,
        on: this.convertConditionToSqlNode(rel.condition, leftContext, rightContext),
      })
    }
    return this.joinResult(join, left, right, rel)
  }

  /** `SELECT * FROM l WHERE [NOT] EXISTS (SELECT 1 FROM r WHERE cond)` */
  protected visitSemiJoin(rel: Join): Result {
    const left = this.visitInput(rel, 0).resetAlias()
    const right = this.visitInput(rel, 1).resetAlias()
    this.registerCorrelation(rel.variablesSet, left)
    const condition = this.convertConditionToSqlNode(
      rel.condition,
      left.qualifiedContext(),
      right.qualifiedContext(),
    )

    const select = left.neededAlias === undefined ? left.asSelect() : left.subSelect()
    const exists = new exp.Select({
      expressions: [exp.Literal.number(1)],
      from: new exp.From({ this: right.asFrom() }),
      where: new exp.Where({ this: condition }),
    })
    let predicate: exp.Expression = new exp.Exists({ this: exists })
    if (rel.joinType === "ANTI") predicate = new exp.Not({ this: predicate })
    const where = select.clause("where")
    select.set("where", new exp.Where({ this: where ? exp.and(where, predicate) : predicate }))
    return this.result(select, [Clause.FROM, Clause.WHERE], rel, undefined)
  }

  protected visitSetOp(rel: SetOp): Result {
    const ctor = SET_OPERATIONS[rel.op]
    let node: exp.Expression | undefined
    for (let i = 0; i < rel.inputs.length; i++) {
      const select = this.visitInput(rel, i).asSelect()
      node = node ? new ctor({ this: node, expression: select, distinct: !rel.all }) : select
    }
    if (!node) throw new ContractError(`${rel.op} without inputs`)
    return this.result(node, [Clause.SET_OP], rel, undefined)
  }

  protected visitSort(rel: Sort): Result {
    const x = this.visitInput(rel, 0, [Clause.ORDER_BY, Clause.FETCH, Clause.OFFSET])
    const builder = x.builder(rel)
    // Below the root a SELECT * would expose fields the sort does not
    if (!this.isRoot && builder.select.selectList === undefined) {
      const list: exp.Expression[] = []
      rel.rowType.fields.forEach((_, i) => {
        this.addSelect(list, builder.context.field(i), rel.rowType)
      })
      builder.setSelect(list)
    }

    const items: exp.Expression[] = []
    for (const collation of rel.collation) builder.addOrderItem(items, collation)
    if (items.length > 0) builder.setOrderBy(items)
    if (rel.fetch) builder.setFetch(builder.context.toSql(rel.fetch))
    if (rel.offset) builder.setOffset(builder.context.toSql(rel.offset))
    return builder.result()
  }

  protected visitWindow(rel: Window): Result {
    const x = this.visitInput(rel, 0, [Clause.SELECT])
    const builder = x.builder(rel)
    const { context } = builder
    const inputCount = rel.input.rowType.fields.length
    const calls = rel.groups.flatMap((group) =>
      context.windowGroup(group, rel.constants, inputCount),
    )
    const list: exp.Expression[] = []
    for (let i = 0; i < inputCount; i++) {
      this.addSelect(list, context.field(i), rel.rowType)
    }
    for (const call of calls) this.addSelect(list, call, rel.rowType)
    builder.setSelect(list)
    return builder.result()
  }

  /** `SELECT * FROM TABLE(f(CURSOR (SELECT …)))` */
  protected visitTableFunctionScan(rel: TableFunctionScan): Result {
    const inputs = rel.inputs.map((_, i) => this.visitInput(rel, i).asSelect())
    const call = this.tableFunctionScanContext(inputs).toSql(rel.call)
    const select = new exp.Select({
      from: new exp.From({ this: new exp.TableFunction({ this: call }) }),
    })
    return this.result(select, [Clause.SELECT], rel, undefined)
  }

  protected visitValues(rel: Values): Result {
    const context = this.aliasContext(new Map(), false)
    const alias = this.unusedAlias()
    const fields = rel.rowType.fields
    const typedNulls = () => fields.map((f) => this.castNull(new exp.Null(), f.type))
    let node: exp.Expression

    if (this.dialect.capabilities.supportsAliasedValues) {
      const rows =
        rel.tuples.length === 0
          ? [new exp.Tuple({ expressions: typedNulls() })]
          : rel.tuples.map(
              (tuple) => new exp.Tuple({ expressions: tuple.map((v) => context.toSql(v)) }),
            )
      const values = new exp.Values({
        expressions: rows,
        alias: tableAlias(alias, fields.map((f) => f.name)),
      })
      node =
        rel.tuples.length === 0
          ? new exp.Select({
              from: new exp.From({ this: values }),
              where: new exp.Where({ this: alwaysFalse() }),
            })
          : values
    } else {
      const selectOf = (items: exp.Expression[]) =>
        new exp.Select({
          expressions: items.map((item, i) => exp.alias(item, fields[i]?.name ?? `EXPR$${i}`)),
        })
      if (rel.tuples.length === 0) {
        node = new exp.Select({
          from: new exp.From({ this: asFromItem(selectOf(typedNulls()), alias) }),
          where: new exp.Where({ this: alwaysFalse() }),
        })
      } else {
        let union: exp.Expression | undefined
        for (const tuple of rel.tuples) {
          const select = selectOf(tuple.map((v) => context.toSql(v)))
          union = union ? new exp.Union({ this: union, expression: select, distinct: false }) : select
        }
        if (!union) throw new ContractError("VALUES without rows")
        node = union
      }
    }
    return this.result(node, [Clause.SELECT], rel, undefined)
  }

  /** `input MATCH_RECOGNIZE (…)`, a FROM item */
  protected visitMatch(rel: Match): Result {
    const x = this.visitInput(rel, 0).resetAlias()
    const context = this.matchRecognizeContext(x.qualifiedContext())
    const named = (entries: ReadonlyMap<string, RexNode>) =>
      [...entries].map(([name, rex]) => exp.alias(context.toSql(rex), name))

    const orderBy: exp.Expression[] = []
    for (const collation of rel.orderKeys) context.addOrderItem(orderBy, collation)
    const { after } = rel

    const node = new exp.MatchRecognize({
      this: x.asFrom(),
      partition_by: rel.partitionKeys.map((key) => context.field(key)),
      order: orderBy.length > 0 ? new exp.Order({ expressions: orderBy }) : undefined,
      measures: named(rel.measures),
      rows: rel.allRows ? "ALL ROWS PER MATCH" : "ONE ROW PER MATCH",
      after: typeof after === "string" ? after : `SKIP TO ${after.skipTo}`,
      after_variable: typeof after === "string" ? undefined : exp.identifier(after.variable),
      pattern: context.toSql(rel.pattern),
      strict_start: rel.strictStart,
      strict_end: rel.strictEnd,
      within: rel.interval ? context.toSql(rel.interval) : undefined,
      subsets: [...rel.subsets].map(([name, variables]) =>
        exp.alias(new exp.Tuple({ expressions: variables.map((v) => exp.identifier(v)) }), name),
      ),
      define: named(rel.patternDefinitions),
    })
    return this.result(node, [Clause.FROM], rel, undefined)
  }

  // ==================== Helpers ====================

  /** `CAST(NULL AS type)`, so the column keeps its type. */
  private castNull(node: exp.Expression, type: SqlType): exp.Expression {
    return type.name === "NULL" ? node : this.dialect.castCall(node, type)
  }
}

/** Whether `rel` passes its input through unchanged. */
function isStar(rel: Project): boolean {
  const inputFields = rel.input.rowType.fields
  if (rel.projects.length !== inputFields.length) return false
  return rel.projects.every(
    (rex, i) =>
      rex.kind === "inputRef" &&
      rex.index === i &&
      rel.rowType.fields[i]?.name === inputFields[i]?.name,
  )
}
