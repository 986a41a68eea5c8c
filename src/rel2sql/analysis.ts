/**
 * Whether a node must be wrapped in a subquery before a parent can add
 * its clauses
 */

import type { DialectCapabilities } from "../dialect.js"
import * as exp from "../expressions.js"
import type { Aggregate, Project, RelNode } from "../rel/rel.js"
import { containsOver, operandsOf, type RexNode } from "../rel/rex.js"
import { findAllInScope, findInScope } from "../scope.js"
import { Clause, clausesFit, maxClause } from "./clause.js"

export interface SubQueryCheck {
  /** The SQL built so far for the input */
  readonly node: exp.Expression
  /** The node that will add clauses on top */
  readonly rel: RelNode
  /** Clauses `node` already uses */
  readonly clauses: readonly Clause[]
  /** Clauses `rel` is about to add */
  readonly expected: ReadonlySet<Clause>
  readonly capabilities: DialectCapabilities
}

/** A verdict, or undefined to defer to the next rule. */
export type SubQueryRule = (check: SubQueryCheck) => boolean | undefined

// ==================== Helpers ====================

function selectOf(node: exp.Expression): exp.Select | undefined {
  return node instanceof exp.Select ? node : undefined
}

function collectRex(rex: RexNode, predicate: (n: RexNode) => boolean): RexNode[] {
  const found = predicate(rex) ? [rex] : []
  for (const child of operandsOf(rex)) found.push(...collectRex(child, predicate))
  return found
}

function inputRefs(rex: RexNode): number[] {
  return collectRex(rex, (n) => n.kind === "inputRef").flatMap((n) =>
    n.kind === "inputRef" ? [n.index] : [],
  )
}

// The immediate operands of a select item; an aliased item's is its expression
function itemOperands(item: exp.Expression): exp.Expression[] {
  if (item instanceof exp.Alias) {
    const inner = item.arg("this")
    return inner ? [inner] : []
  }
  if (item instanceof exp.Column || item instanceof exp.Literal) return []
  return [...item.iterExpressions()]
}

function isAggregateCall(node: exp.Expression): boolean {
  if (node instanceof exp.AggFunc) return true
  return (
    (node instanceof exp.Filter || node instanceof exp.WithinGroup) &&
    node.arg("this") instanceof exp.AggFunc
  )
}

function isWindowedCall(node: exp.Expression): boolean {
  return node instanceof exp.Window
}

function containsWindow(node: exp.Expression | undefined): boolean {
  return node !== undefined && findInScope(node, [exp.Window]) !== undefined
}

function isAnalyticOrCaseOverAnalytic(node: exp.Expression): boolean {
  if (node instanceof exp.Window) return true
  return node instanceof exp.Case && node.ifs.some((i) => containsWindow(i.arg("this")))
}

/** Whether a select item feeding an aggregate argument has an operand matching `predicate`. */
function hasNested(
  node: exp.Expression,
  aggregate: Aggregate,
  predicate: (operand: exp.Expression) => boolean,
): boolean {
  const list = selectOf(node)?.selectList
  if (!list) return false
  const args = new Set(aggregate.aggCalls.flatMap((c) => c.args))
  for (const arg of args) {
    const item = list[arg]
    if (item && itemOperands(item).some(predicate)) return true
  }
  return false
}

/** `GROUP BY x` where the SELECT being replaced aliased something else as x and the projection drops it. */
function hasAliasUsedInGroupByNotProjected(node: exp.Expression, project: Project): boolean {
  const select = selectOf(node)
  const groupBy = select?.groupBy
  if (!select || !groupBy) return false
  const projected = new Set(project.rowType.fields.map((f) => f.name))
  const aliases = new Set(
    (select.selectList ?? []).flatMap((item) => (item instanceof exp.Alias ? [item.alias] : [])),
  )
  return groupBy.some((item) => {
    if (!(item instanceof exp.Column)) return false
    const name = item.table === "" ? item.name : item.table
    return aliases.has(name) && !projected.has(name)
  })
}

/** A projection named like a GROUP BY column that is computed from an aggregate. */
function hasAggregateUsedInGroupBy(node: exp.Expression, project: Project): boolean {
  const select = selectOf(node)
  const groupBy = select?.groupBy
  if (!select || !groupBy) return false
  const list = select.selectList ?? []
  const names = new Set<string>()
  project.projects.forEach((rex, i) => {
    const name = project.rowType.fields[i]?.name
    if (name === undefined) return
    if (inputRefs(rex).some((ref) => list[ref]?.find(exp.AggFunc) !== undefined)) {
      names.add(name)
    }
  })
  return groupBy.some(
    (item) => item instanceof exp.Column && item.table === "" && names.has(item.name),
  )
}

/** A windowed projection whose operands are themselves windowed select items. */
function hasNestedAnalyticalFunctions(node: exp.Expression, project: Project): boolean {
  const list = selectOf(node)?.selectList
  if (!list) return false
  return project.projects.some((rex) =>
    collectRex(rex, (n) => n.kind === "over").some((over) =>
      inputRefs(over).some((ref) => containsWindow(list[ref])),
    ),
  )
}

function hasAliasUsedInHaving(node: exp.Expression): boolean {
  const select = selectOf(node)
  const list = select?.selectList
  const having = select?.clause("having")
  if (!list || !having) return false
  if (!list.every((item) => item instanceof exp.Alias || item instanceof exp.Column)) {
    return false
  }
  const aliases = new Set(list.flatMap((item) => (item instanceof exp.Alias ? [item.alias] : [])))
  for (const column of findAllInScope(having, [exp.Column])) {
    if (column.table === "" && aliases.has(column.name)) return true
  }
  return false
}

// ==================== Rules ====================

const noClausesYet: SubQueryRule = ({ clauses }) => (clauses.length === 0 ? false : undefined)

// A filter over windowed projections becomes QUALIFY on the same SELECT
const qualifyOverAnalytic: SubQueryRule = ({ rel, clauses, capabilities }) => {
  if (
    rel.kind === "filter" &&
    rel.input.kind === "project" &&
    capabilities.supportsQualify &&
    rel.input.projects.some(containsOver) &&
    !containsOver(rel.condition) &&
    maxClause(clauses) === Clause.SELECT
  ) {
    return false
  }
  return undefined
}

const clauseOrder: SubQueryRule = ({ clauses, expected }) =>
  clausesFit(clauses, expected) ? undefined : true

// A new select list over SELECT DISTINCT changes which rows are distinct
const distinctProjection: SubQueryRule = ({ node, rel }) =>
  (rel.kind === "project" || rel.kind === "window") && node.args.distinct === true
    ? true
    : undefined

const aggregateInGroupBy: SubQueryRule = ({ node, rel, capabilities }) =>
  rel.kind === "project" &&
  rel.input.kind === "aggregate" &&
  !capabilities.supportsAggInGroupBy &&
  hasAggregateUsedInGroupBy(node, rel)
    ? true
    : undefined

const nestedAnalytic: SubQueryRule = ({ node, rel, capabilities }) =>
  rel.kind === "project" &&
  !capabilities.supportsNestedAnalyticalFunctions &&
  hasNestedAnalyticalFunctions(node, rel)
    ? true
    : undefined

const nestedAggregation: SubQueryRule = ({ node, rel, capabilities }) =>
  rel.kind === "aggregate" &&
  !capabilities.supportsNestedAggregations &&
  hasNested(node, rel, (o) => isAggregateCall(o) || isWindowedCall(o))
    ? true
    : undefined

const groupByAliasDropped: SubQueryRule = ({ node, rel, clauses, capabilities }) =>
  rel.kind === "project" &&
  clauses.includes(Clause.GROUP_BY) &&
  capabilities.groupByAlias &&
  hasAliasUsedInGroupByNotProjected(node, rel)
    ? true
    : undefined

// Grouping by the alias of a windowed projection needs the window computed first
const groupByAnalytic: SubQueryRule = ({ node, rel, capabilities }) => {
  if (rel.kind !== "aggregate" || rel.input.kind !== "project" || !capabilities.groupByAlias) {
    return undefined
  }
  const list = selectOf(node)?.selectList
  if (!list) return undefined
  return rel.groupSet.some((key) => containsWindow(list[key])) ? true : undefined
}

const analyticInAggregate: SubQueryRule = ({ node, rel, capabilities }) =>
  rel.kind === "aggregate" &&
  !capabilities.supportsAnalyticalFunctionInAggregate &&
  hasNested(node, rel, isAnalyticOrCaseOverAnalytic)
    ? true
    : undefined

const sortOverIntersect: SubQueryRule = ({ node, rel }) =>
  rel.kind === "sort" && node instanceof exp.Intersect ? true : undefined

const havingAliasUsed: SubQueryRule = ({ node, rel, clauses, capabilities }) =>
  rel.kind === "project" &&
  clauses.includes(Clause.HAVING) &&
  capabilities.havingAlias &&
  hasAliasUsedInHaving(node)
    ? true
    : undefined

const analyticOverSelect: SubQueryRule = ({ rel, clauses }) => {
  const windowed =
    (rel.kind === "project" && rel.projects.some(containsOver)) || rel.kind === "window"
  return windowed && maxClause(clauses) === Clause.SELECT ? true : undefined
}

const aggregateOverAggregate: SubQueryRule = ({ node, rel, clauses }) => {
  if (rel.kind !== "aggregate") return undefined
  if (clauses.includes(Clause.GROUP_BY)) {
    // A grand total over a nested aggregate keeps the inner DISTINCT
    return !hasNested(node, rel, isAggregateCall) || rel.groupSet.length > 0
  }
  if (rel.input.kind === "project" && rel.input.distinct) return true
  return undefined
}

const groupByAliasInHaving: SubQueryRule = ({ node, rel, clauses }) =>
  rel.kind === "project" &&
  clauses.includes(Clause.HAVING) &&
  !hasAliasUsedInHaving(node) &&
  hasAliasUsedInGroupByNotProjected(node, rel)
    ? true
    : undefined

/** Evaluated in order; the first rule with a verdict decides. */
export const SUBQUERY_RULES: readonly SubQueryRule[] = [
  noClausesYet,
  qualifyOverAnalytic,
  clauseOrder,
  distinctProjection,
  aggregateInGroupBy,
  nestedAnalytic,
  nestedAggregation,
  groupByAliasDropped,
  groupByAnalytic,
  analyticInAggregate,
  sortOverIntersect,
  havingAliasUsed,
  analyticOverSelect,
  aggregateOverAggregate,
  groupByAliasInHaving,
]

/**
 * Whether `check.node` must become a subquery so `check.rel` can add
 * `check.expected` to a fresh SELECT. Depends only on its argument.
 */
export function needNewSubQuery(check: SubQueryCheck): boolean {
  for (const rule of SUBQUERY_RULES) {
    const verdict = rule(check)
    if (verdict !== undefined) return verdict
  }
  return false
}
