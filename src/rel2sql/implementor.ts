/**
 * State shared while converting one tree: the SQL built for each visited
 * node, its aliases, and the builders that extend it
 */

import type { Dialect } from "../dialect.js"
import { ContractError } from "../errors.js"
import * as exp from "../expressions.js"
import { isComparison, reverseComparison } from "../rel/operators.js"
import { type FieldCollation, inputsOf, type RelNode } from "../rel/rel.js"
import type { CorrelationId, RexNode } from "../rel/rex.js"
import { type RowType, uniquify } from "../rel/types.js"
import { needNewSubQuery } from "./analysis.js"
import { Clause } from "./clause.js"
import {
  AliasContext,
  type Context,
  type Implementor,
  JoinContext,
  MatchRecognizeContext,
  SelectListContext,
  TableFunctionScanContext,
} from "./context.js"
import { aliasColumns, aliasOf, asFromItem, hasAlias } from "./nodes.js"
import { stripCastFromString } from "./translator.js"

/** Input aliases in FROM order; field ordinals run across them. */
export type Aliases = ReadonlyMap<string, RowType>

const NO_CLAUSES: ReadonlySet<Clause> = new Set()

function firstInputRowType(rel: RelNode): RowType {
  const [input] = inputsOf(rel)
  if (!input) throw new ContractError(`A ${rel.kind} node has no input`)
  return input.rowType
}

/**
 * The SQL for a visited node, with what a parent needs to build on it:
 * the clauses it uses, the alias it must be referenced by, and the
 * aliases its fields resolve through.
 */
export class Result {
  constructor(
    readonly implementor: SqlImplementor,
    readonly node: exp.Expression,
    readonly clauses: readonly Clause[],
    readonly neededAlias: string | undefined,
    readonly neededType: RowType | undefined,
    readonly aliases: Aliases,
    readonly expectedClauses: ReadonlySet<Clause> = NO_CLAUSES,
    readonly expectedRel?: RelNode,
    readonly ignoreClauses = false,
  ) {}

  /** The same result, annotated with what `rel` is about to add. */
  withExpectedClauses(
    ignoreClauses: boolean,
    expected: ReadonlySet<Clause>,
    rel: RelNode,
  ): Result {
    return new Result(
      this.implementor,
      this.node,
      this.clauses,
      this.neededAlias,
      this.neededType,
      this.aliases,
      expected,
      rel,
      ignoreClauses,
    )
  }

  /**
   * A builder for `rel` to add its clauses with: the current SELECT when
   * the clauses fit, otherwise a new SELECT over this one as a subquery.
   */
  builder(rel: RelNode): Builder {
    if (rel !== this.expectedRel) {
      throw new ContractError(
        `Builder requested by a ${rel.kind} node for an input visited by another node`,
      )
    }
    const { dialect } = this.implementor
    const capabilities = dialect.capabilities
    const needNew = needNewSubQuery({
      node: this.node,
      rel,
      clauses: this.clauses,
      expected: this.ignoreClauses ? NO_CLAUSES : this.expectedClauses,
      capabilities,
    })

    const select = needNew ? this.subSelect() : this.asSelect()
    const clauses = needNew
      ? [...this.expectedClauses]
      : [...this.clauses, ...this.expectedClauses]

    const selectList = select.selectList
    let context: Context
    let newAliases: Aliases | undefined
    if (selectList) {
      const sortByAlias = rel.kind === "sort" && capabilities.sortByAlias
      context = new SelectListContext(this.implementor, selectList, {
        aliasRef:
          (this.expectedClauses.has(Clause.HAVING) && capabilities.havingAlias) || sortByAlias,
        groupByAlias: this.expectedClauses.has(Clause.GROUP_BY) && capabilities.groupByAlias,
      })
    } else {
      const qualified =
        !capabilities.hasImplicitTableAlias ||
        this.implementor.identicalNameIssue ||
        this.aliases.size > 1
      if (
        needNew &&
        this.neededAlias !== undefined &&
        (this.aliases.size !== 1 || !this.aliases.has(this.neededAlias))
      ) {
        newAliases = new Map([[this.neededAlias, firstInputRowType(rel)]])
        context = this.implementor.aliasContext(newAliases, qualified)
      } else {
        context = this.implementor.aliasContext(this.aliases, qualified)
      }
    }

    const aliases =
      needNew && this.neededAlias !== undefined && !this.aliases.has(this.neededAlias)
        ? newAliases
        : this.aliases
    return new Builder(this.implementor, rel, clauses, select, context, aliases)
  }

  /** The node as a FROM item, aliased when it must be. */
  asFrom(): exp.Expression {
    return this.neededAlias === undefined ? this.node : asFromItem(this.node, this.neededAlias)
  }

  /** A new SELECT reading from this node. */
  subSelect(): exp.Select {
    return this.implementor.wrapSelect(this.asFrom())
  }

  /** The node as a SELECT, wrapping it in one when it is not. */
  asSelect(): exp.Select {
    if (this.node instanceof exp.Select) return this.node
    const { capabilities } = this.implementor.dialect
    if (!capabilities.hasImplicitTableAlias || this.implementor.identicalNameIssue) {
      return this.implementor.wrapSelect(this.asFrom())
    }
    return this.implementor.wrapSelect(this.node)
  }

  /** The node as a top-level statement; set operations stay bare. */
  asStatement(): exp.Expression {
    if (this.node instanceof exp.SetOperation) return this.node
    return this.asSelect()
  }

  /** The node as a query inside an expression; set operations and bare VALUES stay as they are. */
  asQueryOrValues(): exp.Expression {
    if (this.node instanceof exp.SetOperation) return this.node
    if (this.node instanceof exp.Values && !hasAlias(this.node)) return this.node
    return this.asSelect()
  }

  /** A context whose fields are always qualified by their alias. */
  qualifiedContext(): AliasContext {
    return this.implementor.aliasContext(this.aliases, true)
  }

  /** The same result, with the needed alias as its only alias. */
  resetAlias(): Result {
    if (this.neededAlias === undefined) return this
    if (!this.neededType) throw new ContractError(`No row type for alias ${this.neededAlias}`)
    return new Result(
      this.implementor,
      this.node,
      this.clauses,
      this.neededAlias,
      this.neededType,
      new Map([[this.neededAlias, this.neededType]]),
      this.expectedClauses,
      this.expectedRel,
      this.ignoreClauses,
    )
  }
}

/** Adds clauses to one SELECT, checking each was declared up front. */
export class Builder {
  constructor(
    private readonly implementor: SqlImplementor,
    readonly rel: RelNode,
    readonly clauses: readonly Clause[],
    readonly select: exp.Select,
    readonly context: Context,
    private readonly aliases: Aliases | undefined,
  ) {}

  setSelect(list: exp.Expression[]): void {
    this.select.setSelectList(list)
  }

  setDistinct(): void {
    this.select.set("distinct", true)
  }

  setWhere(condition: exp.Expression): void {
    this.assertClause(Clause.WHERE)
    this.select.set("where", new exp.Where({ this: condition }))
  }

  setGroupBy(items: exp.Expression[]): void {
    this.assertClause(Clause.GROUP_BY)
    this.select.set("group", new exp.Group({ expressions: items }))
  }

  setHaving(condition: exp.Expression): void {
    this.assertClause(Clause.HAVING)
    this.select.set("having", new exp.Having({ this: condition }))
  }

  setQualify(condition: exp.Expression): void {
    this.assertClause(Clause.QUALIFY)
    this.select.set("qualify", new exp.Qualify({ this: condition }))
  }

  setOrderBy(items: exp.Expression[]): void {
    this.assertClause(Clause.ORDER_BY)
    this.select.set("order", new exp.Order({ expressions: items }))
  }

  setFetch(fetch: exp.Expression): void {
    this.assertClause(Clause.FETCH)
    this.select.set("limit", new exp.Limit({ this: fetch }))
  }

  setOffset(offset: exp.Expression): void {
    this.assertClause(Clause.OFFSET)
    this.select.set("offset", new exp.Offset({ this: offset }))
  }

  addOrderItem(items: exp.Expression[], collation: FieldCollation): void {
    this.context.addOrderItem(items, collation)
  }

  result(): Result {
    return this.implementor.result(this.select, this.clauses, this.rel, this.aliases)
  }

  private assertClause(clause: Clause): void {
    if (!this.clauses.includes(clause)) {
      throw new ContractError(
        `Clause ${Clause[clause]} was not declared by the ${this.rel.kind} node`,
      )
    }
  }
}

/**
 * Base of the converter: alias bookkeeping, result construction and the
 * helpers every visit shares.
 */
export abstract class SqlImplementor implements Implementor {
  private readonly aliasSet = new Set<string>()
  private readonly correlationContexts = new Map<CorrelationId, Context>()
  private readonly fieldMap = new Map<string, exp.Expression>()
  private isTableNameColumnNameIdentical = false

  constructor(readonly dialect: Dialect) {}

  abstract visitRoot(rel: RelNode): Result

  subQuery(rel: RelNode): exp.Expression {
    return this.visitRoot(rel).asQueryOrValues()
  }

  /** True when the last result's table shares a name with one of its columns and the dialect objects. */
  get identicalNameIssue(): boolean {
    return (
      this.isTableNameColumnNameIdentical &&
      !this.dialect.capabilities.supportsIdenticalTableAndColumnName
    )
  }

  // ==================== Contexts ====================

  correlationContext(id: CorrelationId): Context {
    const context = this.correlationContexts.get(id)
    if (!context) throw new ContractError(`Unknown correlation variable ${id}`)
    return context
  }

  /** Makes the fields of `result` available to subqueries through `variables`. */
  registerCorrelation(variables: readonly CorrelationId[], result: Result): void {
    for (const id of variables) {
      this.correlationContexts.set(id, result.qualifiedContext())
    }
  }

  /** Resolves output field `name` to `node` wherever an alias context meets it. */
  mapField(name: string, node: exp.Expression): void {
    this.fieldMap.set(name.toLowerCase(), node)
  }

  mappedField(name: string): exp.Expression | undefined {
    return this.fieldMap.get(name.toLowerCase())
  }

  aliasContext(aliases: Aliases, qualified: boolean): AliasContext {
    return new AliasContext(this, aliases, qualified)
  }

  joinContext(left: Context, right: Context): JoinContext {
    return new JoinContext(left, right)
  }

  tableFunctionScanContext(inputs: readonly exp.Expression[]): TableFunctionScanContext {
    return new TableFunctionScanContext(this, inputs)
  }

  /** Pattern definitions and measures refer to input fields unqualified. */
  matchRecognizeContext(context: AliasContext): MatchRecognizeContext {
    return new MatchRecognizeContext(this, context.aliases, false)
  }

  // ==================== Results ====================

  /**
   * Records `node` as the SQL for `rel`. The node gets a fresh alias; it
   * must be referenced by it unless the dialect lets its own name do.
   */
  result(
    node: exp.Expression,
    clauses: readonly Clause[],
    rel: RelNode,
    aliases: Aliases | undefined,
  ): Result {
    const capabilities = this.dialect.capabilities
    const alias2 = aliasOf(node)
    const alias4 = uniquify(alias2 ?? "t", this.aliasSet)
    const tableName = tableNameOf(alias4, rel)
    const rowType = adjustedRowType(rel, node)
    this.isTableNameColumnNameIdentical = rowType.fields.some((f) => f.name === tableName)

    if (
      aliases !== undefined &&
      aliases.size > 0 &&
      (!capabilities.hasImplicitTableAlias || this.identicalNameIssue || aliases.size > 1)
    ) {
      return new Result(this, node, clauses, alias4, rowType, aliases)
    }
    const alias5 =
      alias2 === undefined ||
      alias2 !== alias4 ||
      !capabilities.hasImplicitTableAlias ||
      this.identicalNameIssue
        ? alias4
        : undefined
    return new Result(this, node, clauses, alias5, rowType, new Map([[alias4, rowType]]))
  }

  /** The result of joining two inputs; its aliases are theirs, in order. */
  joinResult(join: exp.Expression, left: Result, right: Result, rel: RelNode): Result {
    const aliases = new Map<string, RowType>()
    for (const input of [left, right]) {
      if (input.neededAlias !== undefined && input.neededType) {
        aliases.set(input.neededAlias, input.neededType)
      } else {
        for (const [alias, rowType] of input.aliases) aliases.set(alias, rowType)
      }
    }
    return this.result(join, [Clause.FROM], rel, aliases)
  }

  /** The alias the next unnamed FROM item will get; does not reserve it. */
  unusedAlias(): string {
    return uniquify("t", new Set(this.aliasSet))
  }

  /** A SELECT * over `node`, which must be usable as a FROM item. */
  wrapSelect(node: exp.Expression): exp.Select {
    let from = node
    if (exp.isQuery(node) && !(node instanceof exp.Values && hasAlias(node))) {
      from = new exp.Subquery({ this: node })
    }
    if (this.requiresAlias(node)) from = asFromItem(from, uniquify("t", this.aliasSet))
    return new exp.Select({ from: new exp.From({ this: from }) })
  }

  private requiresAlias(node: exp.Expression): boolean {
    const capabilities = this.dialect.capabilities
    if (!capabilities.requiresAliasForFromItems) return false
    if (node instanceof exp.Table) {
      return !hasAlias(node) && (!capabilities.hasImplicitTableAlias || this.identicalNameIssue)
    }
    if (node instanceof exp.Join) return false
    return !hasAlias(node)
  }

  /** Appends `node` to `list`, aliased to the field's name unless it already carries it. */
  addSelect(list: exp.Expression[], node: exp.Expression, rowType: RowType): void {
    const field = rowType.fields[list.length]
    if (!field) throw new ContractError(`Select item ${list.length} beyond the row type`)
    list.push(aliasOf(node) === field.name ? node : exp.alias(node, field.name))
  }

  /**
   * Translates a join condition. Comparisons between one field of each
   * input are written left input first, reversing the operator if needed.
   */
  convertConditionToSqlNode(
    condition: RexNode,
    left: Context,
    right: Context,
  ): exp.Expression {
    if (condition.kind === "literal" && condition.value.family === "boolean") {
      return exp.Boolean.of(condition.value.value)
    }
    const joinContext = this.joinContext(left, right)
    if (condition.kind !== "call") return joinContext.toSql(condition)

    const { op } = condition
    if (op.kind === "AND" || op.kind === "OR") {
      const terms = condition.operands.map((o) => this.convertConditionToSqlNode(o, left, right))
      return op.kind === "AND" ? exp.and(...terms) : exp.or(...terms)
    }

    if (isComparison(op) || op.kind === "IS_DISTINCT_FROM" || op.kind === "IS_NOT_DISTINCT_FROM") {
      const call = stripCastFromString(condition, this.dialect)
      const [a, b] = call.operands
      if (call.operands.length === 2 && a?.kind === "inputRef" && b?.kind === "inputRef") {
        const leftCount = left.fieldCount
        if (a.index < leftCount && b.index >= leftCount) {
          return joinContext.toSql(call)
        }
        if (b.index < leftCount && a.index >= leftCount) {
          return joinContext.toSql({ ...call, op: reverseComparison(call.op), operands: [b, a] })
        }
      }
      return joinContext.toSql(call)
    }
    return joinContext.toSql(condition)
  }
}

/** The table name a result's columns could collide with. */
function tableNameOf(alias: string, rel: RelNode): string {
  const named =
    rel.kind === "scan"
      ? rel
      : (rel.kind === "filter" || rel.kind === "project") && rel.input.kind === "scan"
        ? rel.input
        : undefined
  return named?.table.at(-1) ?? alias
}

/** The row type of `node` as SQL will see it: select-list or alias-column names over `rel`'s types. */
function adjustedRowType(rel: RelNode, node: exp.Expression): RowType {
  if (node instanceof exp.SetOperation) {
    const first = node.arg("this")
    return first ? adjustedRowType(rel, first) : rel.rowType
  }
  const fields = rel.rowType.fields
  const names =
    node instanceof exp.Select && node.selectList
      ? node.selectList.map((item, i) => aliasOf(item) ?? fields[i]?.name)
      : aliasColumns(node)
  if (names.length === 0 || names.length !== fields.length) return rel.rowType
  return {
    fields: fields.map((field, i) => ({ name: names[i] ?? field.name, type: field.type })),
  }
}
