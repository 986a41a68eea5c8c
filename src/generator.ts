/**
 * SQL generator - renders an unparsed SQL AST to text
 */

import { UnsupportedError, UnsupportedLevel } from "./errors.js"
import * as exp from "./expressions.js"
import RESERVED_KEYWORDS from "./reserved-keywords.json" with { type: "json" }

export interface GeneratorFeatures {
  NULL_ORDERING_SUPPORTED: boolean
  LIMIT_FETCH: "LIMIT" | "FETCH"
  /** Wrap `VALUES` used as a FROM item in parentheses */
  WRAP_DERIVED_VALUES: boolean
  /** Keyword between a FROM item and its alias; BigQuery and Spark accept both */
  TABLE_ALIAS_KEYWORD: string
}

export const DEFAULT_FEATURES: GeneratorFeatures = {
  NULL_ORDERING_SUPPORTED: true,
  LIMIT_FETCH: "FETCH",
  WRAP_DERIVED_VALUES: true,
  TABLE_ALIAS_KEYWORD: "AS",
}

export interface GenerateOptions {
  /** Quote every identifier, not only those that need it */
  identify?: boolean
  unsupportedLevel?: UnsupportedLevel | "IGNORE" | "WARN" | "RAISE"
  /** Name reported in UnsupportedError */
  dialect?: string
}

// Binding strength, loosest first
const PRECEDENCE_OR = 1
const PRECEDENCE_AND = 2
const PRECEDENCE_NOT = 3
const PRECEDENCE_COMPARISON = 4
const PRECEDENCE_CONCAT = 5
const PRECEDENCE_ADDITIVE = 6
const PRECEDENCE_MULTIPLICATIVE = 7
const PRECEDENCE_UNARY = 8
const PRECEDENCE_ATOM = 10

const ASSOCIATIVE = new Set(["and", "or", "add", "mul", "dpipe"])

export class Generator {
  // Maps type names to dialect-specific equivalents
  static TYPE_MAPPING: Map<string, string> = new Map()

  static FEATURES: GeneratorFeatures = { ...DEFAULT_FEATURES }

  static RESERVED_KEYWORDS: Set<string> = new Set(RESERVED_KEYWORDS)

  static IDENTIFIER_START = '"'
  static IDENTIFIER_END = '"'

  // Character that escapes a quote inside a string literal
  static STRING_ESCAPE = "'"

  protected options: GenerateOptions
  protected features: GeneratorFeatures

  readonly warnings: string[] = []

  constructor(options: GenerateOptions = {}) {
    this.options = options
    this.features = { ...(this.constructor as typeof Generator).FEATURES }
  }

  generate(expression: exp.Expression): string {
    return this.sql(expression)
  }

  unsupported(message: string): void {
    const level = this.options.unsupportedLevel ?? UnsupportedLevel.WARN
    if (level === UnsupportedLevel.RAISE) {
      throw new UnsupportedError(message, message, this.options.dialect ?? "")
    }
    if (level !== UnsupportedLevel.IGNORE) {
      this.warnings.push(message)
      console.warn(`[rel2sql] ${message}`)
    }
  }

  sql(expression: exp.Expression | string | undefined, key?: string): string {
    if (!expression) return ""
    if (typeof expression === "string") return expression

    if (key) {
      const value = expression.args[key]
      if (value instanceof exp.Expression) {
        return this.sql(value)
      }
      return typeof value === "string" ? value : ""
    }

    const methodName = `${expression.key}_sql`
    const method = (this as unknown as Record<string, unknown>)[methodName]
    if (typeof method === "function") {
      return (method as (e: exp.Expression) => string).call(this, expression)
    }
    console.error(`[rel2sql] No handler for expression type: ${expression.key}`)
    return this.function_fallback_sql(expression)
  }

  // ==================== Names ====================

  protected identifier_sql(expression: exp.Identifier): string {
    const name = expression.name
    if (expression.quoted || this.shouldQuote(name)) {
      return this.quoteIdentifier(name)
    }
    return name
  }

  protected star_sql(_expression: exp.Star): string {
    return "*"
  }

  protected column_sql(expression: exp.Column): string {
    const table = this.sql(expression, "table")
    const name = this.sql(expression, "this")
    return table ? `${table}.${name}` : name
  }

  protected dot_sql(expression: exp.Dot): string {
    const base = this.operand(expression.left, PRECEDENCE_ATOM)
    return `${base}.${this.sql(expression, "expression")}`
  }

  protected bracket_sql(expression: exp.Bracket): string {
    const base = this.operand(expression.arg("this"), PRECEDENCE_ATOM)
    return `${base}[${this.expressions(expression.expressions)}]`
  }

  protected table_sql(expression: exp.Table): string {
    const name = ["catalog", "db", "this"]
      .map((key) => this.sql(expression, key))
      .filter((part) => part !== "")
      .join(".")
    return `${name}${this.aliasSuffix(expression)}`
  }

  protected tablealias_sql(expression: exp.TableAlias): string {
    const name = this.sql(expression, "this")
    const columns = expression.columns
    if (columns.length === 0) return name
    return `${name} (${this.expressions(columns)})`
  }

  protected alias_sql(expression: exp.Alias): string {
    return `${this.sql(expression, "this")} AS ${this.sql(expression, "alias")}`
  }

  protected aliasSuffix(expression: exp.Expression): string {
    const alias = this.sql(expression, "alias")
    return alias ? ` ${this.features.TABLE_ALIAS_KEYWORD} ${alias}` : ""
  }

  // ==================== Literals ====================

  protected literal_sql(expression: exp.Literal): string {
    if (expression.isString) {
      return this.quoteString(expression.value)
    }
    return expression.value
  }

  protected boolean_sql(expression: exp.Boolean): string {
    return expression.value ? "TRUE" : "FALSE"
  }

  protected null_sql(_expression: exp.Null): string {
    return "NULL"
  }

  protected var_sql(expression: exp.Var): string {
    return expression.name
  }

  protected typedliteral_sql(expression: exp.TypedLiteral): string {
    return `${expression.kind} ${this.sql(expression, "this")}`
  }

  protected interval_sql(expression: exp.Interval): string {
    const sign = expression.args.negative === true ? "-" : ""
    return `INTERVAL ${sign}${this.sql(expression, "this")} ${this.sql(expression, "unit")}`
  }

  protected hexstring_sql(expression: exp.HexString): string {
    return `X'${expression.name}'`
  }

  protected placeholder_sql(_expression: exp.Placeholder): string {
    return "?"
  }

  protected datatype_sql(expression: exp.DataType): string {
    const name = expression.name
    const mapped =
      (this.constructor as typeof Generator).TYPE_MAPPING.get(name) ?? name
    const params = expression.expressions
    return params.length > 0 ? `${mapped}(${this.expressions(params)})` : mapped
  }

  // ==================== Operators ====================

  protected precedence(expression: exp.Expression | undefined): number {
    if (expression instanceof exp.Or) return PRECEDENCE_OR
    if (expression instanceof exp.And) return PRECEDENCE_AND
    if (expression instanceof exp.Not) return PRECEDENCE_NOT
    if (
      expression instanceof exp.EQ ||
      expression instanceof exp.NEQ ||
      expression instanceof exp.GT ||
      expression instanceof exp.GTE ||
      expression instanceof exp.LT ||
      expression instanceof exp.LTE ||
      expression instanceof exp.NegatableBinary ||
      expression instanceof exp.In
    ) {
      return PRECEDENCE_COMPARISON
    }
    if (expression instanceof exp.DPipe) return PRECEDENCE_CONCAT
    if (expression instanceof exp.Add || expression instanceof exp.Sub) {
      return PRECEDENCE_ADDITIVE
    }
    if (
      expression instanceof exp.Mul ||
      expression instanceof exp.Div ||
      expression instanceof exp.Mod
    ) {
      return PRECEDENCE_MULTIPLICATIVE
    }
    if (expression instanceof exp.Neg) return PRECEDENCE_UNARY
    return PRECEDENCE_ATOM
  }

  /** Renders `child`, parenthesized when it binds looser than `minimum`. */
  protected operand(
    child: exp.Expression | undefined,
    minimum: number,
  ): string {
    const sql = this.sql(child)
    return this.precedence(child) < minimum ? `(${sql})` : sql
  }

  protected binary_sql(expression: exp.Binary, op: string): string {
    const prec = this.precedence(expression)
    const left = expression.left
    const right = expression.right
    const leftPrec = this.precedence(left)
    const rightPrec = this.precedence(right)

    // Comparisons do not chain
    const wrapLeft =
      leftPrec < prec || (leftPrec === prec && prec === PRECEDENCE_COMPARISON)
    const wrapRight =
      rightPrec < prec ||
      (rightPrec === prec &&
        !(
          right?.constructor === expression.constructor &&
          ASSOCIATIVE.has(expression.key)
        ))

    const leftSql = wrapLeft ? `(${this.sql(left)})` : this.sql(left)
    const rightSql = wrapRight ? `(${this.sql(right)})` : this.sql(right)
    return `${leftSql} ${op} ${rightSql}`
  }

  protected eq_sql(expression: exp.EQ): string {
    return this.binary_sql(expression, "=")
  }

  protected neq_sql(expression: exp.NEQ): string {
    return this.binary_sql(expression, "<>")
  }

  protected gt_sql(expression: exp.GT): string {
    return this.binary_sql(expression, ">")
  }

  protected gte_sql(expression: exp.GTE): string {
    return this.binary_sql(expression, ">=")
  }

  protected lt_sql(expression: exp.LT): string {
    return this.binary_sql(expression, "<")
  }

  protected lte_sql(expression: exp.LTE): string {
    return this.binary_sql(expression, "<=")
  }

  protected and_sql(expression: exp.And): string {
    return this.binary_sql(expression, "AND")
  }

  protected or_sql(expression: exp.Or): string {
    return this.binary_sql(expression, "OR")
  }

  protected add_sql(expression: exp.Add): string {
    return this.binary_sql(expression, "+")
  }

  protected sub_sql(expression: exp.Sub): string {
    return this.binary_sql(expression, "-")
  }

  protected mul_sql(expression: exp.Mul): string {
    return this.binary_sql(expression, "*")
  }

  protected div_sql(expression: exp.Div): string {
    return this.binary_sql(expression, "/")
  }

  protected mod_sql(expression: exp.Mod): string {
    return this.binary_sql(expression, "%")
  }

  protected dpipe_sql(expression: exp.DPipe): string {
    return this.binary_sql(expression, "||")
  }

  protected like_sql(expression: exp.Like): string {
    const sql = this.binary_sql(expression, this.negate(expression, "LIKE"))
    const escape = this.sql(expression, "escape")
    return escape ? `${sql} ESCAPE ${escape}` : sql
  }

  protected similarto_sql(expression: exp.SimilarTo): string {
    const sql = this.binary_sql(
      expression,
      this.negate(expression, "SIMILAR TO"),
    )
    const escape = this.sql(expression, "escape")
    return escape ? `${sql} ESCAPE ${escape}` : sql
  }

  protected isdistinctfrom_sql(expression: exp.IsDistinctFrom): string {
    const op = expression.negated
      ? "IS NOT DISTINCT FROM"
      : "IS DISTINCT FROM"
    return this.binary_sql(expression, op)
  }

  protected is_sql(expression: exp.Is): string {
    const left = this.operand(expression.left, PRECEDENCE_COMPARISON + 1)
    const op = expression.negated ? "IS NOT" : "IS"
    return `${left} ${op} ${this.sql(expression.right)}`
  }

  protected negate(expression: exp.NegatableBinary, op: string): string {
    return expression.negated ? `NOT ${op}` : op
  }

  protected not_sql(expression: exp.Not): string {
    const inner = expression.arg("this")
    return `NOT ${this.operand(inner, PRECEDENCE_COMPARISON + 1)}`
  }

  protected neg_sql(expression: exp.Neg): string {
    return `-${this.operand(expression.arg("this"), PRECEDENCE_ATOM)}`
  }

  protected in_sql(expression: exp.In): string {
    const left = this.operand(expression.arg("this"), PRECEDENCE_COMPARISON + 1)
    const op = expression.negated ? "NOT IN" : "IN"
    const query = expression.arg("query")
    const values = query
      ? this.sql(query)
      : `(${this.expressions(expression.expressions)})`
    return `${left} ${op} ${values}`
  }

  protected exists_sql(expression: exp.Exists): string {
    return `EXISTS (${this.sql(expression, "this")})`
  }

  protected tuple_sql(expression: exp.Tuple): string {
    return `(${this.expressions(expression.expressions)})`
  }

  protected case_sql(expression: exp.Case): string {
    const parts: string[] = ["CASE"]

    const subject = expression.arg("this")
    if (subject) {
      parts.push(this.sql(subject))
    }

    for (const if_ of expression.ifs) {
      const cond = this.sql(if_, "this")
      const then = this.sql(if_, "true")
      parts.push(`WHEN ${cond} THEN ${then}`)
    }

    const default_ = expression.arg("default")
    if (default_) {
      parts.push("ELSE")
      parts.push(this.sql(default_))
    }

    parts.push("END")
    return parts.join(" ")
  }

  protected cast_sql(expression: exp.Cast): string {
    return `CAST(${this.sql(expression, "this")} AS ${this.sql(expression, "to")})`
  }

  protected funcCall(name: string, args: exp.Expression[], distinct = false): string {
    const prefix = distinct ? "DISTINCT " : ""
    return `${name}(${prefix}${this.expressions(args)})`
  }

  protected anonymous_sql(expression: exp.Anonymous): string {
    return this.funcCall(
      expression.name,
      expression.expressions,
      expression.distinct,
    )
  }

  protected aggfunc_sql(expression: exp.AggFunc): string {
    return this.funcCall(
      expression.name,
      expression.expressions,
      expression.distinct,
    )
  }

  protected function_fallback_sql(expression: exp.Expression): string {
    return this.funcCall(expression.key.toUpperCase(), expression.expressions)
  }

  protected window_sql(expression: exp.Window): string {
    const func = this.sql(expression, "this")
    const parts: string[] = []

    const partitionBy = expression.args.partition_by
    if (Array.isArray(partitionBy) && partitionBy.length > 0) {
      parts.push(`PARTITION BY ${this.expressions(partitionBy)}`)
    }

    const order = expression.arg("order")
    if (order) {
      parts.push(this.sql(order))
    }

    const spec = expression.arg("spec")
    if (spec) {
      parts.push(this.sql(spec))
    }

    return `${func} OVER (${parts.join(" ")})`
  }

  protected windowspec_sql(expression: exp.WindowSpec): string {
    const kind = this.sql(expression, "kind") || "ROWS"

    const formatBound = (bound: exp.ArgValue, side: exp.ArgValue): string => {
      if (bound === "CURRENT ROW") return "CURRENT ROW"
      const sideSql = typeof side === "string" ? side : ""
      if (bound === "UNBOUNDED") return `UNBOUNDED ${sideSql}`
      if (bound instanceof exp.Expression) {
        return `${this.sql(bound)} ${sideSql}`
      }
      return ""
    }

    const startSql = formatBound(
      expression.args.start,
      expression.args.start_side,
    )
    if (expression.args.end === undefined) {
      return `${kind} ${startSql}`
    }
    const endSql = formatBound(expression.args.end, expression.args.end_side)
    return `${kind} BETWEEN ${startSql} AND ${endSql}`
  }

  protected filter_sql(expression: exp.Filter): string {
    return `${this.sql(expression, "this")} FILTER (${this.sql(expression, "expression")})`
  }

  protected withingroup_sql(expression: exp.WithinGroup): string {
    return `${this.sql(expression, "this")} WITHIN GROUP (${this.sql(expression, "expression")})`
  }

  protected cursor_sql(expression: exp.Cursor): string {
    return `CURSOR (${this.sql(expression, "this")})`
  }

  // ==================== Clauses ====================

  protected from_sql(expression: exp.From): string {
    return `FROM ${this.sql(expression, "this")}`
  }

  protected where_sql(expression: exp.Where): string {
    return `WHERE ${this.sql(expression, "this")}`
  }

  protected group_sql(expression: exp.Group): string {
    const items = expression.expressions
    return items.length === 0 ? "GROUP BY ()" : `GROUP BY ${this.expressions(items)}`
  }

  protected groupingsets_sql(expression: exp.GroupingSets): string {
    return `GROUPING SETS (${this.expressions(expression.expressions)})`
  }

  protected rollup_sql(expression: exp.Rollup): string {
    return `ROLLUP(${this.expressions(expression.expressions)})`
  }

  protected cube_sql(expression: exp.Cube): string {
    return `CUBE(${this.expressions(expression.expressions)})`
  }

  protected having_sql(expression: exp.Having): string {
    return `HAVING ${this.sql(expression, "this")}`
  }

  protected qualify_sql(expression: exp.Qualify): string {
    return `QUALIFY ${this.sql(expression, "this")}`
  }

  protected order_sql(expression: exp.Order): string {
    return `ORDER BY ${this.expressions(expression.expressions)}`
  }

  protected ordered_sql(expression: exp.Ordered): string {
    const thisSql = this.sql(expression, "this")
    const sortOrder = expression.desc ? " DESC" : ""
    const nullsFirst = expression.args.nulls_first
    if (typeof nullsFirst !== "boolean") {
      return `${thisSql}${sortOrder}`
    }

    const nullsSortChange = nullsFirst ? " NULLS FIRST" : " NULLS LAST"
    if (!this.features.NULL_ORDERING_SUPPORTED) {
      this.unsupported(`'${nullsSortChange.trim()}' is not supported`)
      return `${thisSql}${sortOrder}`
    }
    return `${thisSql}${sortOrder}${nullsSortChange}`
  }

  protected limitOffset(expression: exp.Select): string[] {
    const limit = this.sql(expression.arg("limit"), "this")
    const offset = this.sql(expression.arg("offset"), "this")
    if (this.features.LIMIT_FETCH === "LIMIT") {
      return [limit ? `LIMIT ${limit}` : "", offset ? `OFFSET ${offset}` : ""]
    }
    return [
      offset ? `OFFSET ${offset} ROWS` : "",
      limit ? `FETCH NEXT ${limit} ROWS ONLY` : "",
    ]
  }

  // ==================== FROM items ====================

  protected join_sql(expression: exp.Join): string {
    const left = this.sql(expression, "this")
    const rightNode = expression.arg("expression")
    const right =
      rightNode instanceof exp.Join
        ? `(${this.sql(rightNode)})`
        : this.sql(rightNode)
    const kind = expression.kind
    if (kind === "COMMA") {
      return `${left}, ${right}`
    }
    const on = this.sql(expression, "on")
    return `${left} ${kind} JOIN ${right}${on ? ` ON ${on}` : ""}`
  }

  protected subquery_sql(expression: exp.Subquery): string {
    return `(${this.sql(expression, "this")})${this.aliasSuffix(expression)}`
  }

  protected tablefunction_sql(expression: exp.TableFunction): string {
    return `TABLE(${this.sql(expression, "this")})${this.aliasSuffix(expression)}`
  }

  protected matchrecognize_sql(expression: exp.MatchRecognize): string {
    const parts: string[] = []
    const list = (key: string): exp.Expression[] => {
      const value = expression.args[key]
      return Array.isArray(value) ? value : []
    }

    const partitionBy = list("partition_by")
    if (partitionBy.length > 0) {
      parts.push(`PARTITION BY ${this.expressions(partitionBy)}`)
    }
    const order = expression.arg("order")
    if (order) {
      parts.push(this.sql(order))
    }
    const measures = list("measures")
    if (measures.length > 0) {
      parts.push(`MEASURES ${this.expressions(measures)}`)
    }
    const rows = this.sql(expression, "rows")
    if (rows) {
      parts.push(rows)
    }
    const after = this.sql(expression, "after")
    if (after) {
      const variable = this.sql(expression, "after_variable")
      parts.push(`AFTER MATCH ${after}${variable ? ` ${variable}` : ""}`)
    }

    const start = expression.args.strict_start === true ? "^" : ""
    const end = expression.args.strict_end === true ? "$" : ""
    parts.push(`PATTERN (${start}${this.sql(expression, "pattern")}${end})`)

    const within = this.sql(expression, "within")
    if (within) {
      parts.push(`WITHIN ${within}`)
    }
    const subsets = list("subsets")
    if (subsets.length > 0) {
      const items = subsets.map((s) => `${this.sql(s, "alias")} = ${this.sql(s, "this")}`)
      parts.push(`SUBSET ${items.join(", ")}`)
    }
    // DEFINE writes the variable before its condition
    const define = list("define").map((d) => `${this.sql(d, "alias")} AS ${this.sql(d, "this")}`)
    parts.push(`DEFINE ${define.join(", ")}`)

    return `${this.sql(expression, "this")} MATCH_RECOGNIZE (${parts.join(" ")})${this.aliasSuffix(expression)}`
  }

  protected patternconcat_sql(expression: exp.PatternConcat): string {
    return expression.expressions
      .map((item) =>
        item instanceof exp.PatternAlternation ? `(${this.sql(item)})` : this.sql(item),
      )
      .join(" ")
  }

  protected patternalternation_sql(expression: exp.PatternAlternation): string {
    return this.expressions(expression.expressions, " | ")
  }

  protected patternquantifier_sql(expression: exp.PatternQuantifier): string {
    const operand = expression.arg("this")
    const term =
      operand instanceof exp.PatternConcat || operand instanceof exp.PatternAlternation
        ? `(${this.sql(operand)})`
        : this.sql(operand)
    const min = expression.args.min
    const max = expression.args.max
    let quantifier: string
    if (min === 0 && max === -1) {
      quantifier = "*"
    } else if (min === 1 && max === -1) {
      quantifier = "+"
    } else if (min === 0 && max === 1) {
      quantifier = "?"
    } else if (max === -1) {
      quantifier = `{${String(min)},}`
    } else if (min === max) {
      quantifier = `{${String(min)}}`
    } else {
      quantifier = `{${String(min)},${String(max)}}`
    }
    const reluctant = expression.args.reluctant === true ? "?" : ""
    return `${term}${quantifier}${reluctant}`
  }

  // ==================== Queries ====================

  protected select_sql(expression: exp.Select): string {
    const distinct = expression.args.distinct === true ? " DISTINCT" : ""
    const list = expression.selectList
    const projection =
      list === undefined || list.length === 0 ? "*" : this.expressions(list)

    return [
      `SELECT${distinct} ${projection}`,
      this.sql(expression, "from"),
      this.sql(expression, "where"),
      this.sql(expression, "group"),
      this.sql(expression, "having"),
      this.sql(expression, "qualify"),
      this.sql(expression, "order"),
      ...this.limitOffset(expression),
    ]
      .filter((part) => part !== "")
      .join(" ")
  }

  protected setOperation(expression: exp.SetOperation, op: string): string {
    const leftNode = expression.arg("this")
    const rightNode = expression.arg("expression")
    const left = this.setOperand(leftNode, expression, false)
    const right = this.setOperand(rightNode, expression, true)
    const distinctOrAll = expression.args.distinct === false ? " ALL" : ""
    return `${left} ${op}${distinctOrAll} ${right}`
  }

  protected setOperand(
    operand: exp.Expression | undefined,
    parent: exp.SetOperation,
    isRight: boolean,
  ): string {
    const sql = this.sql(operand)
    const nested =
      operand instanceof exp.SetOperation &&
      (isRight || operand.constructor !== parent.constructor)
    const modified =
      operand instanceof exp.Select &&
      (operand.arg("order") !== undefined ||
        operand.arg("limit") !== undefined ||
        operand.arg("offset") !== undefined)
    return nested || modified ? `(${sql})` : sql
  }

  protected union_sql(expression: exp.Union): string {
    return this.setOperation(expression, "UNION")
  }

  protected intersect_sql(expression: exp.Intersect): string {
    return this.setOperation(expression, "INTERSECT")
  }

  protected except_sql(expression: exp.Except): string {
    return this.setOperation(expression, "EXCEPT")
  }

  protected values_sql(expression: exp.Values): string {
    const rows = `VALUES ${this.expressions(expression.expressions)}`
    const alias = this.sql(expression, "alias")
    if (!alias) return rows
    const derived = this.features.WRAP_DERIVED_VALUES ? `(${rows})` : rows
    return `${derived} ${this.features.TABLE_ALIAS_KEYWORD} ${alias}`
  }

  // ==================== Helpers ====================

  expressions(items: exp.Expression[], sep = ", "): string {
    return items.map((item) => this.sql(item)).join(sep)
  }

  protected quoteIdentifier(name: string): string {
    const ctor = this.constructor as typeof Generator
    const end = ctor.IDENTIFIER_END
    return `${ctor.IDENTIFIER_START}${name.replaceAll(end, end + end)}${end}`
  }

  protected escape_str(text: string): string {
    const escape = (this.constructor as typeof Generator).STRING_ESCAPE
    if (escape === "\\") {
      text = text.replaceAll("\\", "\\\\")
    }
    return text.replaceAll("'", `${escape}'`)
  }

  protected quoteString(value: string): string {
    return `'${this.escape_str(value)}'`
  }

  protected shouldQuote(name: string): boolean {
    if (this.options.identify) {
      return true
    }
    if (!/^[a-zA-Z_][a-zA-Z0-9_]*$/.test(name)) {
      return true
    }
    const ctor = this.constructor as typeof Generator
    return ctor.RESERVED_KEYWORDS.has(name.toUpperCase())
  }
}
