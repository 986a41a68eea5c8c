/**
 * SQL AST node classes produced by the unparser
 */

export {
  Expression,
  type ArgValue,
  type Args,
  type ExpressionClass,
  type SqlOptions,
} from "./expression-base.js"
import { Expression } from "./expression-base.js"

// ==================== Base categories ====================

export class Condition extends Expression {}

export class Predicate extends Condition {}

export class Binary extends Condition {
  static override readonly argTypes: Record<string, boolean> = {
    this: true,
    expression: true,
  }

  get left(): Expression | undefined {
    return this.arg("this")
  }

  get right(): Expression | undefined {
    return this.arg("expression")
  }
}

export class Func extends Condition {
  static override readonly argTypes: Record<string, boolean> = {
    this: true,
    expressions: false,
    distinct: false,
  }

  get distinct(): boolean {
    return this.args.distinct === true
  }
}

// ==================== Names ====================

export class Identifier extends Expression {
  static override readonly argTypes: Record<string, boolean> = {
    this: true,
    quoted: false,
  }
  override get key(): string {
    return "identifier"
  }
  get quoted(): boolean {
    return this.args.quoted === true
  }
}

export class Star extends Expression {
  static override readonly argTypes: Record<string, boolean> = {}
  override get key(): string {
    return "star"
  }
  override get name(): string {
    return "*"
  }
}

/** A column reference, optionally qualified by a table alias. */
export class Column extends Condition {
  static override readonly argTypes: Record<string, boolean> = {
    this: true,
    table: false,
  }
  override get key(): string {
    return "column"
  }
  get table(): string {
    return this.text("table")
  }
}

/** `this.expression`: access of a named field of a row value. */
export class Dot extends Binary {
  override get key(): string {
    return "dot"
  }
  override get name(): string {
    return this.text("expression")
  }
}

/** `this[index]`: item access into an array or map. */
export class Bracket extends Condition {
  static override readonly argTypes: Record<string, boolean> = {
    this: true,
    expressions: true,
  }
  override get key(): string {
    return "bracket"
  }
}

export class TableAlias extends Expression {
  static override readonly argTypes: Record<string, boolean> = {
    this: false,
    columns: false,
  }
  override get key(): string {
    return "tablealias"
  }
  get columns(): Expression[] {
    const cols = this.args.columns
    return Array.isArray(cols) ? cols : []
  }
}

export class Table extends Expression {
  static override readonly argTypes: Record<string, boolean> = {
    this: true,
    db: false,
    catalog: false,
    alias: false,
  }
  override get key(): string {
    return "table"
  }

  /** Name parts from the outermost qualifier to the table name. */
  get parts(): string[] {
    return ["catalog", "db", "this"]
      .map((k) => this.text(k))
      .filter((part) => part !== "")
  }

  static fromParts(names: readonly string[]): Table {
    const [catalog, db, name] =
      names.length >= 3
        ? [names.slice(0, -2).join("."), names.at(-2), names.at(-1)]
        : [undefined, names.length === 2 ? names[0] : undefined, names.at(-1)]
    if (name === undefined) {
      throw new Error("A table name needs at least one part")
    }
    return new Table({
      this: new Identifier({ this: name }),
      db: db === undefined ? undefined : new Identifier({ this: db }),
      catalog:
        catalog === undefined ? undefined : new Identifier({ this: catalog }),
    })
  }
}

export class Alias extends Expression {
  static override readonly argTypes: Record<string, boolean> = {
    this: true,
    alias: true,
  }
  override get key(): string {
    return "alias"
  }
  override get name(): string {
    return this.alias
  }
}

// ==================== Literals ====================

export class Literal extends Condition {
  static override readonly argTypes: Record<string, boolean> = {
    this: true,
    is_string: true,
  }
  override get key(): string {
    return "literal"
  }
  get isString(): boolean {
    return this.args.is_string === true
  }
  get value(): string {
    return this.text("this")
  }
  static string(val: string): Literal {
    return new Literal({ this: val, is_string: true })
  }
  static number(val: number | bigint | string): Literal {
    return new Literal({ this: `${val}`, is_string: false })
  }
}

export class Boolean extends Condition {
  override get key(): string {
    return "boolean"
  }
  get value(): boolean {
    return this.args.this === true
  }
  static of(value: boolean): Boolean {
    return new Boolean({ this: value })
  }
}

export class Null extends Condition {
  static override readonly argTypes: Record<string, boolean> = {}
  override get key(): string {
    return "null"
  }
}

/** An opaque keyword echoed as-is (time units, trim flags, …). */
export class Var extends Expression {
  override get key(): string {
    return "var"
  }
}

/** `DATE '2020-01-01'`, `TIMESTAMP '…'` and friends. */
export class TypedLiteral extends Condition {
  static override readonly argTypes: Record<string, boolean> = {
    this: true,
    kind: true,
  }
  override get key(): string {
    return "typedliteral"
  }
  get kind(): string {
    return this.text("kind")
  }
}

export class Interval extends Condition {
  static override readonly argTypes: Record<string, boolean> = {
    this: true,
    unit: true,
    negative: false,
  }
  override get key(): string {
    return "interval"
  }
}

/** `X'0A1B'` */
export class HexString extends Condition {
  override get key(): string {
    return "hexstring"
  }
}

/** A dynamic parameter marker. */
export class Placeholder extends Condition {
  static override readonly argTypes: Record<string, boolean> = { index: false }
  override get key(): string {
    return "placeholder"
  }
}

export class DataType extends Expression {
  static override readonly argTypes: Record<string, boolean> = {
    this: true,
    expressions: false,
  }
  override get key(): string {
    return "datatype"
  }
  static build(name: string, params: readonly (number | string)[] = []): DataType {
    return new DataType({
      this: name.toUpperCase(),
      expressions: params.map((p) => Literal.number(p)),
    })
  }
}

// ==================== Operators ====================

export class EQ extends Binary {
  override get key(): string {
    return "eq"
  }
}
export class NEQ extends Binary {
  override get key(): string {
    return "neq"
  }
}
export class GT extends Binary {
  override get key(): string {
    return "gt"
  }
}
export class GTE extends Binary {
  override get key(): string {
    return "gte"
  }
}
export class LT extends Binary {
  override get key(): string {
    return "lt"
  }
}
export class LTE extends Binary {
  override get key(): string {
    return "lte"
  }
}

export class Connector extends Binary {}
export class And extends Connector {
  override get key(): string {
    return "and"
  }
}
export class Or extends Connector {
  override get key(): string {
    return "or"
  }
}

export class Add extends Binary {
  override get key(): string {
    return "add"
  }
}
export class Sub extends Binary {
  override get key(): string {
    return "sub"
  }
}
export class Mul extends Binary {
  override get key(): string {
    return "mul"
  }
}
export class Div extends Binary {
  override get key(): string {
    return "div"
  }
}
export class Mod extends Binary {
  override get key(): string {
    return "mod"
  }
}
/** String concatenation `a || b`. */
export class DPipe extends Binary {
  override get key(): string {
    return "dpipe"
  }
}

/** Binary predicates that may carry a NOT: `NOT LIKE`, `IS NOT DISTINCT FROM`. */
export class NegatableBinary extends Binary {
  static override readonly argTypes: Record<string, boolean> = {
    this: true,
    expression: true,
    negated: false,
    escape: false,
  }
  get negated(): boolean {
    return this.args.negated === true
  }
}

export class Like extends NegatableBinary {
  override get key(): string {
    return "like"
  }
}
export class SimilarTo extends NegatableBinary {
  override get key(): string {
    return "similarto"
  }
}
export class IsDistinctFrom extends NegatableBinary {
  override get key(): string {
    return "isdistinctfrom"
  }
}

/** `this IS [NOT] NULL|TRUE|FALSE|UNKNOWN` */
export class Is extends NegatableBinary {
  override get key(): string {
    return "is"
  }
}

export class Not extends Condition {
  override get key(): string {
    return "not"
  }
}

export class Neg extends Condition {
  override get key(): string {
    return "neg"
  }
}

/** `this [NOT] IN (expressions)` or `this [NOT] IN (query)` */
export class In extends Predicate {
  static override readonly argTypes: Record<string, boolean> = {
    this: true,
    expressions: false,
    query: false,
    negated: false,
  }
  override get key(): string {
    return "in"
  }
  get negated(): boolean {
    return this.args.negated === true
  }
}

export class Exists extends Predicate {
  override get key(): string {
    return "exists"
  }
}

export class Tuple extends Expression {
  static override readonly argTypes: Record<string, boolean> = {
    expressions: false,
  }
  override get key(): string {
    return "tuple"
  }
}

export class If extends Condition {
  static override readonly argTypes: Record<string, boolean> = {
    this: true,
    true: true,
  }
  override get key(): string {
    return "if"
  }
}

export class Case extends Func {
  static override readonly argTypes: Record<string, boolean> = {
    this: false,
    ifs: true,
    default: false,
  }
  override get key(): string {
    return "case"
  }
  get ifs(): If[] {
    const ifs = this.args.ifs
    return Array.isArray(ifs) ? ifs.filter((e): e is If => e instanceof If) : []
  }
}

export class Cast extends Func {
  static override readonly argTypes: Record<string, boolean> = {
    this: true,
    to: true,
  }
  override get key(): string {
    return "cast"
  }
}

/** A function call rendered as `NAME(args)`. */
export class Anonymous extends Func {
  override get key(): string {
    return "anonymous"
  }
}

/** An aggregate function call. */
export class AggFunc extends Func {
  override get key(): string {
    return "aggfunc"
  }
}

export class WindowSpec extends Expression {
  static override readonly argTypes: Record<string, boolean> = {
    kind: false,
    start: false,
    start_side: false,
    end: false,
    end_side: false,
  }
  override get key(): string {
    return "windowspec"
  }
}

/** `this OVER (PARTITION BY … ORDER BY … frame)` */
export class Window extends Condition {
  static override readonly argTypes: Record<string, boolean> = {
    this: true,
    partition_by: false,
    order: false,
    spec: false,
  }
  override get key(): string {
    return "window"
  }
}

/** `this FILTER (WHERE …)` */
export class Filter extends Expression {
  static override readonly argTypes: Record<string, boolean> = {
    this: true,
    expression: true,
  }
  override get key(): string {
    return "filter"
  }
}

/** `this WITHIN GROUP (ORDER BY …)` */
export class WithinGroup extends Expression {
  static override readonly argTypes: Record<string, boolean> = {
    this: true,
    expression: false,
  }
  override get key(): string {
    return "withingroup"
  }
}

export class Cursor extends Expression {
  override get key(): string {
    return "cursor"
  }
}

// ==================== Clauses ====================

export class From extends Expression {
  override get key(): string {
    return "from"
  }
}

export class Where extends Expression {
  override get key(): string {
    return "where"
  }
}

export class Group extends Expression {
  static override readonly argTypes: Record<string, boolean> = {
    expressions: false,
  }
  override get key(): string {
    return "group"
  }
}

export class GroupingSets extends Expression {
  static override readonly argTypes: Record<string, boolean> = {
    expressions: true,
  }
  override get key(): string {
    return "groupingsets"
  }
}

export class Rollup extends Expression {
  static override readonly argTypes: Record<string, boolean> = {
    expressions: true,
  }
  override get key(): string {
    return "rollup"
  }
}

export class Cube extends Expression {
  static override readonly argTypes: Record<string, boolean> = {
    expressions: true,
  }
  override get key(): string {
    return "cube"
  }
}

export class Having extends Expression {
  override get key(): string {
    return "having"
  }
}

export class Qualify extends Expression {
  override get key(): string {
    return "qualify"
  }
}

export class Order extends Expression {
  static override readonly argTypes: Record<string, boolean> = {
    expressions: true,
  }
  override get key(): string {
    return "order"
  }
}

/** An ORDER BY item. `nulls_first` is left unset when the default applies. */
export class Ordered extends Expression {
  static override readonly argTypes: Record<string, boolean> = {
    this: true,
    desc: false,
    nulls_first: false,
  }
  override get key(): string {
    return "ordered"
  }
  get desc(): boolean {
    return this.args.desc === true
  }
}

export class Limit extends Expression {
  override get key(): string {
    return "limit"
  }
}

export class Offset extends Expression {
  override get key(): string {
    return "offset"
  }
}

// ==================== FROM items ====================

export type JoinKind = "INNER" | "LEFT" | "RIGHT" | "FULL" | "CROSS" | "COMMA"

/** A binary FROM-item join tree node: `this <kind> JOIN expression ON on`. */
export class Join extends Expression {
  static override readonly argTypes: Record<string, boolean> = {
    this: true,
    expression: true,
    kind: true,
    on: false,
  }
  override get key(): string {
    return "join"
  }
  get kind(): string {
    return this.text("kind")
  }
}

/** A parenthesized query, optionally aliased when used as a FROM item. */
export class Subquery extends Expression {
  static override readonly argTypes: Record<string, boolean> = {
    this: true,
    alias: false,
  }
  override get key(): string {
    return "subquery"
  }
}

/** `TABLE(call)` */
export class TableFunction extends Expression {
  static override readonly argTypes: Record<string, boolean> = {
    this: true,
    alias: false,
  }
  override get key(): string {
    return "tablefunction"
  }
}

/**
 * `this MATCH_RECOGNIZE (…)`. `measures` and `define` hold aliases;
 * `subsets` holds aliased tuples of pattern variables.
 */
export class MatchRecognize extends Expression {
  static override readonly argTypes: Record<string, boolean> = {
    this: true,
    partition_by: false,
    order: false,
    measures: false,
    rows: false,
    after: false,
    after_variable: false,
    pattern: true,
    strict_start: false,
    strict_end: false,
    within: false,
    subsets: false,
    define: true,
    alias: false,
  }
  override get key(): string {
    return "matchrecognize"
  }
}

/** Pattern terms in sequence */
export class PatternConcat extends Expression {
  static override readonly argTypes: Record<string, boolean> = {
    expressions: true,
  }
  override get key(): string {
    return "patternconcat"
  }
}

export class PatternAlternation extends Expression {
  static override readonly argTypes: Record<string, boolean> = {
    expressions: true,
  }
  override get key(): string {
    return "patternalternation"
  }
}

/** `this{min,max}`, with `max` -1 for no upper bound */
export class PatternQuantifier extends Expression {
  static override readonly argTypes: Record<string, boolean> = {
    this: true,
    min: true,
    max: true,
    reluctant: false,
  }
  override get key(): string {
    return "patternquantifier"
  }
}

// ==================== Queries ====================

export class Select extends Expression {
  static override readonly argTypes: Record<string, boolean> = {
    expressions: false,
    distinct: false,
    from: false,
    where: false,
    group: false,
    having: false,
    qualify: false,
    order: false,
    limit: false,
    offset: false,
  }
  override get key(): string {
    return "select"
  }

  /** The select list, or undefined for `SELECT *`. */
  get selectList(): Expression[] | undefined {
    const list = this.args.expressions
    return Array.isArray(list) ? list : undefined
  }

  setSelectList(list: Expression[] | undefined): void {
    this.set("expressions", list)
  }

  get fromItem(): Expression | undefined {
    return this.arg("from")?.arg("this")
  }

  clause(key: "where" | "having" | "qualify"): Expression | undefined {
    return this.arg(key)?.arg("this")
  }

  get groupBy(): Expression[] | undefined {
    const group = this.arg("group")
    return group ? group.expressions : undefined
  }
}

export class SetOperation extends Expression {
  static override readonly argTypes: Record<string, boolean> = {
    this: true,
    expression: true,
    distinct: false,
  }
}

export class Union extends SetOperation {
  override get key(): string {
    return "union"
  }
}

export class Intersect extends SetOperation {
  override get key(): string {
    return "intersect"
  }
}

export class Except extends SetOperation {
  override get key(): string {
    return "except"
  }
}

export class Values extends Expression {
  static override readonly argTypes: Record<string, boolean> = {
    expressions: true,
    alias: false,
  }
  override get key(): string {
    return "values"
  }
}

export type Query = Select | SetOperation | Values

export function isQuery(node: Expression): node is Query {
  return (
    node instanceof Select ||
    node instanceof SetOperation ||
    node instanceof Values
  )
}

// ==================== Helpers ====================

export function identifier(name: string, quoted = false): Identifier {
  return new Identifier({ this: name, quoted })
}

export function column(name: string, table?: string): Column {
  return new Column({
    this: identifier(name),
    table: table === undefined ? undefined : identifier(table),
  })
}

export function alias(expression: Expression, name: string): Alias {
  return new Alias({ this: expression, alias: identifier(name) })
}

function conjunction(
  ctor: typeof And | typeof Or,
  conditions: readonly Expression[],
): Expression | undefined {
  let node: Expression | undefined
  for (const condition of conditions) {
    node = node ? new ctor({ this: node, expression: condition }) : condition
  }
  return node
}

/** Left-deep AND; `TRUE` for an empty list. */
export function and(...conditions: Expression[]): Expression {
  return conjunction(And, conditions) ?? Boolean.of(true)
}

/** Left-deep OR; `FALSE` for an empty list. */
export function or(...conditions: Expression[]): Expression {
  return conjunction(Or, conditions) ?? Boolean.of(false)
}
