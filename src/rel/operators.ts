/**
 * Standard operator catalog
 */

export type SqlKind =
  | "EQUALS"
  | "NOT_EQUALS"
  | "GREATER_THAN"
  | "GREATER_THAN_OR_EQUAL"
  | "LESS_THAN"
  | "LESS_THAN_OR_EQUAL"
  | "AND"
  | "OR"
  | "NOT"
  | "PLUS"
  | "MINUS"
  | "TIMES"
  | "DIVIDE"
  | "MOD"
  | "MINUS_PREFIX"
  | "IS_NULL"
  | "IS_NOT_NULL"
  | "IS_TRUE"
  | "IS_NOT_TRUE"
  | "IS_FALSE"
  | "IS_NOT_FALSE"
  | "IS_DISTINCT_FROM"
  | "IS_NOT_DISTINCT_FROM"
  | "LIKE"
  | "SIMILAR"
  | "IN"
  | "NOT_IN"
  | "SEARCH"
  | "CASE"
  | "CAST"
  | "CONCAT"
  | "ITEM"
  | "ROW"
  | "COALESCE"
  | "EXISTS"
  | "SCALAR_QUERY"
  | "CURSOR"
  | "SUM"
  | "SUM0"
  | "COUNT"
  | "MIN"
  | "MAX"
  | "AVG"
  | "ROW_NUMBER"
  | "RANK"
  | "DENSE_RANK"
  | "LAG"
  | "LEAD"
  | "FIRST_VALUE"
  | "LAST_VALUE"
  | "LISTAGG"
  | "PATTERN_CONCAT"
  | "PATTERN_ALTER"
  | "PATTERN_QUANTIFIER"
  | "OTHER_FUNCTION"

export type SqlSyntax = "binary" | "prefix" | "postfix" | "function" | "special"

export type SqlLibrary =
  | "STANDARD"
  | "POSTGRESQL"
  | "MYSQL"
  | "BIG_QUERY"
  | "SNOWFLAKE"
  | "SPARK"
  | "HIVE"
  | "ORACLE"

export const SQL_LIBRARIES: readonly SqlLibrary[] = [
  "STANDARD",
  "POSTGRESQL",
  "MYSQL",
  "BIG_QUERY",
  "SNOWFLAKE",
  "SPARK",
  "HIVE",
  "ORACLE",
]

export function isSqlLibrary(value: string): value is SqlLibrary {
  return SQL_LIBRARIES.some((library) => library === value)
}

export interface SqlOperator {
  readonly name: string
  readonly kind: SqlKind
  readonly syntax: SqlSyntax
  readonly isAggregate?: boolean
  /** Whether a window frame (ROWS/RANGE) may follow the call */
  readonly allowsFraming?: boolean
  /** `NOT LIKE`, `NOT SIMILAR TO` */
  readonly negated?: boolean
  /** Libraries defining the function; absent for standard operators */
  readonly libraries?: readonly SqlLibrary[]
  /** Equivalence group used to substitute library functions */
  readonly group?: string
}

function operator(
  name: string,
  kind: SqlKind,
  syntax: SqlSyntax,
  extra: Partial<SqlOperator> = {},
): SqlOperator {
  return { name, kind, syntax, ...extra }
}

function aggregate(name: string, kind: SqlKind, allowsFraming = true): SqlOperator {
  return operator(name, kind, "function", { isAggregate: true, allowsFraming })
}

export const SqlStdOperatorTable = {
  EQUALS: operator("=", "EQUALS", "binary"),
  NOT_EQUALS: operator("<>", "NOT_EQUALS", "binary"),
  GREATER_THAN: operator(">", "GREATER_THAN", "binary"),
  GREATER_THAN_OR_EQUAL: operator(">=", "GREATER_THAN_OR_EQUAL", "binary"),
  LESS_THAN: operator("<", "LESS_THAN", "binary"),
  LESS_THAN_OR_EQUAL: operator("<=", "LESS_THAN_OR_EQUAL", "binary"),
  AND: operator("AND", "AND", "binary"),
  OR: operator("OR", "OR", "binary"),
  NOT: operator("NOT", "NOT", "prefix"),
  PLUS: operator("+", "PLUS", "binary"),
  MINUS: operator("-", "MINUS", "binary"),
  MULTIPLY: operator("*", "TIMES", "binary"),
  DIVIDE: operator("/", "DIVIDE", "binary"),
  MOD: operator("MOD", "MOD", "function"),
  UNARY_MINUS: operator("-", "MINUS_PREFIX", "prefix"),
  IS_NULL: operator("IS NULL", "IS_NULL", "postfix"),
  IS_NOT_NULL: operator("IS NOT NULL", "IS_NOT_NULL", "postfix"),
  IS_TRUE: operator("IS TRUE", "IS_TRUE", "postfix"),
  IS_NOT_TRUE: operator("IS NOT TRUE", "IS_NOT_TRUE", "postfix"),
  IS_FALSE: operator("IS FALSE", "IS_FALSE", "postfix"),
  IS_NOT_FALSE: operator("IS NOT FALSE", "IS_NOT_FALSE", "postfix"),
  IS_DISTINCT_FROM: operator("IS DISTINCT FROM", "IS_DISTINCT_FROM", "binary"),
  IS_NOT_DISTINCT_FROM: operator(
    "IS NOT DISTINCT FROM",
    "IS_NOT_DISTINCT_FROM",
    "binary",
  ),
  LIKE: operator("LIKE", "LIKE", "special"),
  NOT_LIKE: operator("NOT LIKE", "LIKE", "special", { negated: true }),
  SIMILAR_TO: operator("SIMILAR TO", "SIMILAR", "special"),
  NOT_SIMILAR_TO: operator("NOT SIMILAR TO", "SIMILAR", "special", {
    negated: true,
  }),
  IN: operator("IN", "IN", "binary"),
  NOT_IN: operator("NOT IN", "NOT_IN", "binary"),
  SEARCH: operator("SEARCH", "SEARCH", "function"),
  CASE: operator("CASE", "CASE", "special"),
  CAST: operator("CAST", "CAST", "special"),
  CONCAT: operator("||", "CONCAT", "binary"),
  ITEM: operator("ITEM", "ITEM", "special"),
  ROW: operator("ROW", "ROW", "special"),
  COALESCE: operator("COALESCE", "COALESCE", "function"),
  EXISTS: operator("EXISTS", "EXISTS", "prefix"),
  SCALAR_QUERY: operator("$SCALAR_QUERY", "SCALAR_QUERY", "special"),
  CURSOR: operator("CURSOR", "CURSOR", "special"),
  SUM: aggregate("SUM", "SUM"),
  SUM0: aggregate("$SUM0", "SUM0"),
  COUNT: aggregate("COUNT", "COUNT"),
  MIN: aggregate("MIN", "MIN"),
  MAX: aggregate("MAX", "MAX"),
  AVG: aggregate("AVG", "AVG"),
  ROW_NUMBER: aggregate("ROW_NUMBER", "ROW_NUMBER", false),
  RANK: aggregate("RANK", "RANK", false),
  DENSE_RANK: aggregate("DENSE_RANK", "DENSE_RANK", false),
  LAG: aggregate("LAG", "LAG", false),
  LEAD: aggregate("LEAD", "LEAD", false),
  FIRST_VALUE: aggregate("FIRST_VALUE", "FIRST_VALUE"),
  LAST_VALUE: aggregate("LAST_VALUE", "LAST_VALUE"),
  LISTAGG: aggregate("LISTAGG", "LISTAGG", false),
  UPPER: operator("UPPER", "OTHER_FUNCTION", "function"),
  LOWER: operator("LOWER", "OTHER_FUNCTION", "function"),
  CHAR_LENGTH: operator("CHAR_LENGTH", "OTHER_FUNCTION", "function"),
  SUBSTRING: operator("SUBSTRING", "OTHER_FUNCTION", "function"),
  ABS: operator("ABS", "OTHER_FUNCTION", "function"),
  // MATCH_RECOGNIZE
  PATTERN_CONCAT: operator("PATTERN_CONCAT", "PATTERN_CONCAT", "special"),
  PATTERN_ALTER: operator("|", "PATTERN_ALTER", "special"),
  PATTERN_QUANTIFIER: operator("PATTERN_QUANTIFIER", "PATTERN_QUANTIFIER", "special"),
  PREV: operator("PREV", "OTHER_FUNCTION", "function"),
  NEXT: operator("NEXT", "OTHER_FUNCTION", "function"),
  FIRST: operator("FIRST", "OTHER_FUNCTION", "function"),
  LAST: operator("LAST", "OTHER_FUNCTION", "function"),
  CLASSIFIER: operator("CLASSIFIER", "OTHER_FUNCTION", "function"),
  MATCH_NUMBER: operator("MATCH_NUMBER", "OTHER_FUNCTION", "function"),
} as const satisfies Record<string, SqlOperator>

/** A user-defined or otherwise uncatalogued scalar function. */
export function functionOperator(name: string): SqlOperator {
  return operator(name.toUpperCase(), "OTHER_FUNCTION", "function")
}

/** A user-defined aggregate function. */
export function aggregateOperator(name: string): SqlOperator {
  return aggregate(name.toUpperCase(), "OTHER_FUNCTION")
}

const COMPARISON_KINDS: ReadonlySet<SqlKind> = new Set<SqlKind>([
  "EQUALS",
  "NOT_EQUALS",
  "GREATER_THAN",
  "GREATER_THAN_OR_EQUAL",
  "LESS_THAN",
  "LESS_THAN_OR_EQUAL",
])

export function isComparison(op: SqlOperator): boolean {
  return COMPARISON_KINDS.has(op.kind)
}

const PREDICATE_KINDS: ReadonlySet<SqlKind> = new Set<SqlKind>([
  ...COMPARISON_KINDS,
  "AND",
  "OR",
  "NOT",
  "IS_NULL",
  "IS_NOT_NULL",
  "IS_TRUE",
  "IS_NOT_TRUE",
  "IS_FALSE",
  "IS_NOT_FALSE",
  "IS_DISTINCT_FROM",
  "IS_NOT_DISTINCT_FROM",
  "LIKE",
  "SIMILAR",
  "IN",
  "NOT_IN",
  "SEARCH",
  "EXISTS",
])

/** Whether a call of `op` yields BOOLEAN regardless of its operands. */
export function isPredicate(op: SqlOperator): boolean {
  return PREDICATE_KINDS.has(op.kind)
}

/** The comparison obtained by swapping operands: `a < b` ≡ `b > a`. */
export function reverseComparison(op: SqlOperator): SqlOperator {
  switch (op.kind) {
    case "GREATER_THAN":
      return SqlStdOperatorTable.LESS_THAN
    case "GREATER_THAN_OR_EQUAL":
      return SqlStdOperatorTable.LESS_THAN_OR_EQUAL
    case "LESS_THAN":
      return SqlStdOperatorTable.GREATER_THAN
    case "LESS_THAN_OR_EQUAL":
      return SqlStdOperatorTable.GREATER_THAN_OR_EQUAL
    default:
      return op
  }
}
