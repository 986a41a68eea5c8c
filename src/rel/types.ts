/**
 * Semantic types carried by algebra row types and scalar expressions
 */

export type SqlTypeName =
  | "BOOLEAN"
  | "TINYINT"
  | "SMALLINT"
  | "INTEGER"
  | "BIGINT"
  | "DECIMAL"
  | "FLOAT"
  | "REAL"
  | "DOUBLE"
  | "CHAR"
  | "VARCHAR"
  | "BINARY"
  | "VARBINARY"
  | "DATE"
  | "TIME"
  | "TIMESTAMP"
  | "TIMESTAMP_WITH_LOCAL_TIME_ZONE"
  | "INTERVAL_YEAR_MONTH"
  | "INTERVAL_DAY_TIME"
  | "NULL"
  | "SYMBOL"
  | "ROW"
  | "ARRAY"
  | "MAP"
  | "MULTISET"
  | "CURSOR"
  | "SARG"
  | "ANY"

export type TypeFamily =
  | "BOOLEAN"
  | "NUMERIC"
  | "CHARACTER"
  | "BINARY"
  | "DATE"
  | "TIME"
  | "TIMESTAMP"
  | "INTERVAL"
  | "NULL"
  | "STRUCT"
  | "COLLECTION"
  | "CURSOR"
  | "OTHER"

export interface RelField {
  readonly name: string
  readonly type: SqlType
}

export interface SqlType {
  readonly name: SqlTypeName
  readonly precision?: number
  readonly scale?: number
  /** Interval qualifier such as `DAY` or `YEAR TO MONTH` */
  readonly qualifier?: string
  /** Fields of a ROW type */
  readonly fields?: readonly RelField[]
  /** Value type of a search argument */
  readonly component?: SqlType
}

export interface RowType {
  readonly fields: readonly RelField[]
}

const FAMILIES: Record<SqlTypeName, TypeFamily> = {
  BOOLEAN: "BOOLEAN",
  TINYINT: "NUMERIC",
  SMALLINT: "NUMERIC",
  INTEGER: "NUMERIC",
  BIGINT: "NUMERIC",
  DECIMAL: "NUMERIC",
  FLOAT: "NUMERIC",
  REAL: "NUMERIC",
  DOUBLE: "NUMERIC",
  CHAR: "CHARACTER",
  VARCHAR: "CHARACTER",
  BINARY: "BINARY",
  VARBINARY: "BINARY",
  DATE: "DATE",
  TIME: "TIME",
  TIMESTAMP: "TIMESTAMP",
  TIMESTAMP_WITH_LOCAL_TIME_ZONE: "TIMESTAMP",
  INTERVAL_YEAR_MONTH: "INTERVAL",
  INTERVAL_DAY_TIME: "INTERVAL",
  NULL: "NULL",
  SYMBOL: "OTHER",
  ROW: "STRUCT",
  ARRAY: "COLLECTION",
  MAP: "COLLECTION",
  MULTISET: "COLLECTION",
  CURSOR: "CURSOR",
  SARG: "OTHER",
  ANY: "OTHER",
}

export function typeFamily(type: SqlType): TypeFamily {
  return FAMILIES[type.name]
}

export function isCharacter(type: SqlType): boolean {
  return typeFamily(type) === "CHARACTER"
}

// ==================== Builders ====================

export const SqlTypes = {
  BOOLEAN: { name: "BOOLEAN" },
  TINYINT: { name: "TINYINT" },
  SMALLINT: { name: "SMALLINT" },
  INTEGER: { name: "INTEGER" },
  BIGINT: { name: "BIGINT" },
  FLOAT: { name: "FLOAT" },
  REAL: { name: "REAL" },
  DOUBLE: { name: "DOUBLE" },
  DATE: { name: "DATE" },
  NULL: { name: "NULL" },
  SYMBOL: { name: "SYMBOL" },
  CURSOR: { name: "CURSOR" },
  ANY: { name: "ANY" },
  VARCHAR: { name: "VARCHAR" },
} as const satisfies Record<string, SqlType>

export function decimal(precision: number, scale = 0): SqlType {
  return { name: "DECIMAL", precision, scale }
}

export function char(precision: number): SqlType {
  return { name: "CHAR", precision }
}

export function varchar(precision?: number): SqlType {
  return precision === undefined
    ? { name: "VARCHAR" }
    : { name: "VARCHAR", precision }
}

export function timestamp(precision = 0, withLocalTimeZone = false): SqlType {
  return {
    name: withLocalTimeZone ? "TIMESTAMP_WITH_LOCAL_TIME_ZONE" : "TIMESTAMP",
    precision,
  }
}

export function interval(qualifier: string): SqlType {
  const yearMonth = /^(YEAR|MONTH)/.test(qualifier)
  return {
    name: yearMonth ? "INTERVAL_YEAR_MONTH" : "INTERVAL_DAY_TIME",
    qualifier,
  }
}

export function rowOf(fields: readonly (readonly [string, SqlType])[]): SqlType {
  return {
    name: "ROW",
    fields: fields.map(([name, type]) => ({ name, type })),
  }
}

/** Builds a row type from `[name, type]` pairs. */
export function rowType(
  fields: readonly (readonly [string, SqlType])[],
): RowType {
  return { fields: fields.map(([name, type]) => ({ name, type })) }
}

/**
 * Appends a numeric suffix to `name` until it is absent from `used`, then
 * records it. Case-insensitive; `t` becomes `t0`, `t1`, …
 */
export function uniquify(name: string, used: Set<string>): string {
  if (!used.has(name.toLowerCase())) {
    used.add(name.toLowerCase())
    return name
  }
  for (let i = 0; ; i++) {
    const candidate = `${name}${i}`
    if (!used.has(candidate.toLowerCase())) {
      used.add(candidate.toLowerCase())
      return candidate
    }
  }
}
