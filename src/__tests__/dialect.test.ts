import { describe, expect, it } from "vitest"
import { withPrecision } from "../dialect.js"
import * as exp from "../expressions.js"
import { Dialect, UnknownDialectError } from "../index.js"
import { char, decimal, interval, type SqlType, SqlTypes, timestamp, varchar } from "../rel/types.js"

describe("Dialect registry", () => {
  it("lists the registered dialects", () => {
    expect(Dialect.list()).toEqual(["ansi", "bigquery", "mysql", "postgres", "snowflake", "spark"])
  })

  it("resolves names case-insensitively", () => {
    expect(Dialect.get("MySQL").name).toBe("mysql")
    expect(Dialect.get().name).toBe("ansi")
  })

  it("rejects unknown names", () => {
    expect(() => Dialect.get("oracle")).toThrow(UnknownDialectError)
    expect(() => Dialect.get("oracle")).toThrow("Unknown dialect: oracle")
  })

  it("applies capability settings without touching the registered instance", () => {
    const tuned = Dialect.get("mysql, supportsGroupingSets=true, nullCollation=high")
    expect(tuned.capabilities.supportsGroupingSets).toBe(true)
    expect(tuned.capabilities.nullCollation).toBe("high")
    expect(tuned.name).toBe("mysql")
    expect(Dialect.get("mysql").capabilities.supportsGroupingSets).toBe(false)
  })

  it("rejects malformed settings", () => {
    expect(() => Dialect.get("ansi, supportsQualify=maybe")).toThrow(
      "Invalid dialect setting: supportsQualify=maybe",
    )
    expect(() => Dialect.get("ansi, colour=blue")).toThrow("Invalid dialect setting: colour=blue")
  })
})

describe("null ordering", () => {
  it("derives the default null direction from the collation", () => {
    expect(Dialect.get("ansi").defaultNullDirection("ASC")).toBe("LAST")
    expect(Dialect.get("ansi").defaultNullDirection("DESC")).toBe("FIRST")
    expect(Dialect.get("mysql").defaultNullDirection("ASC")).toBe("FIRST")
  })

  it("emulates a non-default direction with an IS NULL key", () => {
    const mysql = Dialect.get("mysql")
    const key = mysql.emulateNullDirection(exp.column("x"), false, false)
    expect(key).toBeInstanceOf(exp.Is)
    expect(key && mysql.generate(key)).toBe("x IS NULL")
    expect(mysql.emulateNullDirection(exp.column("x"), true, false)).toBeUndefined()
  })

  it("writes NULLS FIRST/LAST where the dialect can", () => {
    expect(Dialect.get("postgres").emulateNullDirection(exp.column("x"), false, false)).toBe(
      undefined,
    )
  })
})

describe("casts", () => {
  const cast = (dialect: string, type: SqlType) => {
    const d = Dialect.get(dialect)
    return d.generate(d.castCall(exp.column("x"), type))
  }

  it("maps type names per dialect", () => {
    expect(cast("ansi", decimal(7, 2))).toBe("CAST(x AS DECIMAL(7, 2))")
    expect(cast("mysql", SqlTypes.INTEGER)).toBe("CAST(x AS SIGNED)")
    expect(cast("mysql", varchar(10))).toBe("CAST(x AS CHAR(10))")
    expect(cast("postgres", SqlTypes.DOUBLE)).toBe("CAST(x AS DOUBLE PRECISION)")
    expect(cast("bigquery", varchar(10))).toBe("CAST(x AS STRING)")
  })

  it("writes lengths, zones and interval qualifiers", () => {
    expect(cast("ansi", char(3))).toBe("CAST(x AS CHAR(3))")
    expect(cast("ansi", timestamp(0, true))).toBe("CAST(x AS TIMESTAMP WITH LOCAL TIME ZONE)")
    expect(cast("postgres", timestamp(0, true))).toBe("CAST(x AS TIMESTAMPTZ)")
    expect(cast("ansi", interval("DAY"))).toBe("CAST(x AS INTERVAL DAY)")
  })
})

describe("withPrecision", () => {
  it("pads or trims fractional seconds", () => {
    expect(withPrecision("10:00:00", 3)).toBe("10:00:00.000")
    expect(withPrecision("10:00:00.98765", 2)).toBe("10:00:00.98")
    expect(withPrecision("10:00:00.5", 0)).toBe("10:00:00")
  })
})
