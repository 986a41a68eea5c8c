import { afterEach, describe, expect, it, vi } from "vitest"
import { Dialect, UnsupportedError, UnsupportedLevel } from "../index.js"
import * as exp from "../expressions.js"

const a = exp.column("a")
const b = exp.column("b")
const c = exp.column("c")

function render(node: exp.Expression, dialect = "ansi"): string {
  return Dialect.get(dialect).generate(node)
}

describe("operator precedence", () => {
  it("parenthesizes looser operands", () => {
    expect(render(new exp.Mul({ this: new exp.Add({ this: a, expression: b }), expression: c }))).toBe(
      "(a + b) * c",
    )
    expect(render(new exp.And({ this: new exp.Or({ this: a, expression: b }), expression: c }))).toBe(
      "(a OR b) AND c",
    )
  })

  it("parenthesizes a right operand of equal precedence unless associative", () => {
    expect(render(new exp.Sub({ this: a, expression: new exp.Sub({ this: b, expression: c }) }))).toBe(
      "a - (b - c)",
    )
    expect(render(new exp.Add({ this: a, expression: new exp.Add({ this: b, expression: c }) }))).toBe(
      "a + b + c",
    )
  })

  it("does not chain comparisons", () => {
    const compared = new exp.EQ({ this: new exp.LT({ this: a, expression: b }), expression: c })
    expect(render(compared)).toBe("(a < b) = c")
  })

  it("keeps a NOT operand that is a comparison in parentheses", () => {
    expect(render(new exp.Not({ this: new exp.EQ({ this: a, expression: b }) }))).toBe(
      "NOT (a = b)",
    )
  })
})

describe("identifiers", () => {
  it("quotes names that need it", () => {
    expect(render(exp.column("order", "t"))).toBe('t."order"')
    expect(render(exp.column("first name"))).toBe('"first name"')
    expect(render(exp.column("first name"), "mysql")).toBe("`first name`")
  })

  it("quotes everything with identify", () => {
    const node = exp.column("a", "t")
    expect(Dialect.get("ansi").generate(node, { identify: true })).toBe('"t"."a"')
  })
})

describe("queries", () => {
  const select = new exp.Select({
    expressions: [a],
    from: new exp.From({ this: exp.Table.fromParts(["s", "t"]) }),
    order: new exp.Order({ expressions: [new exp.Ordered({ this: a, desc: true })] }),
    limit: new exp.Limit({ this: exp.Literal.number(5) }),
  })

  it("writes the row limit in the dialect's form", () => {
    expect(render(select)).toBe("SELECT a FROM s.t ORDER BY a DESC FETCH NEXT 5 ROWS ONLY")
    expect(render(select, "spark")).toBe("SELECT a FROM s.t ORDER BY a DESC LIMIT 5")
  })

  it("parenthesizes a sorted branch of a set operation", () => {
    const plain = new exp.Select({
      expressions: [a],
      from: new exp.From({ this: exp.Table.fromParts(["u"]) }),
    })
    const union = new exp.Union({ this: plain, expression: select, distinct: false })
    expect(render(union)).toBe(
      "SELECT a FROM u UNION ALL (SELECT a FROM s.t ORDER BY a DESC FETCH NEXT 5 ROWS ONLY)",
    )
  })
})

describe("unsupported constructs", () => {
  const nullsFirst = new exp.Ordered({ this: a, desc: false, nulls_first: true })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it("warns and drops NULLS FIRST where it cannot be written", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined)
    const generator = Dialect.get("mysql").createGenerator()
    expect(generator.generate(nullsFirst)).toBe("a")
    expect(generator.warnings).toEqual(["'NULLS FIRST' is not supported"])
    expect(warn).toHaveBeenCalledWith("[rel2sql] 'NULLS FIRST' is not supported")
  })

  it("throws at the RAISE level", () => {
    const generate = () =>
      Dialect.get("mysql").generate(nullsFirst, { unsupportedLevel: UnsupportedLevel.RAISE })
    expect(generate).toThrow(UnsupportedError)
    expect(generate).toThrow("'NULLS FIRST' is not supported")
  })

  it("stays silent at the IGNORE level", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined)
    const generator = Dialect.get("mysql").createGenerator({
      unsupportedLevel: UnsupportedLevel.IGNORE,
    })
    expect(generator.generate(nullsFirst)).toBe("a")
    expect(generator.warnings).toEqual([])
    expect(warn).not.toHaveBeenCalled()
  })

  it("writes NULLS FIRST where supported", () => {
    expect(render(nullsFirst)).toBe("a NULLS FIRST")
  })
})
