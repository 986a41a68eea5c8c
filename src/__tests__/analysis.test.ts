import { describe, expect, it } from "vitest"
import { DEFAULT_CAPABILITIES, type DialectCapabilities } from "../dialect.js"
import * as exp from "../expressions.js"
import { SqlStdOperatorTable as Op } from "../rel/operators.js"
import { aggCall, aggregate, filter, project, setOp, sort, collation } from "../rel/rel.js"
import { call, exactLiteral, inputRef, over, windowOf } from "../rel/rex.js"
import { SqlTypes } from "../rel/types.js"
import { needNewSubQuery, type SubQueryCheck } from "../rel2sql/analysis.js"
import { Clause, clausesFit } from "../rel2sql/clause.js"
import { DEPT, EMP, ref } from "./fixtures.js"

const fromEmp = () => new exp.From({ this: exp.Table.fromParts(["emp"]) })

const caps = (overrides: Partial<DialectCapabilities>): DialectCapabilities => ({
  ...DEFAULT_CAPABILITIES,
  ...overrides,
})

function check(overrides: Partial<SubQueryCheck> & Pick<SubQueryCheck, "node" | "rel">): boolean {
  return needNewSubQuery({
    clauses: [Clause.FROM],
    expected: new Set(),
    capabilities: DEFAULT_CAPABILITIES,
    ...overrides,
  })
}

describe("clausesFit", () => {
  it("accepts later clauses and a repeated SELECT", () => {
    expect(clausesFit([Clause.FROM, Clause.WHERE], [Clause.GROUP_BY])).toBe(true)
    expect(clausesFit([Clause.FROM, Clause.SELECT], [Clause.SELECT])).toBe(true)
  })

  it("rejects earlier or repeated clauses", () => {
    expect(clausesFit([Clause.FROM, Clause.SELECT], [Clause.WHERE])).toBe(false)
    expect(clausesFit([Clause.FROM, Clause.WHERE], [Clause.WHERE])).toBe(false)
  })
})

describe("needNewSubQuery", () => {
  const select = () => new exp.Select({ expressions: [exp.column("deptno")], from: fromEmp() })
  const names = project(EMP, [ref(EMP, 1)], ["ename"])

  it("builds on a node that uses no clauses yet", () => {
    expect(check({ node: select(), rel: names, clauses: [], expected: new Set([Clause.WHERE]) })).toBe(
      false,
    )
  })

  it("wraps when a clause would come before one already used", () => {
    expect(
      check({
        node: select(),
        rel: names,
        clauses: [Clause.FROM, Clause.WHERE],
        expected: new Set([Clause.WHERE]),
      }),
    ).toBe(true)
  })

  it("wraps a DISTINCT select before projecting it", () => {
    const distinct = select()
    distinct.set("distinct", true)
    expect(
      check({
        node: distinct,
        rel: names,
        clauses: [Clause.FROM, Clause.SELECT],
        expected: new Set([Clause.SELECT]),
      }),
    ).toBe(true)
  })

  it("wraps an INTERSECT before sorting it", () => {
    const intersect = new exp.Intersect({ this: select(), expression: select() })
    const rel = sort(setOp("INTERSECT", [DEPT, DEPT]), [collation(0)])
    expect(
      check({
        node: intersect,
        rel,
        clauses: [Clause.SET_OP],
        expected: new Set([Clause.ORDER_BY]),
      }),
    ).toBe(true)
  })

  it("wraps an aggregate over a grouped select unless it only totals nested aggregates", () => {
    const inner = aggregate(EMP, [2], [aggCall(Op.SUM, [3], { name: "s" })])
    const grouped = new exp.Select({
      expressions: [
        exp.column("deptno"),
        exp.alias(new exp.AggFunc({ this: "SUM", expressions: [exp.column("sal")] }), "s"),
      ],
      from: fromEmp(),
      group: new exp.Group({ expressions: [exp.column("deptno")] }),
    })
    const clauses = [Clause.FROM, Clause.GROUP_BY, Clause.SELECT]
    const total = aggregate(inner, [], [aggCall(Op.COUNT, [1], { distinct: true })])
    const regroup = aggregate(inner, [0], [aggCall(Op.COUNT, [1], { distinct: true })])
    expect(check({ node: grouped, rel: total, clauses })).toBe(false)
    expect(check({ node: grouped, rel: regroup, clauses })).toBe(true)
  })

  it("leaves a plain projection over a filtered select alone", () => {
    const filtered = select()
    filtered.set("where", new exp.Where({ this: exp.Boolean.of(true) }))
    expect(
      check({
        node: filtered,
        rel: names,
        clauses: [Clause.FROM, Clause.WHERE],
        expected: new Set([Clause.SELECT]),
      }),
    ).toBe(false)
  })
})

describe("needNewSubQuery rules", () => {
  const rowNumber = () =>
    new exp.Window({ this: new exp.Anonymous({ this: "ROW_NUMBER", expressions: [] }) })
  const countStar = () => new exp.AggFunc({ this: "COUNT", expressions: [new exp.Star()] })
  const sumSal = () => new exp.AggFunc({ this: "SUM", expressions: [exp.column("sal")] })
  const gt = (left: exp.Expression, right: number) =>
    new exp.GT({ this: left, expression: exp.Literal.number(right) })

  const ranked = project(
    EMP,
    [ref(EMP, 1), over(Op.ROW_NUMBER, [], windowOf())],
    ["ename", "rn"],
  )
  // SELECT ename, ROW_NUMBER() OVER () AS rn FROM emp
  const rankedSelect = () =>
    new exp.Select({
      expressions: [exp.column("ename"), exp.alias(rowNumber(), "rn")],
      from: fromEmp(),
    })

  const sumSalByDept = aggregate(EMP, [2], [aggCall(Op.SUM, [3], { name: "s" })])
  // SELECT deptno, SUM(sal) AS s FROM emp GROUP BY deptno [HAVING …]
  const sumSelect = (having?: exp.Expression) =>
    new exp.Select({
      expressions: [exp.column("deptno"), exp.alias(sumSal(), "s")],
      from: fromEmp(),
      group: new exp.Group({ expressions: [exp.column("deptno")] }),
      having: having ? new exp.Having({ this: having }) : undefined,
    })

  const countByName = aggregate(EMP, [1], [aggCall(Op.COUNT, [], { name: "c" })])
  const countOnly = project(countByName, [ref(countByName, 1)], ["c"])
  // SELECT ename AS name, COUNT(*) AS c FROM emp GROUP BY name [HAVING …]
  const countSelect = (having?: exp.Expression) =>
    new exp.Select({
      expressions: [exp.alias(exp.column("ename"), "name"), exp.alias(countStar(), "c")],
      from: fromEmp(),
      group: new exp.Group({ expressions: [exp.column("name")] }),
      having: having ? new exp.Having({ this: having }) : undefined,
    })

  const grouped = [Clause.FROM, Clause.GROUP_BY, Clause.SELECT]
  const groupedWithHaving = [Clause.FROM, Clause.GROUP_BY, Clause.HAVING, Clause.SELECT]
  const projecting = new Set([Clause.SELECT])

  it("keeps a filter over windowed projections as QUALIFY where supported", () => {
    const rel = filter(ranked, call(Op.EQUALS, [inputRef(1, SqlTypes.BIGINT), exactLiteral(1)]))
    const args = {
      node: rankedSelect(),
      rel,
      clauses: [Clause.FROM, Clause.SELECT],
      expected: new Set([Clause.QUALIFY]),
    }
    expect(check({ ...args, capabilities: caps({ supportsQualify: true }) })).toBe(false)
    expect(check(args)).toBe(true)
  })

  it("wraps a projection naming an aggregate like a GROUP BY column where that is ambiguous", () => {
    const rel = project(sumSalByDept, [ref(sumSalByDept, 1)], ["deptno"])
    const args = { node: sumSelect(), rel, clauses: grouped, expected: projecting }
    expect(check({ ...args, capabilities: caps({ supportsAggInGroupBy: false }) })).toBe(true)
    expect(check(args)).toBe(false)
  })

  it("wraps a window over windowed items where windows cannot nest", () => {
    const rel = project(
      ranked,
      [over(Op.SUM, [inputRef(1, SqlTypes.BIGINT)], windowOf())],
      ["total"],
    )
    const args = { node: rankedSelect(), rel, expected: projecting }
    expect(
      check({ ...args, capabilities: caps({ supportsNestedAnalyticalFunctions: false }) }),
    ).toBe(true)
    expect(check(args)).toBe(false)
  })

  it("wraps any window over a select list already set", () => {
    const rel = project(ranked, [ref(ranked, 0), over(Op.RANK, [], windowOf())], ["ename", "r"])
    expect(
      check({
        node: rankedSelect(),
        rel,
        clauses: [Clause.FROM, Clause.SELECT],
        expected: projecting,
      }),
    ).toBe(true)
  })

  it("wraps an aggregate over a windowed item where aggregates cannot nest", () => {
    const rel = aggregate(ranked, [], [aggCall(Op.SUM, [1], { name: "s" })])
    const args = { node: rankedSelect(), rel, clauses: [Clause.FROM, Clause.SELECT] }
    expect(check({ ...args, capabilities: caps({ supportsNestedAggregations: false }) })).toBe(
      true,
    )
    expect(check(args)).toBe(false)
  })

  it("wraps an aggregate over a windowed item where aggregates take no windows", () => {
    const rel = aggregate(ranked, [], [aggCall(Op.SUM, [1], { name: "s" })])
    const noWindows = caps({ supportsAnalyticalFunctionInAggregate: false })
    const clauses = [Clause.FROM, Clause.SELECT]
    expect(check({ node: rankedSelect(), rel, clauses, capabilities: noWindows })).toBe(true)
    expect(check({ node: rankedSelect(), rel, clauses })).toBe(false)

    // SELECT ename, CASE WHEN ROW_NUMBER() OVER () > 1 THEN sal END AS late FROM emp
    const late = new exp.Case({
      ifs: [new exp.If({ this: gt(rowNumber(), 1), true: exp.column("sal") })],
    })
    const caseSelect = new exp.Select({
      expressions: [exp.column("ename"), exp.alias(late, "late")],
      from: fromEmp(),
    })
    expect(check({ node: caseSelect, rel, clauses, capabilities: noWindows })).toBe(true)
  })

  it("wraps a projection that drops a GROUP BY alias", () => {
    const args = { node: countSelect(), rel: countOnly, clauses: grouped, expected: projecting }
    expect(check({ ...args, capabilities: caps({ groupByAlias: true }) })).toBe(true)
    expect(check(args)).toBe(false)
  })

  it("wraps grouping by a windowed projection's alias only over a projection", () => {
    const groupByAlias = caps({ groupByAlias: true })
    const clauses = [Clause.FROM, Clause.SELECT]
    const count = [aggCall(Op.COUNT, [], { name: "c" })]
    const byRank = aggregate(ranked, [1], count)
    expect(check({ node: rankedSelect(), rel: byRank, clauses, capabilities: groupByAlias })).toBe(
      true,
    )
    expect(check({ node: rankedSelect(), rel: byRank, clauses })).toBe(false)

    const filtered = filter(
      ranked,
      call(Op.GREATER_THAN, [inputRef(1, SqlTypes.BIGINT), exactLiteral(1)]),
    )
    const overFilter = aggregate(filtered, [1], count)
    expect(
      check({ node: rankedSelect(), rel: overFilter, clauses, capabilities: groupByAlias }),
    ).toBe(false)
  })

  it("wraps a projection over a HAVING that refers to an alias", () => {
    const rel = project(sumSalByDept, [ref(sumSalByDept, 1)], ["s"])
    const args = {
      node: sumSelect(gt(exp.column("s"), 100)),
      rel,
      clauses: groupedWithHaving,
      expected: projecting,
    }
    expect(check({ ...args, capabilities: caps({ havingAlias: true }) })).toBe(true)
    expect(check(args)).toBe(false)
  })

  it("wraps a projection that drops a GROUP BY alias under a HAVING without aliases", () => {
    const args = { rel: countOnly, clauses: groupedWithHaving, expected: projecting }
    const noAlias = countSelect(gt(countStar(), 1))
    expect(check({ ...args, node: noAlias })).toBe(true)
    expect(check({ ...args, node: noAlias, capabilities: caps({ havingAlias: true }) })).toBe(true)
    expect(check({ ...args, node: countSelect(gt(exp.column("c"), 1)) })).toBe(false)
  })
})
