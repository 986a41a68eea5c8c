import { describe, expect, it } from "vitest"
import * as exp from "../expressions.js"
import { relToSql, relToSqlString, UnknownDialectError, UnsupportedError } from "../index.js"
import { aggregateOperator, functionOperator, SqlStdOperatorTable as Op } from "../rel/operators.js"
import {
  aggCall,
  aggregate,
  collation,
  filter,
  join,
  match,
  project,
  setOp,
  sort,
  tableFunctionScan,
  values,
  window,
} from "../rel/rel.js"
import {
  booleanLiteral,
  call,
  cast,
  charLiteral,
  correlVariable,
  equals,
  exactLiteral,
  exists,
  fieldAccess,
  fieldCollation,
  inputRef,
  inSubQuery,
  not,
  nullLiteral,
  over,
  patternAlter,
  patternConcat,
  patternFieldRef,
  patternQuantifier,
  type RexNode,
  scalarQuery,
  windowOf,
} from "../rel/rex.js"
import { SqlTypes, varchar } from "../rel/types.js"
import { DEPT, EMP, ref } from "./fixtures.js"

const gt = (a: RexNode, b: RexNode) => call(Op.GREATER_THAN, [a, b])

const sumSalByDept = aggregate(EMP, [2], [aggCall(Op.SUM, [3], { name: "s" })])

describe("scan and project", () => {
  it("selects every column of a bare scan", () => {
    expect(relToSqlString(EMP)).toBe("SELECT * FROM emp")
  })

  it("lists projected columns, aliasing renamed ones", () => {
    const rel = project(EMP, [ref(EMP, 1), ref(EMP, 2)], ["name", "deptno"])
    expect(relToSqlString(rel)).toBe("SELECT ename AS name, deptno FROM emp")
  })

  it("keeps SELECT * for an identity projection", () => {
    const rel = project(
      EMP,
      [0, 1, 2, 3].map((i) => ref(EMP, i)),
      ["empno", "ename", "deptno", "sal"],
    )
    expect(relToSqlString(rel)).toBe("SELECT * FROM emp")
  })

  it("casts a null projection to the field type", () => {
    const rel = project(EMP, [nullLiteral(SqlTypes.INTEGER)], ["n"])
    expect(relToSqlString(rel)).toBe("SELECT CAST(NULL AS INTEGER) AS n FROM emp")
  })

  it("merges a projection into the filtered SELECT", () => {
    const rel = project(filter(EMP, gt(ref(EMP, 3), exactLiteral(1000))), [ref(EMP, 1)], ["ename"])
    expect(relToSqlString(rel)).toBe("SELECT ename FROM emp WHERE sal > 1000")
  })

  it("writes SELECT DISTINCT for a distinct projection", () => {
    const rel = project(EMP, [ref(EMP, 2)], ["deptno"], { distinct: true })
    expect(relToSqlString(rel)).toBe("SELECT DISTINCT deptno FROM emp")
  })
})

describe("aggregate and sort", () => {
  it("groups, aggregates and sorts by the aggregate alias", () => {
    const rel = sort(sumSalByDept, [collation(1, "DESC")])
    expect(relToSqlString(rel)).toBe(
      "SELECT deptno, SUM(sal) AS s FROM emp GROUP BY deptno ORDER BY s DESC",
    )
  })

  it("emulates the null direction on MySQL", () => {
    const rel = sort(sumSalByDept, [collation(1, "DESC")])
    expect(relToSqlString(rel, { dialect: "mysql" })).toBe(
      "SELECT deptno, SUM(sal) AS s FROM emp GROUP BY deptno ORDER BY s IS NULL DESC, s DESC",
    )
  })

  it("writes a non-default null direction where supported", () => {
    const rel = sort(EMP, [collation(3, "ASC", "FIRST")])
    expect(relToSqlString(rel)).toBe("SELECT * FROM emp ORDER BY sal NULLS FIRST")
  })

  it("writes the HAVING condition over the aggregate expression", () => {
    const rel = filter(sumSalByDept, gt(ref(sumSalByDept, 1), exactLiteral(100)))
    expect(relToSqlString(rel)).toBe(
      "SELECT deptno, SUM(sal) AS s FROM emp GROUP BY deptno HAVING SUM(sal) > 100",
    )
  })

  it("refers to the alias in HAVING where the dialect allows it", () => {
    const rel = filter(sumSalByDept, gt(ref(sumSalByDept, 1), exactLiteral(100)))
    expect(relToSqlString(rel, { dialect: "mysql" })).toBe(
      "SELECT deptno, SUM(sal) AS s FROM emp GROUP BY deptno HAVING s > 100",
    )
  })

  it("wraps an aggregate over an aggregate", () => {
    const rel = aggregate(sumSalByDept, [], [aggCall(Op.MAX, [1], { name: "m" })])
    expect(relToSqlString(rel)).toBe(
      "SELECT MAX(s) AS m FROM (SELECT deptno, SUM(sal) AS s FROM emp GROUP BY deptno) AS t",
    )
  })

  it("selects a constant for an aggregate without keys or calls", () => {
    const rel = aggregate(EMP, [], [])
    expect(relToSqlString(rel)).toBe("SELECT 1 FROM emp GROUP BY ()")
  })

  it("counts rows with COUNT(*)", () => {
    const rel = aggregate(EMP, [], [aggCall(Op.COUNT, [], { name: "c" })])
    expect(relToSqlString(rel)).toBe("SELECT COUNT(*) AS c FROM emp")
  })

  it("writes $SUM0 as COALESCE over SUM", () => {
    const rel = aggregate(EMP, [2], [aggCall(Op.SUM0, [3], { name: "s" })])
    expect(relToSqlString(rel)).toBe(
      "SELECT deptno, COALESCE(SUM(sal), 0) AS s FROM emp GROUP BY deptno",
    )
  })

  it("keeps FILTER where supported and rewrites it to CASE elsewhere", () => {
    const input = project(EMP, [ref(EMP, 3), gt(ref(EMP, 3), exactLiteral(1000))], ["sal", "big"])
    const rel = aggregate(input, [], [aggCall(Op.SUM, [0], { filterArg: 1, name: "s" })])
    expect(relToSqlString(rel)).toBe(
      "SELECT SUM(sal) FILTER (WHERE sal > 1000) AS s FROM emp",
    )
    expect(relToSqlString(rel, { dialect: "mysql" })).toBe(
      "SELECT SUM(CASE WHEN sal > 1000 THEN sal END) AS s FROM emp",
    )
  })

  it("counts filtered rows with FILTER or a CASE over a constant", () => {
    const input = project(EMP, [ref(EMP, 3), gt(ref(EMP, 3), exactLiteral(1000))], ["sal", "big"])
    const rel = aggregate(input, [], [aggCall(Op.COUNT, [], { filterArg: 1, name: "c" })])
    expect(relToSqlString(rel)).toBe("SELECT COUNT(*) FILTER (WHERE sal > 1000) AS c FROM emp")
    expect(relToSqlString(rel, { dialect: "mysql" })).toBe(
      "SELECT COUNT(CASE WHEN sal > 1000 THEN 1 END) AS c FROM emp",
    )
  })

  it("calls user-defined aggregate functions by name", () => {
    const rel = aggregate(EMP, [2], [aggCall(aggregateOperator("median"), [3], { name: "m" })])
    expect(relToSqlString(rel)).toBe("SELECT deptno, MEDIAN(sal) AS m FROM emp GROUP BY deptno")
  })

  it("projects and sorts an aggregate in one SELECT without nested aggregates or GROUP BY aliases", () => {
    const strict = "ansi, supportsNestedAggregations=false, groupByAlias=false"
    const keyFirst = project(
      sumSalByDept,
      [ref(sumSalByDept, 0), ref(sumSalByDept, 1)],
      ["deptno", "s"],
    )
    expect(relToSqlString(keyFirst, { dialect: strict })).toBe(
      "SELECT deptno, SUM(sal) AS s FROM emp GROUP BY deptno",
    )
    expect(relToSqlString(sort(keyFirst, [collation(1, "DESC")]), { dialect: strict })).toBe(
      "SELECT deptno, SUM(sal) AS s FROM emp GROUP BY deptno ORDER BY s DESC",
    )

    const sumFirst = project(
      sumSalByDept,
      [ref(sumSalByDept, 1), ref(sumSalByDept, 0)],
      ["s", "deptno"],
    )
    expect(relToSqlString(sort(sumFirst, [collation(0, "DESC")]), { dialect: strict })).toBe(
      "SELECT SUM(sal) AS s, deptno FROM emp GROUP BY deptno ORDER BY s DESC",
    )
  })

  it("writes OFFSET and FETCH in the dialect's form", () => {
    const rel = sort(EMP, [collation(0)], { offset: exactLiteral(5), fetch: exactLiteral(10) })
    expect(relToSqlString(rel)).toBe(
      "SELECT * FROM emp ORDER BY empno OFFSET 5 ROWS FETCH NEXT 10 ROWS ONLY",
    )
    expect(relToSqlString(rel, { dialect: "postgres" })).toBe(
      "SELECT * FROM emp ORDER BY empno LIMIT 10 OFFSET 5",
    )
  })

  it("lists the columns of a sort below the root", () => {
    const sorted = sort(EMP, [collation(3, "DESC")], { fetch: exactLiteral(3) })
    const rel = project(sorted, [ref(EMP, 1)], ["ename"])
    expect(relToSqlString(rel)).toBe(
      "SELECT ename FROM (SELECT empno, ename, deptno, sal FROM emp ORDER BY sal DESC FETCH NEXT 3 ROWS ONLY) AS t",
    )
  })
})

describe("grouping sets", () => {
  const grouped = (sets: number[][]) =>
    aggregate(EMP, [1, 2], [aggCall(Op.COUNT, [], { name: "c" })], sets)

  it("recognizes ROLLUP", () => {
    expect(relToSqlString(grouped([[1, 2], [1], []]))).toBe(
      "SELECT ename, deptno, COUNT(*) AS c FROM emp GROUP BY ROLLUP(ename, deptno)",
    )
  })

  it("recognizes CUBE", () => {
    expect(relToSqlString(grouped([[1, 2], [1], [2], []]))).toBe(
      "SELECT ename, deptno, COUNT(*) AS c FROM emp GROUP BY CUBE(ename, deptno)",
    )
  })

  it("falls back to GROUPING SETS", () => {
    expect(relToSqlString(grouped([[1, 2], []]))).toBe(
      "SELECT ename, deptno, COUNT(*) AS c FROM emp GROUP BY GROUPING SETS ((ename, deptno), ())",
    )
  })

  it("fails on a dialect without grouping sets", () => {
    const rel = grouped([[1, 2], [1], []])
    expect(() => relToSqlString(rel, { dialect: "mysql" })).toThrow(UnsupportedError)
    expect(() => relToSqlString(rel, { dialect: "mysql" })).toThrow(
      "ROLLUP is not supported by dialect mysql",
    )
  })
})

describe("joins", () => {
  it("aliases the second occurrence of a table in a self-join", () => {
    const rel = join(EMP, EMP, equals(ref(EMP, 2), inputRef(6, SqlTypes.INTEGER)))
    expect(relToSqlString(rel)).toBe(
      "SELECT * FROM emp INNER JOIN emp AS emp0 ON emp.deptno = emp0.deptno",
    )
  })

  it("qualifies projected columns over a join", () => {
    const joined = join(EMP, EMP, equals(ref(EMP, 2), inputRef(6, SqlTypes.INTEGER)))
    const rel = project(joined, [ref(joined, 1), ref(joined, 5)], ["ename", "ename0"])
    expect(relToSqlString(rel)).toBe(
      "SELECT emp.ename, emp0.ename AS ename0 FROM emp INNER JOIN emp AS emp0 ON emp.deptno = emp0.deptno",
    )
  })

  it("writes the left input first in a join condition", () => {
    const condition = call(Op.LESS_THAN, [inputRef(4, SqlTypes.INTEGER), ref(EMP, 2)])
    expect(relToSqlString(join(EMP, DEPT, condition))).toBe(
      "SELECT * FROM emp INNER JOIN dept ON emp.deptno > dept.deptno",
    )
  })

  it("writes outer joins", () => {
    const rel = join(EMP, DEPT, equals(ref(EMP, 2), inputRef(4, SqlTypes.INTEGER)), "LEFT")
    expect(relToSqlString(rel)).toBe(
      "SELECT * FROM emp LEFT JOIN dept ON emp.deptno = dept.deptno",
    )
  })

  it("writes a join on TRUE in the dialect's cross join style", () => {
    const rel = join(EMP, DEPT, booleanLiteral(true))
    expect(relToSqlString(rel)).toBe("SELECT * FROM emp CROSS JOIN dept")
    expect(relToSqlString(rel, { dialect: "ansi, crossJoinStyle=COMMA" })).toBe(
      "SELECT * FROM emp, dept",
    )
  })

  it("writes a semi join as EXISTS", () => {
    const rel = join(EMP, DEPT, equals(ref(EMP, 2), inputRef(4, SqlTypes.INTEGER)), "SEMI")
    expect(relToSqlString(rel)).toBe(
      "SELECT * FROM emp WHERE EXISTS (SELECT 1 FROM dept WHERE emp.deptno = dept.deptno)",
    )
  })

  it("writes an anti join as NOT EXISTS", () => {
    const rel = join(EMP, DEPT, equals(ref(EMP, 2), inputRef(4, SqlTypes.INTEGER)), "ANTI")
    expect(relToSqlString(rel)).toBe(
      "SELECT * FROM emp WHERE NOT EXISTS (SELECT 1 FROM dept WHERE emp.deptno = dept.deptno)",
    )
  })
})

describe("analytic functions", () => {
  const ranked = project(
    EMP,
    [
      ref(EMP, 1),
      over(Op.ROW_NUMBER, [], windowOf({
        partitionKeys: [ref(EMP, 2)],
        orderKeys: [fieldCollation(ref(EMP, 3), "DESC")],
      })),
    ],
    ["ename", "rn"],
  )
  const topPerDept = filter(ranked, equals(inputRef(1, SqlTypes.BIGINT), exactLiteral(1)))

  it("filters with QUALIFY where supported", () => {
    const rowNumber = "ROW_NUMBER() OVER (PARTITION BY deptno ORDER BY sal DESC NULLS FIRST)"
    expect(relToSqlString(topPerDept, { dialect: "bigquery" })).toBe(
      `SELECT ename, ${rowNumber} AS rn FROM emp QUALIFY ${rowNumber} = 1`,
    )
  })

  it("wraps the projection in a subquery elsewhere", () => {
    expect(relToSqlString(topPerDept, { dialect: "postgres" })).toBe(
      "SELECT * FROM (SELECT ename, ROW_NUMBER() OVER (PARTITION BY deptno ORDER BY sal DESC) AS rn FROM emp) AS t WHERE rn = 1",
    )
  })

  it("appends the calls of a window node to its input fields", () => {
    const rel = window(
      EMP,
      [
        {
          keys: [2],
          orderKeys: [collation(0)],
          isRows: true,
          lowerBound: { kind: "unboundedPreceding" },
          upperBound: { kind: "currentRow" },
          aggCalls: [
            { op: Op.SUM, operands: [ref(EMP, 3)], distinct: false, type: SqlTypes.DOUBLE },
          ],
        },
      ],
      [],
      ["running"],
    )
    expect(relToSqlString(rel)).toBe(
      "SELECT empno, ename, deptno, sal, SUM(sal) OVER (PARTITION BY deptno ORDER BY empno ROWS BETWEEN UNBOUNDED PRECEDING AND CURRENT ROW) AS running FROM emp",
    )
  })

  it("resolves window constants", () => {
    const rel = window(
      EMP,
      [
        {
          keys: [2],
          orderKeys: [],
          isRows: false,
          aggCalls: [
            {
              op: Op.SUM,
              operands: [inputRef(4, SqlTypes.INTEGER)],
              distinct: false,
              type: SqlTypes.INTEGER,
            },
          ],
        },
      ],
      [exactLiteral(1)],
      ["n"],
    )
    expect(relToSqlString(rel)).toBe(
      "SELECT empno, ename, deptno, sal, SUM(1) OVER (PARTITION BY deptno) AS n FROM emp",
    )
  })
})

describe("set operations", () => {
  const empDepts = project(EMP, [ref(EMP, 2)], ["deptno"])
  const deptDepts = project(DEPT, [ref(DEPT, 0)], ["deptno"])

  it("chains inputs left-deep", () => {
    const rel = setOp("UNION", [empDepts, deptDepts, empDepts], true)
    expect(relToSqlString(rel)).toBe(
      "SELECT deptno FROM emp UNION ALL SELECT deptno FROM dept UNION ALL SELECT deptno FROM emp",
    )
  })

  it("wraps INTERSECT before sorting it", () => {
    const rel = sort(setOp("INTERSECT", [empDepts, deptDepts]), [collation(0)])
    expect(relToSqlString(rel)).toBe(
      "SELECT * FROM (SELECT deptno FROM emp INTERSECT SELECT deptno FROM dept) AS t1 ORDER BY deptno",
    )
  })
})

describe("values", () => {
  const fields = [
    ["a", SqlTypes.INTEGER],
    ["b", varchar()],
  ] as const
  const rows = values(fields, [
    [exactLiteral(1), charLiteral("x")],
    [exactLiteral(2), charLiteral("y")],
  ])

  it("writes an aliased VALUES list", () => {
    expect(relToSqlString(rows)).toBe("SELECT * FROM (VALUES (1, 'x'), (2, 'y')) AS t (a, b)")
  })

  it("writes a UNION ALL of selects where VALUES cannot be aliased", () => {
    expect(relToSqlString(rows, { dialect: "mysql" })).toBe(
      "SELECT 1 AS a, 'x' AS b UNION ALL SELECT 2 AS a, 'y' AS b",
    )
  })

  it("gives each VALUES list in a join its own alias", () => {
    const one = values([["a", SqlTypes.INTEGER]], [[exactLiteral(1)]])
    const two = values([["a", SqlTypes.INTEGER]], [[exactLiteral(2)]])
    const condition = equals(inputRef(0, SqlTypes.INTEGER), inputRef(1, SqlTypes.INTEGER))
    const rel = join(one, two, condition)
    expect(relToSqlString(rel)).toBe(
      "SELECT * FROM (VALUES (1)) AS t (a) INNER JOIN (VALUES (2)) AS t0 (a) ON t.a = t0.a",
    )
  })

  it("writes an empty VALUES as a typed row that never matches", () => {
    expect(relToSqlString(values(fields, []))).toBe(
      "SELECT * FROM (VALUES (CAST(NULL AS INTEGER), CAST(NULL AS VARCHAR))) AS t (a, b) WHERE 1 = 0",
    )
  })
})

describe("subqueries and correlation", () => {
  it("writes IN and NOT IN over a subquery", () => {
    const depts = project(DEPT, [ref(DEPT, 0)], ["deptno"])
    const inDepts = inSubQuery([ref(EMP, 2)], depts)
    expect(relToSqlString(filter(EMP, inDepts))).toBe(
      "SELECT * FROM emp WHERE deptno IN (SELECT deptno FROM dept)",
    )
    expect(relToSqlString(filter(EMP, not(inDepts)))).toBe(
      "SELECT * FROM emp WHERE deptno NOT IN (SELECT deptno FROM dept)",
    )
  })

  it("writes a scalar subquery in parentheses", () => {
    const maxDept = aggregate(DEPT, [], [aggCall(Op.MAX, [0], { name: "m" })])
    expect(relToSqlString(filter(EMP, gt(ref(EMP, 2), scalarQuery(maxDept))))).toBe(
      "SELECT * FROM emp WHERE deptno > (SELECT MAX(deptno) AS m FROM dept)",
    )
  })

  it("resolves correlated fields through the outer input", () => {
    const outer = correlVariable("$cor0", { name: "ROW", fields: EMP.rowType.fields })
    const inner = filter(DEPT, equals(fieldAccess(outer, "deptno"), ref(DEPT, 0)))
    const rel = filter(EMP, exists(inner), ["$cor0"])
    expect(relToSqlString(rel)).toBe(
      "SELECT * FROM emp WHERE EXISTS (SELECT * FROM dept WHERE emp.deptno = deptno)",
    )
  })
})

describe("table functions", () => {
  it("writes TABLE(call)", () => {
    const rel = tableFunctionScan(call(functionOperator("ramp"), [exactLiteral(3)]), [
      ["i", SqlTypes.INTEGER],
    ])
    expect(relToSqlString(rel)).toBe("SELECT * FROM TABLE(RAMP(3))")
  })

  it("passes inputs as cursors", () => {
    const names = project(EMP, [ref(EMP, 1)], ["ename"])
    const rel = tableFunctionScan(
      call(functionOperator("dedup"), [cast(inputRef(0), SqlTypes.CURSOR)]),
      [["ename", varchar(20)]],
      [names],
    )
    expect(relToSqlString(rel)).toBe(
      "SELECT * FROM TABLE(DEDUP(CURSOR (SELECT ename FROM emp)))",
    )
  })

  it("aliases a wrapped cursor query apart from the aliases already taken", () => {
    const union = setOp("UNION", [
      project(EMP, [ref(EMP, 2)], ["deptno"]),
      project(DEPT, [ref(DEPT, 0)], ["deptno"]),
    ])
    const rel = tableFunctionScan(
      call(functionOperator("dedup"), [cast(inputRef(0), SqlTypes.CURSOR)]),
      [["deptno", SqlTypes.INTEGER]],
      [union],
    )
    expect(relToSqlString(rel, { dialect: "postgres" })).toBe(
      "SELECT * FROM TABLE(DEDUP(CURSOR (SELECT * FROM (SELECT deptno FROM emp UNION SELECT deptno FROM dept) AS t2)))",
    )
  })
})

describe("match recognize", () => {
  const sal = (variable: string) => patternFieldRef(variable, 3, ref(EMP, 3).type)
  const prev = (variable: string) => call(Op.PREV, [sal(variable), exactLiteral(1)])

  it("writes partitions, measures and pattern definitions over unqualified fields", () => {
    const rel = match(
      EMP,
      patternConcat(
        charLiteral("STRT"),
        patternQuantifier(charLiteral("DOWN"), 1),
        patternQuantifier(charLiteral("UP"), 1),
      ),
      new Map([
        ["DOWN", call(Op.LESS_THAN, [sal("DOWN"), prev("DOWN")])],
        ["UP", gt(sal("UP"), prev("UP"))],
      ]),
      {
        measures: new Map([["bottom", call(Op.LAST, [sal("DOWN")])]]),
        partitionKeys: [2],
        orderKeys: [collation(3)],
      },
    )
    expect(relToSqlString(rel)).toBe(
      "SELECT * FROM emp MATCH_RECOGNIZE (PARTITION BY deptno ORDER BY sal " +
        "MEASURES LAST(DOWN.sal) AS bottom ONE ROW PER MATCH AFTER MATCH SKIP TO NEXT ROW " +
        "PATTERN (STRT DOWN+ UP+) " +
        "DEFINE DOWN AS DOWN.sal < PREV(DOWN.sal, 1), UP AS UP.sal > PREV(UP.sal, 1))",
    )
  })

  it("writes anchors, reluctant quantifiers, subsets and the skip target", () => {
    const rel = match(
      EMP,
      patternConcat(
        charLiteral("A"),
        patternQuantifier(patternAlter(charLiteral("B"), charLiteral("C")), 1, 3, true),
      ),
      new Map([["A", gt(sal("A"), exactLiteral(1000))]]),
      {
        measures: new Map([["matchno", call(Op.MATCH_NUMBER, [])]]),
        allRows: true,
        strictStart: true,
        after: { skipTo: "LAST", variable: "A" },
        subsets: new Map([["S", ["B", "C"]]]),
      },
    )
    expect(rel.rowType.fields.map((f) => f.name)).toEqual([
      "empno",
      "ename",
      "deptno",
      "sal",
      "matchno",
    ])
    expect(relToSqlString(rel)).toBe(
      "SELECT * FROM emp MATCH_RECOGNIZE (MEASURES MATCH_NUMBER() AS matchno " +
        "ALL ROWS PER MATCH AFTER MATCH SKIP TO LAST A " +
        "PATTERN (^A (B | C){1,3}?) SUBSET S = (B, C) DEFINE A AS A.sal > 1000)",
    )
  })
})

describe("options", () => {
  const unnamed = project(EMP, [call(Op.PLUS, [ref(EMP, 3), exactLiteral(1)])], ["EXPR$0"])

  it("keeps generated aliases unless asked to strip them", () => {
    expect(relToSqlString(unnamed)).toBe('SELECT sal + 1 AS "EXPR$0" FROM emp')
    expect(relToSqlString(unnamed, { stripTrivialAliases: true })).toBe(
      "SELECT sal + 1 FROM emp",
    )
  })

  it("quotes every identifier with identify", () => {
    const rel = project(EMP, [ref(EMP, 1)], ["ename"])
    expect(relToSqlString(rel, { identify: true })).toBe('SELECT "ename" FROM "emp"')
  })

  it("returns the statement tree", () => {
    const statement = relToSql(EMP, { dialect: "postgres" })
    expect(statement.sql({ dialect: "mysql" })).toBe("SELECT * FROM emp")
  })

  it("writes mapped fields in place of input columns", () => {
    const rel = project(EMP, [ref(EMP, 3)], ["sal"])
    const fieldMap = new Map([["SAL", exp.column("salary", "e")]])
    expect(relToSqlString(rel, { fieldMap })).toBe("SELECT e.salary AS sal FROM emp")
  })

  it("rejects unknown dialects", () => {
    expect(() => relToSqlString(EMP, { dialect: "nosuch" })).toThrow(UnknownDialectError)
  })
})
