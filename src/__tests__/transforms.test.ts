import { describe, expect, it } from "vitest"
import { relToSqlString } from "../index.js"
import { SqlStdOperatorTable as Op } from "../rel/operators.js"
import { collation, project, setOp, sort } from "../rel/rel.js"
import { call, exactLiteral } from "../rel/rex.js"
import { isTrivialAlias } from "../transforms.js"
import { DEPT, EMP, ref } from "./fixtures.js"

describe("isTrivialAlias", () => {
  it("matches generated expression names only", () => {
    expect(isTrivialAlias("EXPR$0")).toBe(true)
    expect(isTrivialAlias("EXPR$12")).toBe(true)
    expect(isTrivialAlias("EXPR$")).toBe(false)
    expect(isTrivialAlias("expr")).toBe(false)
  })
})

describe("stripTrivialAliases", () => {
  const strip = { stripTrivialAliases: true }

  it("keeps an alias the ORDER BY refers to", () => {
    const plusOne = project(EMP, [call(Op.PLUS, [ref(EMP, 3), exactLiteral(1)])], ["EXPR$0"])
    const rel = sort(plusOne, [collation(0)])
    expect(relToSqlString(rel, strip)).toBe('SELECT sal + 1 AS "EXPR$0" FROM emp ORDER BY "EXPR$0"')
  })

  it("strips each branch of a set operation", () => {
    const empDepts = project(EMP, [call(Op.PLUS, [ref(EMP, 2), exactLiteral(1)])], ["EXPR$0"])
    const deptDepts = project(DEPT, [ref(DEPT, 0)], ["EXPR$0"])
    const rel = setOp("UNION", [empDepts, deptDepts], true)
    expect(relToSqlString(rel, strip)).toBe(
      "SELECT deptno + 1 FROM emp UNION ALL SELECT deptno FROM dept",
    )
  })

  it("leaves named items alone", () => {
    const named = project(EMP, [ref(EMP, 1)], ["name"])
    expect(relToSqlString(named, strip)).toBe("SELECT ename AS name FROM emp")
  })
})
