import { scan, type RelNode } from "../rel/rel.js"
import { inputRef, type RexInputRef } from "../rel/rex.js"
import { decimal, SqlTypes, varchar } from "../rel/types.js"

export const EMP = scan("emp", [
  ["empno", SqlTypes.INTEGER],
  ["ename", varchar(20)],
  ["deptno", SqlTypes.INTEGER],
  ["sal", decimal(7, 2)],
])

export const DEPT = scan("dept", [
  ["deptno", SqlTypes.INTEGER],
  ["dname", varchar(14)],
])

export const ORDERS = scan(["sales", "orders"], [
  ["id", SqlTypes.INTEGER],
  ["shipped", SqlTypes.DATE],
])

/** A typed reference to field `index` of `rel`. */
export function ref(rel: RelNode, index: number): RexInputRef {
  const field = rel.rowType.fields[index]
  if (!field) throw new Error(`No field ${index}`)
  return inputRef(index, field.type)
}
