/**
 * Rewrites applied to a finished statement before it is rendered
 */

import * as exp from "./expressions.js"
import { findAllInScope } from "./scope.js"

// Names the algebra gives unnamed expressions
const TRIVIAL_ALIAS = /^EXPR\$\d+$/

export function isTrivialAlias(name: string): boolean {
  return TRIVIAL_ALIAS.test(name)
}

/**
 * Drops `AS EXPR$n` from the select list of the statement and of each
 * branch of a top-level set operation. Nested queries keep their aliases,
 * since an enclosing query may refer to them.
 */
export function stripTrivialAliases<E extends exp.Expression>(expression: E): E {
  if (expression instanceof exp.SetOperation) {
    for (const branch of [expression.arg("this"), expression.arg("expression")]) {
      if (branch) stripTrivialAliases(branch)
    }
  } else if (expression instanceof exp.Select) {
    stripSelect(expression)
  }
  return expression
}

function stripSelect(select: exp.Select): void {
  const list = select.selectList
  if (!list) return
  const referenced = referencedNames(select)
  let changed = false
  const stripped = list.map((item) => {
    const inner = item.arg("this")
    if (
      item instanceof exp.Alias &&
      inner &&
      isTrivialAlias(item.alias) &&
      !referenced.has(item.alias.toLowerCase())
    ) {
      changed = true
      return inner
    }
    return item
  })
  if (changed) select.setSelectList(stripped)
}

// Unqualified column names the clauses after SELECT refer to
function referencedNames(select: exp.Select): Set<string> {
  const names = new Set<string>()
  for (const key of ["group", "having", "qualify", "order"]) {
    const clause = select.arg(key)
    if (!clause) continue
    for (const column of findAllInScope(clause, [exp.Column])) {
      if (column.table === "") names.add(column.name.toLowerCase())
    }
  }
  return names
}
