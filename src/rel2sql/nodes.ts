/**
 * Helpers over the SQL nodes the converter assembles
 */

import { ContractError } from "../errors.js"
import * as exp from "../expressions.js"

/**
 * The name a node is known by in its enclosing query: the alias of an
 * aliased item, the last name part of a table or column, otherwise
 * undefined.
 */
export function aliasOf(node: exp.Expression): string | undefined {
  if (node instanceof exp.Alias) return node.alias
  if (
    node instanceof exp.Table ||
    node instanceof exp.Subquery ||
    node instanceof exp.Values ||
    node instanceof exp.TableFunction ||
    node instanceof exp.MatchRecognize
  ) {
    const alias = node.alias
    if (alias !== "") return alias
    return node instanceof exp.Table ? node.name : undefined
  }
  if (node instanceof exp.Column) return node.name
  return undefined
}

export function tableAlias(name: string, columns: readonly string[] = []): exp.TableAlias {
  return new exp.TableAlias({
    this: exp.identifier(name),
    columns: columns.length > 0 ? columns.map((c) => exp.identifier(c)) : undefined,
  })
}

/** Column names declared by a FROM item's alias, `AS t (a, b)`. */
export function aliasColumns(node: exp.Expression): string[] {
  const alias = node.arg("alias")
  return alias instanceof exp.TableAlias ? alias.columns.map((c) => c.name) : []
}

/**
 * `node` as a FROM item named `alias`. Aliased items are renamed, keeping
 * their column list; queries are wrapped in a subquery.
 */
export function asFromItem(node: exp.Expression, alias: string): exp.Expression {
  const expr: exp.Expression = node
  if (
    node instanceof exp.Table ||
    node instanceof exp.Subquery ||
    node instanceof exp.TableFunction ||
    node instanceof exp.Values ||
    node instanceof exp.MatchRecognize
  ) {
    const item = node.copy()
    item.set("alias", tableAlias(alias, aliasColumns(node)))
    return item
  }
  if (exp.isQuery(node)) {
    return new exp.Subquery({ this: node, alias: tableAlias(alias) })
  }
  throw new ContractError(`Cannot use a ${expr.key} as a FROM item`)
}

export function hasAlias(node: exp.Expression): boolean {
  return node.args.alias instanceof exp.Expression
}

/** `1 = 0` */
export function alwaysFalse(): exp.Expression {
  return new exp.EQ({
    this: exp.Literal.number(1),
    expression: exp.Literal.number(0),
  })
}
