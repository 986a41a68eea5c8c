/**
 * Scope utility functions for walking an AST without entering nested
 * queries.
 *
 * Scope boundaries are:
 * - Subqueries (derived tables, IN and scalar subqueries)
 * - Unwrapped queries (Select, SetOperation, Values) below the root
 */

import type { Expression, ExpressionClass } from "./expression-base.js"
import * as exp from "./expressions.js"

function isScopeBoundary(node: Expression): boolean {
  return node instanceof exp.Subquery || exp.isQuery(node)
}

/**
 * Walks an expression tree but stops at scope boundaries. The boundary
 * nodes themselves are yielded; their contents are not.
 *
 * @param expression - Starting expression node
 * @param bfs - Use breadth-first search (default true)
 */
export function* walkInScope(
  expression: Expression,
  bfs = true,
): Generator<Expression> {
  // Don't check scope boundaries for the root expression
  yield* expression.walk(
    bfs,
    (node) => node !== expression && isScopeBoundary(node),
  )
}

/**
 * Finds all nodes of the given types within the current scope.
 */
export function* findAllInScope<T extends Expression>(
  expression: Expression,
  expressionTypes: ExpressionClass<T>[],
  bfs = true,
): Generator<T> {
  for (const node of walkInScope(expression, bfs)) {
    for (const type of expressionTypes) {
      if (node instanceof type) {
        yield node
        break
      }
    }
  }
}

/**
 * Finds the first node of the given types within the current scope.
 */
export function findInScope<T extends Expression>(
  expression: Expression,
  expressionTypes: ExpressionClass<T>[],
  bfs = true,
): T | undefined {
  for (const node of findAllInScope(expression, expressionTypes, bfs)) {
    return node
  }
  return undefined
}
