/**
 * SELECT clauses in evaluation order
 */

export enum Clause {
  FROM,
  WHERE,
  GROUP_BY,
  HAVING,
  QUALIFY,
  SELECT,
  SET_OP,
  ORDER_BY,
  FETCH,
  OFFSET,
}

// Clauses a node may set again on a SELECT that already has them
const MERGEABLE: ReadonlySet<Clause> = new Set([Clause.SELECT])

export function maxClause(clauses: Iterable<Clause>): Clause | undefined {
  let max: Clause | undefined
  for (const clause of clauses) {
    if (max === undefined || clause > max) max = clause
  }
  return max
}

/**
 * Whether `expected` can be added to a SELECT already using `used`
 * without a wrapping subquery, judged by evaluation order alone.
 */
export function clausesFit(
  used: Iterable<Clause>,
  expected: Iterable<Clause>,
): boolean {
  const max = maxClause(used)
  if (max === undefined) return true
  for (const clause of expected) {
    if (max > clause || (max === clause && !MERGEABLE.has(clause))) {
      return false
    }
  }
  return true
}
