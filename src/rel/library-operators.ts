/**
 * Functions defined by particular SQL libraries, with the equivalence
 * groups used to substitute one for another
 */

import { ContractError } from "../errors.js"
import ENTRIES from "./library-operators.json" with { type: "json" }
import {
  isSqlLibrary,
  type SqlKind,
  type SqlLibrary,
  type SqlOperator,
} from "./operators.js"

function kindOf(kind: string | undefined): SqlKind {
  if (kind === "PLUS" || kind === "MINUS") return kind
  return "OTHER_FUNCTION"
}

const OPERATORS: ReadonlyMap<string, SqlOperator> = new Map(
  ENTRIES.map((entry): [string, SqlOperator] => [
    entry.name,
    {
      name: entry.name,
      kind: kindOf(entry.kind),
      syntax: "function",
      isAggregate: entry.aggregate === true,
      allowsFraming: entry.aggregate === true,
      libraries: entry.libraries.filter(isSqlLibrary),
      group: entry.group,
    },
  ]),
)

export function libraryOperator(name: string): SqlOperator {
  const op = OPERATORS.get(name.toUpperCase())
  if (!op) {
    throw new ContractError(`Unknown library function: ${name}`)
  }
  return op
}

export function libraryOperators(): SqlOperator[] {
  return [...OPERATORS.values()]
}

/** Whether `op` may be emitted for a dialect of `library`. */
export function isAvailable(op: SqlOperator, library: SqlLibrary): boolean {
  const libraries = op.libraries
  if (!libraries) return true
  return libraries.includes("STANDARD") || libraries.includes(library)
}

/**
 * The operator to emit in place of `op` for `library`: `op` itself when
 * available, else a member of its group, preferring one the library
 * defines over a standard one. Undefined when nothing fits.
 */
export function substitute(
  op: SqlOperator,
  library: SqlLibrary,
): SqlOperator | undefined {
  if (isAvailable(op, library)) return op
  if (op.group === undefined) return undefined
  const candidates = libraryOperators().filter(
    (candidate) => candidate.group === op.group && candidate !== op,
  )
  return (
    candidates.find((c) => c.libraries?.includes(library)) ??
    candidates.find((c) => isAvailable(c, library))
  )
}
