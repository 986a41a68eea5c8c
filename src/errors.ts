/**
 * Error handling for rel2sql
 */

/**
 * Controls how the SQL text generator reacts to constructs a dialect
 * cannot render.
 */
export enum UnsupportedLevel {
  /** Render anyway, record nothing */
  IGNORE = "IGNORE",
  /** Render anyway, collect a warning and write it to the console (default) */
  WARN = "WARN",
  /** Throw an UnsupportedError on the first occurrence */
  RAISE = "RAISE",
}

/**
 * A broken internal contract: a tree/row-type mismatch, a clause mutated
 * without being declared, an unrecognized node kind. Never recoverable.
 */
export class ContractError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "ContractError"
  }
}

/**
 * The input uses a construct the target dialect cannot express and no
 * rewrite exists for it.
 */
export class UnsupportedError extends Error {
  constructor(
    message: string,
    public readonly construct: string,
    public readonly dialect: string,
  ) {
    super(message)
    this.name = "UnsupportedError"
  }

  static of(construct: string, dialect: string): UnsupportedError {
    return new UnsupportedError(
      `${construct} is not supported by dialect ${dialect}`,
      construct,
      dialect,
    )
  }
}

export class UnknownDialectError extends Error {
  constructor(public readonly dialect: string) {
    super(`Unknown dialect: ${dialect}`)
    this.name = "UnknownDialectError"
  }
}
