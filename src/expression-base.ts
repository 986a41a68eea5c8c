/**
 * Base Expression class and types for SQL AST nodes
 */

export type ArgValue =
  | Expression
  | Expression[]
  | string
  | number
  | boolean
  | null
  | undefined
export type Args = Record<string, ArgValue>

export interface ExpressionClass<T extends Expression = Expression> {
  new (args?: Args): T
  readonly argTypes: Record<string, boolean>
}

export interface SqlOptions {
  dialect?: unknown
  identify?: boolean
  unsupportedLevel?: string
}

/**
 * Base class for all SQL AST nodes
 */
export abstract class Expression {
  static readonly argTypes: Record<string, boolean> = { this: true }

  readonly args: Args

  constructor(args: Args = {}) {
    this.args = args
  }

  get key(): string {
    return this.constructor.name.toLowerCase()
  }

  get this(): ArgValue {
    return this.args.this
  }

  get expression(): ArgValue {
    return this.args.expression
  }

  get expressions(): Expression[] {
    const val = this.args.expressions
    return Array.isArray(val) ? val : []
  }

  /** Returns the child stored under `key` if it is a single node. */
  arg(key: string): Expression | undefined {
    const value = this.args[key]
    return value instanceof Expression ? value : undefined
  }

  text(key: string): string {
    const field = this.args[key]
    if (typeof field === "string") {
      return field
    }
    if (field instanceof Expression) {
      if (field.key === "star") return ""
      if (field.key === "null") return "null"
      const val = field.args.this
      return typeof val === "string" ? val : ""
    }
    return ""
  }

  copy(): this {
    const ctor: ExpressionClass<this> = Object.getPrototypeOf(this).constructor
    return new ctor(this.deepCopyArgs())
  }

  private deepCopyArgs(): Args {
    const result: Args = {}
    for (const [key, value] of Object.entries(this.args)) {
      if (value instanceof Expression) {
        result[key] = value.copy()
      } else if (Array.isArray(value)) {
        result[key] = value.map((item) => item.copy())
      } else {
        result[key] = value
      }
    }
    return result
  }

  *iterExpressions(reverse = false): Generator<Expression> {
    const entries = Object.entries(this.args)
    const ordered = reverse ? entries.reverse() : entries
    for (const [, value] of ordered) {
      if (value instanceof Expression) {
        yield value
      } else if (Array.isArray(value)) {
        const items = reverse ? [...value].reverse() : value
        yield* items
      }
    }
  }

  *bfs(prune?: (node: Expression) => boolean): Generator<Expression> {
    const queue: Expression[] = [this]
    for (let node = queue.shift(); node; node = queue.shift()) {
      yield node
      if (prune && prune(node)) continue
      for (const child of node.iterExpressions()) {
        queue.push(child)
      }
    }
  }

  *dfs(prune?: (node: Expression) => boolean): Generator<Expression> {
    const stack: Expression[] = [this]
    for (let node = stack.pop(); node; node = stack.pop()) {
      yield node
      if (prune && prune(node)) continue
      for (const child of node.iterExpressions(true)) {
        stack.push(child)
      }
    }
  }

  *walk(
    bfs = true,
    prune?: (node: Expression) => boolean,
  ): Generator<Expression> {
    if (bfs) {
      yield* this.bfs(prune)
    } else {
      yield* this.dfs(prune)
    }
  }

  find<T extends Expression>(...types: ExpressionClass<T>[]): T | undefined {
    for (const node of this.walk()) {
      for (const type of types) {
        if (node instanceof type) {
          return node
        }
      }
    }
    return undefined
  }

  set(argKey: string, value: ArgValue): void {
    if (value === null || value === undefined) {
      delete this.args[argKey]
      return
    }
    this.args[argKey] = value
  }

  // sql() method - implementation provided by index.ts to avoid circular deps
  private static sqlImpl:
    | ((expr: Expression, options?: SqlOptions) => string)
    | undefined

  static setSqlImpl(
    impl: (expr: Expression, options?: SqlOptions) => string,
  ): void {
    Expression.sqlImpl = impl
  }

  sql(options?: SqlOptions): string {
    if (!Expression.sqlImpl) {
      throw new Error("sql() requires initialization - import from rel2sql-ts")
    }
    return Expression.sqlImpl(this, options)
  }

  toString(): string {
    return `${this.constructor.name}(${JSON.stringify(this.args)})`
  }

  get alias(): string {
    const aliasExpr = this.args.alias
    if (aliasExpr instanceof Expression) {
      return aliasExpr.name
    }
    if (typeof aliasExpr === "string") {
      return aliasExpr
    }
    return ""
  }

  get name(): string {
    return this.text("this")
  }
}
