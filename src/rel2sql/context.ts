/**
 * Translation contexts: how field ordinals of the current input resolve to
 * SQL nodes
 */

import type { Dialect } from "../dialect.js"
import { ContractError } from "../errors.js"
import * as exp from "../expressions.js"
import type { AggregateCall, FieldCollation, RelNode, WindowGroup } from "../rel/rel.js"
import type { CorrelationId, RexLiteral, RexNode } from "../rel/rex.js"
import type { RowType } from "../rel/types.js"
import { aliasOf } from "./nodes.js"
import {
  addOrderItem,
  aggregateCallToSql,
  rexToSql,
  windowGroupToSql,
} from "./translator.js"

/** The services a context needs from the converter that owns it. */
export interface Implementor {
  readonly dialect: Dialect
  /** Translates a nested tree to a query usable inside an expression. */
  subQuery(rel: RelNode): exp.Expression
  correlationContext(id: CorrelationId): Context
  /** A node registered for an output field name, matched case-insensitively. */
  mappedField(name: string): exp.Expression | undefined
}

export abstract class Context {
  constructor(
    readonly implementor: Implementor,
    readonly fieldCount: number,
  ) {}

  get dialect(): Dialect {
    return this.implementor.dialect
  }

  abstract field(ordinal: number): exp.Expression

  /** The node naming field `ordinal` in an ORDER BY list. */
  orderField(ordinal: number): exp.Expression {
    return this.field(ordinal)
  }

  /** The node naming field `ordinal` in a GROUP BY list. */
  groupField(ordinal: number): exp.Expression {
    return this.field(ordinal)
  }

  toSql(rex: RexNode): exp.Expression {
    return rexToSql(this, rex)
  }

  aggregateCall(call: AggregateCall): exp.Expression {
    return aggregateCallToSql(this, call)
  }

  addOrderItem(items: exp.Expression[], collation: FieldCollation): void {
    addOrderItem(this, items, collation)
  }

  /** One windowed call per aggregate of `group`. */
  windowGroup(
    group: WindowGroup,
    constants: readonly RexLiteral[],
    inputFieldCount: number,
  ): exp.Expression[] {
    return windowGroupToSql(this, group, constants, inputFieldCount)
  }

  protected checkOrdinal(ordinal: number): void {
    if (!Number.isInteger(ordinal) || ordinal < 0 || ordinal >= this.fieldCount) {
      throw new ContractError(
        `Field ordinal ${ordinal} out of range [0, ${this.fieldCount})`,
      )
    }
  }
}

/**
 * Resolves fields through a list of aliased inputs, each contributing its
 * row type's fields in order.
 */
export class AliasContext extends Context {
  constructor(
    implementor: Implementor,
    readonly aliases: ReadonlyMap<string, RowType>,
    readonly qualified: boolean,
  ) {
    let count = 0
    for (const rowType of aliases.values()) count += rowType.fields.length
    super(implementor, count)
  }

  field(ordinal: number): exp.Expression {
    this.checkOrdinal(ordinal)
    let offset = ordinal
    for (const [alias, rowType] of this.aliases) {
      const field = rowType.fields[offset]
      if (!field) {
        offset -= rowType.fields.length
        continue
      }
      const mapped = this.implementor.mappedField(field.name)
      if (mapped) return mapped.copy()
      return exp.column(field.name, this.qualified ? alias : undefined)
    }
    throw new ContractError(`Field ordinal ${ordinal} not found in any alias`)
  }
}

/** Fields of the left input, then fields of the right input. */
export class JoinContext extends Context {
  constructor(
    readonly left: Context,
    readonly right: Context,
  ) {
    super(left.implementor, left.fieldCount + right.fieldCount)
  }

  field(ordinal: number): exp.Expression {
    this.checkOrdinal(ordinal)
    return ordinal < this.left.fieldCount
      ? this.left.field(ordinal)
      : this.right.field(ordinal - this.left.fieldCount)
  }
}

/** Field `i` is the whole translated input `i` of a table function. */
export class TableFunctionScanContext extends Context {
  constructor(
    implementor: Implementor,
    readonly inputs: readonly exp.Expression[],
  ) {
    super(implementor, inputs.length)
  }

  field(ordinal: number): exp.Expression {
    this.checkOrdinal(ordinal)
    const input = this.inputs[ordinal]
    if (!input) throw new ContractError(`No table function input ${ordinal}`)
    return input.copy()
  }
}

/** Inside a MATCH_RECOGNIZE definition, character literals name pattern variables. */
export class MatchRecognizeContext extends AliasContext {
  override toSql(rex: RexNode): exp.Expression {
    if (rex.kind === "literal" && rex.value.family === "character") {
      return exp.identifier(rex.value.value)
    }
    return super.toSql(rex)
  }
}

export interface SelectListOptions {
  /** Refer to aliased items by their alias rather than repeating them */
  aliasRef: boolean
  /** Refer to computed items by alias in GROUP BY */
  groupByAlias: boolean
}

/** Resolves fields to the items of a SELECT list being built upon. */
export class SelectListContext extends Context {
  constructor(
    implementor: Implementor,
    readonly selectList: readonly exp.Expression[],
    readonly options: SelectListOptions,
  ) {
    super(implementor, selectList.length)
  }

  private item(ordinal: number): exp.Expression {
    this.checkOrdinal(ordinal)
    const item = this.selectList[ordinal]
    if (!item) throw new ContractError(`No select item ${ordinal}`)
    return item
  }

  field(ordinal: number): exp.Expression {
    const item = this.item(ordinal)
    if (item instanceof exp.Alias) {
      // `SELECT SUM(x) AS x FROM t HAVING x > 0`: x is the alias, not t.x
      if (this.options.aliasRef) return exp.column(item.alias)
      const inner = item.arg("this")
      if (!inner) throw new ContractError(`Empty select item ${ordinal}`)
      return inner.copy()
    }
    return item.copy()
  }

  override orderField(ordinal: number): exp.Expression {
    const node = this.field(ordinal)
    // An integer would be read as an ordinal; a character literal sorts the same
    if (node instanceof exp.Literal && !node.isString) {
      return exp.Literal.string(node.value)
    }
    if (node instanceof exp.Column && node.table === "") {
      const name = node.name.toLowerCase()
      const shadowed = this.selectList.some(
        (item, i) => i !== ordinal && aliasOf(item)?.toLowerCase() === name,
      )
      if (shadowed) return exp.Literal.number(ordinal + 1)
    }
    return node
  }

  override groupField(ordinal: number): exp.Expression {
    const item = this.item(ordinal)
    if (
      this.options.groupByAlias &&
      item instanceof exp.Alias &&
      !(item.arg("this") instanceof exp.Column)
    ) {
      return exp.column(item.alias)
    }
    return this.field(ordinal)
  }
}
