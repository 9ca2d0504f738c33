/**
 * Compiles record predicates to DynamoDB filter expressions.
 *
 * Null-valued fields are never stored, so equality with null compiles to
 * attribute_not_exists. A field the entity does not store at all behaves as
 * null.
 */

import type { QueryCommandInput } from "@aws-sdk/lib-dynamodb"
import type { FilterField, RecordPredicate } from "../../domain/access/Access"

export type AttributeMap = Partial<Record<FilterField, string>>

export interface CompiledFilter {
  // null when every record matches
  expression: string | null
  names: Record<string, string>
  values: Record<string, number | boolean>
}

type Fragment = { kind: "all" } | { kind: "none" } | { kind: "expr"; text: string }

const ALL: Fragment = { kind: "all" }
const NONE: Fragment = { kind: "none" }

// DynamoDB accepts at most 100 operands in one IN list
const IN_OPERAND_LIMIT = 100

class FilterCompiler {
  readonly names: Record<string, string> = {}
  readonly values: Record<string, number | boolean> = {}
  private counter = 0

  constructor(private attributes: AttributeMap) {}

  compile(predicate: RecordPredicate): Fragment {
    switch (predicate.kind) {
      case "all":
        return ALL
      case "none":
        return NONE
      case "eq": {
        const attribute = this.attributes[predicate.field]
        if (!attribute) {
          return predicate.value === null ? ALL : NONE
        }
        const name = this.name(attribute)
        if (predicate.value === null) {
          return { kind: "expr", text: `attribute_not_exists(${name})` }
        }
        return { kind: "expr", text: `${name} = ${this.value(predicate.value)}` }
      }
      case "in": {
        const attribute = this.attributes[predicate.field]
        if (!attribute || predicate.values.length === 0) {
          return NONE
        }
        const name = this.name(attribute)
        const groups: string[] = []
        for (let start = 0; start < predicate.values.length; start += IN_OPERAND_LIMIT) {
          const operands = predicate.values.slice(start, start + IN_OPERAND_LIMIT).map((value) => this.value(value))
          groups.push(`${name} IN (${operands.join(", ")})`)
        }
        return { kind: "expr", text: groups.length === 1 ? groups[0] : groups.map((g) => `(${g})`).join(" OR ") }
      }
      case "present": {
        const attribute = this.attributes[predicate.field]
        return attribute ? { kind: "expr", text: `attribute_exists(${this.name(attribute)})` } : NONE
      }
      case "and": {
        const parts: string[] = []
        for (const clause of predicate.clauses) {
          const fragment = this.compile(clause)
          if (fragment.kind === "none") {
            return NONE
          }
          if (fragment.kind === "expr") {
            parts.push(fragment.text)
          }
        }
        return this.join(parts, "AND", ALL)
      }
      case "or": {
        const parts: string[] = []
        for (const clause of predicate.clauses) {
          const fragment = this.compile(clause)
          if (fragment.kind === "all") {
            return ALL
          }
          if (fragment.kind === "expr") {
            parts.push(fragment.text)
          }
        }
        return this.join(parts, "OR", NONE)
      }
    }
  }

  private join(parts: string[], operator: "AND" | "OR", empty: Fragment): Fragment {
    if (parts.length === 0) {
      return empty
    }
    if (parts.length === 1) {
      return { kind: "expr", text: parts[0] }
    }
    return { kind: "expr", text: parts.map((part) => `(${part})`).join(` ${operator} `) }
  }

  private name(attribute: string): string {
    const placeholder = `#f_${attribute}`
    this.names[placeholder] = attribute
    return placeholder
  }

  private value(value: number | boolean): string {
    const placeholder = `:f${this.counter++}`
    this.values[placeholder] = value
    return placeholder
  }
}

/**
 * Returns null when the predicate can match no record, so the caller can
 * skip the query.
 */
export function compileFilter(predicate: RecordPredicate, attributes: AttributeMap): CompiledFilter | null {
  const compiler = new FilterCompiler(attributes)
  const fragment = compiler.compile(predicate)

  switch (fragment.kind) {
    case "none":
      return null
    case "all":
      return { expression: null, names: {}, values: {} }
    case "expr":
      return { expression: fragment.text, names: compiler.names, values: compiler.values }
  }
}

export function applyFilter(input: QueryCommandInput, filter: CompiledFilter): QueryCommandInput {
  if (!filter.expression) {
    return input
  }
  return {
    ...input,
    FilterExpression: input.FilterExpression
      ? `(${input.FilterExpression}) AND (${filter.expression})`
      : filter.expression,
    ExpressionAttributeNames: { ...input.ExpressionAttributeNames, ...filter.names },
    ExpressionAttributeValues: { ...input.ExpressionAttributeValues, ...filter.values },
  }
}
