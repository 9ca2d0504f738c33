/**
 * Active-dependent counters
 *
 * Each node that records hang under (business group, company, branch,
 * department, supervisor) has a counter item in the DEPENDENTS partition
 * holding how many active records are attached to it. Attaching a record
 * checks the node is active and bumps the counter in one transaction;
 * deactivating the node checks the counter is zero and clears is_active in
 * one transaction. Both transactions touch both items, so a deactivation and
 * an attachment under the same node cannot both commit.
 */

import type { Item } from "./items"
import { Sentinel } from "./tableLayout"
import type { TransactItem } from "./transactions"

export interface NodeRef {
  partition: string
  id: number
}

export function nodeRef(partition: string, id: number | null): NodeRef | null {
  return id === null ? null : { partition, id }
}

function present(nodes: ReadonlyArray<NodeRef | null>): NodeRef[] {
  return nodes.filter((node): node is NodeRef => node !== null)
}

function sameNode(a: NodeRef, b: NodeRef): boolean {
  return a.partition === b.partition && a.id === b.id
}

export function dependentsKey(node: NodeRef): Item {
  return { PK: Sentinel.dependents, SK: `${node.partition}#${node.id}` }
}

function adjust(tableName: string, node: NodeRef, delta: number): TransactItem {
  return {
    Update: {
      TableName: tableName,
      Key: dependentsKey(node),
      UpdateExpression: "ADD #count :delta",
      ExpressionAttributeNames: { "#count": "active_count" },
      ExpressionAttributeValues: { ":delta": delta },
    },
  }
}

function requireActive(tableName: string, node: NodeRef): TransactItem {
  return {
    ConditionCheck: {
      TableName: tableName,
      Key: { PK: node.partition, SK: node.id.toString() },
      ConditionExpression: "#active = :active",
      ExpressionAttributeNames: { "#active": "is_active" },
      ExpressionAttributeValues: { ":active": true },
    },
  }
}

/**
 * Attaches an active record to its nodes. Nodes in `checked` already get a
 * condition on their item elsewhere in the transaction (the hierarchy
 * guard), and DynamoDB takes one operation per item, so their active check
 * is left to that condition.
 */
export function attach(
  tableName: string,
  nodes: ReadonlyArray<NodeRef | null>,
  checked: ReadonlyArray<NodeRef | null> = []
): TransactItem[] {
  const guarded = present(checked)
  return present(nodes).flatMap((node) =>
    guarded.some((other) => sameNode(other, node))
      ? [adjust(tableName, node, 1)]
      : [requireActive(tableName, node), adjust(tableName, node, 1)]
  )
}

export function detach(tableName: string, nodes: ReadonlyArray<NodeRef | null>): TransactItem[] {
  return present(nodes).map((node) => adjust(tableName, node, -1))
}

/**
 * Moves an active record from one set of nodes to another, touching only
 * the nodes that changed.
 */
export function reattach(
  tableName: string,
  before: ReadonlyArray<NodeRef | null>,
  after: ReadonlyArray<NodeRef | null>,
  checked: ReadonlyArray<NodeRef | null> = []
): TransactItem[] {
  const previous = present(before)
  const next = present(after)
  const left = previous.filter((node) => !next.some((other) => sameNode(other, node)))
  const joined = next.filter((node) => !previous.some((other) => sameNode(other, node)))
  return [...detach(tableName, left), ...attach(tableName, joined, checked)]
}

export function requireNoDependents(tableName: string, node: NodeRef): TransactItem {
  return {
    ConditionCheck: {
      TableName: tableName,
      Key: dependentsKey(node),
      ConditionExpression: "attribute_not_exists(#count) OR #count = :zero",
      ExpressionAttributeNames: { "#count": "active_count" },
      ExpressionAttributeValues: { ":zero": 0 },
    },
  }
}

/**
 * Clears is_active on an active node. Fails the condition when the node is
 * missing or already inactive.
 */
export function markInactive(tableName: string, node: NodeRef): TransactItem {
  return {
    Update: {
      TableName: tableName,
      Key: { PK: node.partition, SK: node.id.toString() },
      UpdateExpression: "SET #active = :inactive, updated_at = :now",
      ConditionExpression: "#active = :active",
      ExpressionAttributeNames: { "#active": "is_active" },
      ExpressionAttributeValues: { ":inactive": false, ":active": true, ":now": new Date().toISOString() },
    },
  }
}
