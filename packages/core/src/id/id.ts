/**
 * Identifier Model
 *
 * Vertices are named by positive integers. `1` is the synthetic Root;
 * every parsed transaction gets an identifier of 2 or more.
 */

import { IdentifierError } from "../errors"

/** Integer value reserved for Root. */
export const ROOT_VALUE = 1

/** Identifier of the first parsed transaction. */
export const FIRST_TRANSACTION_VALUE = 2

export interface RootId {
  readonly kind: "root"
}

export interface TransactionId {
  readonly kind: "transaction"
  /** Always >= 2 */
  readonly value: number
}

/**
 * Any vertex: Root or a transaction.
 */
export type Id = RootId | TransactionId

export const Root: RootId = Object.freeze({ kind: "root" })

/**
 * Build the identifier of a transaction.
 * @throws IdentifierError `invalid` for 0, `reserved` for 1
 */
export function transactionId(value: number): TransactionId {
  if (value === ROOT_VALUE) {
    throw new IdentifierError("reserved", value)
  }
  if (!Number.isInteger(value) || value < ROOT_VALUE) {
    throw new IdentifierError("invalid", value)
  }
  return Object.freeze({ kind: "transaction", value })
}

/**
 * Build any identifier; 1 resolves to Root.
 * @throws IdentifierError `invalid` for 0
 */
export function id(value: number): Id {
  return value === ROOT_VALUE ? Root : transactionId(value)
}

export function idToNumber(identifier: Id): number {
  return identifier.kind === "root" ? ROOT_VALUE : identifier.value
}

export function isRoot(identifier: Id): identifier is RootId {
  return identifier.kind === "root"
}

export function idEquals(left: Id, right: Id): boolean {
  return idToNumber(left) === idToNumber(right)
}

/**
 * Render as `Root` or `Tx:<n>`.
 */
export function formatId(identifier: Id): string {
  return identifier.kind === "root" ? "Root" : `Tx:${identifier.value}`
}
