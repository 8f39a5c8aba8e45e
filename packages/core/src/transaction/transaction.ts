/**
 * Transaction Record
 *
 * One ledger entry: its own identifier, two backward references and a
 * logical timestamp. Records are frozen once created.
 */

import { IdentifierError, IntegerParseError, TransactionParseError } from "../errors"
import { formatId, id, transactionId, type Id, type TransactionId } from "../id"
import { parseUnsigned } from "../utils"

/** Space, tab, line feed, carriage return and form feed */
const ASCII_WHITESPACE = /[ \t\n\r\f]+/

export interface Transaction {
  readonly id: TransactionId
  readonly left: Id
  readonly right: Id
  /** Non-negative logical time */
  readonly timestamp: number
}

export function createTransaction(
  identifier: TransactionId,
  left: Id,
  right: Id,
  timestamp: number,
): Transaction {
  return Object.freeze({ id: identifier, left, right, timestamp })
}

/**
 * Parse a `<left> <right> <timestamp>` line for the transaction numbered `value`.
 *
 * Tokens are read left to right and the first problem wins, so `"abc"` is an
 * invalid left reference rather than a missing right one. Tokens after the
 * timestamp are ignored. The upper bound on references is not checked here;
 * it depends on the declared count of the whole input.
 *
 * @throws TransactionParseError
 */
export function parseTransaction(value: number, line: string): Transaction {
  const identifier = wrap("InvalidId", value, () => transactionId(value))

  const tokens = line.split(ASCII_WHITESPACE).filter((token) => token.length > 0)
  const [leftToken, rightToken, timestampToken] = tokens

  if (leftToken === undefined) {
    throw new TransactionParseError("MissingLeft", value)
  }
  const left = parseReference(value, leftToken, "InvalidLeft", "InvalidLeftId")

  if (rightToken === undefined) {
    throw new TransactionParseError("MissingRight", value)
  }
  const right = parseReference(value, rightToken, "InvalidRight", "InvalidRightId")

  if (timestampToken === undefined) {
    throw new TransactionParseError("MissingTimestamp", value)
  }
  const timestamp = wrap("InvalidTimestamp", value, () => parseUnsigned(timestampToken))

  return createTransaction(identifier, left, right, timestamp)
}

/**
 * Render as `Tx<Tx:2, Root, Tx:3, 120>`.
 */
export function formatTransaction(transaction: Transaction): string {
  const { id: identifier, left, right, timestamp } = transaction
  return `Tx<${formatId(identifier)}, ${formatId(left)}, ${formatId(right)}, ${timestamp}>`
}

// =============================================================================
// HELPERS
// =============================================================================

function parseReference(
  value: number,
  token: string,
  parseKind: "InvalidLeft" | "InvalidRight",
  idKind: "InvalidLeftId" | "InvalidRightId",
): Id {
  const raw = wrap(parseKind, value, () => parseUnsigned(token))
  return wrap(idKind, value, () => id(raw))
}

function wrap<T>(kind: TransactionParseError["kind"], value: number, read: () => T): T {
  try {
    return read()
  } catch (error) {
    if (error instanceof IntegerParseError || error instanceof IdentifierError) {
      throw new TransactionParseError(kind, value, error)
    }
    throw error
  }
}
