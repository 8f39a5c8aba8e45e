/**
 * Custom Error Classes
 */

/**
 * Base error for everything the ledger core can report.
 */
export class LedgerError extends Error {
  public override readonly cause?: Error

  constructor(message: string, cause?: Error) {
    super(message)
    this.name = "LedgerError"
    this.cause = cause

    // V8-specific stack trace capture (not in TypeScript's lib)
    if (typeof (Error as { captureStackTrace?: unknown }).captureStackTrace === "function") {
      ;(Error as { captureStackTrace: (target: Error, ctor: unknown) => void }).captureStackTrace(
        this,
        this.constructor,
      )
    }
  }
}

// =============================================================================
// IDENTIFIERS AND TOKENS
// =============================================================================

export type IdentifierErrorKind = "invalid" | "reserved"

/**
 * Identifier error.
 * Thrown when an integer cannot name a vertex: 0 never can, 1 only names Root.
 */
export class IdentifierError extends LedgerError {
  constructor(
    public readonly kind: IdentifierErrorKind,
    public readonly value: number,
  ) {
    super(kind === "invalid" ? `Invalid ID ${value}` : `ID ${value} is reserved for Root`)
    this.name = "IdentifierError"
  }
}

export type IntegerParseFailure = "empty" | "invalid-digit" | "overflow"

/**
 * Integer parse error.
 * Thrown when a token is not a non-negative decimal integer.
 */
export class IntegerParseError extends LedgerError {
  constructor(
    public readonly token: string,
    public readonly reason: IntegerParseFailure,
  ) {
    super(describeParseFailure(token, reason))
    this.name = "IntegerParseError"
  }
}

function describeParseFailure(token: string, reason: IntegerParseFailure): string {
  switch (reason) {
    case "empty":
      return "cannot parse an integer from an empty token"
    case "invalid-digit":
      return `'${token}' is not a non-negative integer`
    case "overflow":
      return `'${token}' is larger than the largest safe integer`
  }
}

// =============================================================================
// TRANSACTION LINES
// =============================================================================

export type TransactionErrorKind =
  | "InvalidId"
  | "MissingLeft"
  | "MissingRight"
  | "MissingTimestamp"
  | "InvalidLeft"
  | "InvalidRight"
  | "InvalidTimestamp"
  | "InvalidLeftId"
  | "InvalidRightId"

const TRANSACTION_ERROR_MESSAGES: Record<TransactionErrorKind, string> = {
  InvalidId: "Invalid Id",
  MissingLeft: "Missing left reference",
  MissingRight: "Missing right reference",
  MissingTimestamp: "Missing timestamp",
  InvalidLeft: "Invalid left reference",
  InvalidRight: "Invalid right reference",
  InvalidTimestamp: "Invalid timestamp",
  InvalidLeftId: "Invalid left id",
  InvalidRightId: "Invalid right id",
}

/**
 * Transaction parse error.
 * Thrown when a single `<left> <right> <timestamp>` line is malformed.
 */
export class TransactionParseError extends LedgerError {
  constructor(
    public readonly kind: TransactionErrorKind,
    public readonly transactionId: number,
    public readonly detail?: IdentifierError | IntegerParseError,
  ) {
    const base = TRANSACTION_ERROR_MESSAGES[kind]
    super(detail ? `${base}: ${detail.message}` : base, detail)
    this.name = "TransactionParseError"
  }
}

// =============================================================================
// GRAPH INPUT FORMAT
// =============================================================================

export type GraphFormatErrorKind =
  | "MissingCount"
  | "InvalidCount"
  | "TooManyTransactions"
  | "TooLittleTransactions"
  | "InvalidTransaction"
  | "InvalidLeftReference"
  | "InvalidRightReference"

/**
 * Base error for a malformed ledger input.
 */
export class GraphFormatError extends LedgerError {
  constructor(
    public readonly kind: GraphFormatErrorKind,
    message: string,
    cause?: Error,
  ) {
    super(message, cause)
    this.name = "GraphFormatError"
  }
}

/**
 * The input has no count line at all.
 */
export class MissingCountError extends GraphFormatError {
  constructor() {
    super("MissingCount", "Missing number of transactions")
    this.name = "MissingCountError"
  }
}

/**
 * The count line is not a non-negative integer.
 */
export class InvalidCountError extends GraphFormatError {
  constructor(public readonly parseError: IntegerParseError) {
    super("InvalidCount", `Invalid number of transactions: ${parseError.message}`, parseError)
    this.name = "InvalidCountError"
  }
}

/**
 * The data section is longer or shorter than the count line declares.
 */
export class TransactionCountError extends GraphFormatError {
  constructor(
    kind: "TooManyTransactions" | "TooLittleTransactions",
    public readonly declared: number,
    public readonly received: number,
  ) {
    super(
      kind,
      kind === "TooManyTransactions"
        ? `Too many transactions: expected ${declared}, found more`
        : `Too little transactions: expected ${declared}, found ${received}`,
    )
    this.name = "TransactionCountError"
  }
}

/**
 * A data line could not be parsed as a transaction.
 */
export class InvalidTransactionError extends GraphFormatError {
  constructor(
    public readonly line: number,
    public readonly transactionError: TransactionParseError,
  ) {
    super("InvalidTransaction", `Invalid transaction on line ${line}: ${transactionError.message}`, transactionError)
    this.name = "InvalidTransactionError"
  }
}

export type ReferenceSide = "left" | "right"

/**
 * A reference points past the largest identifier the input can hold.
 */
export class InvalidReferenceError extends GraphFormatError {
  constructor(
    public readonly side: ReferenceSide,
    public readonly transactionId: number,
    public readonly reference: number,
    public readonly max: number,
  ) {
    super(
      side === "left" ? "InvalidLeftReference" : "InvalidRightReference",
      `Invalid ${side} ref to Tx:${reference} on Tx:${transactionId} max=${max}`,
    )
    this.name = "InvalidReferenceError"
  }
}

/**
 * Records handed to the graph are not numbered 2, 3, 4, ... in order.
 */
export class TransactionSequenceError extends LedgerError {
  constructor(
    public readonly expected: number,
    public readonly received: number,
  ) {
    super(`Transactions out of sequence: expected Tx:${expected}, got Tx:${received}`)
    this.name = "TransactionSequenceError"
  }
}

// =============================================================================
// COMPUTATION
// =============================================================================

/**
 * Numeric conversion error.
 * Thrown when an integer count cannot be represented exactly as a float.
 */
export class NumericConversionError extends LedgerError {
  constructor(public readonly value: number) {
    super(`Cannot convert ${value} to a float without losing precision`)
    this.name = "NumericConversionError"
  }
}

/**
 * Cyclic graph error.
 * Thrown when a computation that requires acyclicity walks into a cycle.
 */
export class CyclicGraphError extends LedgerError {
  constructor(
    public readonly transactionId: number,
    public readonly reference: number,
  ) {
    super(`Graph is cyclic (Tx:${transactionId} -> Tx:${reference})`)
    this.name = "CyclicGraphError"
  }
}

/**
 * Unknown transaction error.
 * Thrown when a referenced transaction is not held by the graph.
 */
export class UnknownTransactionError extends LedgerError {
  constructor(public readonly transactionId: number) {
    super(`Transaction not found: Tx:${transactionId}`)
    this.name = "UnknownTransactionError"
  }
}
