/**
 * Errors Module
 */

export {
  LedgerError,
  IdentifierError,
  IntegerParseError,
  TransactionParseError,
  GraphFormatError,
  MissingCountError,
  InvalidCountError,
  TransactionCountError,
  InvalidTransactionError,
  InvalidReferenceError,
  TransactionSequenceError,
  NumericConversionError,
  CyclicGraphError,
  UnknownTransactionError,
} from "./errors"
export type {
  IdentifierErrorKind,
  IntegerParseFailure,
  TransactionErrorKind,
  GraphFormatErrorKind,
  ReferenceSide,
} from "./errors"
