/**
 * Graph Builder
 *
 * Reads the line-oriented ledger format:
 *
 * ```text
 * <n>
 * <left> <right> <timestamp>   (n times)
 * ```
 *
 * The count line takes no identifier, so data line `i` (0-based) becomes
 * transaction `i + 2` and sits on input line `i + 2`.
 */

import {
  IntegerParseError,
  InvalidCountError,
  InvalidTransactionError,
  MissingCountError,
  TransactionCountError,
  TransactionParseError,
} from "../errors"
import { FIRST_TRANSACTION_VALUE } from "../id"
import { parseTransaction } from "../transaction"
import { parseUnsigned } from "../utils"
import { GraphAssembler } from "./assembler"
import type { LedgerGraph } from "./graph"

/**
 * Build a graph from the lines of a ledger input.
 *
 * Errors thrown by the line source itself propagate unchanged.
 *
 * @throws GraphFormatError on any malformed input
 */
export function buildGraph(lines: Iterable<string>): LedgerGraph {
  const iterator = lines[Symbol.iterator]()

  const first = iterator.next()
  if (first.done) {
    throw new MissingCountError()
  }

  const declared = parseCount(first.value)
  const assembler = new GraphAssembler(declared)

  for (let next = iterator.next(); !next.done; next = iterator.next()) {
    if (assembler.length >= declared) {
      throw new TransactionCountError("TooManyTransactions", declared, assembler.length + 1)
    }

    const value = assembler.length + FIRST_TRANSACTION_VALUE
    assembler.append(parseLine(value, next.value))
  }

  if (assembler.length < declared) {
    throw new TransactionCountError("TooLittleTransactions", declared, assembler.length)
  }

  return assembler.finish()
}

function parseCount(line: string): number {
  try {
    return parseUnsigned(line)
  } catch (error) {
    if (error instanceof IntegerParseError) {
      throw new InvalidCountError(error)
    }
    throw error
  }
}

function parseLine(value: number, line: string) {
  try {
    return parseTransaction(value, line)
  } catch (error) {
    if (error instanceof TransactionParseError) {
      throw new InvalidTransactionError(value, error)
    }
    throw error
  }
}
