/**
 * Transaction Module
 */

export { createTransaction, parseTransaction, formatTransaction } from "./transaction"
export type { Transaction } from "./transaction"
