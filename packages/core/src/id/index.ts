/**
 * Identifier Module
 */

export {
  ROOT_VALUE,
  FIRST_TRANSACTION_VALUE,
  Root,
  transactionId,
  id,
  idToNumber,
  isRoot,
  idEquals,
  formatId,
} from "./id"
export type { Id, RootId, TransactionId } from "./id"
