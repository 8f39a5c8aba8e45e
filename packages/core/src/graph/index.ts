/**
 * Graph Module
 */

export { LedgerGraph } from "./graph"
export { GraphAssembler } from "./assembler"
export { ReverseIndex } from "./reverse-index"
export { buildGraph } from "./builder"
