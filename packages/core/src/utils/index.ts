/**
 * Utilities Module
 */

export { parseUnsigned, toFloat } from "./integers"
