/**
 * Depth Module
 */

export { DepthCalculator } from "./depth"
