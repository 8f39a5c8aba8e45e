/**
 * Validation Module
 */

export { isConnectedAcyclic } from "./connectivity"
export { isBipartite } from "./bipartite"
