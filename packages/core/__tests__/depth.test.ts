/**
 * Tests for the Depth Calculator
 */

import { describe, it, expect } from "vitest"
import { CyclicGraphError, DepthCalculator, Root, UnknownTransactionError, id, transactionId } from "../src"
import { EXAMPLE_ROWS, captureError, graphOf } from "./helpers"

describe("DepthCalculator", () => {
  it("should place Root at depth 0", () => {
    expect(new DepthCalculator(graphOf([])).depth(Root)).toBe(0)
  })

  it("should take one more than the shallower reference", () => {
    const calculator = new DepthCalculator(graphOf(EXAMPLE_ROWS))

    expect([2, 3, 4, 5, 6].map((value) => calculator.depth(transactionId(value)))).toEqual([1, 1, 2, 2, 2])
  })

  it("should cache every transaction resolved on the way", () => {
    const calculator = new DepthCalculator(graphOf(EXAMPLE_ROWS))

    expect(calculator.depth(transactionId(5))).toBe(2)
    expect(calculator.cachedCount).toBe(4)

    expect(calculator.depth(transactionId(4))).toBe(2)
    expect(calculator.cachedCount).toBe(5)
  })

  it("should resolve long chains without recursion", () => {
    const rows: Array<[number, number, number]> = []
    for (let value = 2; value <= 50_001; value++) {
      rows.push([value - 1, value - 1, value])
    }
    const calculator = new DepthCalculator(graphOf(rows))

    expect(calculator.depth(transactionId(50_001))).toBe(50_000)
  })

  it("should throw on a cycle", () => {
    const calculator = new DepthCalculator(graphOf([[1, 3, 120], [1, 4, 130], [1, 2, 130]]))
    const error = captureError(() => calculator.depth(transactionId(2)))

    expect(error).toBeInstanceOf(CyclicGraphError)
    expect(error).toMatchObject({ transactionId: 4, reference: 2, message: "Graph is cyclic (Tx:4 -> Tx:2)" })
  })

  it("should throw on a self reference", () => {
    const calculator = new DepthCalculator(graphOf([[1, 2, 0]]))

    expect(captureError(() => calculator.depth(id(2)))).toMatchObject({ transactionId: 2, reference: 2 })
  })

  it("should throw for a transaction the graph does not hold", () => {
    const calculator = new DepthCalculator(graphOf([[1, 1, 0]]))
    const error = captureError(() => calculator.depth(transactionId(9)))

    expect(error).toBeInstanceOf(UnknownTransactionError)
    expect(error).toHaveProperty("message", "Transaction not found: Tx:9")
  })
})
