import { describe, it, expect } from "vitest"
import { decodeValue, encodeValue, type Value } from "../codec"
import { ENCODINGS } from "../types"
import { loadShapes } from "./fixtures"

const registry = loadShapes()

const drawing = (order: "ab" | "ba"): Value => {
  const entries: [Value, Value][] = [
    ["a", { Polygon: [{ x: 0, y: 0 }, { x: -3, y: 9 }] }],
    ["b", { Circle: { center: { x: 1, y: 2 }, radius: 3 } }],
  ]
  return {
    id: (1n << 100n) + 7n,
    shapes: new Map(order === "ab" ? entries : [...entries].reverse()),
    palette: [{ Red: null }, { Custom: [1, 2, 3] }],
    visible: true,
    blob: new Uint8Array([9, 8, 7]),
    offset: -4n,
    layer: [1, -2],
    origin: [-1, 500],
    marker: null,
  }
}

const samples: [string, Value][] = [
  ["Drawing", drawing("ab")],
  ["Tree", { label: "root", children: [{ label: "left", children: [] }, { label: "right", children: [{ label: "leaf", children: [] }] }] }],
  ["List", { value: 18446744073709551615n, next: { value: 0n, next: null } }],
  ["Shape", { Empty: null }],
  ["Color", { Green: null }],
  ["Label", "ünïcödé"],
]

describe("round trip", () => {
  for (const encoding of ENCODINGS) {
    for (const [type, value] of samples) {
      it(`should decode the ${encoding} encoding of ${type} to the same value`, () => {
        const bytes = encodeValue(registry, type, value, encoding)

        expect(decodeValue(registry, type, bytes, encoding)).toEqual(value)
      })
    }
  }
})

describe("BCS canonical encoding", () => {
  it("should not depend on map insertion order", () => {
    expect(encodeValue(registry, "Drawing", drawing("ba"), "bcs")).toEqual(encodeValue(registry, "Drawing", drawing("ab"), "bcs"))
  })

  it("should depend on map insertion order with Bincode", () => {
    expect(encodeValue(registry, "Drawing", drawing("ba"), "bincode")).not.toEqual(encodeValue(registry, "Drawing", drawing("ab"), "bincode"))
  })

  it("should reject any single-byte change or decode it to a different value", () => {
    for (const [type, value] of samples) {
      const bytes = encodeValue(registry, type, value, "bcs")

      for (let position = 0; position < bytes.length; position++) {
        for (const mask of [0x01, 0x80, 0xff]) {
          const mutated = bytes.slice()
          mutated[position] ^= mask

          let decoded: Value
          try {
            decoded = decodeValue(registry, type, mutated, "bcs")
          } catch {
            continue
          }
          expect(decoded, `${type} byte ${position} ^ ${mask}`).not.toEqual(value)
          expect(encodeValue(registry, type, decoded, "bcs")).toEqual(mutated)
        }
      }
    }
  })
})
