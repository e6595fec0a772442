import { describe, it, expect, beforeEach } from "vitest"
import { Registry } from "./registry"
import { Containers, Formats, Variants } from "./types"
import { SchemaError } from "../types"
import { loadShapes } from "../tests/fixtures"

describe("Registry", () => {
  let registry: Registry

  beforeEach(() => {
    registry = new Registry()
  })

  describe("add()", () => {
    it("should add a definition", () => {
      registry.add("Point", Containers.struct({ x: Formats.scalar("i32"), y: Formats.scalar("i32") }))

      expect(registry.has("Point")).toBe(true)
      expect(registry.size).toBe(1)
    })

    it("should support method chaining", () => {
      const result = registry.add("A", Containers.unitStruct()).add("B", Containers.unitStruct())

      expect(result).toBe(registry)
      expect(registry.size).toBe(2)
    })

    it("should reject an empty name", () => {
      expect(() => registry.add("", Containers.unitStruct())).toThrow("Definition name must not be empty")
    })

    it("should reject a duplicate name", () => {
      registry.add("A", Containers.unitStruct())

      expect(() => registry.add("A", Containers.unitStruct())).toThrow('Invalid definition "A": defined more than once')

      try {
        registry.add("A", Containers.unitStruct())
      } catch (err) {
        expect(err).toBeInstanceOf(SchemaError)
        expect(err).toMatchObject({ code: "DUPLICATE_DEFINITION", definition: "A" })
      }
    })
  })

  describe("get() / require()", () => {
    it("should return the container", () => {
      const container = Containers.newTypeStruct(Formats.scalar("str"))
      registry.add("Label", container)

      expect(registry.get("Label")).toBe(container)
      expect(registry.require("Label")).toBe(container)
    })

    it("should return undefined for unknown names", () => {
      expect(registry.get("Missing")).toBeUndefined()
    })

    it("should throw from require() for unknown names", () => {
      expect(() => registry.require("Missing")).toThrow('Unknown type name "Missing"')
    })
  })

  describe("iteration", () => {
    it("should keep registration order", () => {
      registry.add("Zeta", Containers.unitStruct()).add("Alpha", Containers.unitStruct()).add("Mid", Containers.unitStruct())

      expect([...registry.names()]).toEqual(["Zeta", "Alpha", "Mid"])
      expect([...registry].map(([name]) => name)).toEqual(["Zeta", "Alpha", "Mid"])
      expect([...registry.values()]).toHaveLength(3)
    })

    it("should build from entries", () => {
      const built = Registry.fromEntries([
        ["A", Containers.unitStruct()],
        ["B", Containers.tupleStruct([Formats.scalar("u8")])],
      ])

      expect([...built.names()]).toEqual(["A", "B"])
    })
  })

  describe("collectDependencies()", () => {
    it("should return requested names first, then dependencies in discovery order", () => {
      const shapes = loadShapes()

      expect(shapes.collectDependencies(["Drawing"])).toEqual(["Drawing", "Color", "Layer", "Marker", "Shape", "Point"])
    })

    it("should include self-referencing definitions once", () => {
      const shapes = loadShapes()

      expect(shapes.collectDependencies(["Tree"])).toEqual(["Tree", "Label"])
    })

    it("should skip unknown names", () => {
      const shapes = loadShapes()

      expect(shapes.collectDependencies(["Nope", "Point"])).toEqual(["Point"])
    })
  })

  describe("subset()", () => {
    it("should keep the definitions and their dependencies in registry order", () => {
      const subset = loadShapes().subset(["Drawing"])

      expect([...subset.names()]).toEqual(["Color", "Point", "Shape", "Drawing", "Layer", "Marker"])
    })

    it("should not modify the original registry", () => {
      const shapes = loadShapes()
      shapes.subset(["Point"])

      expect(shapes.size).toBe(9)
    })
  })

  describe("toDocument()", () => {
    it("should use the canonical tags", () => {
      registry
        .add("Unit", Containers.unitStruct())
        .add("Choice", Containers.enum({ Left: Variants.unit(), Right: Variants.tuple([Formats.scalar("bool"), Formats.fixedArray(Formats.scalar("u8"), 4)]) }))

      expect(registry.toDocument()).toEqual({
        Unit: "UNITSTRUCT",
        Choice: {
          ENUM: {
            "0": { Left: "UNIT" },
            "1": { Right: { TUPLE: ["BOOL", { TUPLEARRAY: { CONTENT: "U8", SIZE: 4 } }] } },
          },
        },
      })
    })
  })
})
