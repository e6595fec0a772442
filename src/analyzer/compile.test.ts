import { describe, it, expect } from "vitest"
import { compileRegistry } from "./compile"
import { Registry } from "../format/registry"
import { Containers, Formats, Variants, type Named, type VariantFormat } from "../format/types"
import { SchemaError } from "../types"

const sprite = () =>
  new Registry()
    .add("Sprite", Containers.struct({ position: Formats.typeName("Vec2"), frames: Formats.seq(Formats.typeName("Frame")) }))
    .add("Frame", Containers.tupleStruct([Formats.scalar("u16"), Formats.typeName("Vec2")]))

const compileError = (run: () => unknown): SchemaError => {
  try {
    run()
  } catch (err) {
    if (err instanceof SchemaError) return err
    throw err
  }
  throw new Error("Expected a SchemaError")
}

describe("compileRegistry()", () => {
  it("should return the dependency map, order and layout", () => {
    const compiled = compileRegistry(sprite(), { externalNames: ["Vec2"] })

    expect([...(compiled.dependencies.get("Sprite") ?? [])]).toEqual(["Frame", "Vec2"])
    expect(compiled.order).toEqual(["Frame", "Sprite"])
    expect(compiled.layout.order).toEqual(["Frame", "Sprite"])
    expect([...compiled.externalNames]).toEqual(["Vec2"])
  })

  it("should treat external names as complete", () => {
    const { layout } = compileRegistry(sprite(), { externalNames: ["Vec2"] })

    expect(layout.get("Sprite")?.references.map((site) => [site.path, site.external, site.indirect])).toEqual([
      [".position", true, false],
      [".frames[]", false, false],
    ])
    expect(layout.get("Frame")?.forwardDeclarations).toEqual([])
    expect([...layout.knownSizes]).toEqual(["Frame", "Sprite"])
  })

  it("should reject references to names that are neither defined nor external", () => {
    const err = compileError(() => compileRegistry(sprite()))

    expect(err.code).toBe("UNKNOWN_TYPE_NAME")
    expect(err.definition).toBe("Sprite")
    expect(err.message).toBe('Invalid definition "Sprite": reference to unknown type "Vec2"')
  })

  it("should reject an external name that is also defined", () => {
    const err = compileError(() => compileRegistry(sprite(), { externalNames: ["Vec2", "Frame"] }))

    expect(err.code).toBe("DUPLICATE_DEFINITION")
    expect(err.message).toBe('Invalid definition "Frame": also declared as an external definition')
  })

  it("should reject sparse enum indices", () => {
    const variants = new Map<number, Named<VariantFormat>>([
      [0, { name: "Idle", value: Variants.unit() }],
      [2, { name: "Busy", value: Variants.newType(Formats.scalar("u32")) }],
    ])
    const registry = new Registry().add("State", { kind: "enum", variants })

    const err = compileError(() => compileRegistry(registry))

    expect(err.code).toBe("SPARSE_VARIANT_INDEX")
    expect(err.message).toBe('Invalid definition "State": variant indices must be 0..1, found [0, 2]')
  })

  it("should reject unresolved formats before producing anything", () => {
    const registry = new Registry().add("Ok", Containers.unitStruct()).add("Pending", Containers.struct({ value: Formats.option(Formats.unknown()) }))

    const err = compileError(() => compileRegistry(registry))

    expect(err.code).toBe("UNRESOLVED_FORMAT")
    expect(err.message).toBe('Invalid definition "Pending": unresolved format at .value?')
  })

  it("should not modify the registry", () => {
    const registry = sprite()
    const before = registry.toDocument()

    compileRegistry(registry, { externalNames: ["Vec2"] })

    expect(registry.toDocument()).toEqual(before)
  })

  it("should produce the same result on every run", () => {
    const first = compileRegistry(sprite(), { externalNames: ["Vec2"] })
    const second = compileRegistry(sprite(), { externalNames: ["Vec2"] })

    expect(second.order).toEqual(first.order)
    expect(second.layout.indirectReferences()).toEqual(first.layout.indirectReferences())
  })
})
