import { describe, it, expect } from "vitest"
import { BincodeDeserializer, BincodeSerializer } from "./bincode"
import { fromHex, toHex } from "./bytes"
import { createDeserializer, createSerializer } from "./index"
import { BcsSerializer } from "./bcs"

const encode = (write: (serializer: BincodeSerializer) => void) => {
  const serializer = new BincodeSerializer()
  write(serializer)
  return toHex(serializer.getBytes())
}

describe("BincodeSerializer", () => {
  it("should write lengths as u64", () => {
    expect(encode((s) => s.serializeLen(3))).toBe("0300000000000000")
    expect(encode((s) => s.serializeStr("ok"))).toBe("02000000000000006f6b")
  })

  it("should write variant indices as u32", () => {
    expect(encode((s) => s.serializeVariantIndex(2))).toBe("02000000")
  })

  it("should write floats little-endian", () => {
    expect(encode((s) => s.serializeF32(0.5))).toBe("0000003f")
    expect(encode((s) => s.serializeF64(0.5))).toBe("000000000000e03f")
  })

  it("should write chars as UTF-8", () => {
    expect(encode((s) => s.serializeChar("a"))).toBe("61")
    expect(encode((s) => s.serializeChar("é"))).toBe("c3a9")
    expect(encode((s) => s.serializeChar("😀"))).toBe("f09f9880")
  })

  it("should reject strings that are not a single character", () => {
    const serializer = new BincodeSerializer()

    expect(() => serializer.serializeChar("ab")).toThrow('Expected a single character, got "ab"')
    expect(() => serializer.serializeChar("")).toThrow('Expected a single character, got ""')
  })

  it("should keep map entries in insertion order", () => {
    const serializer = new BincodeSerializer()
    const offsets: number[] = []
    for (const key of [2, 1]) {
      offsets.push(serializer.getBufferOffset())
      serializer.serializeU8(key)
    }
    serializer.sortMapEntries(offsets)

    expect(toHex(serializer.getBytes())).toBe("0201")
  })

  it("should have no container depth limit", () => {
    const serializer = new BincodeSerializer()

    expect(() => {
      for (let i = 0; i < 1000; i++) serializer.increaseContainerDepth()
    }).not.toThrow()
  })
})

describe("BincodeDeserializer", () => {
  it("should read lengths, variant indices and floats", () => {
    const deserializer = new BincodeDeserializer(fromHex("0300000000000000" + "02000000" + "000000000000e03f"))

    expect(deserializer.deserializeLen()).toBe(3)
    expect(deserializer.deserializeVariantIndex()).toBe(2)
    expect(deserializer.deserializeF64()).toBe(0.5)
  })

  it("should read chars of every width", () => {
    const deserializer = new BincodeDeserializer(fromHex("61" + "c3a9" + "e282ac" + "f09f9880"))

    expect(deserializer.deserializeChar()).toBe("a")
    expect(deserializer.deserializeChar()).toBe("é")
    expect(deserializer.deserializeChar()).toBe("€")
    expect(deserializer.deserializeChar()).toBe("😀")
  })

  it("should reject invalid chars", () => {
    expect(() => new BincodeDeserializer(fromHex("c328")).deserializeChar()).toThrow("Invalid UTF-8")
  })

  it("should reject lengths beyond the safe integer range", () => {
    expect(() => new BincodeDeserializer(fromHex("0000000000002000")).deserializeLen()).toThrow("Length 9007199254740992 is too large (at byte 0)")
  })

  it("should accept map keys in any order", () => {
    const deserializer = new BincodeDeserializer(fromHex("0201"))

    expect(() => deserializer.checkThatKeySlicesAreIncreasing([0, 1], [1, 2])).not.toThrow()
  })
})

describe("createSerializer() / createDeserializer()", () => {
  it("should pick the implementation for the encoding", () => {
    expect(createSerializer("bcs")).toBeInstanceOf(BcsSerializer)
    expect(createSerializer("bincode")).toBeInstanceOf(BincodeSerializer)
    expect(createDeserializer("bincode", new Uint8Array())).toBeInstanceOf(BincodeDeserializer)
  })
})
