import { describe, it, expect } from "vitest"
import { BcsDeserializer, BcsSerializer, BCS_MAX_SEQUENCE_LENGTH } from "./bcs"
import { fromHex, toHex } from "./bytes"
import { DeserializationError, SerializationError } from "../types"

const encode = (write: (serializer: BcsSerializer) => void) => {
  const serializer = new BcsSerializer()
  write(serializer)
  return toHex(serializer.getBytes())
}

describe("BcsSerializer", () => {
  it("should write integers little-endian", () => {
    expect(encode((s) => s.serializeU16(0x1234))).toBe("3412")
    expect(encode((s) => s.serializeI32(-1))).toBe("ffffffff")
    expect(encode((s) => s.serializeU64(1n))).toBe("0100000000000000")
    expect(encode((s) => s.serializeI8(-128))).toBe("80")
  })

  it("should write 128-bit integers low half first", () => {
    expect(encode((s) => s.serializeU128(1n << 64n))).toBe("00000000000000000100000000000000")
    expect(encode((s) => s.serializeI128(-1n))).toBe("ffffffffffffffffffffffffffffffff")
    expect(encode((s) => s.serializeI128(-2n))).toBe("feffffffffffffffffffffffffffffff")
  })

  it("should write lengths as ULEB128", () => {
    expect(encode((s) => s.serializeLen(0))).toBe("00")
    expect(encode((s) => s.serializeLen(127))).toBe("7f")
    expect(encode((s) => s.serializeLen(128))).toBe("8001")
    expect(encode((s) => s.serializeLen(300))).toBe("ac02")
    expect(encode((s) => s.serializeVariantIndex(16384))).toBe("808001")
  })

  it("should prefix strings and bytes with their length", () => {
    expect(encode((s) => s.serializeStr("hé"))).toBe("0368c3a9")
    expect(encode((s) => s.serializeBytes(new Uint8Array([1, 2])))).toBe("020102")
  })

  it("should write booleans, option tags and unit", () => {
    expect(encode((s) => s.serializeBool(true))).toBe("01")
    expect(encode((s) => s.serializeOptionTag(false))).toBe("00")
    expect(encode((s) => s.serializeUnit(null))).toBe("")
  })

  it("should reject values out of range", () => {
    const serializer = new BcsSerializer()

    expect(() => serializer.serializeU8(256)).toThrow("Expected u8 in [0, 255], got 256")
    expect(() => serializer.serializeI16(1.5)).toThrow(SerializationError)
    expect(() => serializer.serializeU64(-1n)).toThrow(SerializationError)
    expect(() => serializer.serializeLen(BCS_MAX_SEQUENCE_LENGTH + 1)).toThrow("Length 2147483648 exceeds the maximum of 2147483647")
  })

  it("should not support floats or chars", () => {
    const serializer = new BcsSerializer()

    expect(() => serializer.serializeF64(1)).toThrow("BCS does not support floating-point values")
    expect(() => serializer.serializeF32(1)).toThrow("BCS does not support floating-point values")
    expect(() => serializer.serializeChar("a")).toThrow("This encoding does not support char values")
  })

  it("should sort map entries by their bytes", () => {
    const serializer = new BcsSerializer()
    serializer.serializeLen(3)
    const offsets: number[] = []
    for (const [key, value] of [
      ["b", 1],
      ["ab", 2],
      ["a", 3],
    ] as const) {
      offsets.push(serializer.getBufferOffset())
      serializer.serializeStr(key)
      serializer.serializeU8(value)
    }
    serializer.sortMapEntries(offsets)

    // "a" < "b" < "ab": the length byte comes first
    expect(toHex(serializer.getBytes())).toBe("03" + "016103" + "016201" + "02616202")
  })

  it("should stop at the maximum container depth", () => {
    const serializer = new BcsSerializer()
    for (let i = 0; i < 500; i++) serializer.increaseContainerDepth()

    expect(() => serializer.increaseContainerDepth()).toThrow("Exceeded maximum container depth 500")

    serializer.decreaseContainerDepth()
    expect(() => serializer.increaseContainerDepth()).not.toThrow()
  })

  it("should grow its buffer", () => {
    const serializer = new BcsSerializer()
    for (let i = 0; i < 100; i++) serializer.serializeU64(BigInt(i))

    const bytes = serializer.getBytes()
    expect(bytes).toHaveLength(800)
    expect(toHex(bytes.subarray(792))).toBe("6300000000000000")
  })
})

describe("BcsDeserializer", () => {
  const decoder = (hex: string) => new BcsDeserializer(fromHex(hex))

  it("should read what the serializer writes", () => {
    const serializer = new BcsSerializer()
    serializer.serializeStr("hello")
    serializer.serializeI64(-5n)
    serializer.serializeU128(340282366920938463463374607431768211455n)
    serializer.serializeI128(-170141183460469231731687303715884105728n)
    serializer.serializeBool(false)
    serializer.serializeU16(65535)

    const deserializer = new BcsDeserializer(serializer.getBytes())
    expect(deserializer.deserializeStr()).toBe("hello")
    expect(deserializer.deserializeI64()).toBe(-5n)
    expect(deserializer.deserializeU128()).toBe(340282366920938463463374607431768211455n)
    expect(deserializer.deserializeI128()).toBe(-170141183460469231731687303715884105728n)
    expect(deserializer.deserializeBool()).toBe(false)
    expect(deserializer.deserializeU16()).toBe(65535)
    expect(deserializer.remaining).toBe(0)
  })

  it("should read ULEB128 values", () => {
    expect(decoder("ac02").deserializeLen()).toBe(300)
    expect(decoder("ffffffff0f").deserializeUleb128AsU32()).toBe(4294967295)
  })

  it("should reject overlong ULEB128 encodings", () => {
    expect(() => decoder("8000").deserializeLen()).toThrow("Invalid uleb128 number (unexpected zero digit) (at byte 0)")
    expect(() => decoder("ff00").deserializeVariantIndex()).toThrow("unexpected zero digit")
  })

  it("should reject ULEB128 values above u32", () => {
    expect(() => decoder("ffffffff1f").deserializeUleb128AsU32()).toThrow("Overflow while parsing uleb128-encoded uint32 value")
    expect(() => decoder("ffffffffff01").deserializeUleb128AsU32()).toThrow("Overflow while parsing uleb128-encoded uint32 value")
  })

  it("should reject lengths above the maximum", () => {
    expect(() => decoder("8080808008").deserializeLen()).toThrow("Length 2147483648 exceeds the maximum of 2147483647")
  })

  it("should reject booleans other than 0 and 1", () => {
    expect(() => decoder("02").deserializeBool()).toThrow("Invalid boolean value 2 (at byte 0)")
    expect(() => decoder("ff").deserializeOptionTag()).toThrow(DeserializationError)
  })

  it("should reject invalid UTF-8", () => {
    expect(() => decoder("01ff").deserializeStr()).toThrow("Invalid UTF-8")
  })

  it("should report the end of input", () => {
    expect(() => decoder("0102").deserializeU32()).toThrow("Unexpected end of input: needed 4 more bytes (at byte 0)")
    expect(() => decoder("05616263").deserializeStr()).toThrow("Unexpected end of input: needed 5 more bytes (at byte 1)")
  })

  it("should not support floats", () => {
    expect(() => decoder("0000803f").deserializeF32()).toThrow("BCS does not support floating-point values")
  })

  it("should require strictly increasing map keys", () => {
    const deserializer = decoder("01610162")

    expect(() => deserializer.checkThatKeySlicesAreIncreasing([0, 2], [2, 4])).not.toThrow()
    expect(() => deserializer.checkThatKeySlicesAreIncreasing([2, 4], [0, 2])).toThrow(
      "Error while decoding map: keys are not serialized in the expected order (at byte 0)",
    )
    expect(() => deserializer.checkThatKeySlicesAreIncreasing([0, 2], [0, 2])).toThrow("keys are not serialized in the expected order")
  })

  it("should stop at the maximum container depth", () => {
    const deserializer = decoder("")
    for (let i = 0; i < 500; i++) deserializer.increaseContainerDepth()

    expect(() => deserializer.increaseContainerDepth()).toThrow("Exceeded maximum container depth 500")
  })
})
