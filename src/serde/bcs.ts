import { DeserializationError, SerializationError } from "../types"
import { BinaryDeserializer } from "./binary-deserializer"
import { BinarySerializer } from "./binary-serializer"
import { compareBytes } from "./bytes"

/** Longest sequence, string or map accepted by BCS */
export const BCS_MAX_SEQUENCE_LENGTH = 2 ** 31 - 1

/** Deepest nesting of named containers accepted by BCS */
export const BCS_MAX_CONTAINER_DEPTH = 500

/**
 * Binary Canonical Serialization.
 *
 * Lengths and variant indices are ULEB128-encoded u32 values and map entries are sorted by the bytes
 * of their keys, so every value has exactly one encoding. Floats and chars are not supported.
 */
export class BcsSerializer extends BinarySerializer {
  constructor() {
    super({ maxContainerDepth: BCS_MAX_CONTAINER_DEPTH })
  }

  serializeU32AsUleb128(value: number): void {
    this.checkInteger(value, 0, 0xffffffff, "u32")
    const bytes: number[] = []
    let rest = value
    while (rest >= 0x80) {
      bytes.push((rest & 0x7f) | 0x80)
      rest = Math.floor(rest / 0x80)
    }
    bytes.push(rest)
    this.concat(new Uint8Array(bytes))
  }

  serializeLen(value: number): void {
    if (value > BCS_MAX_SEQUENCE_LENGTH) {
      throw new SerializationError(`Length ${value} exceeds the maximum of ${BCS_MAX_SEQUENCE_LENGTH}`)
    }
    this.serializeU32AsUleb128(value)
  }

  serializeVariantIndex(value: number): void {
    this.serializeU32AsUleb128(value)
  }

  override serializeF32(_value: number): void {
    throw new SerializationError("BCS does not support floating-point values")
  }

  override serializeF64(_value: number): void {
    throw new SerializationError("BCS does not support floating-point values")
  }

  /**
   * Sort the entries written since `offsets[0]` by their bytes. Keys come first in each entry and
   * encodings are self-delimiting, so this orders entries by key.
   */
  sortMapEntries(offsets: number[]): void {
    if (offsets.length <= 1) return

    const end = this.getBufferOffset()
    const entries = offsets.map((start, i) => this.bytesBetween(start, i + 1 < offsets.length ? offsets[i + 1] : end))
    entries.sort(compareBytes)

    let position = offsets[0]
    for (const entry of entries) {
      this.overwrite(position, entry)
      position += entry.length
    }
  }
}

export class BcsDeserializer extends BinaryDeserializer {
  constructor(input: Uint8Array) {
    super(input, { maxContainerDepth: BCS_MAX_CONTAINER_DEPTH })
  }

  /**
   * Read a ULEB128-encoded u32, rejecting overlong encodings
   */
  deserializeUleb128AsU32(): number {
    const start = this.getBufferOffset()
    let value = 0
    for (let shift = 0; shift < 32; shift += 7) {
      const byte = this.deserializeU8()
      const digit = byte & 0x7f
      value += digit * 2 ** shift
      if ((byte & 0x80) === 0) {
        if (shift > 0 && digit === 0) {
          throw new DeserializationError("Invalid uleb128 number (unexpected zero digit)", start)
        }
        if (value > 0xffffffff) {
          throw new DeserializationError("Overflow while parsing uleb128-encoded uint32 value", start)
        }
        return value
      }
    }
    throw new DeserializationError("Overflow while parsing uleb128-encoded uint32 value", start)
  }

  deserializeLen(): number {
    const start = this.getBufferOffset()
    const length = this.deserializeUleb128AsU32()
    if (length > BCS_MAX_SEQUENCE_LENGTH) {
      throw new DeserializationError(`Length ${length} exceeds the maximum of ${BCS_MAX_SEQUENCE_LENGTH}`, start)
    }
    return length
  }

  deserializeVariantIndex(): number {
    return this.deserializeUleb128AsU32()
  }

  override deserializeF32(): number {
    throw new DeserializationError("BCS does not support floating-point values", this.getBufferOffset())
  }

  override deserializeF64(): number {
    throw new DeserializationError("BCS does not support floating-point values", this.getBufferOffset())
  }

  checkThatKeySlicesAreIncreasing(key1: [number, number], key2: [number, number]): void {
    if (compareBytes(this.inputBetween(key1[0], key1[1]), this.inputBetween(key2[0], key2[1])) >= 0) {
      throw new DeserializationError("Error while decoding map: keys are not serialized in the expected order", key2[0])
    }
  }
}
