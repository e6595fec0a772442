import { DeserializationError, SerializationError } from "../types"
import { BinaryDeserializer } from "./binary-deserializer"
import { BinarySerializer } from "./binary-serializer"

const textEncoder = new TextEncoder()

/**
 * Bincode: u64 lengths, u32 variant indices, maps kept in insertion order.
 * Not canonical: the same map may be encoded in several ways.
 */
export class BincodeSerializer extends BinarySerializer {
  serializeLen(value: number): void {
    this.checkInteger(value, 0, Number.MAX_SAFE_INTEGER, "length")
    this.serializeU64(BigInt(value))
  }

  serializeVariantIndex(value: number): void {
    this.serializeU32(value)
  }

  /**
   * Chars are written as their UTF-8 bytes, without a length
   */
  override serializeChar(value: string): void {
    if (typeof value !== "string" || [...value].length !== 1) {
      throw new SerializationError(`Expected a single character, got ${JSON.stringify(value)}`)
    }
    this.concat(textEncoder.encode(value))
  }

  sortMapEntries(_offsets: number[]): void {}
}

export class BincodeDeserializer extends BinaryDeserializer {
  deserializeLen(): number {
    const start = this.getBufferOffset()
    const length = this.deserializeU64()
    if (length > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new DeserializationError(`Length ${length} is too large`, start)
    }
    return Number(length)
  }

  deserializeVariantIndex(): number {
    return this.deserializeU32()
  }

  override deserializeChar(): string {
    const start = this.getBufferOffset()
    const first = this.remaining > 0 ? this.inputBetween(start, start + 1)[0] : 0
    const width = first < 0x80 ? 1 : first >= 0xf0 ? 4 : first >= 0xe0 ? 3 : 2
    const value = this.decodeUtf8(this.read(width), start)
    if ([...value].length !== 1) {
      throw new DeserializationError("Invalid char encoding", start)
    }
    return value
  }

  checkThatKeySlicesAreIncreasing(_key1: [number, number], _key2: [number, number]): void {}
}
