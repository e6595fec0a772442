import { SerializationError } from "../types"
import type { Serializer } from "./serializer"

const textEncoder = new TextEncoder()

const U64_MAX = (1n << 64n) - 1n
const U128_MAX = (1n << 128n) - 1n
const I64_MIN = -(1n << 63n)
const I64_MAX = (1n << 63n) - 1n
const I128_MIN = -(1n << 127n)
const I128_MAX = (1n << 127n) - 1n
const LOW_64 = (1n << 64n) - 1n

/**
 * Little-endian, fixed-width encoding shared by the binary formats.
 * Subclasses decide how lengths and variant indices are written and how maps are ordered.
 */
export abstract class BinarySerializer implements Serializer {
  #buffer: Uint8Array = new Uint8Array(64)
  #length: number = 0
  #depth: number = 0

  /** Maximum nesting of named containers, if the encoding has one */
  protected readonly maxContainerDepth?: number

  constructor(options: { maxContainerDepth?: number } = {}) {
    this.maxContainerDepth = options.maxContainerDepth
  }

  abstract serializeLen(value: number): void

  abstract serializeVariantIndex(value: number): void

  abstract sortMapEntries(offsets: number[]): void

  #reserve(size: number): number {
    const offset = this.#length
    if (offset + size > this.#buffer.length) {
      let capacity = this.#buffer.length * 2
      while (capacity < offset + size) capacity *= 2
      const grown = new Uint8Array(capacity)
      grown.set(this.#buffer.subarray(0, offset))
      this.#buffer = grown
    }
    this.#length += size
    return offset
  }

  /**
   * Reserve `size` bytes and return a view over them
   */
  protected writeView(size: number): DataView {
    const offset = this.#reserve(size)
    return new DataView(this.#buffer.buffer, this.#buffer.byteOffset + offset, size)
  }

  /**
   * Append raw bytes
   */
  concat(value: Uint8Array): void {
    const offset = this.#reserve(value.length)
    this.#buffer.set(value, offset)
  }

  /**
   * Copy of the output between two offsets
   */
  protected bytesBetween(start: number, end: number): Uint8Array {
    return this.#buffer.slice(start, end)
  }

  /**
   * Overwrite already written output starting at `offset`
   */
  protected overwrite(offset: number, value: Uint8Array): void {
    if (offset + value.length > this.#length) {
      throw new SerializationError("Cannot overwrite past the end of the output")
    }
    this.#buffer.set(value, offset)
  }

  protected checkInteger(value: number, min: number, max: number, type: string): void {
    if (typeof value !== "number" || !Number.isInteger(value) || value < min || value > max) {
      throw new SerializationError(`Expected ${type} in [${min}, ${max}], got ${String(value)}`)
    }
  }

  protected checkBigInt(value: bigint, min: bigint, max: bigint, type: string): void {
    if (typeof value !== "bigint" || value < min || value > max) {
      throw new SerializationError(`Expected ${type} as a bigint in [${min}, ${max}], got ${String(value)}`)
    }
  }

  serializeStr(value: string): void {
    this.serializeBytes(textEncoder.encode(value))
  }

  serializeBytes(value: Uint8Array): void {
    this.serializeLen(value.length)
    this.concat(value)
  }

  serializeBool(value: boolean): void {
    this.concat(new Uint8Array([value ? 1 : 0]))
  }

  serializeUnit(_value: null): void {}

  serializeChar(_value: string): void {
    throw new SerializationError("This encoding does not support char values")
  }

  serializeF32(value: number): void {
    this.writeView(4).setFloat32(0, value, true)
  }

  serializeF64(value: number): void {
    this.writeView(8).setFloat64(0, value, true)
  }

  serializeU8(value: number): void {
    this.checkInteger(value, 0, 0xff, "u8")
    this.writeView(1).setUint8(0, value)
  }

  serializeU16(value: number): void {
    this.checkInteger(value, 0, 0xffff, "u16")
    this.writeView(2).setUint16(0, value, true)
  }

  serializeU32(value: number): void {
    this.checkInteger(value, 0, 0xffffffff, "u32")
    this.writeView(4).setUint32(0, value, true)
  }

  serializeU64(value: bigint): void {
    this.checkBigInt(value, 0n, U64_MAX, "u64")
    this.writeView(8).setBigUint64(0, value, true)
  }

  serializeU128(value: bigint): void {
    this.checkBigInt(value, 0n, U128_MAX, "u128")
    const view = this.writeView(16)
    view.setBigUint64(0, value & LOW_64, true)
    view.setBigUint64(8, value >> 64n, true)
  }

  serializeI8(value: number): void {
    this.checkInteger(value, -0x80, 0x7f, "i8")
    this.writeView(1).setInt8(0, value)
  }

  serializeI16(value: number): void {
    this.checkInteger(value, -0x8000, 0x7fff, "i16")
    this.writeView(2).setInt16(0, value, true)
  }

  serializeI32(value: number): void {
    this.checkInteger(value, -0x80000000, 0x7fffffff, "i32")
    this.writeView(4).setInt32(0, value, true)
  }

  serializeI64(value: bigint): void {
    this.checkBigInt(value, I64_MIN, I64_MAX, "i64")
    this.writeView(8).setBigInt64(0, value, true)
  }

  serializeI128(value: bigint): void {
    this.checkBigInt(value, I128_MIN, I128_MAX, "i128")
    // Two's complement over 128 bits, then the same layout as u128
    const unsigned = BigInt.asUintN(128, value)
    const view = this.writeView(16)
    view.setBigUint64(0, unsigned & LOW_64, true)
    view.setBigUint64(8, unsigned >> 64n, true)
  }

  serializeOptionTag(value: boolean): void {
    this.serializeBool(value)
  }

  increaseContainerDepth(): void {
    if (this.maxContainerDepth !== undefined && this.#depth >= this.maxContainerDepth) {
      throw new SerializationError(`Exceeded maximum container depth ${this.maxContainerDepth}`)
    }
    this.#depth += 1
  }

  decreaseContainerDepth(): void {
    this.#depth -= 1
  }

  getBufferOffset(): number {
    return this.#length
  }

  getBytes(): Uint8Array {
    return this.#buffer.slice(0, this.#length)
  }
}
