import { DeserializationError } from "../types"
import type { Deserializer } from "./serializer"

const textDecoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true })

/**
 * Reads the little-endian, fixed-width encoding written by `BinarySerializer`.
 * Every read is bounds-checked; booleans and option tags must be exactly 0 or 1.
 */
export abstract class BinaryDeserializer implements Deserializer {
  readonly #input: Uint8Array
  #offset: number = 0
  #depth: number = 0

  /** Maximum nesting of named containers, if the encoding has one */
  protected readonly maxContainerDepth?: number

  constructor(input: Uint8Array, options: { maxContainerDepth?: number } = {}) {
    this.#input = input
    this.maxContainerDepth = options.maxContainerDepth
  }

  abstract deserializeLen(): number

  abstract deserializeVariantIndex(): number

  abstract checkThatKeySlicesAreIncreasing(key1: [number, number], key2: [number, number]): void

  /**
   * Consume `length` bytes
   */
  protected read(length: number): Uint8Array {
    if (length > this.#input.length - this.#offset) {
      throw new DeserializationError(`Unexpected end of input: needed ${length} more bytes`, this.#offset)
    }
    const bytes = this.#input.subarray(this.#offset, this.#offset + length)
    this.#offset += length
    return bytes
  }

  protected readView(length: number): DataView {
    const bytes = this.read(length)
    return new DataView(bytes.buffer, bytes.byteOffset, bytes.length)
  }

  /**
   * Input bytes between two offsets, without consuming anything
   */
  protected inputBetween(start: number, end: number): Uint8Array {
    return this.#input.subarray(start, end)
  }

  /**
   * Number of input bytes not consumed yet
   */
  get remaining(): number {
    return this.#input.length - this.#offset
  }

  protected decodeUtf8(bytes: Uint8Array, offset: number): string {
    try {
      return textDecoder.decode(bytes)
    } catch (err) {
      throw new DeserializationError(`Invalid UTF-8: ${err instanceof Error ? err.message : String(err)}`, offset)
    }
  }

  deserializeStr(): string {
    const bytes = this.deserializeBytes()
    return this.decodeUtf8(bytes, this.#offset - bytes.length)
  }

  deserializeBytes(): Uint8Array {
    const length = this.deserializeLen()
    return this.read(length).slice()
  }

  deserializeBool(): boolean {
    const offset = this.#offset
    const byte = this.read(1)[0]
    if (byte > 1) {
      throw new DeserializationError(`Invalid boolean value ${byte}`, offset)
    }
    return byte === 1
  }

  deserializeUnit(): null {
    return null
  }

  deserializeChar(): string {
    throw new DeserializationError("This encoding does not support char values", this.#offset)
  }

  deserializeF32(): number {
    return this.readView(4).getFloat32(0, true)
  }

  deserializeF64(): number {
    return this.readView(8).getFloat64(0, true)
  }

  deserializeU8(): number {
    return this.readView(1).getUint8(0)
  }

  deserializeU16(): number {
    return this.readView(2).getUint16(0, true)
  }

  deserializeU32(): number {
    return this.readView(4).getUint32(0, true)
  }

  deserializeU64(): bigint {
    return this.readView(8).getBigUint64(0, true)
  }

  deserializeU128(): bigint {
    const view = this.readView(16)
    // The high 64 bits come second
    return (view.getBigUint64(8, true) << 64n) | view.getBigUint64(0, true)
  }

  deserializeI8(): number {
    return this.readView(1).getInt8(0)
  }

  deserializeI16(): number {
    return this.readView(2).getInt16(0, true)
  }

  deserializeI32(): number {
    return this.readView(4).getInt32(0, true)
  }

  deserializeI64(): bigint {
    return this.readView(8).getBigInt64(0, true)
  }

  deserializeI128(): bigint {
    const view = this.readView(16)
    return BigInt.asIntN(128, (view.getBigUint64(8, true) << 64n) | view.getBigUint64(0, true))
  }

  deserializeOptionTag(): boolean {
    return this.deserializeBool()
  }

  increaseContainerDepth(): void {
    if (this.maxContainerDepth !== undefined && this.#depth >= this.maxContainerDepth) {
      throw new DeserializationError(`Exceeded maximum container depth ${this.maxContainerDepth}`, this.#offset)
    }
    this.#depth += 1
  }

  decreaseContainerDepth(): void {
    this.#depth -= 1
  }

  getBufferOffset(): number {
    return this.#offset
  }
}
