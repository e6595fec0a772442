/**
 * Primitive encode calls every generated serializer is written against.
 *
 * Composite values are expressed with these calls: an option tag before an optional payload, a
 * length before sequence and map elements, a variant index before a variant payload. Map entries
 * are written one after another, recording `getBufferOffset()` before each, and `sortMapEntries`
 * is called with those offsets once the last entry is written.
 */
export interface Serializer {
  serializeStr(value: string): void
  serializeBytes(value: Uint8Array): void
  serializeBool(value: boolean): void
  serializeUnit(value: null): void
  serializeChar(value: string): void
  serializeF32(value: number): void
  serializeF64(value: number): void
  serializeU8(value: number): void
  serializeU16(value: number): void
  serializeU32(value: number): void
  serializeU64(value: bigint): void
  serializeU128(value: bigint): void
  serializeI8(value: number): void
  serializeI16(value: number): void
  serializeI32(value: number): void
  serializeI64(value: bigint): void
  serializeI128(value: bigint): void
  serializeLen(value: number): void
  serializeVariantIndex(value: number): void
  serializeOptionTag(value: boolean): void
  /** Called when entering a named container; fails past the encoding's depth limit */
  increaseContainerDepth(): void
  decreaseContainerDepth(): void
  getBufferOffset(): number
  /** Reorder the map entries starting at each offset, as the encoding requires */
  sortMapEntries(offsets: number[]): void
  getBytes(): Uint8Array
}

/**
 * Primitive decode calls mirroring `Serializer`
 */
export interface Deserializer {
  deserializeStr(): string
  deserializeBytes(): Uint8Array
  deserializeBool(): boolean
  deserializeUnit(): null
  deserializeChar(): string
  deserializeF32(): number
  deserializeF64(): number
  deserializeU8(): number
  deserializeU16(): number
  deserializeU32(): number
  deserializeU64(): bigint
  deserializeU128(): bigint
  deserializeI8(): number
  deserializeI16(): number
  deserializeI32(): number
  deserializeI64(): bigint
  deserializeI128(): bigint
  deserializeLen(): number
  deserializeVariantIndex(): number
  deserializeOptionTag(): boolean
  increaseContainerDepth(): void
  decreaseContainerDepth(): void
  getBufferOffset(): number
  /**
   * Verify the ordering of two consecutive map keys, given as `[start, end)` input offsets.
   * Canonical encodings reject keys that are not strictly increasing.
   */
  checkThatKeySlicesAreIncreasing(key1: [number, number], key2: [number, number]): void
}
