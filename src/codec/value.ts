import { DeserializationError, SerializationError, type Encoding } from "../types"
import type { Registry } from "../format/registry"
import { Formats, type ContainerFormat, type Format, type Named, type ScalarKind, type VariantFormat } from "../format/types"
import { enumVariants } from "../format/visit"
import type { Deserializer, Serializer } from "../serde/serializer"
import { createDeserializer, createSerializer } from "../serde"
import { compareBytes } from "../serde/bytes"

/**
 * A plain JavaScript value matching some format of a registry
 */
export type Value = null | boolean | number | bigint | string | Uint8Array | ValueArray | ValueMap | ValueRecord

export type ValueArray = Value[]

export type ValueMap = Map<Value, Value>

export interface ValueRecord {
  [key: string]: Value
}

export function isValueArray(value: Value): value is ValueArray {
  return Array.isArray(value)
}

export function isValueMap(value: Value): value is ValueMap {
  return value instanceof Map
}

export function isValueRecord(value: Value): value is ValueRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Map) && !(value instanceof Uint8Array)
}

function kindOf(value: Value): string {
  if (value === null) return "null"
  if (Array.isArray(value)) return "array"
  if (value instanceof Map) return "Map"
  if (value instanceof Uint8Array) return "Uint8Array"
  return typeof value
}

/**
 * Longest sequence of zero-size elements accepted by default when decoding
 */
export const DEFAULT_MAX_ZERO_SIZE_LENGTH = 65536

export interface ValueCodecOptions {
  /**
   * Upper bound on the decoded length of a sequence whose elements encode to no bytes at all
   * (unit, unit structs, empty tuples). Such lengths are not bounded by the input size.
   */
  maxZeroSizeLength?: number
}

/**
 * Encodes and decodes plain values against the formats of a registry, one runtime call per
 * primitive. Named containers increase the container depth of the runtime.
 */
export class ValueCodec {
  readonly #registry: Registry
  readonly #maxZeroSizeLength: number
  readonly #zeroSize: Map<string, boolean> = new Map()

  constructor(registry: Registry, options: ValueCodecOptions = {}) {
    this.#registry = registry
    this.#maxZeroSizeLength = options.maxZeroSizeLength ?? DEFAULT_MAX_ZERO_SIZE_LENGTH
  }

  /**
   * Write `value` as `format`
   * @throws SerializationError when the value does not have the shape of the format
   */
  serialize(format: Format, value: Value, serializer: Serializer): void {
    this.#serialize(format, value, serializer, "")
  }

  /**
   * Read one value of `format`
   * @throws DeserializationError when the input is not a valid encoding
   */
  deserialize(format: Format, deserializer: Deserializer): Value {
    return this.#deserialize(format, deserializer)
  }

  #container(name: string, path: string): ContainerFormat {
    const container = this.#registry.get(name)
    if (!container) {
      throw new SerializationError(`Unknown type name "${name}"`, path)
    }
    return container
  }

  #serialize(format: Format, value: Value, serializer: Serializer, path: string): void {
    switch (format.kind) {
      case "variable":
        throw new SerializationError("Cannot serialize an unresolved format", path)
      case "typeName": {
        const container = this.#container(format.name, path)
        serializer.increaseContainerDepth()
        this.#serializeContainer(container, value, serializer, path)
        serializer.decreaseContainerDepth()
        return
      }
      case "option":
        if (value === null) {
          serializer.serializeOptionTag(false)
        } else {
          serializer.serializeOptionTag(true)
          this.#serialize(format.format, value, serializer, `${path}?`)
        }
        return
      case "seq": {
        const items = expectArray(value, path)
        serializer.serializeLen(items.length)
        items.forEach((item, i) => this.#serialize(format.format, item, serializer, `${path}[${i}]`))
        return
      }
      case "map":
        this.#serializeMap(format.key, format.value, value, serializer, path)
        return
      case "tuple":
        this.#serializeTuple(format.formats, value, serializer, path)
        return
      case "fixedArray": {
        const items = expectArray(value, path, format.size)
        items.forEach((item, i) => this.#serialize(format.content, item, serializer, `${path}[${i}]`))
        return
      }
      default:
        serializeScalar(format.kind, value, serializer, path)
        return
    }
  }

  #serializeTuple(formats: readonly Format[], value: Value, serializer: Serializer, path: string): void {
    const items = expectArray(value, path, formats.length)
    formats.forEach((format, i) => this.#serialize(format, items[i], serializer, `${path}[${i}]`))
  }

  #serializeFields(fields: readonly Named<Format>[], value: Value, serializer: Serializer, path: string): void {
    if (!isValueRecord(value)) {
      throw new SerializationError(`Expected an object, got ${kindOf(value)}`, path)
    }
    const known = new Set(fields.map((field) => field.name))
    const unknown = Object.keys(value).find((key) => !known.has(key))
    if (unknown !== undefined) {
      throw new SerializationError(`Unknown field "${unknown}"`, path)
    }
    for (const field of fields) {
      if (!Object.prototype.hasOwnProperty.call(value, field.name)) {
        throw new SerializationError(`Missing field "${field.name}"`, path)
      }
      this.#serialize(field.value, value[field.name], serializer, `${path}.${field.name}`)
    }
  }

  #serializeMap(keyFormat: Format, valueFormat: Format, value: Value, serializer: Serializer, path: string): void {
    if (!isValueMap(value)) {
      throw new SerializationError(`Expected a Map, got ${kindOf(value)}`, path)
    }

    serializer.serializeLen(value.size)
    const offsets: number[] = []
    const keySlices: [number, number][] = []
    for (const [key, item] of value) {
      const start = serializer.getBufferOffset()
      offsets.push(start)
      this.#serialize(keyFormat, key, serializer, `${path}{key}`)
      keySlices.push([start, serializer.getBufferOffset()])
      this.#serialize(valueFormat, item, serializer, `${path}{value}`)
    }

    if (keySlices.length > 1) {
      // Distinct Map keys may still have the same encoding, e.g. two equal arrays
      const output = serializer.getBytes()
      const keys = keySlices.map(([start, end]) => output.subarray(start, end)).sort(compareBytes)
      for (let i = 1; i < keys.length; i++) {
        if (compareBytes(keys[i - 1], keys[i]) === 0) {
          throw new SerializationError("Duplicate map key", path)
        }
      }
    }

    serializer.sortMapEntries(offsets)
  }

  #serializeContainer(container: ContainerFormat, value: Value, serializer: Serializer, path: string): void {
    switch (container.kind) {
      case "unitStruct":
        serializeScalar("unit", value, serializer, path)
        return
      case "newTypeStruct":
        this.#serialize(container.format, value, serializer, path)
        return
      case "tupleStruct":
        this.#serializeTuple(container.formats, value, serializer, path)
        return
      case "struct":
        this.#serializeFields(container.fields, value, serializer, path)
        return
      case "enum": {
        if (!isValueRecord(value)) {
          throw new SerializationError(`Expected an enum value { Variant: payload }, got ${kindOf(value)}`, path)
        }
        const keys = Object.keys(value)
        if (keys.length !== 1) {
          throw new SerializationError(`Expected exactly one variant key, got ${keys.length}`, path)
        }
        const name = keys[0]
        const variants = enumVariants(container.variants)
        const index = variants.findIndex((variant) => variant.name === name)
        if (index < 0) {
          throw new SerializationError(`Unknown variant "${name}"`, path)
        }
        serializer.serializeVariantIndex(index)
        this.#serializeVariant(variants[index].value, value[name], serializer, `${path}::${name}`)
        return
      }
    }
  }

  #serializeVariant(variant: VariantFormat, value: Value, serializer: Serializer, path: string): void {
    switch (variant.kind) {
      case "variable":
        throw new SerializationError("Cannot serialize an unresolved variant", path)
      case "unit":
        serializeScalar("unit", value, serializer, path)
        return
      case "newType":
        this.#serialize(variant.format, value, serializer, path)
        return
      case "tuple":
        this.#serializeTuple(variant.formats, value, serializer, path)
        return
      case "struct":
        this.#serializeFields(variant.fields, value, serializer, path)
        return
    }
  }

  #deserialize(format: Format, deserializer: Deserializer): Value {
    switch (format.kind) {
      case "variable":
        throw new DeserializationError("Cannot deserialize an unresolved format", deserializer.getBufferOffset())
      case "typeName": {
        const container = this.#registry.get(format.name)
        if (!container) {
          throw new DeserializationError(`Unknown type name "${format.name}"`, deserializer.getBufferOffset())
        }
        deserializer.increaseContainerDepth()
        const value = this.#deserializeContainer(container, deserializer)
        deserializer.decreaseContainerDepth()
        return value
      }
      case "option":
        return deserializer.deserializeOptionTag() ? this.#deserialize(format.format, deserializer) : null
      case "seq": {
        const offset = deserializer.getBufferOffset()
        const length = deserializer.deserializeLen()
        if (this.#isZeroSize(format.format)) {
          this.#checkZeroSizeLength(length, offset)
        }
        const items: ValueArray = []
        for (let i = 0; i < length; i++) {
          items.push(this.#deserialize(format.format, deserializer))
        }
        return items
      }
      case "map":
        return this.#deserializeMap(format.key, format.value, deserializer)
      case "tuple":
        return this.#deserializeTuple(format.formats, deserializer)
      case "fixedArray": {
        const items: ValueArray = []
        for (let i = 0; i < format.size; i++) {
          items.push(this.#deserialize(format.content, deserializer))
        }
        return items
      }
      default:
        return deserializeScalar(format.kind, deserializer)
    }
  }

  #checkZeroSizeLength(length: number, offset: number): void {
    if (length > this.#maxZeroSizeLength) {
      throw new DeserializationError(`Sequence of ${length} zero-size elements exceeds the limit of ${this.#maxZeroSizeLength}`, offset)
    }
  }

  /**
   * Whether every value of `format` encodes to zero bytes
   */
  #isZeroSize(format: Format, visiting: Set<string> = new Set()): boolean {
    switch (format.kind) {
      case "unit":
        return true
      case "tuple":
        return format.formats.every((item) => this.#isZeroSize(item, visiting))
      case "fixedArray":
        return format.size === 0 || this.#isZeroSize(format.content, visiting)
      case "typeName": {
        const cached = this.#zeroSize.get(format.name)
        if (cached !== undefined) return cached
        // A type embedding itself by value has no finite encoding
        if (visiting.has(format.name)) return false
        const container = this.#registry.get(format.name)
        if (!container) return false

        visiting.add(format.name)
        const result = this.#isZeroSizeContainer(container, visiting)
        visiting.delete(format.name)
        this.#zeroSize.set(format.name, result)
        return result
      }
      default:
        return false
    }
  }

  #isZeroSizeContainer(container: ContainerFormat, visiting: Set<string>): boolean {
    switch (container.kind) {
      case "unitStruct":
        return true
      case "newTypeStruct":
        return this.#isZeroSize(container.format, visiting)
      case "tupleStruct":
        return container.formats.every((item) => this.#isZeroSize(item, visiting))
      case "struct":
        return container.fields.every((field) => this.#isZeroSize(field.value, visiting))
      case "enum":
        return false
    }
  }

  #deserializeTuple(formats: readonly Format[], deserializer: Deserializer): ValueArray {
    return formats.map((format) => this.#deserialize(format, deserializer))
  }

  #deserializeFields(fields: readonly Named<Format>[], deserializer: Deserializer): ValueRecord {
    // fromEntries defines own properties, so a field named `__proto__` is kept as data
    return Object.fromEntries(fields.map((field): [string, Value] => [field.name, this.#deserialize(field.value, deserializer)]))
  }

  #deserializeMap(keyFormat: Format, valueFormat: Format, deserializer: Deserializer): ValueMap {
    const offset = deserializer.getBufferOffset()
    const length = deserializer.deserializeLen()
    if (this.#isZeroSize(keyFormat) && this.#isZeroSize(valueFormat)) {
      this.#checkZeroSizeLength(length, offset)
    }
    const result: ValueMap = new Map()
    let previous: [number, number] | undefined

    for (let i = 0; i < length; i++) {
      const start = deserializer.getBufferOffset()
      const key = this.#deserialize(keyFormat, deserializer)
      const slice: [number, number] = [start, deserializer.getBufferOffset()]
      if (previous) {
        deserializer.checkThatKeySlicesAreIncreasing(previous, slice)
      }
      previous = slice
      result.set(key, this.#deserialize(valueFormat, deserializer))
    }

    return result
  }

  #deserializeContainer(container: ContainerFormat, deserializer: Deserializer): Value {
    switch (container.kind) {
      case "unitStruct":
        return deserializer.deserializeUnit()
      case "newTypeStruct":
        return this.#deserialize(container.format, deserializer)
      case "tupleStruct":
        return this.#deserializeTuple(container.formats, deserializer)
      case "struct":
        return this.#deserializeFields(container.fields, deserializer)
      case "enum": {
        const offset = deserializer.getBufferOffset()
        const index = deserializer.deserializeVariantIndex()
        const variant = enumVariants(container.variants).at(index)
        if (!variant) {
          throw new DeserializationError(`Unknown variant index ${index}`, offset)
        }
        return { [variant.name]: this.#deserializeVariant(variant.value, deserializer) }
      }
    }
  }

  #deserializeVariant(variant: VariantFormat, deserializer: Deserializer): Value {
    switch (variant.kind) {
      case "variable":
        throw new DeserializationError("Cannot deserialize an unresolved variant", deserializer.getBufferOffset())
      case "unit":
        return deserializer.deserializeUnit()
      case "newType":
        return this.#deserialize(variant.format, deserializer)
      case "tuple":
        return this.#deserializeTuple(variant.formats, deserializer)
      case "struct":
        return this.#deserializeFields(variant.fields, deserializer)
    }
  }
}

function expectArray(value: Value, path: string, length?: number): ValueArray {
  if (!isValueArray(value)) {
    throw new SerializationError(`Expected an array, got ${kindOf(value)}`, path)
  }
  if (length !== undefined && value.length !== length) {
    throw new SerializationError(`Expected ${length} elements, got ${value.length}`, path)
  }
  return value
}

function expectNumber(value: Value, path: string): number {
  if (typeof value !== "number") {
    throw new SerializationError(`Expected a number, got ${kindOf(value)}`, path)
  }
  return value
}

function expectBigInt(value: Value, path: string): bigint {
  if (typeof value !== "bigint") {
    throw new SerializationError(`Expected a bigint, got ${kindOf(value)}`, path)
  }
  return value
}

function expectString(value: Value, path: string): string {
  if (typeof value !== "string") {
    throw new SerializationError(`Expected a string, got ${kindOf(value)}`, path)
  }
  return value
}

/**
 * Scalar writes report errors raised by the runtime with the path of the value
 */
function serializeScalar(kind: ScalarKind, value: Value, serializer: Serializer, path: string): void {
  try {
    writeScalar(kind, value, serializer, path)
  } catch (err) {
    if (err instanceof SerializationError && !err.path && path) {
      throw new SerializationError(err.message, path)
    }
    throw err
  }
}

function writeScalar(kind: ScalarKind, value: Value, serializer: Serializer, path: string): void {
  switch (kind) {
    case "unit":
      if (value !== null) {
        throw new SerializationError(`Expected null, got ${kindOf(value)}`, path)
      }
      serializer.serializeUnit(value)
      return
    case "bool":
      if (typeof value !== "boolean") {
        throw new SerializationError(`Expected a boolean, got ${kindOf(value)}`, path)
      }
      serializer.serializeBool(value)
      return
    case "i8":
      return serializer.serializeI8(expectNumber(value, path))
    case "i16":
      return serializer.serializeI16(expectNumber(value, path))
    case "i32":
      return serializer.serializeI32(expectNumber(value, path))
    case "i64":
      return serializer.serializeI64(expectBigInt(value, path))
    case "i128":
      return serializer.serializeI128(expectBigInt(value, path))
    case "u8":
      return serializer.serializeU8(expectNumber(value, path))
    case "u16":
      return serializer.serializeU16(expectNumber(value, path))
    case "u32":
      return serializer.serializeU32(expectNumber(value, path))
    case "u64":
      return serializer.serializeU64(expectBigInt(value, path))
    case "u128":
      return serializer.serializeU128(expectBigInt(value, path))
    case "f32":
      return serializer.serializeF32(expectNumber(value, path))
    case "f64":
      return serializer.serializeF64(expectNumber(value, path))
    case "char":
      return serializer.serializeChar(expectString(value, path))
    case "str":
      return serializer.serializeStr(expectString(value, path))
    case "bytes":
      if (!(value instanceof Uint8Array)) {
        throw new SerializationError(`Expected a Uint8Array, got ${kindOf(value)}`, path)
      }
      return serializer.serializeBytes(value)
  }
}

function deserializeScalar(kind: ScalarKind, deserializer: Deserializer): Value {
  switch (kind) {
    case "unit":
      return deserializer.deserializeUnit()
    case "bool":
      return deserializer.deserializeBool()
    case "i8":
      return deserializer.deserializeI8()
    case "i16":
      return deserializer.deserializeI16()
    case "i32":
      return deserializer.deserializeI32()
    case "i64":
      return deserializer.deserializeI64()
    case "i128":
      return deserializer.deserializeI128()
    case "u8":
      return deserializer.deserializeU8()
    case "u16":
      return deserializer.deserializeU16()
    case "u32":
      return deserializer.deserializeU32()
    case "u64":
      return deserializer.deserializeU64()
    case "u128":
      return deserializer.deserializeU128()
    case "f32":
      return deserializer.deserializeF32()
    case "f64":
      return deserializer.deserializeF64()
    case "char":
      return deserializer.deserializeChar()
    case "str":
      return deserializer.deserializeStr()
    case "bytes":
      return deserializer.deserializeBytes()
  }
}

/**
 * Encode a value of a named registry type
 * @example
 * encodeValue(registry, "Point", { x: 1, y: 2 }, "bcs")
 */
export function encodeValue(registry: Registry, typeName: string, value: Value, encoding: Encoding): Uint8Array {
  const serializer = createSerializer(encoding)
  new ValueCodec(registry).serialize(Formats.typeName(typeName), value, serializer)
  return serializer.getBytes()
}

/**
 * Decode a value of a named registry type
 * @throws DeserializationError when the bytes are invalid or not entirely consumed
 */
export function decodeValue(registry: Registry, typeName: string, bytes: Uint8Array, encoding: Encoding, options: ValueCodecOptions = {}): Value {
  const deserializer = createDeserializer(encoding, bytes)
  const value = new ValueCodec(registry, options).deserialize(Formats.typeName(typeName), deserializer)
  if (deserializer.remaining > 0) {
    throw new DeserializationError("Some input bytes were not read", deserializer.getBufferOffset())
  }
  return value
}
