import type { Encoding } from "../types"
import { BcsDeserializer, BcsSerializer } from "./bcs"
import { BincodeDeserializer, BincodeSerializer } from "./bincode"
import type { BinaryDeserializer } from "./binary-deserializer"
import type { BinarySerializer } from "./binary-serializer"

export type { Serializer, Deserializer } from "./serializer"
export { BinarySerializer } from "./binary-serializer"
export { BinaryDeserializer } from "./binary-deserializer"
export { BcsSerializer, BcsDeserializer, BCS_MAX_SEQUENCE_LENGTH, BCS_MAX_CONTAINER_DEPTH } from "./bcs"
export { BincodeSerializer, BincodeDeserializer } from "./bincode"
export { compareBytes, toHex, fromHex } from "./bytes"

export function createSerializer(encoding: Encoding): BinarySerializer {
  switch (encoding) {
    case "bcs":
      return new BcsSerializer()
    case "bincode":
      return new BincodeSerializer()
  }
}

export function createDeserializer(encoding: Encoding, input: Uint8Array): BinaryDeserializer {
  switch (encoding) {
    case "bcs":
      return new BcsDeserializer(input)
    case "bincode":
      return new BincodeDeserializer(input)
  }
}
