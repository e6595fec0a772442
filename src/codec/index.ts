export {
  ValueCodec,
  DEFAULT_MAX_ZERO_SIZE_LENGTH,
  encodeValue,
  decodeValue,
  isValueArray,
  isValueMap,
  isValueRecord,
  type Value,
  type ValueCodecOptions,
  type ValueArray,
  type ValueMap,
  type ValueRecord,
} from "./value"
