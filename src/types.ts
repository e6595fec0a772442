/**
 * Wire formats supported by the runtime
 */
export type Encoding = "bcs" | "bincode"

export const ENCODINGS: readonly Encoding[] = ["bcs", "bincode"] as const

/**
 * Failure categories for a malformed registry
 */
export type SchemaErrorCode = "UNRESOLVED_FORMAT" | "SPARSE_VARIANT_INDEX" | "UNKNOWN_TYPE_NAME" | "DUPLICATE_DEFINITION" | "DUPLICATE_NAME" | "INVALID_DOCUMENT"

/**
 * Base class of every error raised by this package.
 */
export class FormatgenError extends Error {
  override name: string = "FormatgenError"

  /** The underlying error, if any */
  public override readonly cause: unknown

  /** Machine-readable error code */
  public readonly code: string

  constructor(options: { message: string; code: string; cause?: unknown }) {
    super(options.message)
    this.code = options.code
    this.cause = options.cause

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }
}

/**
 * Error thrown when a registry cannot be compiled.
 *
 * These are producer errors: an enum with gaps in its variant indices, a format left
 * unresolved by schema extraction, or a reference to a type nobody defines. The compiler
 * pass aborts on the first one, before anything is emitted.
 */
export class SchemaError extends FormatgenError {
  override name = "SchemaError" as const

  declare readonly code: SchemaErrorCode

  /** Name of the offending definition, when known */
  public readonly definition?: string

  constructor(options: { message: string; code: SchemaErrorCode; definition?: string; cause?: unknown }) {
    super({
      message: options.definition ? `Invalid definition "${options.definition}": ${options.message}` : options.message,
      code: options.code,
      cause: options.cause,
    })
    this.definition = options.definition
  }

  /**
   * Attach a definition name to an error raised while traversing that definition
   */
  static from(err: unknown, definition: string): SchemaError {
    if (err instanceof SchemaError) {
      if (err.definition) return err
      return new SchemaError({ message: err.reason, code: err.code, definition, cause: err })
    }

    if (err instanceof Error) {
      return new SchemaError({ message: err.message, code: "INVALID_DOCUMENT", definition, cause: err })
    }

    return new SchemaError({ message: String(err), code: "INVALID_DOCUMENT", definition, cause: err })
  }

  /** The message without the definition prefix */
  get reason(): string {
    const prefix = this.definition ? `Invalid definition "${this.definition}": ` : ""
    return this.message.slice(prefix.length)
  }
}

/**
 * Error thrown when querying a layout for a reference site it does not contain
 */
export class LayoutError extends FormatgenError {
  override name = "LayoutError" as const

  constructor(message: string) {
    super({ message, code: "UNKNOWN_REFERENCE_SITE" })
  }
}

/**
 * Error thrown when a code generator configuration fails validation
 */
export class ConfigError extends FormatgenError {
  override name = "ConfigError" as const

  constructor(options: { message: string; cause?: unknown }) {
    super({ message: `Invalid generator configuration: ${options.message}`, code: "INVALID_CONFIG", cause: options.cause })
  }
}

/**
 * Error thrown when a value cannot be serialized
 */
export class SerializationError extends FormatgenError {
  override name = "SerializationError" as const

  /** Position of the offending value inside the serialized value, e.g. `.items[2]` */
  public readonly path: string

  constructor(message: string, path: string = "") {
    super({ message: path ? `${message} (at ${path})` : message, code: "SERIALIZATION_FAILED" })
    this.path = path
  }
}

/**
 * Error thrown when input bytes cannot be deserialized
 */
export class DeserializationError extends FormatgenError {
  override name = "DeserializationError" as const

  /** Offset in the input where decoding failed */
  public readonly offset?: number

  constructor(message: string, offset?: number) {
    super({ message: offset === undefined ? message : `${message} (at byte ${offset})`, code: "DESERIALIZATION_FAILED" })
    this.offset = offset
  }
}
