import { BaseError } from "@reprkit/errors"

export type CodecErrorCode =
  | "out_of_range"
  | "invalid_encoding"
  | "size_unavailable"
  | "invalid_value"

export class CodecError extends BaseError<CodecErrorCode> {
  static outOfRange(input: {
    offset: number
    length: number
    available: number
  }): CodecError {
    return new CodecError(
      `Cannot access ${input.length} byte(s) at offset ${input.offset}: buffer holds ${input.available}`,
      { code: "out_of_range", context: input },
    )
  }

  static invalidEncoding(
    message: string,
    context: Record<string, unknown>,
    cause?: unknown,
  ): CodecError {
    return new CodecError(message, {
      code: "invalid_encoding",
      context,
      ...(cause !== undefined && { cause }),
    })
  }

  static trailingBytes(input: { codec: string; end: number; length: number }): CodecError {
    return CodecError.invalidEncoding(
      `${input.codec} ended at offset ${input.end} but the buffer holds ${input.length} bytes`,
      input,
    )
  }

  static sizeUnavailable(codec: string): CodecError {
    return new CodecError(
      `${codec} cannot find the end of an encoded value without decoding it`,
      { code: "size_unavailable", context: { codec } },
    )
  }

  static invalidValue(codec: string, expected: string, value: unknown): CodecError {
    return new CodecError(`${codec} expected ${expected}`, {
      code: "invalid_value",
      context: { codec, value },
    })
  }
}
