import { BaseError } from "@reprkit/errors"

export class RegistryError extends BaseError<"invariant_violation"> {
  /**
   * Two keys share an id but not a witness. Keys only come from `createKey`,
   * so this means one was forged.
   */
  static witnessMismatch(input: { id: number; stored: string; requested: string }): RegistryError {
    return new RegistryError(
      `Key ${input.id} ("${input.requested}") does not match the stored key ("${input.stored}")`,
      { code: "invariant_violation", context: input, isOperational: false },
    )
  }
}
