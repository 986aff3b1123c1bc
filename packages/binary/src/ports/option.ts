export type Some<T> = {
  readonly kind: "some"
  readonly value: T
}

export type None = {
  readonly kind: "none"
}

/**
 * An optional value. Unlike `T | undefined` it nests, so
 * `Option<Option<T>>` keeps both levels on the wire.
 */
export type Option<T> = Some<T> | None
