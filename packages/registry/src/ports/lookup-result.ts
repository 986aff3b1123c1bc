export type Found<T> = {
  readonly kind: "found"
  readonly value: T
}

export type NotFound = {
  readonly kind: "not_found"
}

export type LookupResult<T> = Found<T> | NotFound

export const found = <T>(value: T): Found<T> => ({ kind: "found", value })

export const notFound = (): NotFound => ({ kind: "not_found" })
