const fn = Symbol("staged")

/**
 * A function built once for a given configuration (a header kind, an element
 * codec) and reused for every call, instead of re-dispatching per value.
 */
export type Staged<F> = { readonly [fn]: F }

export function stage<F>(f: F): Staged<F> {
  return { [fn]: f }
}

export function unstage<F>(staged: Staged<F>): F {
  return staged[fn]
}
