export { createKey, keyName, sameKey } from "./core/key"
export { RegistryError } from "./core/registry-error"
export { TypedMap } from "./core/typed-map"
export { castWith, UniqueWitness } from "./core/witness"
export type { Binding, BindingVisitor, Key } from "./ports/key"
export { type Found, found, type LookupResult, type NotFound, notFound } from "./ports/lookup-result"
export type { Erased, Witness } from "./ports/witness"
