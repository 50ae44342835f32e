/**
 * Resolves to `true` only when both types are assignable to each other and declare the same keys.
 * Pins a schema's static type to the model interface it mirrors:
 * `const _check: AreTypesFullyCompatible<Model, Static<typeof ModelSchema>> = true;`
 */
export type AreTypesFullyCompatible<A, B> = [A, keyof A] extends [B, keyof B] ? ([B, keyof B] extends [A, keyof A] ? true : false) : false;
