export type OptionScalar = string | number | boolean | null

/**
 * A value held by an options container: a scalar, an ordered sequence, a
 * nested mapping, or a nested container.
 */
export type OptionValue = OptionScalar | OptionValue[] | OptionMap | OptionContainer

export type OptionMap = { [key: string]: OptionValue }

/**
 * Brand carried by option containers, so nested containers are recognised
 * without importing the class.
 */
export const optionContainer = Symbol("confbag.option-container")

/**
 * A container nested as a value. Deep merge treats it as a mapping and
 * writes into it through `set`.
 */
export interface OptionContainer {
  readonly [optionContainer]: true
  entries(): [string, OptionValue][]
  set(key: string, value: OptionValue): unknown
  deepClone(): OptionContainer
  toJSON(): OptionMap
}
