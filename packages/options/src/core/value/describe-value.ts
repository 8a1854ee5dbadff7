import {
  type OptionContainer,
  type OptionMap,
  type OptionScalar,
  type OptionValue,
  optionContainer,
} from "../../ports/option-value"

export type DescribedValue =
  | { kind: "sequence"; items: OptionValue[] }
  | { kind: "mapping"; entries: OptionMap }
  | { kind: "container"; container: OptionContainer }
  | { kind: "scalar"; value: OptionScalar }

/**
 * True for object literals and null-prototype objects. Arrays, containers,
 * class instances and other exotic objects are not mappings.
 */
export function isOptionMap(value: unknown): value is OptionMap {
  if (typeof value !== "object" || value === null) return false
  if (Array.isArray(value)) return false

  const proto = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

export function isOptionContainer(value: unknown): value is OptionContainer {
  return typeof value === "object" && value !== null && optionContainer in value
}

export function describeValue(value: OptionValue): DescribedValue {
  if (Array.isArray(value)) return { kind: "sequence", items: value }
  if (isOptionContainer(value)) return { kind: "container", container: value }
  if (isOptionMap(value)) return { kind: "mapping", entries: value }

  return { kind: "scalar", value }
}

// Plain assignment of "__proto__" would replace the prototype instead.
export function assignEntry(target: OptionMap, key: string, value: OptionValue): void {
  Object.defineProperty(target, key, {
    value,
    writable: true,
    enumerable: true,
    configurable: true,
  })
}

/**
 * Structural copy sharing nothing mutable with `value`. Nested containers
 * are deep-cloned.
 */
export function copyValue(value: OptionValue): OptionValue {
  const described = describeValue(value)

  switch (described.kind) {
    case "sequence":
      return described.items.map(copyValue)
    case "mapping":
      return copyMap(described.entries)
    case "container":
      return described.container.deepClone()
    case "scalar":
      return described.value
  }
}

export function copyMap(map: OptionMap): OptionMap {
  const copy: OptionMap = {}

  for (const [key, value] of Object.entries(map)) {
    assignEntry(copy, key, copyValue(value))
  }

  return copy
}

/**
 * Freezes `value` and every sequence and mapping reachable from it.
 * Containers are left mutable.
 */
export function deepFreeze<T extends OptionValue>(value: T): T {
  const described = describeValue(value)

  switch (described.kind) {
    case "sequence":
      for (const item of described.items) deepFreeze(item)
      break
    case "mapping":
      for (const item of Object.values(described.entries)) deepFreeze(item)
      break
    case "container":
    case "scalar":
      return value
  }

  Object.freeze(value)
  return value
}
