import type { OptionValue } from "../../ports/option-value"
import { assignEntry, type DescribedValue, describeValue } from "../value/describe-value"

export type OptionStore = Map<string, OptionValue>
export type OptionEntries = Iterable<readonly [string, OptionValue]>

/**
 * Last writer wins per key. Nested values are stored by reference.
 */
export function mergeEntries(store: OptionStore, entries: OptionEntries): void {
  for (const [key, value] of entries) {
    store.set(key, value)
  }
}

/**
 * Layered merge used for option files.
 *
 * - new key: inserted as is
 * - sequence onto sequence: items appended in place, existing order first
 * - mapping or container onto mapping or container: entries assigned onto
 *   the existing one in place, one level only
 * - anything else: overwritten
 *
 * Merging a structure into itself is not supported.
 */
export function deepMergeEntries(store: OptionStore, entries: OptionEntries): void {
  for (const [key, incoming] of entries) {
    const existing = store.get(key)

    store.set(key, existing === undefined ? incoming : combine(existing, incoming))
  }
}

function combine(existing: OptionValue, incoming: OptionValue): OptionValue {
  const next = describeValue(incoming)
  const current = describeValue(existing)

  switch (next.kind) {
    case "sequence":
      if (current.kind !== "sequence") return incoming

      // copied first: incoming may be the existing array itself
      for (const item of next.items.slice()) {
        current.items.push(item)
      }
      return current.items

    case "mapping":
    case "container":
      return assignAll(current, mappingEntries(next)) ?? incoming

    case "scalar":
      return incoming
  }
}

function mappingEntries(value: DescribedValue): [string, OptionValue][] {
  switch (value.kind) {
    case "mapping":
      return Object.entries(value.entries)
    case "container":
      return value.container.entries()
    default:
      return []
  }
}

function assignAll(
  target: DescribedValue,
  entries: [string, OptionValue][],
): OptionValue | undefined {
  switch (target.kind) {
    case "mapping":
      for (const [key, value] of entries) assignEntry(target.entries, key, value)
      return target.entries

    case "container":
      for (const [key, value] of entries) target.container.set(key, value)
      return target.container

    default:
      return undefined
  }
}
