import type { OptionMap } from "./option-value"

/**
 * Converts option mappings to and from their persisted text form.
 */
export interface OptionSerializer {
  /**
   * Render `values` as text that `parse` turns back into an equal mapping.
   * Nested values are written out in full, never by reference.
   *
   * @throws SerializationError when the mapping cannot be represented.
   */
  serialize(values: OptionMap): string

  /**
   * Parse `text` into a mapping.
   *
   * @param source - Human-readable origin used in error messages,
   *   e.g. "options file /etc/app/options.json".
   * @throws DeserializationError when `text` is not a mapping.
   */
  parse(text: string, source: string): OptionMap
}
