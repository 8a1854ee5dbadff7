import type { OptionMap } from "./option-value"

/**
 * Memo of parsed option files keyed by absolute path.
 *
 * Entries are authoritative once stored: nothing refreshes them when the file
 * on disk changes, and nothing evicts them. Stored values must not be
 * mutated; loaders merge copies.
 */
export interface OptionFileCache {
  get(filePath: string): OptionMap | undefined

  has(filePath: string): boolean

  set(filePath: string, value: OptionMap): void

  /**
   * Returns true if the path was cached.
   */
  delete(filePath: string): boolean

  /**
   * Drops every entry. The only way to force a re-read.
   */
  clear(): void

  size(): number

  keys(): string[]
}
