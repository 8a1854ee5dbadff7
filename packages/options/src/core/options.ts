import type { OptionFileCache } from "../ports/option-file-cache"
import type { OptionSerializer } from "../ports/option-serializer"
import {
  type OptionContainer,
  type OptionMap,
  type OptionValue,
  optionContainer,
} from "../ports/option-value"
import type { OptionFiles, OptionsInit } from "../ports/options"
import { defaultOptionFileCache, defaultOptionSerializer, defaultOptionsLogger } from "./defaults"
import { loadOptionFiles } from "./files/load-option-files"
import { parseOptionFilesSetting } from "./files/option-files"
import { writeOptionFile } from "./files/write-option-file"
import { deepMergeEntries, mergeEntries } from "./merge/merge"
import { copyMap, isOptionMap } from "./value/describe-value"

export type MergeInput = OptionMap | Options

/**
 * A mutable bag of options with layered merge semantics.
 *
 * @example
 * ```ts
 * const options = new Options({ verbose: false, plugins: ["core"] })
 *
 * options.set("optionfile", ["/etc/app/options.json", `${home}/.app.json`])
 * options.loadFiles()                      // deep-merges both files, in order
 * options.merge({ verbose: true })         // explicit overrides last
 *
 * options.get("plugins")                   // ["core", ...plugins from the files]
 * options.writeFile()                      // writes to ~/.app.json
 * ```
 */
export class Options implements OptionContainer {
  readonly [optionContainer] = true as const

  private readonly store = new Map<string, OptionValue>()

  /**
   * @param initial - Seed values, shallow-merged. The mapping is copied, not
   *   adopted; nested values are shared.
   */
  constructor(
    initial?: MergeInput | null,
    private readonly init: OptionsInit = {},
  ) {
    this.merge(initial)
  }

  get size(): number {
    return this.store.size
  }

  get(key: string): OptionValue | undefined {
    return this.store.get(key)
  }

  set<V extends OptionValue>(key: string, value: V): V {
    this.store.set(key, value)
    return value
  }

  has(key: string): boolean {
    return this.store.has(key)
  }

  delete(key: string): boolean {
    return this.store.delete(key)
  }

  keys(): string[] {
    return [...this.store.keys()]
  }

  entries(): [string, OptionValue][] {
    return [...this.store.entries()]
  }

  /**
   * Snapshot of the top level as a plain object. Nested values are shared.
   */
  toObject(): OptionMap {
    return Object.fromEntries(this.store)
  }

  toJSON(): OptionMap {
    return this.toObject()
  }

  /**
   * Shallow merge: each incoming key replaces the current value.
   *
   * @returns the container, or `undefined` without touching anything when
   *   `input` is not a mapping.
   */
  merge(input: MergeInput | null | undefined): this | undefined {
    const entries = Options.entriesOf(input)
    if (entries === undefined) return undefined

    mergeEntries(this.store, entries)
    return this
  }

  /**
   * Layered merge: sequences append, mappings take the incoming entries one
   * level deep, everything else is replaced. Existing arrays, objects and
   * nested containers are updated in place.
   *
   * `options.deepMerge(options)` and cyclic inputs are not supported.
   *
   * @returns the container, or `undefined` when `input` is not a mapping.
   */
  deepMerge(input: MergeInput | null | undefined): this | undefined {
    const entries = Options.entriesOf(input)
    if (entries === undefined) return undefined

    deepMergeEntries(this.store, entries)
    return this
  }

  /**
   * New container with the same top-level keys and collaborators. Nested
   * arrays and objects are shared with this one, so mutating them through
   * either container shows in both.
   */
  clone(): Options {
    return new Options(this, this.init)
  }

  /**
   * New container sharing nothing mutable with this one. Nested containers
   * are deep-cloned as well.
   */
  deepClone(): Options {
    return new Options(copyMap(this.toObject()), this.init)
  }

  serialize(): string {
    return this.serializer.serialize(this.toObject())
  }

  /**
   * Parses `text` and shallow-merges the result.
   *
   * @param source - Names the text's origin in a `DeserializationError`.
   */
  deserialize(text: string, source = "text"): this {
    this.merge(this.serializer.parse(text, source))
    return this
  }

  /**
   * Deep-merges option files in order, through the file cache.
   *
   * @param files - Defaults to the `optionfile` option. An empty path counts
   *   as absent.
   * @returns how many files were read from disk.
   */
  loadFiles(files?: OptionFiles): number {
    return loadOptionFiles(this, files || this.optionFiles(), {
      cache: this.cache,
      serializer: this.serializer,
      logger: this.init.logger ?? defaultOptionsLogger(),
      cwd: this.cwd,
    })
  }

  /**
   * Writes the serialized options to `files`, or to the `optionfile` option;
   * a list writes to its last element.
   */
  writeFile(files?: OptionFiles): this {
    writeOptionFile(this, files || this.optionFiles(), { cwd: this.cwd })
    return this
  }

  private optionFiles(): OptionFiles | undefined {
    return parseOptionFilesSetting(this.get("optionfile"))
  }

  private get cache(): OptionFileCache {
    return this.init.cache ?? defaultOptionFileCache
  }

  private get serializer(): OptionSerializer {
    return this.init.serializer ?? defaultOptionSerializer
  }

  private get cwd(): string {
    return this.init.cwd ?? process.cwd()
  }

  private static entriesOf(input: unknown): [string, OptionValue][] | undefined {
    if (input instanceof Options) return input.entries()
    if (isOptionMap(input)) return Object.entries(input)

    return undefined
  }
}
