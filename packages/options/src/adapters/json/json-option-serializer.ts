import { z } from "zod"
import { DeserializationError, SerializationError } from "../../errors/options-errors"
import type { OptionSerializer } from "../../ports/option-serializer"
import type { OptionMap } from "../../ports/option-value"
import { isOptionMap } from "../../core/value/describe-value"
import { optionMapSchema } from "./option-schema"

export type JsonOptionSerializerOptions = {
  /**
   * Spaces per indentation level. `0` writes a single line.
   *
   * @default 2
   */
  indent?: number
}

/**
 * Reads and writes option files as a JSON object.
 *
 * Output ends with a newline. Shared references are written out once per
 * occurrence. Cyclic structures, non-finite numbers and -0 are rejected.
 */
export class JsonOptionSerializer implements OptionSerializer {
  private readonly indent: number

  constructor(opts: JsonOptionSerializerOptions = {}) {
    this.indent = opts.indent ?? 2
  }

  serialize(values: OptionMap): string {
    try {
      return `${JSON.stringify(values, rejectUnrepresentable, this.indent)}\n`
    } catch (err) {
      throw new SerializationError(err)
    }
  }

  parse(text: string, source: string): OptionMap {
    let raw: unknown

    try {
      raw = JSON.parse(text)
    } catch (err) {
      throw new DeserializationError(source, err instanceof Error ? err.message : String(err), err)
    }

    const result = optionMapSchema.safeParse(raw)

    if (!result.success) {
      throw new DeserializationError(source, z.prettifyError(result.error), result.error)
    }

    // result.data is rebuilt by assignment and loses "__proto__" keys
    if (!isOptionMap(raw)) {
      throw new DeserializationError(source, "expected an object")
    }

    return raw
  }
}

function rejectUnrepresentable(key: string, value: unknown): unknown {
  if (typeof value !== "number") return value

  if (Object.is(value, -0)) {
    throw new RangeError(`-0 at key "${key}" has no JSON representation`)
  }
  if (!Number.isFinite(value)) {
    throw new RangeError(`${value} at key "${key}" has no JSON representation`)
  }

  return value
}
