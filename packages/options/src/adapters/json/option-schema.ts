import { z } from "zod"
import type { OptionMap, OptionValue } from "../../ports/option-value"

export const optionValueSchema: z.ZodType<OptionValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(optionValueSchema),
    optionMapSchema,
  ]),
)

export const optionMapSchema: z.ZodType<OptionMap> = z.record(z.string(), optionValueSchema)
