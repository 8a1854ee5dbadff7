export { JsonOptionSerializer, type JsonOptionSerializerOptions } from "./adapters/json/json-option-serializer"
export { optionMapSchema, optionValueSchema } from "./adapters/json/option-schema"
export { MemoryOptionFileCache } from "./adapters/memory/memory-option-file-cache"
export { defaultOptionFileCache, defaultOptionSerializer } from "./core/defaults"
export { loadOptionFiles, type LoadOptionFilesDeps } from "./core/files/load-option-files"
export { writeOptionFile } from "./core/files/write-option-file"
export { type LoadOptionsParams, loadOptions } from "./core/load-options"
export { deepMergeEntries, mergeEntries } from "./core/merge/merge"
export { type MergeInput, Options } from "./core/options"
export {
  type DescribedValue,
  describeValue,
  isOptionContainer,
  isOptionMap,
} from "./core/value/describe-value"
export {
  DeserializationError,
  FileCloseError,
  FileOpenError,
  FileReadError,
  FileWriteError,
  IoError,
  type IoErrorCode,
  OptionFileTargetError,
  SerializationError,
} from "./errors/options-errors"
export type { OptionFileCache } from "./ports/option-file-cache"
export type { OptionSerializer } from "./ports/option-serializer"
export {
  type OptionContainer,
  type OptionMap,
  type OptionScalar,
  type OptionValue,
  optionContainer,
} from "./ports/option-value"
export type { OptionFiles, OptionsInit } from "./ports/options"
