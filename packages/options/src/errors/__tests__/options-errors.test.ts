import { isAppError } from "@confbag/errors"
import {
  DeserializationError,
  FileCloseError,
  FileReadError,
  IoError,
  isMissingFileError,
  OptionFileTargetError,
  SerializationError,
} from "../options-errors"

describe("options errors", () => {
  it("DeserializationError carries source and detail", () => {
    const err = new DeserializationError("options file /a.json", "Unexpected token")

    expect(err.message).toBe("Unable to process options file /a.json: Unexpected token")
    expect(err.code).toBe("deserialization_failed")
    expect(err.source).toBe("options file /a.json")
    expect(err.context).toEqual({ source: "options file /a.json", detail: "Unexpected token" })
    expect(isAppError(err)).toBe(true)
  })

  it("IoError subclasses carry path, errno and the system message", () => {
    const cause = Object.assign(new Error("EACCES: permission denied, open '/a.json'"), {
      code: "EACCES",
    })
    const err = new FileReadError("/a.json", cause)

    expect(err).toBeInstanceOf(IoError)
    expect(err.name).toBe("FileReadError")
    expect(err.code).toBe("file_read_failed")
    expect(err.path).toBe("/a.json")
    expect(err.context).toEqual({ path: "/a.json", errno: "EACCES" })
    expect(err.message).toBe(
      "Unable to read option file /a.json: EACCES: permission denied, open '/a.json'",
    )
    expect(err.cause).toBe(cause)
  })

  it("FileCloseError describes non-error causes", () => {
    const err = new FileCloseError("/a.json", "bad descriptor")

    expect(err.message).toBe("Unable to close option file /a.json: bad descriptor")
    expect(err.context).toEqual({ path: "/a.json", errno: undefined })
  })

  it("SerializationError wraps the cause", () => {
    const err = new SerializationError(new TypeError("Converting circular structure to JSON"))

    expect(err.code).toBe("serialization_failed")
    expect(err.message).toBe("Unable to serialize options: Converting circular structure to JSON")
  })

  it("OptionFileTargetError has a fixed message", () => {
    expect(new OptionFileTargetError().code).toBe("option_file_target_missing")
  })

  it("isMissingFileError matches ENOENT and ENOTDIR only", () => {
    const withCode = (code: string) => Object.assign(new Error(code), { code })

    expect(isMissingFileError(withCode("ENOENT"))).toBe(true)
    expect(isMissingFileError(withCode("ENOTDIR"))).toBe(true)
    expect(isMissingFileError(withCode("EACCES"))).toBe(false)
    expect(isMissingFileError(new Error("no code"))).toBe(false)
    expect(isMissingFileError("ENOENT")).toBe(false)
  })
})
