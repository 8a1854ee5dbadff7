import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { createNullLogger } from "@confbag/logger"
import { MemoryOptionFileCache } from "../../adapters/memory/memory-option-file-cache"
import { loadOptions } from "../load-options"

describe("loadOptions e2e", () => {
  let cwd: string
  let home: string

  const base = () => ({ cache: new MemoryOptionFileCache(), logger: createNullLogger(), cwd })

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "options-e2e-"))
    home = path.join(cwd, "home")
    await fs.mkdir(home)
    await fs.writeFile(
      path.join(cwd, "system.json"),
      JSON.stringify({ plugins: ["syslog"], db: { host: "db.internal" }, level: "warn" }),
    )
    await fs.writeFile(
      path.join(home, ".app.json"),
      JSON.stringify({ plugins: ["notify"], db: { user: "me" }, level: "info" }),
    )
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  it("layers defaults, files and overrides", () => {
    const options = loadOptions({
      ...base(),
      defaults: { plugins: ["core"], db: { port: 5432 }, level: "error", color: true },
      files: ["system.json", "home/.app.json", "home/.missing.json"],
      overrides: { level: "debug", color: false },
    })

    expect(options.toObject()).toEqual({
      plugins: ["core", "syslog", "notify"],
      db: { port: 5432, host: "db.internal", user: "me" },
      level: "debug",
      color: false,
    })
  })

  it("falls back to optionfile from the defaults", () => {
    const options = loadOptions({
      ...base(),
      defaults: { optionfile: ["system.json", "home/.app.json"] },
    })

    expect(options.get("plugins")).toEqual(["syslog", "notify"])
  })

  it("works with nothing but defaults", () => {
    expect(loadOptions({ ...base(), defaults: { a: 1 } }).toObject()).toEqual({ a: 1 })
  })

  it("writes back to the most specific file", async () => {
    const options = loadOptions({
      ...base(),
      defaults: { optionfile: ["system.json", "home/.app.json"] },
      overrides: { level: "trace" },
    })

    options.writeFile()

    const written = JSON.parse(await fs.readFile(path.join(home, ".app.json"), "utf-8"))

    expect(written.level).toBe("trace")
    expect(written.plugins).toEqual(["syslog", "notify"])
    expect(JSON.parse(await fs.readFile(path.join(cwd, "system.json"), "utf-8")).level).toBe("warn")
  })
})
