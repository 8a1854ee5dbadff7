import type { OptionFileCache } from "../option-file-cache"

export type OptionFileCacheHarness = {
  name: string
  make: () => OptionFileCache
}

export function describeOptionFileCacheContract(h: OptionFileCacheHarness) {
  describe(`${h.name} (OptionFileCache contract)`, () => {
    let cache: OptionFileCache

    beforeEach(() => {
      cache = h.make()
    })

    it("starts empty", () => {
      expect(cache.size()).toBe(0)
      expect(cache.keys()).toEqual([])
      expect(cache.get("/a.json")).toBeUndefined()
      expect(cache.has("/a.json")).toBe(false)
    })

    it("returns the stored value by path", () => {
      const value = { a: 1 }

      cache.set("/a.json", value)

      expect(cache.get("/a.json")).toBe(value)
      expect(cache.has("/a.json")).toBe(true)
      expect(cache.size()).toBe(1)
    })

    it("keeps paths distinct", () => {
      cache.set("/a.json", { a: 1 })
      cache.set("/b.json", { b: 2 })

      expect(cache.get("/a.json")).toEqual({ a: 1 })
      expect(cache.get("/b.json")).toEqual({ b: 2 })
      expect([...cache.keys()].sort()).toEqual(["/a.json", "/b.json"])
    })

    it("delete() removes one entry and reports whether it existed", () => {
      cache.set("/a.json", { a: 1 })

      expect(cache.delete("/a.json")).toBe(true)
      expect(cache.delete("/a.json")).toBe(false)
      expect(cache.has("/a.json")).toBe(false)
    })

    it("clear() removes every entry", () => {
      cache.set("/a.json", { a: 1 })
      cache.set("/b.json", { b: 2 })

      cache.clear()

      expect(cache.size()).toBe(0)
    })
  })
}
