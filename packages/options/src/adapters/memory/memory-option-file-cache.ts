import type { OptionFileCache } from "../../ports/option-file-cache"
import type { OptionMap } from "../../ports/option-value"

export class MemoryOptionFileCache implements OptionFileCache {
  private readonly map = new Map<string, OptionMap>()

  get(filePath: string): OptionMap | undefined {
    return this.map.get(filePath)
  }

  has(filePath: string): boolean {
    return this.map.has(filePath)
  }

  set(filePath: string, value: OptionMap): void {
    this.map.set(filePath, value)
  }

  delete(filePath: string): boolean {
    return this.map.delete(filePath)
  }

  clear(): void {
    this.map.clear()
  }

  size(): number {
    return this.map.size
  }

  keys(): string[] {
    return [...this.map.keys()]
  }
}
