import { join } from "path";
import { writeFile, readFile, mkdir, stat } from "fs/promises";

export default class FileCache {
  /** @param maxAge milliseconds after which an entry reads as missing */
  constructor(public readonly path: string, public readonly maxAge = Infinity) {}

  async get(key: string): Promise<unknown | undefined> {
    try {
      const file = this.getKey(key);
      const { mtimeMs } = await stat(file);
      if (Date.now() - mtimeMs > this.maxAge) return undefined;
      return JSON.parse(await readFile(file, "utf-8"));
    } catch {
      // missing or unreadable entries are a cache miss
      return undefined;
    }
  }

  async set(key: string, value: unknown) {
    await mkdir(this.path, { recursive: true });
    return writeFile(this.getKey(key), JSON.stringify(value));
  }

  getKey(key: string): string {
    return join(this.path, `${key}.json`);
  }
}
