/**
 * Storage Backend - JSON documents on disk
 */

import fs from "node:fs/promises";
import path from "node:path";

export interface StorageBackend {
  writeJson(filePath: string, value: unknown): Promise<void>;
  readJson(filePath: string): Promise<unknown>;
}

export class FileStorageBackend implements StorageBackend {
  /**
   * Write atomically: temp file, then rename over the target
   */
  async writeJson(filePath: string, value: unknown): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const tempPath = `${filePath}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify(value, null, 2), "utf-8");
    await fs.rename(tempPath, filePath);
  }

  /**
   * Returns undefined when the file does not exist. Unreadable or
   * unparseable files throw.
   */
  async readJson(filePath: string): Promise<unknown> {
    let content: string;
    try {
      content = await fs.readFile(filePath, "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") {
        return undefined;
      }
      throw err;
    }
    return JSON.parse(content);
  }
}
