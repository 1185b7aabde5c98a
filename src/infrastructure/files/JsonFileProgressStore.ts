import { readFile, rename, writeFile } from "fs/promises";
import type { ProgressStore } from "../../ports/ProgressStore";

const isMissingFile = (err: unknown): boolean =>
  typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";

/**
 * Checkpoint file. Writes go to a sibling temp file first and are renamed
 * over the target, so a crash mid-write leaves the previous checkpoint.
 */
export class JsonFileProgressStore implements ProgressStore {
  constructor(private readonly filePath: string) {}

  async read(): Promise<unknown> {
    let text: string;
    try {
      text = await readFile(this.filePath, "utf8");
    } catch (err) {
      if (isMissingFile(err)) return undefined;
      throw err;
    }
    const parsed: unknown = JSON.parse(text);
    return parsed;
  }

  async write(value: unknown): Promise<void> {
    const tmpPath = `${this.filePath}.tmp`;
    await writeFile(tmpPath, JSON.stringify(value), "utf8");
    await rename(tmpPath, this.filePath);
  }
}
