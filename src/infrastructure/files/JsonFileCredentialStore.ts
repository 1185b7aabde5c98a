import { readFile, writeFile } from "fs/promises";
import type { CredentialStore } from "../../ports/CredentialStore";
import type { SessionCredential } from "../../core/work/work.types";

const isStringRecord = (value: unknown): value is SessionCredential =>
  typeof value === "object" &&
  value !== null &&
  !Array.isArray(value) &&
  Object.values(value).every((entry) => typeof entry === "string");

const isMissingFile = (err: unknown): boolean =>
  typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";

const parseJson = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch (err) {
    if (err instanceof SyntaxError) return undefined;
    throw err;
  }
};

export class JsonFileCredentialStore implements CredentialStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<SessionCredential | undefined> {
    let text: string;
    try {
      text = await readFile(this.filePath, "utf8");
    } catch (err) {
      if (isMissingFile(err)) {
        console.warn(JSON.stringify({ event: "credential.missing", file: this.filePath }));
      } else {
        const reason = err instanceof Error ? err.message : String(err);
        console.warn(JSON.stringify({ event: "credential.unreadable", file: this.filePath, reason }));
      }
      return undefined;
    }

    const parsed = parseJson(text);
    if (isStringRecord(parsed)) {
      console.log(JSON.stringify({ event: "credential.loaded", file: this.filePath, cookies: Object.keys(parsed).length }));
      return parsed;
    }
    console.warn(JSON.stringify({ event: "credential.corrupt", file: this.filePath }));
    return undefined;
  }

  async save(credential: SessionCredential): Promise<void> {
    await writeFile(this.filePath, `${JSON.stringify(credential, null, 2)}\n`, "utf8");
    console.log(JSON.stringify({ event: "credential.saved", file: this.filePath }));
  }
}
