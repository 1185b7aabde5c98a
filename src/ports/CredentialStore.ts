import type { SessionCredential } from "../core/work/work.types";

export interface CredentialStore {
  load(): Promise<SessionCredential | undefined>;
  save(credential: SessionCredential): Promise<void>;
}
