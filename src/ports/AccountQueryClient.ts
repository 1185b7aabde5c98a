import type { CallResult, SessionCredential, WorkItem } from "../core/work/work.types";

export interface AccountQueryClient {
  /** Resolves with a value for every outcome; exhaustion yields an absent result. */
  call(item: WorkItem, credential: SessionCredential): Promise<CallResult>;
  probe(credential: SessionCredential): Promise<boolean>;
}
