import type { SessionCredential } from "../core/work/work.types";

export type LoginChallenge = {
  submitOtp(code: string): Promise<SessionCredential>;
};

export interface LoginDriver {
  start(username: string, password: string): Promise<LoginChallenge>;
  close(): Promise<void>;
}
