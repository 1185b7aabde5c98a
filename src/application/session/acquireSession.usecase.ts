import type { AccountQueryClient } from "../../ports/AccountQueryClient";
import type { CredentialStore } from "../../ports/CredentialStore";
import type { LoginDriver } from "../../ports/LoginDriver";
import type { OtpChannel } from "../../ports/OtpChannel";
import type { SessionCredential } from "../../core/work/work.types";
import { sleep } from "../../shared/retry/retry";
import type { SessionConfig } from "./session.config";

export type SessionState = "NO_CREDENTIAL" | "VALIDATING" | "LOGGING_IN" | "VALID" | "FAILED";

export type SessionFailureReason = "otp_timeout" | "login_failed";

export type SessionOutcome =
  | { state: "VALID"; credential: SessionCredential; source: "stored" | "login" }
  | { state: "FAILED"; reason: SessionFailureReason };

export type SessionDeps = {
  store: CredentialStore;
  client: Pick<AccountQueryClient, "probe">;
  driver: LoginDriver;
  otp: OtpChannel;
  config: SessionConfig;
  now?: () => number;
  sleepFn?: (ms: number) => Promise<void>;
};

const reasonOf = (err: unknown): string => (err instanceof Error ? err.message : String(err));

/**
 * Polls the OTP channel until a code arrives or `timeoutMs` has elapsed
 * since `after`. The last poll happens past the deadline, never before it.
 */
export const waitForOtp = async (
  otp: OtpChannel,
  after: Date,
  opts: { timeoutMs: number; pollIntervalMs: number; now: () => number; sleepFn: (ms: number) => Promise<void> }
): Promise<string | undefined> => {
  while (true) {
    const code = await otp.pollForCode(after);
    if (code) return code;
    if (opts.now() - after.getTime() > opts.timeoutMs) return undefined;
    await opts.sleepFn(opts.pollIntervalMs);
  }
};

const loginWithOtp = async (deps: SessionDeps, now: () => number): Promise<SessionOutcome> => {
  const { driver, otp, store, config } = deps;
  try {
    const challenge = await driver.start(config.username, config.password);
    const requestedAt = new Date(now());
    await otp.notify(config.otpRequestMessage);

    console.log(JSON.stringify({ event: "session.otp_waiting", timeoutMs: config.otpTimeoutMs }));
    const code = await waitForOtp(otp, requestedAt, {
      timeoutMs: config.otpTimeoutMs,
      pollIntervalMs: config.otpPollIntervalMs,
      now,
      sleepFn: deps.sleepFn ?? sleep
    });
    if (!code) {
      console.error(JSON.stringify({ event: "session.otp_timeout", timeoutMs: config.otpTimeoutMs }));
      return { state: "FAILED", reason: "otp_timeout" };
    }

    const credential = await challenge.submitOtp(code);
    if (Object.keys(credential).length === 0) {
      console.error(JSON.stringify({ event: "session.login_failed", reason: "no cookies after OTP submission" }));
      return { state: "FAILED", reason: "login_failed" };
    }

    try {
      await store.save(credential);
    } catch (err) {
      console.warn(JSON.stringify({ event: "credential.save_failed", reason: reasonOf(err) }));
    }
    return { state: "VALID", credential, source: "login" };
  } catch (err) {
    console.error(JSON.stringify({ event: "session.login_failed", reason: reasonOf(err) }));
    return { state: "FAILED", reason: "login_failed" };
  } finally {
    await driver.close().catch((err: unknown) => {
      console.warn(JSON.stringify({ event: "login.close_failed", reason: reasonOf(err) }));
    });
  }
};

/**
 * NO_CREDENTIAL -> VALIDATING -> VALID, or
 * NO_CREDENTIAL/VALIDATING -> LOGGING_IN -> VALID | FAILED.
 * The credential is not re-validated once VALID.
 */
export const acquireSession = async (deps: SessionDeps): Promise<SessionOutcome> => {
  const now = deps.now ?? Date.now;
  let state: SessionState = "NO_CREDENTIAL";
  const transition = (to: SessionState) => {
    console.log(JSON.stringify({ event: "session.transition", from: state, to }));
    state = to;
  };

  const stored = await deps.store.load();
  if (stored) {
    transition("VALIDATING");
    if (await deps.client.probe(stored)) {
      transition("VALID");
      return { state: "VALID", credential: stored, source: "stored" };
    }
  }

  transition("LOGGING_IN");
  const outcome = await loginWithOtp(deps, now);
  transition(outcome.state);
  return outcome;
};
