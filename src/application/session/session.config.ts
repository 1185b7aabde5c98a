export type SessionConfig = {
  username: string;
  password: string;
  otpTimeoutMs: number;
  otpPollIntervalMs: number;
  otpRequestMessage: string;
};

export const defaultSessionTimings = {
  otpTimeoutMs: 10 * 60 * 1000,
  otpPollIntervalMs: 5000
} as const;

export const sessionCaps = {
  otpTimeoutMs: { min: 1000, max: 60 * 60 * 1000 },
  otpPollIntervalMs: { min: 100, max: 60000 }
} as const;

export const defaultOtpRequestMessage = "I need OTP";
