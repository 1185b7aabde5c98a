export interface OtpChannel {
  notify(message: string): Promise<void>;
  /** Newest numeric code posted strictly after `after`, if any. */
  pollForCode(after: Date): Promise<string | undefined>;
}
