import { chromium, type Browser, type BrowserContext, type Page } from "playwright-core";
import type { LoginChallenge, LoginDriver } from "../../ports/LoginDriver";
import type { SessionCredential } from "../../core/work/work.types";

export const loginPagePath = "Linetest/Test/TestL2GponPortList";

export type PlaywrightLoginDriverOptions = {
  baseUrl: string;
  headless: boolean;
  executablePath?: string;
  loginButtonText?: string;
  navigationTimeoutMs?: number;
};

export const defaultLoginButtonText = "ĐĂNG NHẬP";

export const cookiesToCredential = (cookies: ReadonlyArray<{ name: string; value: string }>): SessionCredential => {
  const credential: SessionCredential = {};
  for (const cookie of cookies) {
    credential[cookie.name] = cookie.value;
  }
  return credential;
};

/**
 * Drives the login form in headless Chromium. The browser binary is not
 * bundled; point `executablePath` at an installed Chromium or Chrome.
 */
export class PlaywrightLoginDriver implements LoginDriver {
  private browser?: Browser;

  constructor(private readonly options: PlaywrightLoginDriverOptions) {}

  private loginUrl(): string {
    const url = new URL(this.options.baseUrl);
    url.pathname = url.pathname.endsWith("/") ? `${url.pathname}${loginPagePath}` : `${url.pathname}/${loginPagePath}`;
    return url.toString();
  }

  private loginButton(page: Page) {
    return page.locator(`xpath=//button[text()='${this.options.loginButtonText ?? defaultLoginButtonText}']`);
  }

  async start(username: string, password: string): Promise<LoginChallenge> {
    this.browser = await chromium.launch({
      headless: this.options.headless,
      ...(this.options.executablePath ? { executablePath: this.options.executablePath } : {})
    });
    const context: BrowserContext = await this.browser.newContext();
    const page = await context.newPage();
    page.setDefaultTimeout(this.options.navigationTimeoutMs ?? 30000);

    await page.goto(this.loginUrl());
    await page.fill("#username", username);
    await page.fill("#password", password);
    await this.loginButton(page).click();
    console.log(JSON.stringify({ event: "login.credentials_submitted" }));

    return {
      submitOtp: async (code: string) => {
        await page.fill("#passOTP", code);
        await this.loginButton(page).click();
        await page.waitForLoadState("networkidle");
        const credential = cookiesToCredential(await context.cookies());
        console.log(JSON.stringify({ event: "login.otp_submitted", cookies: Object.keys(credential).length }));
        return credential;
      }
    };
  }

  async close(): Promise<void> {
    await this.browser?.close();
    this.browser = undefined;
  }
}
