import axios, { type AxiosInstance, type AxiosResponse } from "axios";
import { formatError } from "../ingest/utils";
import { CookieJar } from "./cookieJar";
import { VERIFICATION_TOKEN_FIELD, extractVerificationToken } from "./loginForm";

export type MarkovCredentials = {
  company: string;
  email: string;
  password: string;
};

export type MarkovClientOptions = {
  baseUrl: string;
  returnUrl: string;
  timeoutMs?: number;
};

export type MarkovSession = {
  cookies: CookieJar;
};

const LOGIN_OK_STATUSES = [200, 302];

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

export class MarkovSessionClient {
  private readonly http: AxiosInstance;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly options: MarkovClientOptions,
    http?: AxiosInstance
  ) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 60000;
    this.http = http ?? axios.create();
  }

  get loginUrl(): string {
    return `${this.baseUrl}/Identity/Account/Login`;
  }

  get logoutUrl(): string {
    return `${this.baseUrl}/Identity/Account/Logout`;
  }

  get dashboardDataUrl(): string {
    return `${this.baseUrl}/api/dashboard/data/DashboardItemGetAction`;
  }

  private remember(session: MarkovSession, response: AxiosResponse): void {
    session.cookies.store(response.headers["set-cookie"]);
  }

  private cookieHeaders(session: MarkovSession): Record<string, string> {
    return session.cookies.size > 0 ? { Cookie: session.cookies.toHeader() } : {};
  }

  async login(credentials: MarkovCredentials): Promise<MarkovSession> {
    const session: MarkovSession = { cookies: new CookieJar() };
    try {
      await this.submitLogin(session, credentials);
      return session;
    } catch (err) {
      await this.logoutQuietly(session);
      throw err;
    }
  }

  private async submitLogin(session: MarkovSession, credentials: MarkovCredentials): Promise<void> {
    const params = { ReturnUrl: this.options.returnUrl };

    const formResponse = await this.http.get<string>(this.loginUrl, {
      params,
      responseType: "text",
      timeout: this.timeoutMs,
      validateStatus: () => true,
    });
    if (!isSuccess(formResponse.status)) {
      throw new Error(`Failed to load login form: status ${formResponse.status}`);
    }
    this.remember(session, formResponse);
    const token = extractVerificationToken(String(formResponse.data ?? ""));

    const form = new URLSearchParams({
      "Input.Company": credentials.company,
      "Input.Email": credentials.email,
      "Input.Password": credentials.password,
      [VERIFICATION_TOKEN_FIELD]: token,
    });
    const loginResponse = await this.http.post<string>(this.loginUrl, form.toString(), {
      params,
      headers: {
        "Content-Type": "application/x-www-form-urlencoded",
        ...this.cookieHeaders(session),
      },
      responseType: "text",
      maxRedirects: 0,
      timeout: this.timeoutMs,
      validateStatus: () => true,
    });
    this.remember(session, loginResponse);
    if (!LOGIN_OK_STATUSES.includes(loginResponse.status)) {
      throw new Error(`Login failed with status code: ${loginResponse.status}`);
    }
  }

  async fetchPayload(session: MarkovSession, dashboardId: string, itemId: string): Promise<unknown> {
    const response = await this.http.get<unknown>(this.dashboardDataUrl, {
      params: { dashboardId, itemId },
      headers: this.cookieHeaders(session),
      responseType: "json",
      timeout: this.timeoutMs,
      validateStatus: () => true,
    });
    if (!isSuccess(response.status)) {
      throw new Error(`Dashboard data request failed with status code: ${response.status}`);
    }
    this.remember(session, response);
    return response.data;
  }

  async logout(session: MarkovSession): Promise<void> {
    await this.http.get(this.logoutUrl, {
      headers: this.cookieHeaders(session),
      responseType: "text",
      timeout: this.timeoutMs,
      validateStatus: () => true,
    });
  }

  async logoutQuietly(session: MarkovSession): Promise<void> {
    try {
      await this.logout(session);
    } catch (err) {
      console.warn(`Logout failed (ignored): ${formatError(err)}`);
    }
  }
}
