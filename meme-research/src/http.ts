import axios, { type AxiosInstance } from "axios";
import { DEFAULT_USER_AGENT } from "./env";
import { sleep } from "./utils";

export type HtmlGetter = (url: string, params?: Record<string, string>) => Promise<string>;

export type HttpOptions = {
  userAgent?: string;
  timeoutMs?: number;
  maxAttempts?: number;
};

export function createHttp({ userAgent, timeoutMs }: HttpOptions = {}): AxiosInstance {
  return axios.create({
    headers: {
      "User-Agent": userAgent ?? DEFAULT_USER_AGENT,
      Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
      "Accept-Language": "en-US,en;q=0.9",
    },
    timeout: timeoutMs ?? 10_000,
  });
}

export function createHtmlGetter(options: HttpOptions = {}): HtmlGetter {
  const http = createHttp(options);
  const maxAttempts = options.maxAttempts ?? 2;

  const getHtml = async (url: string, params?: Record<string, string>, attempt = 1): Promise<string> => {
    try {
      const res = await http.get<string>(url, { params, responseType: "text" });
      return res.data;
    } catch (err: unknown) {
      const status = axios.isAxiosError(err) ? err.response?.status : undefined;
      if (attempt < maxAttempts && (!status || status >= 500)) {
        await sleep(500 * 2 ** (attempt - 1));
        return getHtml(url, params, attempt + 1);
      }
      throw err;
    }
  };

  return (url, params) => getHtml(url, params);
}
