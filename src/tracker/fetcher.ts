import { ExternalFetchError, errorMessage } from "../errors.js";

export interface PageFetcher {
  /** Resolves with the page body or rejects with an ExternalFetchError. */
  fetchPage(url: string): Promise<string>;
}

export interface HttpFetcherOptions {
  timeoutMs: number;
  userAgent: string;
}

export class HttpPageFetcher implements PageFetcher {
  constructor(
    private readonly options: HttpFetcherOptions,
    private readonly fetchFn: typeof fetch = fetch
  ) {}

  async fetchPage(url: string): Promise<string> {
    let response: Response;
    try {
      response = await this.fetchFn(url, {
        redirect: "follow",
        headers: { "User-Agent": this.options.userAgent },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      throw new ExternalFetchError(url, errorMessage(error), error);
    }

    if (!response.ok) {
      throw new ExternalFetchError(url, `HTTP ${response.status}`);
    }

    try {
      return await response.text();
    } catch (error) {
      throw new ExternalFetchError(url, errorMessage(error), error);
    }
  }
}
