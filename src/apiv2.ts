import { URL } from "url";
import { ProxyAgent } from "proxy-agent";
import AbortController from "abort-controller";
import fetch, { HeadersInit, Response, RequestInit, Headers } from "node-fetch";

import { Credential } from "./credential";
import { AdminError, getError } from "./error";
import { logger } from "./logger";
import { responseToError } from "./responseToError";
import { SDK_VERSION } from "./version";

const CLIENT_HEADER_VALUE = `RemoteConfigAdmin/${SDK_VERSION}`;

export interface ClientGetOptions {
  headers?: HeadersInit;
  // Timeout, in ms. 0 or unset is no timeout.
  timeout?: number;
}

export type ClientResponse = {
  status: number;
  response: Response;
  body: string;
};

function proxyURIFromEnv(): string | undefined {
  return (
    process.env.HTTPS_PROXY ||
    process.env.https_proxy ||
    process.env.HTTP_PROXY ||
    process.env.http_proxy ||
    undefined
  );
}

export type ClientOptions = {
  urlPrefix: string;
  apiVersion?: string;
  /** Requests are sent unauthenticated when no credential is given. */
  credential?: Credential;
};

/**
 * A small authenticated GET client for Google REST APIs. Bodies come back as
 * raw text; any status outside 2xx rejects with an AdminError carrying the
 * response.
 */
export class Client {
  private readonly urlPrefix: string;

  constructor(private readonly opts: ClientOptions) {
    this.urlPrefix = opts.urlPrefix.endsWith("/")
      ? opts.urlPrefix.substring(0, opts.urlPrefix.length - 1)
      : opts.urlPrefix;
  }

  /**
   * @example
   * const res = await client.get("/projects/my-project/remoteConfig");
   * const etag = res.response.headers.get("etag");
   */
  async get(path: string, options: ClientGetOptions = {}): Promise<ClientResponse> {
    const headers = new Headers(options.headers);
    this.addRequestHeaders(headers);
    if (this.opts.credential) {
      await this.addAuthHeader(headers, this.opts.credential);
    }
    try {
      return await this.doRequest(path, headers, options.timeout);
    } catch (thrown: unknown) {
      if (thrown instanceof AdminError) {
        throw thrown;
      }
      // Though it should never happen in practice, a non-Error type can be thrown
      const err = getError(thrown);
      throw new AdminError(`Failed to make request: ${err.message}`, { original: err });
    }
  }

  private addRequestHeaders(headers: Headers): void {
    headers.set("Connection", "keep-alive");
    if (!headers.has("User-Agent")) {
      headers.set("User-Agent", CLIENT_HEADER_VALUE);
    }
    headers.set("X-Client-Version", CLIENT_HEADER_VALUE);
  }

  private async addAuthHeader(headers: Headers, credential: Credential): Promise<void> {
    let token: string;
    if (isLocalInsecureRequest(this.urlPrefix)) {
      token = "owner";
    } else {
      token = await credential.getAccessToken();
    }
    headers.set("Authorization", `Bearer ${token}`);
  }

  private requestURL(path: string): string {
    const versionPath = this.opts.apiVersion ? `/${this.opts.apiVersion}` : "";
    return `${this.urlPrefix}${versionPath}${path.startsWith("/") ? path : `/${path}`}`;
  }

  private async doRequest(
    path: string,
    headers: Headers,
    timeout: number | undefined,
  ): Promise<ClientResponse> {
    const fetchURL = this.requestURL(path);
    const fetchOptions: RequestInit = { headers, method: "GET" };

    if (proxyURIFromEnv()) {
      fetchOptions.agent = new ProxyAgent();
    }

    let reqTimeout: NodeJS.Timeout | undefined;
    if (timeout) {
      const controller = new AbortController();
      reqTimeout = setTimeout(() => {
        controller.abort();
      }, timeout);
      fetchOptions.signal = controller.signal;
    }

    logger.debug(`>>> [apiv2][query] GET ${fetchURL}`);
    let res: Response;
    let text: string;
    try {
      res = await fetch(fetchURL, fetchOptions);
      text = await res.text();
    } catch (thrown: unknown) {
      const err = getError(thrown);
      logger.debug(`*** [apiv2] error from fetch(${fetchURL}, GET): ${err}`);
      if (err.name.includes("AbortError")) {
        throw new AdminError(`Timeout reached making request to ${fetchURL}`, {
          original: err,
        });
      }
      throw new AdminError(`Failed to make request to ${fetchURL}`, { original: err });
    } finally {
      // If we succeed or failed, clear the timeout.
      if (reqTimeout) {
        clearTimeout(reqTimeout);
      }
    }

    logger.debug(`<<< [apiv2][status] GET ${fetchURL} ${res.status}`);
    logger.debug(`<<< [apiv2][body] GET ${fetchURL} ${text}`);

    const err = responseToError({ statusCode: res.status, content: text }, text);
    if (err) {
      throw err;
    }
    return { status: res.status, response: res, body: text };
  }
}

function isLocalInsecureRequest(urlPrefix: string): boolean {
  const u = new URL(urlPrefix);
  return u.protocol === "http:";
}
