import AbortController from "abort-controller";
import fetch, { Headers, HeadersInit, RequestInit, Response } from "node-fetch";
import { ProxyAgent } from "proxy-agent";
import * as retry from "retry";
import * as fs from "fs";
import * as path from "path";
import { inspect } from "util";
import { z } from "zod";

import { AdminError, MalformedResponseError, getError, toAdminError } from "./error";
import { logger } from "./logger";
import { errorFromResponse } from "./responseToError";

const USER_AGENT = `dbadmin-lro/${readClientVersion()}`;

export type HttpMethod = "GET" | "POST" | "PATCH" | "DELETE";

export interface ClientVerbOptions {
  headers?: HeadersInit;
  queryParams?: Record<string, string | number>;
  /** Timeout in ms for each attempt. 0 or unset is no timeout. */
  timeout?: number;
  /** Resolve with the response instead of rejecting on HTTP errors. */
  resolveOnHTTPError?: boolean;
  /** HTTP statuses on which to retry. Defaults to none. */
  retryCodes?: number[];
  /** Number of retries on a status in retryCodes. Defaults to 1. */
  retries?: number;
  /** Minimum wait between retries. Defaults to 1s. */
  retryMinTimeout?: number;
  /** Maximum wait between retries. Defaults to 5s. */
  retryMaxTimeout?: number;
}

export interface ClientRequestOptions<T> extends ClientVerbOptions {
  method: HttpMethod;
  path: string;
  body?: T;
}

export interface ClientResponse<T> {
  status: number;
  response: Response;
  body: T;
}

export interface ClientOptions {
  /** Origin of the API, e.g. https://spanner.googleapis.com. */
  urlPrefix: string;
  apiVersion?: string;
  /** Overrides the module-level token set with setAccessToken. */
  accessToken?: string;
}

let accessToken = "";

/**
 * Sets the bearer token sent by every client that was not given one of its own.
 */
export function setAccessToken(token = ""): void {
  accessToken = token;
}

function readClientVersion(): string {
  try {
    const raw = fs.readFileSync(path.join(__dirname, "..", "package.json"), "utf8");
    return z.object({ version: z.string() }).parse(JSON.parse(raw)).version;
  } catch (e: unknown) {
    return "0.0.0";
  }
}

function proxyURIFromEnv(): string | undefined {
  return (
    process.env.HTTPS_PROXY ||
    process.env.https_proxy ||
    process.env.HTTP_PROXY ||
    process.env.http_proxy ||
    undefined
  );
}

/**
 * Local emulators are served over plain http and accept the fixed token "owner".
 */
function isLocalInsecureRequest(urlPrefix: string): boolean {
  return new URL(urlPrefix).protocol === "http:";
}

function bodyToString(body: unknown): string {
  try {
    return JSON.stringify(body);
  } catch (_) {
    return inspect(body);
  }
}

function parseBody(text: string): unknown {
  // 204s, and some 202s, come back without content.
  if (!text.length) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch (err: unknown) {
    throw new MalformedResponseError(`Unable to parse JSON: ${err}`, getError(err));
  }
}

/**
 * JSON client for one API origin. Requests are authenticated with a bearer token and
 * fail with an AdminError.
 */
export class Client {
  private readonly urlPrefix: string;

  constructor(private readonly opts: ClientOptions) {
    this.urlPrefix = opts.urlPrefix.replace(/\/+$/, "");
  }

  get<ResT>(path: string, options: ClientVerbOptions = {}): Promise<ClientResponse<ResT>> {
    return this.request<unknown, ResT>({ ...options, method: "GET", path });
  }

  post<ReqT, ResT>(
    path: string,
    json?: ReqT,
    options: ClientVerbOptions = {},
  ): Promise<ClientResponse<ResT>> {
    return this.request<ReqT, ResT>({ ...options, method: "POST", path, body: json });
  }

  patch<ReqT, ResT>(
    path: string,
    json?: ReqT,
    options: ClientVerbOptions = {},
  ): Promise<ClientResponse<ResT>> {
    return this.request<ReqT, ResT>({ ...options, method: "PATCH", path, body: json });
  }

  delete<ResT>(path: string, options: ClientVerbOptions = {}): Promise<ClientResponse<ResT>> {
    return this.request<unknown, ResT>({ ...options, method: "DELETE", path });
  }

  /**
   * Makes a request as specified by the options. Bodies are sent and read as JSON;
   * the response body is not validated.
   *
   * @example
   * const res = await client.request<BackupResource, BackupResource>({
   *   method: "PATCH",
   *   path: "/projects/p/instances/i/backups/b",
   *   queryParams: { updateMask: "expire_time" },
   *   body: { name: "projects/p/instances/i/backups/b", expireTime: "2030-01-01T00:00:00Z" },
   * });
   */
  async request<ReqT, ResT>(options: ClientRequestOptions<ReqT>): Promise<ClientResponse<ResT>> {
    const url = this.requestURL(options);
    const init: RequestInit = {
      method: options.method,
      headers: this.requestHeaders(options.headers),
    };
    if (options.body !== undefined) {
      init.body = JSON.stringify(options.body);
    }
    if (proxyURIFromEnv()) {
      init.agent = new ProxyAgent();
    }

    const operation = retry.operation({
      retries: options.retries ?? 1,
      minTimeout: options.retryMinTimeout ?? 1000,
      maxTimeout: options.retryMaxTimeout ?? 5000,
    });

    return new Promise<ClientResponse<ResT>>((resolve, reject) => {
      operation.attempt((attempt) => {
        if (attempt > 1) {
          logger.debug(`*** [apiv2] Attempting the request again. Attempt number ${attempt}`);
        }
        this.attempt<ResT>(url, init, options).then(
          (res) => {
            if (res.status < 400) {
              return resolve(res);
            }
            if (
              options.retryCodes?.includes(res.status) &&
              operation.retry(errorFromResponse(res.status, res.body))
            ) {
              return;
            }
            if (options.resolveOnHTTPError) {
              return resolve(res);
            }
            reject(errorFromResponse(res.status, res.body, url));
          },
          (err: unknown) => reject(toAdminError(err)),
        );
      });
    });
  }

  private async attempt<ResT>(
    url: string,
    init: RequestInit,
    options: ClientRequestOptions<unknown>,
  ): Promise<ClientResponse<ResT>> {
    this.logRequest(url, options);
    const controller = options.timeout ? new AbortController() : undefined;
    const timer = controller ? setTimeout(() => controller.abort(), options.timeout) : undefined;

    let res: Response;
    try {
      res = await fetch(url, controller ? { ...init, signal: controller.signal } : init);
    } catch (thrown: unknown) {
      const err = thrown instanceof Error ? thrown : new Error(String(thrown));
      logger.debug(`*** [apiv2] error from fetch(${url}): ${err}`);
      if (err.name.includes("AbortError")) {
        throw new AdminError(`Timeout reached making request to ${url}`, {
          code: "DEADLINE_EXCEEDED",
          original: err,
        });
      }
      throw new AdminError(`Failed to make request to ${url}`, {
        code: "UNAVAILABLE",
        original: err,
      });
    } finally {
      clearTimeout(timer);
    }

    const text = await res.text();
    logger.debug(`<<< [apiv2][status] ${options.method} ${url} ${res.status}`);
    logger.debug(`<<< [apiv2][body] ${options.method} ${url} ${text || "[empty]"}`);
    return {
      status: res.status,
      response: res,
      // The body is whatever JSON the server sent; callers validate it.
      body: parseBody(text) as ResT,
    };
  }

  private requestURL(options: ClientRequestOptions<unknown>): string {
    const reqPath = options.path.startsWith("/") ? options.path : `/${options.path}`;
    const versionPath = this.opts.apiVersion ? `/${this.opts.apiVersion}` : "";
    const url = new URL(`${this.urlPrefix}${versionPath}${reqPath}`);
    for (const [key, value] of Object.entries(options.queryParams ?? {})) {
      url.searchParams.append(key, `${value}`);
    }
    return url.toString();
  }

  private requestHeaders(extra?: HeadersInit): Headers {
    const headers = new Headers(extra);
    headers.set("Connection", "keep-alive");
    if (!headers.has("User-Agent")) {
      headers.set("User-Agent", USER_AGENT);
    }
    if (!headers.has("Content-Type")) {
      headers.set("Content-Type", "application/json");
    }
    headers.set("Authorization", `Bearer ${this.token()}`);
    return headers;
  }

  private token(): string {
    if (isLocalInsecureRequest(this.urlPrefix)) {
      return "owner";
    }
    const token = this.opts.accessToken || accessToken;
    if (!token) {
      throw new AdminError(
        "No access token configured. Call setAccessToken() or pass accessToken to the client.",
        { code: "PERMISSION_DENIED", exit: 2 },
      );
    }
    return token;
  }

  private logRequest(url: string, options: ClientRequestOptions<unknown>): void {
    logger.debug(`>>> [apiv2][query] ${options.method} ${url}`);
    if (options.body !== undefined) {
      logger.debug(`>>> [apiv2][body] ${options.method} ${url} ${bodyToString(options.body)}`);
    }
  }
}
