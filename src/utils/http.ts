/**
 * Thin fetch wrapper shared by the OAI-PMH, registry and vocabulary clients
 */

import { HttpRequestError, errorMessage } from "../errors.js";

import type { Logger } from "pino";

export interface HttpRequest {
  method?: "GET" | "POST" | "PUT" | "DELETE";
  url: string;
  headers?: Record<string, string>;
  /** Serialized as JSON when present */
  json?: unknown;
  timeoutMs: number;
}

export interface HttpResponse {
  status: number;
  text: string;
}

/**
 * Send one request and return the response body as text.
 *
 * Non-2xx responses and network failures are logged with method, URL and
 * response text, then thrown as HttpRequestError.
 */
export async function sendRequest(
  log: Logger,
  request: HttpRequest
): Promise<HttpResponse> {
  const method = request.method ?? "GET";
  const { url } = request;
  const headers: Record<string, string> = { ...request.headers };
  let body: string | undefined;
  if (request.json !== undefined) {
    headers["Content-Type"] = "application/json";
    body = JSON.stringify(request.json);
  }

  log.debug({ method, url }, "Sending request");

  const startTime = performance.now();
  let response: Response;
  try {
    response = await fetch(url, {
      method,
      headers,
      body,
      signal: AbortSignal.timeout(request.timeoutMs),
    });
  } catch (error) {
    const message = errorMessage(error);
    log.error({ method, url, error: message }, "Request failed");
    throw new HttpRequestError(
      `${method} ${url} failed: ${message}`,
      method,
      url,
      null,
      ""
    );
  }
  const duration = Math.round(performance.now() - startTime);
  const text = await response.text();

  log.debug(
    {
      method,
      url,
      status: response.status,
      duration: `${String(duration)}ms`,
    },
    "Received response"
  );

  if (!response.ok) {
    log.error(
      {
        method,
        url,
        status: response.status,
        statusText: response.statusText,
        responseText: text,
      },
      "Request failed"
    );
    throw new HttpRequestError(
      `${method} ${url} failed with status ${String(response.status)}`,
      method,
      url,
      response.status,
      text
    );
  }

  return { status: response.status, text };
}

/**
 * Parse a JSON body; a body that is not JSON yields `undefined`
 */
export function parseJsonBody(text: string): unknown {
  if (text.trim() === "") {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return undefined;
  }
}
