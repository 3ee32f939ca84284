import { AdminError, isObject } from "./error";

export interface HttpResponseInfo {
  statusCode: number;
  // Raw response body, when one was read.
  content?: string;
}

export interface ErrorBody {
  error: Record<string, unknown> | string;
  [key: string]: unknown;
}

export interface HttpErrorContext {
  body: ErrorBody;
  response: HttpResponseInfo;
}

function toErrorBody(statusCode: number, body: unknown): ErrorBody {
  if (typeof body === "string" && body.length) {
    try {
      body = JSON.parse(body);
    } catch (e: unknown) {
      return { error: { message: statusCode === 404 ? "Not Found" : body } };
    }
  }

  const parsed: Record<string, unknown> = isObject(body) && !Array.isArray(body) ? body : {};
  const error = parsed.error;
  if (isObject(error) || typeof error === "string") {
    return { ...parsed, error };
  }
  return { ...parsed, error: { message: statusCode === 404 ? "Not Found" : "Unknown Error" } };
}

export function responseToError(
  response: HttpResponseInfo,
  body: unknown,
  url?: string,
): AdminError | undefined {
  // Anything outside 2xx is an error, redirects and 304s included.
  if (response.statusCode >= 200 && response.statusCode < 300) {
    return;
  }

  const errorBody = toErrorBody(response.statusCode, body);
  const detail =
    typeof errorBody.error === "string"
      ? errorBody.error
      : typeof errorBody.error.message === "string"
        ? errorBody.error.message
        : JSON.stringify(errorBody.error);

  let message = "HTTP Error: " + response.statusCode + ", " + detail;
  if (url) {
    message = "Request to " + url + " had " + message;
  }

  // 5xx errors are unexpected, 3xx and 4xx errors happen sometimes
  const exitCode = response.statusCode >= 500 ? 2 : 1;

  const context: HttpErrorContext = { body: errorBody, response };
  return new AdminError(message, {
    context,
    exit: exitCode,
    status: response.statusCode,
  });
}

/**
 * Returns the HTTP response an error was built from, if it came from a
 * completed request.
 */
export function getHttpResponse(err: AdminError): HttpResponseInfo | undefined {
  const context = err.context;
  if (!isObject(context) || !isObject(context.response)) {
    return undefined;
  }
  const { statusCode, content } = context.response;
  if (typeof statusCode !== "number") {
    return undefined;
  }
  return typeof content === "string" ? { statusCode, content } : { statusCode };
}
