import { isObject } from "../error";
import { RemoteConfigErrorCode } from "./error";

const REMOTE_CONFIG_ERROR_CODES: ReadonlyMap<string, RemoteConfigErrorCode> = new Map([
  ["INTERNAL", RemoteConfigErrorCode.INTERNAL],
]);

const RC_ERROR_TYPE = "type.googleapis.com/google.firebase.fcm.v1.FcmError";

function stringField(obj: Record<string, unknown>, key: string): string | undefined {
  const value = obj[key];
  return typeof value === "string" ? value : undefined;
}

/**
 * The body of an error response from the Remote Config service:
 *
 *   { "error": { "status": ..., "message": ..., "details": [{ "@type": ..., "errorCode": ... }] } }
 *
 * Every accessor returns undefined when its field is missing or has the wrong type.
 */
export class RemoteConfigServiceErrorResponse {
  private constructor(private readonly error?: Record<string, unknown>) {}

  /**
   * Parses an error response body. Empty or malformed content gives an empty
   * response rather than an error: the server may answer with a non-JSON payload.
   */
  static parse(content?: string | null): RemoteConfigServiceErrorResponse {
    if (!content) {
      return new RemoteConfigServiceErrorResponse();
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (e: unknown) {
      return new RemoteConfigServiceErrorResponse();
    }
    if (!isObject(parsed) || !isObject(parsed.error) || Array.isArray(parsed.error)) {
      return new RemoteConfigServiceErrorResponse();
    }
    return new RemoteConfigServiceErrorResponse(parsed.error);
  }

  getStatus(): string | undefined {
    return this.error ? stringField(this.error, "status") : undefined;
  }

  /**
   * Finds the first FcmError detail and maps its errorCode. Unknown codes map
   * to undefined; later FcmError details are never consulted.
   */
  getRemoteConfigErrorCode(): RemoteConfigErrorCode | undefined {
    const details = this.error?.details;
    if (!Array.isArray(details)) {
      return undefined;
    }
    for (const detail of details) {
      if (isObject(detail) && detail["@type"] === RC_ERROR_TYPE) {
        const errorCode = stringField(detail, "errorCode");
        return errorCode === undefined ? undefined : REMOTE_CONFIG_ERROR_CODES.get(errorCode);
      }
    }
    return undefined;
  }

  getErrorMessage(): string | undefined {
    return this.error ? stringField(this.error, "message") : undefined;
  }
}
