import { AdminError } from "../error";

/** Remote Config specific error codes, read from the FcmError detail of an error response. */
export enum RemoteConfigErrorCode {
  INTERNAL = "INTERNAL",
}

/**
 * The error raised by RemoteConfigClient when a request fails. Carries the
 * Remote Config error code when the service reported one that is known.
 */
export class RemoteConfigError extends AdminError {
  readonly name: string = "RemoteConfigError";
  readonly remoteConfigErrorCode: RemoteConfigErrorCode | undefined;

  constructor(
    message: string,
    options: ConstructorParameters<typeof AdminError>[1] = {},
    remoteConfigErrorCode?: RemoteConfigErrorCode,
  ) {
    super(message, options);
    this.remoteConfigErrorCode = remoteConfigErrorCode;
  }

  static withRemoteConfigErrorCode(
    base: AdminError,
    remoteConfigErrorCode?: RemoteConfigErrorCode,
  ): RemoteConfigError {
    return new RemoteConfigError(
      base.message,
      {
        context: base.context,
        exit: base.exit,
        original: base,
        status: base.status,
      },
      remoteConfigErrorCode,
    );
  }
}
