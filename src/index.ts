export { AdminError } from "./error";
export { ApplicationDefaultCredential } from "./credential";
export type { Credential } from "./credential";
export { logger, useConsoleLoggers, useFileLogger } from "./logger";
export { RemoteConfigClient } from "./remoteconfig/client";
export type { RemoteConfigClientOptions } from "./remoteconfig/client";
export { RemoteConfigError, RemoteConfigErrorCode } from "./remoteconfig/error";
export { RemoteConfigServiceErrorResponse } from "./remoteconfig/serviceErrorResponse";
export * from "./remoteconfig/interfaces";
export * from "./auth/hash";
export { SDK_VERSION } from "./version";
