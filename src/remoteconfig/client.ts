import { remoteConfigApiOrigin, PROJECT_ID_ENV_VARS } from "../api";
import { Client, ClientResponse } from "../apiv2";
import { ApplicationDefaultCredential, Credential } from "../credential";
import { AdminError, getErrMsg, getError, isObject } from "../error";
import { logger } from "../logger";
import { getHttpResponse } from "../responseToError";
import { firstEnv } from "../utils";
import { SDK_VERSION } from "../version";
import { RemoteConfigError } from "./error";
import { RemoteConfigTemplate } from "./interfaces";
import { RemoteConfigServiceErrorResponse } from "./serviceErrorResponse";

const COMMON_HEADERS: Readonly<Record<string, string>> = Object.freeze({
  "X-Firebase-Client": `remote-config-admin-node/${SDK_VERSION}`,
});

const MISSING_PROJECT_ID_MESSAGE =
  "Project ID is required to access Remote Config service. Use a service account " +
  "credential or set the project ID explicitly via the projectId option. " +
  "Alternatively you can also set the project ID via the GOOGLE_CLOUD_PROJECT " +
  "environment variable.";

export interface RemoteConfigClientOptions {
  projectId?: string | null;
  /** Defaults to application default credentials. */
  credential?: Credential;
  /** Per-request timeout in ms. No timeout when unset. */
  timeout?: number;
  /** Service origin, for tests and emulators. */
  apiOrigin?: string;
}

type RawTemplate = Partial<Omit<RemoteConfigTemplate, "etag">>;

function isRawTemplate(value: unknown): value is RawTemplate {
  if (!isObject(value) || Array.isArray(value)) {
    return false;
  }
  const { conditions, parameters, parameterGroups, version } = value;
  return (
    (conditions === undefined || Array.isArray(conditions)) &&
    (parameters === undefined || isObject(parameters)) &&
    (parameterGroups === undefined || isObject(parameterGroups)) &&
    (version === undefined || isObject(version))
  );
}

function parseTemplate(content: string, etag: string): RemoteConfigTemplate {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err: unknown) {
    throw new AdminError(`Unable to parse Remote Config template: ${getErrMsg(err)}`, {
      original: getError(err),
    });
  }
  if (!isRawTemplate(parsed)) {
    throw new AdminError("Remote Config service returned a malformed template.");
  }
  const template: RemoteConfigTemplate = {
    conditions: parsed.conditions ?? [],
    parameters: parsed.parameters ?? {},
    parameterGroups: parsed.parameterGroups ?? {},
    etag,
  };
  if (parsed.version) {
    template.version = parsed.version;
  }
  return template;
}

/**
 * Converts a failed request into a RemoteConfigError, carrying the error code
 * from the response body when the service sent a known one.
 */
function createRemoteConfigError(err: unknown): RemoteConfigError {
  const base =
    err instanceof AdminError ? err : new AdminError(getErrMsg(err), { original: getError(err) });
  const response = getHttpResponse(base);
  const parsed = RemoteConfigServiceErrorResponse.parse(response?.content);
  return RemoteConfigError.withRemoteConfigErrorCode(base, parsed.getRemoteConfigErrorCode());
}

/**
 * Reads Remote Config templates from the Remote Config REST API. Holds only
 * configuration, so one instance can serve concurrent calls.
 */
export class RemoteConfigClient {
  private readonly projectId: string;
  private readonly apiOrigin: string;
  private readonly apiClient: Client;
  private readonly timeout: number | undefined;

  constructor(options: RemoteConfigClientOptions) {
    if (!options.projectId) {
      throw new AdminError(MISSING_PROJECT_ID_MESSAGE, { exit: 2 });
    }
    this.projectId = options.projectId;
    this.apiOrigin = (options.apiOrigin ?? remoteConfigApiOrigin).replace(/\/$/, "");
    this.timeout = options.timeout;
    this.apiClient = new Client({
      urlPrefix: this.apiOrigin,
      apiVersion: "v1",
      credential: options.credential ?? new ApplicationDefaultCredential(),
    });
  }

  /**
   * Builds a client for the project found in the environment: the projectId
   * option, then GOOGLE_CLOUD_PROJECT or GCLOUD_PROJECT, then the credential.
   */
  static async fromEnvironment(
    options: RemoteConfigClientOptions = {},
  ): Promise<RemoteConfigClient> {
    const credential = options.credential ?? new ApplicationDefaultCredential();
    let projectId: string | undefined = options.projectId || firstEnv(...PROJECT_ID_ENV_VARS);
    if (!projectId && credential.getProjectId) {
      projectId = await credential.getProjectId();
    }
    return new RemoteConfigClient({ ...options, projectId, credential });
  }

  getTemplateUrl(): string {
    return `${this.apiOrigin}/v1${this.templatePath()}`;
  }

  /**
   * Fetches the current template of the project, with its etag.
   */
  async getTemplate(): Promise<RemoteConfigTemplate> {
    let res: ClientResponse;
    try {
      // Rejects on any status outside 2xx.
      res = await this.apiClient.get(this.templatePath(), {
        headers: { ...COMMON_HEADERS },
        timeout: this.timeout,
      });
    } catch (err: unknown) {
      logger.debug(`Failed to get Remote Config template for ${this.projectId}: ${getErrMsg(err)}`);
      throw createRemoteConfigError(err);
    }

    const etag = res.response.headers.get("etag");
    if (etag === null) {
      throw new AdminError(
        `Remote Config template for project ${this.projectId} was returned without an ETag.`,
      );
    }
    return parseTemplate(res.body, etag);
  }

  private templatePath(): string {
    return `/projects/${this.projectId}/remoteConfig`;
  }
}
