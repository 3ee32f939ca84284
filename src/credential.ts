import { GoogleAuth, GoogleAuthOptions } from "google-auth-library";

import { REMOTE_CONFIG_SCOPES } from "./api";
import { AdminError, getErrMsg } from "./error";
import { logger } from "./logger";

/**
 * Supplies OAuth2 access tokens for outgoing requests, and optionally the
 * project the credential belongs to.
 */
export interface Credential {
  getAccessToken(): Promise<string>;
  getProjectId?(): Promise<string | undefined>;
}

/**
 * Credential backed by Google Application Default Credentials: a service
 * account file named by GOOGLE_APPLICATION_CREDENTIALS, gcloud user
 * credentials, or the metadata server.
 */
export class ApplicationDefaultCredential implements Credential {
  private readonly authClient: GoogleAuth;

  constructor(options: GoogleAuthOptions = {}) {
    this.authClient = new GoogleAuth({ scopes: REMOTE_CONFIG_SCOPES, ...options });
  }

  async getAccessToken(): Promise<string> {
    const token = await this.authClient.getAccessToken();
    if (!token) {
      throw new AdminError("Unable to obtain an access token from application default credentials");
    }
    return token;
  }

  async getProjectId(): Promise<string | undefined> {
    try {
      return await this.authClient.getProjectId();
    } catch (err: unknown) {
      logger.debug(`Unable to determine project id from credentials: ${getErrMsg(err)}`);
      return undefined;
    }
  }
}
