import * as utils from "./utils";

export const remoteConfigApiOrigin = utils.envOverride(
  "REMOTE_CONFIG_URL",
  "https://firebaseremoteconfig.googleapis.com",
);

export const REMOTE_CONFIG_SCOPES = [
  "https://www.googleapis.com/auth/cloud-platform",
  "https://www.googleapis.com/auth/firebase.remoteconfig",
];

// Checked in order after an explicitly configured project id.
export const PROJECT_ID_ENV_VARS = ["GOOGLE_CLOUD_PROJECT", "GCLOUD_PROJECT"];
