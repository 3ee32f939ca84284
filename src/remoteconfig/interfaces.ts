export enum TagColor {
  BLUE = "BLUE",
  BROWN = "BROWN",
  CYAN = "CYAN",
  DEEP_ORANGE = "DEEP_ORANGE",
  GREEN = "GREEN",
  INDIGO = "INDIGO",
  LIME = "LIME",
  ORANGE = "ORANGE",
  PINK = "PINK",
  PURPLE = "PURPLE",
  TEAL = "TEAL",
}

/** Interface representing a Remote Config parameter `value` in value options. */
export interface ExplicitParameterValue {
  value: string;
}

/** Interface representing a Remote Config parameter `useInAppDefault` in value options. */
export interface InAppDefaultValue {
  useInAppDefault: boolean;
}

export type RemoteConfigParameterValue = ExplicitParameterValue | InAppDefaultValue;

/** Interface representing a Remote Config parameter. */
export interface RemoteConfigParameter {
  defaultValue?: RemoteConfigParameterValue;
  conditionalValues?: { [key: string]: RemoteConfigParameterValue };
  description?: string;
  valueType?: "PARAMETER_VALUE_TYPE_UNSPECIFIED" | "STRING" | "BOOLEAN" | "NUMBER" | "JSON";
}

/** Interface representing a Remote Config parameter group. */
export interface RemoteConfigParameterGroup {
  description?: string;
  parameters: { [key: string]: RemoteConfigParameter };
}

/** Interface representing a Remote Config condition. */
export interface RemoteConfigCondition {
  name: string;
  expression: string;
  tagColor?: TagColor;
}

/**
 * A project's Remote Config template. The etag comes from the response
 * headers, not the body, and is needed for any later conditional update.
 */
export interface RemoteConfigTemplate {
  conditions: RemoteConfigCondition[];
  parameters: { [key: string]: RemoteConfigParameter };
  parameterGroups: { [key: string]: RemoteConfigParameterGroup };
  readonly etag: string;
  version?: Version;
}

/** Interface representing a Remote Config version. */
export interface Version {
  versionNumber?: string; // int64 format
  updateTime?: string; // in UTC
  updateOrigin?:
    | "REMOTE_CONFIG_UPDATE_ORIGIN_UNSPECIFIED"
    | "CONSOLE"
    | "REST_API"
    | "ADMIN_SDK_NODE";
  updateType?:
    | "REMOTE_CONFIG_UPDATE_TYPE_UNSPECIFIED"
    | "INCREMENTAL_UPDATE"
    | "FORCED_UPDATE"
    | "ROLLBACK";
  updateUser?: RemoteConfigUser;
  description?: string;
  rollbackSource?: string;
  isLegacy?: boolean;
}

/** Interface representing a Remote Config user. */
export interface RemoteConfigUser {
  email: string;
  name?: string;
  imageUrl?: string;
}
