import { defaultTo } from "lodash";

interface AdminErrorOptions {
  children?: unknown[];
  context?: unknown;
  exit?: number;
  original?: Error;
  status?: number;
}

const DEFAULT_CHILDREN: NonNullable<AdminErrorOptions["children"]> = [];
const DEFAULT_EXIT: NonNullable<AdminErrorOptions["exit"]> = 1;
const DEFAULT_STATUS: NonNullable<AdminErrorOptions["status"]> = 500;

export class AdminError extends Error {
  readonly children: unknown[];
  readonly context: unknown | undefined;
  readonly exit: number;
  readonly message: string;
  // Typed as string, not the literal, so subclasses such as RemoteConfigError
  // can set their own name.
  readonly name: string = "AdminError";
  readonly original: Error | undefined;
  readonly status: number;

  constructor(message: string, options: AdminErrorOptions = {}) {
    super();

    this.children = defaultTo(options.children, DEFAULT_CHILDREN);
    this.context = options.context;
    this.exit = defaultTo(options.exit, DEFAULT_EXIT);
    this.message = message;
    this.original = options.original;
    this.status = defaultTo(options.status, DEFAULT_STATUS);
  }
}

/**
 * Safely gets an error message from an unknown object
 * @param err an unknown error type
 * @param defaultMsg an optional message to return if the err is not Error or string
 * @return An error string
 */
export function getErrMsg(err: unknown, defaultMsg?: string): string {
  if (err instanceof Error) {
    return err.message;
  } else if (typeof err === "string") {
    return err;
  } else if (defaultMsg) {
    return defaultMsg;
  }
  return JSON.stringify(err);
}

/**
 * Safely gets an error object from an unknown object
 * @param err The error to get an Error for.
 * @return an Error object
 */
export function getError(err: unknown): Error {
  if (err instanceof Error) {
    return err;
  }
  return Error(getErrMsg(err));
}

/**
 * A typeguard for objects
 * @param value The value to check
 */
export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}
