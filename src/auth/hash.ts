import { AdminError } from "../error";

export type RepeatableHashAlgorithm =
  | "MD5"
  | "SHA1"
  | "SHA256"
  | "SHA512"
  | "PBKDF_SHA1"
  | "PBKDF2_SHA256";

interface RoundsBounds {
  min: number;
  max: number;
}

// Inclusive. MD5 is [0,8192] but SHA1, SHA256, and SHA512 are [1,8192].
const ROUNDS_BOUNDS: Readonly<Record<RepeatableHashAlgorithm, RoundsBounds>> = Object.freeze({
  MD5: { min: 0, max: 8192 },
  SHA1: { min: 1, max: 8192 },
  SHA256: { min: 1, max: 8192 },
  SHA512: { min: 1, max: 8192 },
  PBKDF_SHA1: { min: 0, max: 120000 },
  PBKDF2_SHA256: { min: 0, max: 120000 },
});

/**
 * Describes how imported password hashes were produced. Nothing is hashed
 * locally; the record is sent along with a user import request.
 */
export interface UserImportHash {
  readonly hashAlgorithm: RepeatableHashAlgorithm;
  readonly rounds: number;
}

export interface RepeatableHashOptions {
  rounds: number;
}

/**
 * Builds the configuration for a hash algorithm that is applied `rounds` times.
 */
export function repeatableHash(
  hashAlgorithm: RepeatableHashAlgorithm,
  options: RepeatableHashOptions,
): UserImportHash {
  const { min, max } = ROUNDS_BOUNDS[hashAlgorithm];
  const rounds = options.rounds;
  if (!Number.isInteger(rounds) || rounds < min || rounds > max) {
    throw new AdminError(
      `Must provide valid rounds(${min}..${max}) for hash algorithm ${hashAlgorithm}`,
    );
  }
  return Object.freeze({ hashAlgorithm, rounds });
}

export const md5 = (options: RepeatableHashOptions): UserImportHash =>
  repeatableHash("MD5", options);
export const sha1 = (options: RepeatableHashOptions): UserImportHash =>
  repeatableHash("SHA1", options);
export const sha256 = (options: RepeatableHashOptions): UserImportHash =>
  repeatableHash("SHA256", options);
export const sha512 = (options: RepeatableHashOptions): UserImportHash =>
  repeatableHash("SHA512", options);
export const pbkdfSha1 = (options: RepeatableHashOptions): UserImportHash =>
  repeatableHash("PBKDF_SHA1", options);
export const pbkdf2Sha256 = (options: RepeatableHashOptions): UserImportHash =>
  repeatableHash("PBKDF2_SHA256", options);

/**
 * The hash fields of an accounts:batchCreate request body.
 */
export function toUploadAccountOptions(hash: UserImportHash): {
  hashAlgorithm: string;
  rounds: number;
} {
  return { hashAlgorithm: hash.hashAlgorithm, rounds: hash.rounds };
}
