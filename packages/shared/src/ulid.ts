/**
 * ULID helpers. Locally generated ids (workspaces, archive names) are
 * ULIDs so they sort by creation time in listings and on disk.
 */

import { ulid } from "ulidx";

/** Crockford Base32 pattern for ULID validation */
const ULID_REGEX = /^[0-9A-HJKMNP-TV-Z]{26}$/;

/** Generate a new ULID from the current time. */
export function generateId(): string {
  return ulid();
}

/** Check that a string has the ULID shape (charset and length only). */
export function isValidUlid(id: string): boolean {
  return ULID_REGEX.test(id);
}

