/**
 * Input validation utilities for AWS API response data.
 *
 * Instance names come from user-controlled tags and end up printed to a
 * terminal, so they are treated as untrusted input. These utilities sanitize
 * values to prevent:
 * - Terminal escape injection via ANSI sequences in tag values
 * - Garbled report columns via control characters
 * - Memory exhaustion via extremely long strings
 */

import { ValidationError } from "./errors.js";

/**
 * Maximum length for instance names and identifiers.
 * EC2 tag values are limited to 256 characters.
 */
const MAX_DISPLAY_NAME_LENGTH = 256;

/**
 * Valid AWS region pattern.
 * Matches standard regions (us-east-1) and partitioned ones (us-gov-west-1, cn-north-1).
 */
const AWS_REGION_REGEX = /^[a-z]{2}(?:-gov|-iso[a-z]?)?-[a-z]+-\d+$/;

/**
 * Availability zone pattern: a region followed by either a zone letter
 * (us-east-1a) or a local/wavelength zone suffix (us-west-2-lax-1a).
 * The first group captures the region.
 */
const AVAILABILITY_ZONE_REGEX =
  /^([a-z]{2}(?:-gov|-iso[a-z]?)?-[a-z]+-\d+)(?:[a-z]|-[a-z0-9-]+)$/;

/**
 * Control character regex - matches characters that would corrupt the
 * aligned report columns. Tab, newline and stray ESC bytes are included.
 */
const CONTROL_CHAR_REGEX = /[\x00-\x1F\x7F-\x9F]/g;

/**
 * ANSI escape sequence regex - matches terminal control sequences.
 * Covers SGR (colors), cursor movement, and other VT100/ANSI sequences.
 * Must be applied before the control char regex to handle multi-byte sequences.
 */
const ANSI_ESCAPE_REGEX = /\x1B(?:[@-Z\\-_]|\[[0-?]*[ -/]*[@-~])/g;

/**
 * Sanitizes an instance name or identifier before it reaches the report.
 *
 * @param rawName - Name from AWS API (untrusted)
 * @returns Name without escape sequences or control characters
 */
export function sanitizeDisplayName(rawName: string): string {
  const TRUNCATION_SUFFIX = "...";

  // Remove ANSI escape sequences first (multi-byte), then individual control characters
  const sanitized = rawName
    .replace(ANSI_ESCAPE_REGEX, "")
    .replace(CONTROL_CHAR_REGEX, "")
    .trim();

  if (sanitized.length > MAX_DISPLAY_NAME_LENGTH) {
    return (
      sanitized.substring(0, MAX_DISPLAY_NAME_LENGTH - TRUNCATION_SUFFIX.length) +
      TRUNCATION_SUFFIX
    );
  }

  return sanitized;
}

/**
 * Checks whether a string is a well-formed AWS region code.
 */
export function isRegion(value: string): boolean {
  return AWS_REGION_REGEX.test(value);
}

/**
 * Checks whether a string is a well-formed availability zone name.
 */
export function isAvailabilityZone(value: string): boolean {
  return AVAILABILITY_ZONE_REGEX.test(value);
}

/**
 * Derives the region an availability zone belongs to.
 *
 * @example
 * ```typescript
 * regionFromAvailabilityZone("eu-west-1b");       // "eu-west-1"
 * regionFromAvailabilityZone("us-west-2-lax-1a"); // "us-west-2"
 * ```
 *
 * @throws {ValidationError} If the value is not an availability zone name
 */
export function regionFromAvailabilityZone(availabilityZone: string): string {
  const match = AVAILABILITY_ZONE_REGEX.exec(availabilityZone);
  if (!match?.[1]) {
    throw new ValidationError(
      `Invalid availability zone: "${availabilityZone}"`,
      { details: { availabilityZone } }
    );
  }
  return match[1];
}
