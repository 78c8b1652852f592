/**
 * Bit pattern formatting for debugging encoded values.
 */

import { type Logger, isLevelEnabled } from "../log";

/**
 * Format a non-negative integer as binary, grouped in nibbles from the
 * least significant bit.
 *
 * Negative values are formatted as a minus sign followed by the groups of
 * their magnitude.
 *
 * @example formatBinary(10) === "1010"
 * @example formatBinary(255) === "1111 1111"
 * @example formatBinary(65546) === "1 0000 0000 0000 1010"
 */
export function formatBinary(value: number | bigint): string {
  const big = BigInt(value);
  const negative = big < 0n;
  const digits = (negative ? -big : big).toString(2);

  const groups: string[] = [];
  for (let end = digits.length; end > 0; end -= 4) {
    groups.unshift(digits.slice(Math.max(0, end - 4), end));
  }
  const formatted = groups.join(" ");
  return negative ? `-${formatted}` : formatted;
}

/**
 * Log the bit pattern of a value at debug level.
 * Formatting is skipped entirely when debug logging is off.
 */
export function logBinary(
  logger: Logger,
  value: number | bigint,
  label = "Value"
): void {
  if (!isLevelEnabled("debug")) return;
  logger.debug(`${label}: ${formatBinary(value)}`);
}
