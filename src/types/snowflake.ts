/**
 * Discord Snowflake ID type and utilities.
 *
 * Snowflakes are 64-bit unsigned integers:
 * timestamp (42 bits) | worker (5 bits) | process (5 bits) | increment (12 bits)
 */

/** Discord epoch (2015-01-01T00:00:00.000Z) in milliseconds */
export const DISCORD_EPOCH = 1420070400000n;

/**
 * A Discord Snowflake ID, kept as a string since it overflows `number`.
 */
export type Snowflake = string;

/**
 * Validates if a value is a Snowflake ID.
 */
export function isValidSnowflake(value: unknown): value is Snowflake {
  if (typeof value !== 'string') return false;
  if (!/^\d{1,20}$/.test(value)) return false;
  return BigInt(value) <= 0xffffffffffffffffn;
}

/**
 * Parses a string, number or bigint into a Snowflake.
 * @throws Error if the value is not a valid Snowflake
 */
export function parseSnowflake(value: string | number | bigint): Snowflake {
  const strValue = String(value);
  if (!isValidSnowflake(strValue)) {
    throw new Error(`Invalid Snowflake ID: ${value}`);
  }
  return strValue;
}

/**
 * Gets the Unix timestamp (ms) encoded in a Snowflake.
 */
export function getSnowflakeTimestamp(snowflake: Snowflake): number {
  return Number((BigInt(snowflake) >> 22n) + DISCORD_EPOCH);
}

export function getSnowflakeDate(snowflake: Snowflake): Date {
  return new Date(getSnowflakeTimestamp(snowflake));
}

/**
 * Builds the lowest Snowflake for a point in time, for use as a
 * `before`/`after` pagination cursor.
 */
export function snowflakeFromTimestamp(timestamp: number | Date): Snowflake {
  const ms = timestamp instanceof Date ? timestamp.getTime() : timestamp;
  if (!Number.isFinite(ms)) {
    throw new Error('Timestamp is not a valid time');
  }
  const relative = BigInt(Math.floor(ms)) - DISCORD_EPOCH;
  if (relative < 0n) {
    throw new Error('Timestamp predates the Discord epoch');
  }
  return (relative << 22n).toString();
}

/**
 * Compares two Snowflakes chronologically.
 * @returns Negative if a < b, positive if a > b, 0 if equal
 */
export function compareSnowflakes(a: Snowflake, b: Snowflake): number {
  const bigA = BigInt(a);
  const bigB = BigInt(b);
  if (bigA < bigB) return -1;
  if (bigA > bigB) return 1;
  return 0;
}
