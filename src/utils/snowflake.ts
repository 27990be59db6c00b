import { z } from 'zod';
import { DISCORD_EPOCH } from '../constants';

/**
 * Discord snowflake id in its decimal string form
 */
export type Snowflake = string;

export type InteractionId = Snowflake;
export type ApplicationId = Snowflake;
export type ChannelId = Snowflake;
export type GuildId = Snowflake;
export type MessageId = Snowflake;
export type UserId = Snowflake;
export type RoleId = Snowflake;

function isSnowflake(value: string | number): boolean {
  if (typeof value === 'string') {
    return /^\d+$/.test(value);
  }
  return Number.isSafeInteger(value) && value >= 0;
}

/**
 * Accepts a decimal string or a safe non-negative integer and yields the string form
 *
 * Numbers past 2^53 have already lost digits, so they are rejected.
 */
export const snowflakeSchema = z
  .union([z.string(), z.number()])
  .refine(isSnowflake, 'Expected a snowflake id')
  .transform((value): Snowflake => String(value));

/**
 * Get the creation time encoded in a snowflake
 */
export function snowflakeTimestamp(id: Snowflake): Date {
  const millis = (BigInt(id) >> 22n) + BigInt(DISCORD_EPOCH);
  return new Date(Number(millis));
}
