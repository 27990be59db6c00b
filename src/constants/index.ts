/**
 * Return codes for interaction operation results
 */
export const ReturnCode = {
  /** Success */
  SUCCESS: 1,
  /** Local validation failed, nothing was sent */
  VALIDATION_ERROR: 4,
  /** System error */
  FAILURE: 9,
  /** Transport failure or non-2xx response from Discord */
  HTTP_ERROR: 31,
  /** Discord answered with a body that does not decode */
  JSON_ERROR: 32,
} as const;

export type ReturnCodeValue = (typeof ReturnCode)[keyof typeof ReturnCode];

/**
 * Discord server URL
 */
export const DISCORD_SERVER_URL = 'https://discord.com';

/**
 * Default REST API version
 */
export const DISCORD_API_VERSION = 10;

/**
 * Default Discord user agent
 */
export const DEFAULT_DISCORD_USER_AGENT = 'DiscordBot (modal-interactions, 1.0.0)';

/**
 * First second of 2015, the epoch of Discord snowflakes
 */
export const DISCORD_EPOCH = 1420070400000;

/**
 * Message limits enforced before a request is made
 */
export const MESSAGE_CODE_LIMIT = 2000;
export const EMBED_MAX_COUNT = 10;

/**
 * Message flags accepted on interaction responses
 */
export const MessageFlags = {
  SUPPRESS_EMBEDS: 1 << 2,
  EPHEMERAL: 1 << 6,
} as const;

/**
 * Discord JSON error codes surfaced on delete and edit calls
 */
export const DiscordErrorCode = {
  UNKNOWN_WEBHOOK: 10015,
  UNKNOWN_MESSAGE: 10008,
  UNKNOWN_INTERACTION: 10062,
  INTERACTION_ALREADY_ACKNOWLEDGED: 40060,
} as const;
