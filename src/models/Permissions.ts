import { z } from 'zod';

/**
 * Discord permission bits
 */
export const PermissionFlags = {
  CREATE_INSTANT_INVITE: 1n << 0n,
  KICK_MEMBERS: 1n << 1n,
  BAN_MEMBERS: 1n << 2n,
  ADMINISTRATOR: 1n << 3n,
  MANAGE_CHANNELS: 1n << 4n,
  MANAGE_GUILD: 1n << 5n,
  ADD_REACTIONS: 1n << 6n,
  VIEW_AUDIT_LOG: 1n << 7n,
  PRIORITY_SPEAKER: 1n << 8n,
  STREAM: 1n << 9n,
  VIEW_CHANNEL: 1n << 10n,
  SEND_MESSAGES: 1n << 11n,
  SEND_TTS_MESSAGES: 1n << 12n,
  MANAGE_MESSAGES: 1n << 13n,
  EMBED_LINKS: 1n << 14n,
  ATTACH_FILES: 1n << 15n,
  READ_MESSAGE_HISTORY: 1n << 16n,
  MENTION_EVERYONE: 1n << 17n,
  USE_EXTERNAL_EMOJIS: 1n << 18n,
  VIEW_GUILD_INSIGHTS: 1n << 19n,
  CONNECT: 1n << 20n,
  SPEAK: 1n << 21n,
  MUTE_MEMBERS: 1n << 22n,
  DEAFEN_MEMBERS: 1n << 23n,
  MOVE_MEMBERS: 1n << 24n,
  USE_VAD: 1n << 25n,
  CHANGE_NICKNAME: 1n << 26n,
  MANAGE_NICKNAMES: 1n << 27n,
  MANAGE_ROLES: 1n << 28n,
  MANAGE_WEBHOOKS: 1n << 29n,
  MANAGE_GUILD_EXPRESSIONS: 1n << 30n,
  USE_APPLICATION_COMMANDS: 1n << 31n,
  REQUEST_TO_SPEAK: 1n << 32n,
  MANAGE_EVENTS: 1n << 33n,
  MANAGE_THREADS: 1n << 34n,
  CREATE_PUBLIC_THREADS: 1n << 35n,
  CREATE_PRIVATE_THREADS: 1n << 36n,
  USE_EXTERNAL_STICKERS: 1n << 37n,
  SEND_MESSAGES_IN_THREADS: 1n << 38n,
  USE_EMBEDDED_ACTIVITIES: 1n << 39n,
  MODERATE_MEMBERS: 1n << 40n,
} as const;

export type PermissionName = keyof typeof PermissionFlags;

function isPermissionName(name: string): name is PermissionName {
  return name in PermissionFlags;
}

const PERMISSION_NAMES = Object.keys(PermissionFlags).filter(isPermissionName);

/**
 * Immutable set of permission bits
 */
export class Permissions {
  readonly bits: bigint;

  constructor(bits: bigint = 0n) {
    this.bits = bits;
    Object.freeze(this);
  }

  /**
   * Parse the decimal string form used on the wire
   */
  static from(value: string | bigint): Permissions {
    return new Permissions(typeof value === 'bigint' ? value : BigInt(value));
  }

  static of(...names: PermissionName[]): Permissions {
    return new Permissions(names.reduce((bits, name) => bits | PermissionFlags[name], 0n));
  }

  has(name: PermissionName): boolean {
    const flag = PermissionFlags[name];
    return (this.bits & flag) === flag;
  }

  with(...names: PermissionName[]): Permissions {
    return new Permissions(names.reduce((bits, name) => bits | PermissionFlags[name], this.bits));
  }

  without(...names: PermissionName[]): Permissions {
    return new Permissions(names.reduce((bits, name) => bits & ~PermissionFlags[name], this.bits));
  }

  /**
   * Names of the known flags that are set, lowest bit first
   */
  toArray(): PermissionName[] {
    return PERMISSION_NAMES.filter((name) => this.has(name));
  }

  equals(other: Permissions): boolean {
    return this.bits === other.bits;
  }

  toString(): string {
    return this.bits.toString();
  }

  toJSON(): string {
    return this.toString();
  }
}

export const permissionsSchema = z
  .string()
  .regex(/^\d+$/, 'Expected permission bits as a decimal string')
  .transform((value) => Permissions.from(value));
