/**
 * Message component types
 */
export enum ComponentType {
  ACTION_ROW = 1,
  BUTTON = 2,
  STRING_SELECT = 3,
  INPUT_TEXT = 4,
  USER_SELECT = 5,
  ROLE_SELECT = 6,
  MENTIONABLE_SELECT = 7,
  CHANNEL_SELECT = 8,
}

/**
 * Text input styles
 */
export enum InputTextStyle {
  SHORT = 1,
  PARAGRAPH = 2,
}

