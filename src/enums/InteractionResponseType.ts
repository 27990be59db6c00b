/**
 * Interaction callback types
 */
export enum InteractionResponseType {
  /** ACK a ping */
  PONG = 1,
  /** Respond with a message */
  CHANNEL_MESSAGE_WITH_SOURCE = 4,
  /** ACK and edit a response later, the user sees a loading state */
  DEFERRED_CHANNEL_MESSAGE_WITH_SOURCE = 5,
  /** ACK and edit the originating message later */
  DEFERRED_UPDATE_MESSAGE = 6,
  /** Edit the message the component was attached to */
  UPDATE_MESSAGE = 7,
  /** Respond to an autocomplete interaction */
  APPLICATION_COMMAND_AUTOCOMPLETE_RESULT = 8,
  /** Respond with a popup modal */
  MODAL = 9,
}
