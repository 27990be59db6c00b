import { ApplicationId, InteractionId, MessageId } from '../utils/snowflake';

/**
 * Request path plus a label safe to log, with the token left out
 */
export interface Route {
  path: string;
  label: string;
}

export function interactionCallback(interactionId: InteractionId, token: string): Route {
  return {
    path: `/interactions/${interactionId}/${encodeURIComponent(token)}/callback`,
    label: `/interactions/${interactionId}/:token/callback`,
  };
}

export function originalResponse(applicationId: ApplicationId, token: string): Route {
  return {
    path: `/webhooks/${applicationId}/${encodeURIComponent(token)}/messages/@original`,
    label: `/webhooks/${applicationId}/:token/messages/@original`,
  };
}

export function followupMessages(applicationId: ApplicationId, token: string): Route {
  return {
    path: `/webhooks/${applicationId}/${encodeURIComponent(token)}`,
    label: `/webhooks/${applicationId}/:token`,
  };
}

export function followupMessage(applicationId: ApplicationId, token: string, messageId: MessageId): Route {
  const message = encodeURIComponent(messageId);
  return {
    path: `/webhooks/${applicationId}/${encodeURIComponent(token)}/messages/${message}`,
    label: `/webhooks/${applicationId}/:token/messages/${message}`,
  };
}
