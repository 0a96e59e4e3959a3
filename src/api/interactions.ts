/**
 * Interaction response and followup endpoints.
 *
 * All routes here are authenticated by the interaction token, carry no bot
 * token and do not count toward the global rate limit. Tokens stay valid
 * for 15 minutes; the initial response must be sent within 3 seconds.
 */

import { ApiResource } from './base.js';
import {
  MessageContentParams,
  assertValid,
  toMessageBody,
  validateMessageContent,
} from './validation.js';
import { Routes } from '../routes/index.js';
import {
  FileAttachment,
  InteractionCallbackData,
  InteractionMessageData,
  InteractionResponse,
  InteractionResponseType,
  Message,
  MessageFlags,
  Snowflake,
} from '../types/index.js';

export interface FollowupParams extends MessageContentParams {
  /** Only the invoking user sees the message */
  ephemeral?: boolean;
}

const MESSAGE_RESPONSE_TYPES: ReadonlySet<InteractionResponseType> = new Set([
  InteractionResponseType.ChannelMessageWithSource,
  InteractionResponseType.UpdateMessage,
]);

function isMessageData(data: InteractionCallbackData): data is InteractionMessageData {
  return !('choices' in data) && !('custom_id' in data && 'title' in data);
}

function validateResponse(errors: string[], response: InteractionResponse, files?: FileAttachment[]): void {
  const { data } = response;
  if (!data) {
    if (MESSAGE_RESPONSE_TYPES.has(response.type)) {
      errors.push('Message responses need data');
    }
    return;
  }

  if (response.type === InteractionResponseType.ApplicationCommandAutocompleteResult) {
    if (!('choices' in data)) {
      errors.push('Autocomplete responses need choices');
    } else if (data.choices.length > 25) {
      errors.push('Autocomplete responses have at most 25 choices');
    }
    return;
  }

  if (response.type === InteractionResponseType.Modal) {
    if (!('custom_id' in data && 'title' in data)) {
      errors.push('Modal responses need custom_id, title and components');
    }
    return;
  }

  if (isMessageData(data)) {
    validateMessageContent(
      errors,
      { content: data.content, embeds: data.embeds, components: data.components, files },
      { requireContent: response.type === InteractionResponseType.ChannelMessageWithSource }
    );
  }
}

export class InteractionsApi extends ApiResource {
  /**
   * Sends the initial response to an interaction.
   */
  async createResponse(
    interactionId: Snowflake,
    interactionToken: string,
    response: InteractionResponse,
    files?: FileAttachment[]
  ): Promise<void> {
    const errors: string[] = [];
    validateResponse(errors, response, files);
    assertValid(errors);

    await this.transport.executeVoid({
      method: 'POST',
      route: Routes.interactionCallback,
      params: { interaction_id: interactionId, interaction_token: interactionToken },
      body: response,
      files,
      attachmentsIn: 'data',
      operation: 'interactions.createResponse',
    });
    this.logger.debug('Interaction response sent', { interactionId, type: response.type });
  }

  async getOriginalResponse(applicationId: Snowflake, interactionToken: string): Promise<Message> {
    return this.transport.execute<Message>({
      method: 'GET',
      route: Routes.interactionOriginal,
      params: { webhook_id: applicationId, interaction_token: interactionToken },
      operation: 'interactions.getOriginalResponse',
    });
  }

  async editOriginalResponse(
    applicationId: Snowflake,
    interactionToken: string,
    params: MessageContentParams
  ): Promise<Message> {
    const errors: string[] = [];
    validateMessageContent(errors, params, { requireContent: false });
    assertValid(errors);

    return this.transport.execute<Message>({
      method: 'PATCH',
      route: Routes.interactionOriginal,
      params: { webhook_id: applicationId, interaction_token: interactionToken },
      body: toMessageBody(params),
      files: params.files,
      operation: 'interactions.editOriginalResponse',
    });
  }

  async deleteOriginalResponse(applicationId: Snowflake, interactionToken: string): Promise<void> {
    await this.transport.executeVoid({
      method: 'DELETE',
      route: Routes.interactionOriginal,
      params: { webhook_id: applicationId, interaction_token: interactionToken },
      operation: 'interactions.deleteOriginalResponse',
    });
  }

  async createFollowup(
    applicationId: Snowflake,
    interactionToken: string,
    params: FollowupParams
  ): Promise<Message> {
    const errors: string[] = [];
    validateMessageContent(errors, params, { requireContent: true });
    assertValid(errors);

    const body = toMessageBody(params);
    if (params.ephemeral) {
      body.flags = (params.flags ?? 0) | MessageFlags.Ephemeral;
    }

    return this.transport.execute<Message>({
      method: 'POST',
      route: Routes.interactionFollowups,
      params: { webhook_id: applicationId, interaction_token: interactionToken },
      body,
      files: params.files,
      operation: 'interactions.createFollowup',
    });
  }

  async getFollowup(applicationId: Snowflake, interactionToken: string, messageId: Snowflake): Promise<Message> {
    return this.transport.execute<Message>({
      method: 'GET',
      route: Routes.interactionFollowup,
      params: { webhook_id: applicationId, interaction_token: interactionToken, message_id: messageId },
      operation: 'interactions.getFollowup',
    });
  }

  async editFollowup(
    applicationId: Snowflake,
    interactionToken: string,
    messageId: Snowflake,
    params: MessageContentParams
  ): Promise<Message> {
    const errors: string[] = [];
    validateMessageContent(errors, params, { requireContent: false });
    assertValid(errors);

    return this.transport.execute<Message>({
      method: 'PATCH',
      route: Routes.interactionFollowup,
      params: { webhook_id: applicationId, interaction_token: interactionToken, message_id: messageId },
      body: toMessageBody(params),
      files: params.files,
      operation: 'interactions.editFollowup',
    });
  }

  async deleteFollowup(applicationId: Snowflake, interactionToken: string, messageId: Snowflake): Promise<void> {
    await this.transport.executeVoid({
      method: 'DELETE',
      route: Routes.interactionFollowup,
      params: { webhook_id: applicationId, interaction_token: interactionToken, message_id: messageId },
      operation: 'interactions.deleteFollowup',
    });
  }
}
