/**
 * @squadline/runtime - Inbound Message Handler
 *
 * Boundary between a chat transport and the business services: resolves the
 * tenant, opens a request scope and a message context, dispatches, and turns
 * failures into user-safe replies.
 */

import {
  NOT_LINKED_USER_MESSAGE,
  RuntimeError,
  describeError,
  toUserMessage,
} from '../../domain/exceptions';
import { MessageContext, type MessageContextData } from '../../domain/context/MessageContext';
import type { CapabilityContext, CommandRegistry } from '../../infrastructure/registry';
import type { DependencyContainer } from '../di';
import { consoleLogger, type ILogger } from '../host/host';
import type { InboundMessage, InboundMessageListener } from '../ports';
import type { TeamMappingService } from '../tenancy/TeamMappingService';

/**
 * Handles messages that are not slash commands (the natural-language path)
 */
export type MessageProcessor = (message: InboundMessage, context: MessageContextData) => Promise<string | undefined>;

export interface InboundMessageHandlerOptions {
  teamMapping: TeamMappingService;
  container: DependencyContainer;
  commands?: CommandRegistry;
  fallback?: MessageProcessor;
  logger?: ILogger;
}

export class InboundMessageHandler {
  private readonly teamMapping: TeamMappingService;
  private readonly container: DependencyContainer;
  private readonly commands?: CommandRegistry;
  private readonly fallback?: MessageProcessor;
  private readonly logger: ILogger;

  constructor(options: InboundMessageHandlerOptions) {
    this.teamMapping = options.teamMapping;
    this.container = options.container;
    this.commands = options.commands;
    this.fallback = options.fallback;
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Reply for `message`, or undefined when nothing handled it. Never
   * rejects.
   */
  async handle(message: InboundMessage): Promise<string | undefined> {
    const resolution = this.teamMapping.resolve(message.conversationId);
    if (!resolution) {
      this.logger.warn(`Message ${message.id} from unlinked chat ${message.conversationId}`);
      return NOT_LINKED_USER_MESSAGE;
    }

    const context: MessageContextData = {
      messageId: message.id,
      conversationId: message.conversationId,
      senderId: message.senderId,
      teamId: resolution.teamId,
      resolution,
    };

    try {
      return await this.container.runInRequestScope(() =>
        MessageContext.run(context, () => this.dispatch(message, context)),
      );
    } catch (error) {
      const code = error instanceof RuntimeError ? error.code : 'UNEXPECTED';
      this.logger.error(
        `[${code}] Failed to handle message ${message.id} in chat ${message.conversationId} ` +
          `(team ${resolution.teamId}): ${describeError(error)}`,
      );
      return toUserMessage(error);
    }
  }

  /**
   * `handle` bound for `IChatTransport.onMessage`
   */
  listener(): InboundMessageListener {
    return (message) => this.handle(message);
  }

  private async dispatch(message: InboundMessage, context: MessageContextData): Promise<string | undefined> {
    const command = this.commands?.match(message.text);
    if (command) {
      const args = message.text.trim().split(/\s+/).slice(1);
      const capabilityContext: CapabilityContext = {
        teamId: context.teamId,
        conversationId: context.conversationId,
        senderId: context.senderId,
      };
      this.logger.debug(`Dispatching ${command.name} for team ${context.teamId}`);
      return command.handler(args, capabilityContext);
    }

    return this.fallback?.(message, context);
  }
}
