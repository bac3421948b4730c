/**
 * @fileoverview MessageContext - AsyncLocalStorage-based per-message context
 *
 * @packageDocumentation
 * @module @squadline/runtime/domain/context
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Carries the tenant resolution of the inbound message being handled
 * through every await in its handling, without threading it through
 * function parameters. Two messages handled concurrently each see their own
 * context.
 *
 * ```typescript
 * await MessageContext.run({ messageId, conversationId, teamId, resolution }, async () => {
 *   await players.list(); // deep inside: MessageContext.current().teamId
 * });
 *
 * MessageContext.tryCurrent(); // undefined outside run()
 * ```
 *
 * @see {@link https://nodejs.org/api/async_context.html | Node.js AsyncLocalStorage}
 */

import { AsyncLocalStorage } from 'async_hooks';
import type { TeamResolution } from '../tenancy';

/**
 * Data bound to one inbound message
 */
export interface MessageContextData {
  readonly messageId: string;
  readonly conversationId: string;
  readonly senderId: string;
  readonly teamId: string;
  readonly resolution: TeamResolution;
}

export class MessageContext {
  private static readonly storage = new AsyncLocalStorage<MessageContextData>();

  /**
   * Run `callback` with `data` as the current message context
   */
  static run<R>(data: MessageContextData, callback: () => R): R {
    return MessageContext.storage.run(Object.freeze({ ...data }), callback);
  }

  /**
   * @throws Error when called outside `run()`
   */
  static current(): MessageContextData {
    const data = MessageContext.storage.getStore();
    if (!data) {
      throw new Error('No message context is active; call MessageContext.run() first');
    }
    return data;
  }

  static tryCurrent(): MessageContextData | undefined {
    return MessageContext.storage.getStore();
  }

  static get teamId(): string | undefined {
    return MessageContext.storage.getStore()?.teamId;
  }
}
