/**
 * @fileoverview In-process chat transport for host and messaging tests
 */

import type { IChatTransport, InboundMessage, InboundMessageListener } from '../../src';

export class FakeTransport implements IChatTransport {
  readonly sent: Array<{ conversationId: string; text: string }> = [];
  started = false;
  private listener?: InboundMessageListener;
  private nextId = 1;

  constructor(readonly name = 'fake') {}

  onMessage(listener: InboundMessageListener): void {
    this.listener = listener;
  }

  async start(): Promise<void> {
    this.started = true;
  }

  async stop(): Promise<void> {
    this.started = false;
  }

  async send(conversationId: string, text: string): Promise<void> {
    this.sent.push({ conversationId, text });
  }

  /**
   * Hand a message to the listener and send its reply back, as a real
   * transport would
   */
  async deliver(conversationId: string, text: string, senderId = 'user-1'): Promise<string | undefined> {
    if (!this.listener) {
      throw new Error(`Transport ${this.name} has no listener`);
    }

    const message: InboundMessage = {
      id: `m-${this.nextId++}`,
      conversationId,
      senderId,
      text,
      receivedAt: new Date(),
    };
    const reply = await this.listener(message);
    if (reply !== undefined) {
      await this.send(conversationId, reply);
    }
    return reply;
  }
}
