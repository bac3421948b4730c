/**
 * @squadline/runtime - Chat Transport Port
 *
 * The transport delivers inbound messages tagged with a conversation id and
 * sends replies back. Its wire protocol is not part of this package.
 */

/**
 * Message as delivered by a transport
 */
export interface InboundMessage {
  /** Transport message id */
  id: string;

  /** Chat/group the message arrived on */
  conversationId: string;

  /** Transport user id of the sender */
  senderId: string;

  text: string;

  receivedAt: Date;
}

/**
 * Callback a transport invokes per inbound message; the returned text, if
 * any, is sent back to the same conversation.
 */
export type InboundMessageListener = (message: InboundMessage) => Promise<string | undefined>;

/**
 * Chat transport contract
 */
export interface IChatTransport {
  readonly name: string;

  onMessage(listener: InboundMessageListener): void;

  start(): Promise<void>;

  stop(): Promise<void>;

  send(conversationId: string, text: string): Promise<void>;
}
