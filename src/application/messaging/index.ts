/**
 * @squadline/runtime - Messaging Module
 */

export { InboundMessageHandler } from './InboundMessageHandler';
export type { InboundMessageHandlerOptions, MessageProcessor } from './InboundMessageHandler';
