/**
 * @squadline/runtime - Context Module
 *
 * Per-message context propagation
 */

export { MessageContext } from './MessageContext';
export type { MessageContextData } from './MessageContext';
