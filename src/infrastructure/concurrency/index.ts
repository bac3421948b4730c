/**
 * @squadline/runtime - Concurrency Module
 */

export { AsyncLock } from './AsyncLock';
