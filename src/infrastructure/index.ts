/**
 * @fileoverview Infrastructure Layer Exports
 * @description
 * Implementations behind the runtime's core services:
 *
 * - **Cache**: expiring tenant cache with background sweep
 * - **Registry**: capability registries, discovery, validation and metrics
 * - **Store**: in-process document store
 * - **Concurrency**: async mutual exclusion
 *
 * @packageDocumentation
 * @module @squadline/runtime/infrastructure
 */

export * from './cache';
export * from './concurrency';
export * from './registry';
export * from './store';
