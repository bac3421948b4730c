/**
 * @fileoverview @squadline/runtime - Multi-tenant runtime for a team chat bot
 * @description
 * Runtime composition and tenant resolution for a chat bot that serves many
 * sports teams from one process.
 *
 * ## Architecture Layers
 *
 * - **Domain**: error taxonomy, tenancy types, per-message context
 * - **Application**: DI container, settings, host and composition root,
 *   team mapping, inbound message boundary, ports
 * - **Infrastructure**: TTL cache and sweep, capability registries with
 *   discovery and metrics, in-memory document store
 *
 * @example
 * ```typescript
 * import { createRuntime, loadSettings } from '@squadline/runtime';
 *
 * const runtime = createRuntime(loadSettings(), { transports: [telegram] });
 * await runtime.start();
 * ```
 *
 * @packageDocumentation
 * @module @squadline/runtime
 */

// ============================================================================
// DOMAIN LAYER EXPORTS
// ============================================================================

export * from './domain';

// ============================================================================
// APPLICATION LAYER EXPORTS
// ============================================================================

export * from './application';

// ============================================================================
// INFRASTRUCTURE LAYER EXPORTS
// ============================================================================

export * from './infrastructure';
