/**
 * @module @squadline/runtime/application
 * @description Application layer exports
 */

// ============================================================================
// Configuration
// ============================================================================

export * from './config';

// ============================================================================
// Dependency Injection
// ============================================================================

export * from './di';

// ============================================================================
// Host, Background Services & Composition Root
// ============================================================================

export * from './host';

// ============================================================================
// Inbound Messages
// ============================================================================

export * from './messaging';

// ============================================================================
// Ports
// ============================================================================

export * from './ports';

// ============================================================================
// Tenancy
// ============================================================================

export * from './tenancy';
