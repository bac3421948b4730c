/**
 * @module @squadline/runtime/domain
 * @description Domain layer exports
 */

// ============================================================================
// Message Context
// ============================================================================

export * from './context';

// ============================================================================
// Error Taxonomy
// ============================================================================

export * from './exceptions';

// ============================================================================
// Tenancy
// ============================================================================

export * from './tenancy';
