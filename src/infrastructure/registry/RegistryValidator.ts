/**
 * @squadline/runtime - Registry Validator
 *
 * Metadata checks for registry items. Reports issues; never throws.
 */

import type { RegistryKind } from './types';

export type ValidationSeverity = 'error' | 'warning';

export interface ValidationIssue {
  field: string;
  message: string;
  severity: ValidationSeverity;
}

/**
 * Anything that can list its items' metadata (a `BaseRegistry`)
 */
export interface ValidatableRegistry {
  readonly kind: RegistryKind;
  entries(): Array<{ name: string; metadata: Record<string, unknown> }>;
}

const SEMVER_PATTERN = /^\d+\.\d+\.\d+$/;

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

export class RegistryValidator {
  /**
   * Check one item's metadata against the rules of its kind
   *
   * @example
   * ```typescript
   * validator.validateMetadata('command', { name: 'list', handler: listHandler });
   * // [{ field: 'name', message: "Command name must start with '/'", severity: 'error' },
   * //  { field: 'description', message: 'Command has no description', severity: 'warning' }]
   * ```
   */
  validateMetadata(kind: RegistryKind, metadata: Record<string, unknown>): ValidationIssue[] {
    const issues: ValidationIssue[] = [];

    switch (kind) {
      case 'tool':
        this.validateTool(metadata, issues);
        break;
      case 'command':
        this.validateCommand(metadata, issues);
        break;
      case 'service':
        this.validateService(metadata, issues);
        break;
    }

    const version = metadata.version;
    if (version !== undefined && !(typeof version === 'string' && SEMVER_PATTERN.test(version))) {
      issues.push({
        field: 'version',
        message: `Version '${String(version)}' is not in X.Y.Z format`,
        severity: 'error',
      });
    }

    return issues;
  }

  /**
   * Check every item already in a registry. Fields are prefixed with the
   * item name (`"/list.handler"`).
   */
  validateRegistry(registry: ValidatableRegistry): ValidationIssue[] {
    const issues: ValidationIssue[] = [];
    for (const { name, metadata } of registry.entries()) {
      for (const issue of this.validateMetadata(registry.kind, metadata)) {
        issues.push({ ...issue, field: `${name}.${issue.field}` });
      }
    }
    return issues;
  }

  hasErrors(issues: ValidationIssue[]): boolean {
    return issues.some((issue) => issue.severity === 'error');
  }

  private validateTool(metadata: Record<string, unknown>, issues: ValidationIssue[]): void {
    if (!isNonEmptyString(metadata.name)) {
      issues.push({ field: 'name', message: 'Tool name is required', severity: 'error' });
    }
    if (!isNonEmptyString(metadata.description)) {
      issues.push({ field: 'description', message: 'Tool description is required', severity: 'error' });
    }
  }

  private validateCommand(metadata: Record<string, unknown>, issues: ValidationIssue[]): void {
    const name = metadata.name;
    if (!isNonEmptyString(name)) {
      issues.push({ field: 'name', message: 'Command name is required', severity: 'error' });
    } else if (!name.startsWith('/')) {
      issues.push({ field: 'name', message: "Command name must start with '/'", severity: 'error' });
    }

    if (metadata.handler === undefined) {
      issues.push({ field: 'handler', message: 'Command handler is required', severity: 'error' });
    } else if (typeof metadata.handler !== 'function') {
      issues.push({ field: 'handler', message: 'Command handler must be a function', severity: 'error' });
    }

    if (!isNonEmptyString(metadata.description)) {
      issues.push({ field: 'description', message: 'Command has no description', severity: 'warning' });
    }
  }

  private validateService(metadata: Record<string, unknown>, issues: ValidationIssue[]): void {
    if (!isNonEmptyString(metadata.interface)) {
      issues.push({ field: 'interface', message: 'Service interface is required', severity: 'error' });
    }
    if (metadata.implementation === undefined && metadata.factory === undefined) {
      issues.push({
        field: 'implementation',
        message: 'Service needs an implementation or a factory',
        severity: 'error',
      });
    }
    if (!isNonEmptyString(metadata.description)) {
      issues.push({ field: 'description', message: 'Service has no description', severity: 'warning' });
    }
  }
}
