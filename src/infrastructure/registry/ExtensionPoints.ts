/**
 * @squadline/runtime - Extension Points
 *
 * Startup-time table of named groups, each mapping entry names to loaders
 * that produce capabilities.
 */

import type { Capability } from './types';

/** Well-known groups, one per registry */
export const EXTENSION_GROUPS = {
  tools: 'tools',
  commands: 'commands',
  services: 'services',
} as const;

export type ExtensionGroup = (typeof EXTENSION_GROUPS)[keyof typeof EXTENSION_GROUPS];

/**
 * Produces one capability or several; may be async (a dynamic `import()`)
 */
export type ExtensionLoader<T extends Capability = Capability> = () => T | T[] | Promise<T | T[]>;

export interface ExtensionEntry<T extends Capability = Capability> {
  group: string;
  name: string;
  load: ExtensionLoader<T>;
}

/**
 * ExtensionPointCatalog
 *
 * @example
 * ```typescript
 * const catalog = new ExtensionPointCatalog()
 *   .add('tools', 'players', () => import('./tools/players').then((m) => m.playerTools))
 *   .add('commands', 'help', () => helpCommand);
 *
 * await toolRegistry.discoverFromEntryPoints('tools');
 * ```
 */
export class ExtensionPointCatalog {
  private groups: Map<string, Map<string, ExtensionLoader>> = new Map();

  /**
   * Add (or replace) the loader `name` in `group`
   */
  add(group: string, name: string, load: ExtensionLoader): this {
    let entries = this.groups.get(group);
    if (!entries) {
      entries = new Map();
      this.groups.set(group, entries);
    }
    entries.set(name, load);
    return this;
  }

  remove(group: string, name: string): boolean {
    return this.groups.get(group)?.delete(name) ?? false;
  }

  /**
   * Entries of a group in insertion order; empty for an unknown group
   */
  entries(group: string): ExtensionEntry[] {
    const entries = this.groups.get(group);
    if (!entries) return [];
    return Array.from(entries, ([name, load]) => ({ group, name, load }));
  }

  groupNames(): string[] {
    return Array.from(this.groups.keys());
  }

  clear(): void {
    this.groups.clear();
  }
}
