// pattern: Functional Core

/**
 * Capability catalog.
 * Built once from every registered provider; indexes descriptors by name and by
 * category. Read-only after construction.
 */

import type { ToolDescriptor, ToolProvider } from './types.ts';

export interface CapabilityCatalog {
  all(): Array<ToolDescriptor>;
  byCategory(): Record<string, Array<string>>;
  categoryDescriptions(): Record<string, string>;
  hasCategory(category: string): boolean;
  /** Tool names registered under a category; empty when the category is unknown. */
  categoryMembers(category: string): Array<string>;
  get(name: string): ToolDescriptor | undefined;
  resolve(name: string): ToolProvider | undefined;
}

export function createCapabilityCatalog(
  providers: ReadonlyArray<ToolProvider>,
): CapabilityCatalog {
  const descriptors = new Map<string, ToolDescriptor>();
  const owners = new Map<string, ToolProvider>();
  const categories = new Map<string, Array<string>>();
  const descriptions = new Map<string, string>();

  for (const provider of providers) {
    for (const descriptor of provider.descriptors()) {
      const existing = owners.get(descriptor.name);
      if (existing) {
        throw new Error(
          `tool already registered: ${descriptor.name} (providers ${existing.name} and ${provider.name})`,
        );
      }

      const category = descriptor.category;
      const knownDescription = descriptions.get(category.name);
      if (knownDescription !== undefined && knownDescription !== category.description) {
        throw new Error(`category ${category.name} declared with conflicting descriptions`);
      }

      descriptors.set(descriptor.name, descriptor);
      owners.set(descriptor.name, provider);
      descriptions.set(category.name, category.description);

      const members = categories.get(category.name);
      if (members) {
        members.push(descriptor.name);
      } else {
        categories.set(category.name, [descriptor.name]);
      }
    }
  }

  return {
    all(): Array<ToolDescriptor> {
      return Array.from(descriptors.values());
    },

    byCategory(): Record<string, Array<string>> {
      const result: Record<string, Array<string>> = {};
      for (const [category, names] of categories) {
        result[category] = [...names];
      }
      return result;
    },

    categoryDescriptions(): Record<string, string> {
      return Object.fromEntries(descriptions);
    },

    hasCategory(category: string): boolean {
      return categories.has(category);
    },

    categoryMembers(category: string): Array<string> {
      return [...(categories.get(category) ?? [])];
    },

    get(name: string): ToolDescriptor | undefined {
      return descriptors.get(name);
    },

    resolve(name: string): ToolProvider | undefined {
      return owners.get(name);
    },
  };
}
