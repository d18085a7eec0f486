// pattern: Imperative Shell

/**
 * Gating policy: which non-baseline tools are currently elevated, and until when.
 *
 * State is in-memory only and starts at baseline-only. Every operation is
 * synchronous, so checks and mutations never interleave on the event loop.
 * Expiry is evaluated lazily: the first operation that observes a lapsed TTL
 * drops the elevation back to baseline before doing its own work.
 */

import type { CapabilityCatalog } from './catalog.ts';
import type { Clock, ToolDescriptor } from './types.ts';

const MS_PER_MINUTE = 60_000;

export type ElevationResult = {
  readonly enabled: Array<string>;
  readonly unknown: Array<string>;
};

export type GatingSnapshot = {
  readonly enabled: Array<string>;
  readonly expiresAt: Date | null;
};

export interface GatingPolicy {
  isCallable(descriptor: ToolDescriptor, now?: number): boolean;
  /** Replaces the elevated set; it does not add to it. */
  enable(names: ReadonlyArray<string>, now?: number): ElevationResult;
  enableCategories(categories: ReadonlyArray<string>, now?: number): ElevationResult;
  setTTL(minutes: number, now?: number): Date;
  reset(): void;
  snapshot(now?: number): GatingSnapshot;
}

function unique(values: ReadonlyArray<string>): Array<string> {
  return Array.from(new Set(values));
}

export function createGatingPolicy(
  catalog: CapabilityCatalog,
  clock: Clock = Date.now,
): GatingPolicy {
  let enabledNames: Set<string> | null = null;
  let expiresAt: number | null = null;

  function lapse(now: number): void {
    if (expiresAt !== null && now >= expiresAt) {
      console.log(`[gating] elevation expired at ${new Date(expiresAt).toISOString()}`);
      enabledNames = null;
      expiresAt = null;
    }
  }

  function enabledList(): Array<string> {
    return enabledNames ? Array.from(enabledNames).sort() : [];
  }

  function enable(names: ReadonlyArray<string>, now: number = clock()): ElevationResult {
    lapse(now);

    const requested = unique(names);
    const known = requested.filter((name) => catalog.get(name) !== undefined);
    const unknown = requested.filter((name) => catalog.get(name) === undefined);

    enabledNames = new Set(known);
    if (unknown.length > 0) {
      console.warn(`[gating] ignoring unknown tools: ${unknown.join(', ')}`);
    }
    console.log(`[gating] enabled tools: ${known.join(', ') || '(none)'}`);

    return { enabled: enabledList(), unknown };
  }

  return {
    isCallable(descriptor: ToolDescriptor, now: number = clock()): boolean {
      if (descriptor.isBaseline) {
        return true;
      }
      lapse(now);
      return enabledNames !== null && enabledNames.has(descriptor.name);
    },

    enable,

    enableCategories(
      categories: ReadonlyArray<string>,
      now: number = clock(),
    ): ElevationResult {
      const requested = unique(categories);
      const unknown = requested.filter((category) => !catalog.hasCategory(category));
      const names = requested.flatMap((category) => catalog.categoryMembers(category));

      if (unknown.length > 0) {
        console.warn(`[gating] unknown categories: ${unknown.join(', ')}`);
      }

      const result = enable(names, now);
      return { enabled: result.enabled, unknown };
    },

    setTTL(minutes: number, now: number = clock()): Date {
      if (!Number.isFinite(minutes) || minutes <= 0) {
        throw new Error(`ttl must be a positive number of minutes, got ${minutes}`);
      }
      lapse(now);
      expiresAt = now + minutes * MS_PER_MINUTE;
      console.log(`[gating] elevation ttl set to ${minutes} minutes`);
      return new Date(expiresAt);
    },

    reset(): void {
      enabledNames = null;
      expiresAt = null;
      console.log('[gating] reset to baseline');
    },

    snapshot(now: number = clock()): GatingSnapshot {
      lapse(now);
      return {
        enabled: enabledList(),
        expiresAt: expiresAt === null ? null : new Date(expiresAt),
      };
    },
  };
}
