// This module models announced protocol capabilities as fixed well-known slots plus open-ended extensions.

import { AppError } from '../utils/errors.js';
import { isRecord } from '../utils/json.js';

export const WELL_KNOWN_CAPABILITIES = [
  'experimental',
  'logging',
  'completions',
  'prompts',
  'resources',
  'tools'
] as const;

export type WellKnownCapability = (typeof WELL_KNOWN_CAPABILITIES)[number];

export type CapabilityOptions = Record<string, unknown>;

export type CapabilityRecord = Partial<Record<WellKnownCapability, CapabilityOptions>> & Record<string, unknown>;

function isWellKnown(name: string): name is WellKnownCapability {
  return WELL_KNOWN_CAPABILITIES.some((slot) => slot === name);
}

// Slot and extension objects are copied on the way in and out so no two sets share a mapping.
function copyValue(value: unknown): unknown {
  return isRecord(value) ? { ...value } : value;
}

/**
 * Capability announcement exchanged during negotiation.
 *
 * A well-known slot is either absent or a mapping of sub-options. Any other name lives in the extension map
 * and may hold any value. Instances only change through `set`/`unset`; `merge` always returns a new set.
 */
export class CapabilitySet {
  private readonly slots = new Map<WellKnownCapability, CapabilityOptions>();
  private readonly extensions = new Map<string, unknown>();

  public static fromRecord(record: Record<string, unknown>): CapabilitySet {
    const set = new CapabilitySet();
    for (const [name, value] of Object.entries(record)) {
      set.set(name, value);
    }
    return set;
  }

  public get(name: string): unknown {
    if (isWellKnown(name)) {
      return copyValue(this.slots.get(name));
    }

    return copyValue(this.extensions.get(name));
  }

  // Setting null or undefined makes the capability absent.
  public set(name: string, value: unknown): void {
    if (value === undefined || value === null) {
      this.unset(name);
      return;
    }

    if (isWellKnown(name)) {
      if (!isRecord(value)) {
        throw new AppError(400, 'invalid_capability', `Capability ${name} must be an object.`, {
          name,
          receivedType: Array.isArray(value) ? 'array' : typeof value
        });
      }

      this.slots.set(name, { ...value });
      return;
    }

    this.extensions.set(name, copyValue(value));
  }

  public has(name: string): boolean {
    return isWellKnown(name) ? this.slots.has(name) : this.extensions.has(name);
  }

  public unset(name: string): void {
    if (isWellKnown(name)) {
      this.slots.delete(name);
      return;
    }

    this.extensions.delete(name);
  }

  public toRecord(): CapabilityRecord {
    const result: CapabilityRecord = {};

    for (const slot of WELL_KNOWN_CAPABILITIES) {
      const options = this.slots.get(slot);
      if (options) {
        result[slot] = { ...options };
      }
    }

    for (const [name, value] of this.extensions) {
      if (!Object.hasOwn(result, name)) {
        // Defined rather than assigned so names such as "__proto__" stay plain keys.
        Object.defineProperty(result, name, {
          value: copyValue(value),
          enumerable: true,
          writable: true,
          configurable: true
        });
      }
    }

    return result;
  }

  public toJSON(): CapabilityRecord {
    return this.toRecord();
  }

  /**
   * Returns a new set where `other` wins: its slots are key-wise unioned over ours, its extension mappings are
   * unioned over ours when both sides are mappings, and any other extension value replaces ours.
   */
  public merge(other: CapabilitySet): CapabilitySet {
    const result = CapabilitySet.fromRecord(this.toRecord());

    for (const slot of WELL_KNOWN_CAPABILITIES) {
      const incoming = other.slots.get(slot);
      if (!incoming) {
        continue;
      }

      const current = result.slots.get(slot);
      result.slots.set(slot, current ? { ...current, ...incoming } : { ...incoming });
    }

    for (const [name, incoming] of other.extensions) {
      const current = result.extensions.get(name);
      if (isRecord(current) && isRecord(incoming)) {
        result.extensions.set(name, { ...current, ...incoming });
      } else {
        result.extensions.set(name, copyValue(incoming));
      }
    }

    return result;
  }
}
