// backend/services/shared/src/binding/DescriptorCache.ts
/**
 * Purpose:
 * - Process-lifetime cache: record class → TypeDescriptor.
 * - Built lazily on first reference; never evicted.
 *
 * Invariants:
 * - Access is "load, else compute-and-store-if-absent". If two callers both
 *   compute, the first stored descriptor is the one every caller gets.
 * - Descriptor construction is synchronous, so no event-loop turn can
 *   interleave between the miss and the store.
 * - Non-class keys are never stored; they map to EMPTY_DESCRIPTOR.
 */

import { buildDescriptor, EMPTY_DESCRIPTOR, type TypeDescriptor } from "./descriptor";

export class DescriptorCache {
  readonly #entries = new Map<Function, TypeDescriptor>();
  readonly #build: (type: Function) => TypeDescriptor;

  constructor(build: (type: Function) => TypeDescriptor = buildDescriptor) {
    this.#build = build;
  }

  /** Descriptor for `type`, building and storing it on first use. */
  public get(type: unknown): TypeDescriptor {
    if (typeof type !== "function") return EMPTY_DESCRIPTOR;
    const hit = this.#entries.get(type);
    if (hit) return hit;
    return this.loadOrStore(type, this.#build(type));
  }

  /** Store `descriptor` unless one is already present; return whichever is stored. */
  public loadOrStore(type: Function, descriptor: TypeDescriptor): TypeDescriptor {
    const existing = this.#entries.get(type);
    if (existing) return existing;
    this.#entries.set(type, descriptor);
    return descriptor;
  }

  public has(type: Function): boolean {
    return this.#entries.has(type);
  }

  public get size(): number {
    return this.#entries.size;
  }
}

const defaultCache = new DescriptorCache();

/** Descriptor lookup against the process-wide cache. */
export function getDescriptor(type: unknown): TypeDescriptor {
  return defaultCache.get(type);
}

/** Descriptor for a record instance, keyed by its constructor. */
export function descriptorOf(record: object): TypeDescriptor {
  const proto: unknown = Object.getPrototypeOf(record);
  if (typeof proto !== "object" || proto === null) return EMPTY_DESCRIPTOR;
  return defaultCache.get(Reflect.get(proto, "constructor"));
}
