import type { DataStore } from "../ports/data-store";
import { assertSafeKey } from "../application/backup-layout";
import { KeyNotFoundError } from "../application/errors";

const registry = new Map<string, MemoryDataStore>();

/**
 * In-process DataStore. Every check-and-set runs synchronously inside one
 * turn of the event loop, so `putIfAbsent` is exclusive across callers.
 */
export class MemoryDataStore implements DataStore {
  private readonly values = new Map<string, Buffer>();

  constructor(readonly name = "default") {}

  /** Process-wide store for `memory://<name>` destinations. */
  static named(name: string): MemoryDataStore {
    let store = registry.get(name);
    if (!store) {
      store = new MemoryDataStore(name);
      registry.set(name, store);
    }
    return store;
  }

  static forget(name: string): void {
    registry.delete(name);
  }

  get description(): string {
    return `memory://${this.name}`;
  }

  async put(key: string, data: Buffer): Promise<void> {
    assertSafeKey(key);
    this.values.set(key, Buffer.from(data));
  }

  async putIfAbsent(key: string, data: Buffer): Promise<boolean> {
    assertSafeKey(key);
    if (this.values.has(key)) return false;
    this.values.set(key, Buffer.from(data));
    return true;
  }

  async get(key: string): Promise<Buffer> {
    const value = this.values.get(key);
    if (!value) throw new KeyNotFoundError(key);
    return Buffer.from(value);
  }

  async exists(key: string): Promise<boolean> {
    return this.values.has(key);
  }

  async list(prefix: string): Promise<string[]> {
    return [...this.values.keys()].filter((k) => k.startsWith(prefix)).sort();
  }

  async delete(key: string): Promise<void> {
    this.values.delete(key);
  }
}
