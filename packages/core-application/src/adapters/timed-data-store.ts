import type { DataStore } from "../ports/data-store";
import { withTimeout } from "../application/with-timeout";

/** Bounds every call of the wrapped store; overruns reject with StoreTimeoutError. */
export class TimedDataStore implements DataStore {
  constructor(private readonly inner: DataStore, private readonly timeoutMs: number) {}

  get description(): string {
    return this.inner.description;
  }

  put(key: string, data: Buffer): Promise<void> {
    return withTimeout(`put ${key}`, this.timeoutMs, () => this.inner.put(key, data));
  }

  putIfAbsent(key: string, data: Buffer): Promise<boolean> {
    return withTimeout(`putIfAbsent ${key}`, this.timeoutMs, () =>
      this.inner.putIfAbsent(key, data)
    );
  }

  get(key: string): Promise<Buffer> {
    return withTimeout(`get ${key}`, this.timeoutMs, () => this.inner.get(key));
  }

  exists(key: string): Promise<boolean> {
    return withTimeout(`exists ${key}`, this.timeoutMs, () => this.inner.exists(key));
  }

  list(prefix: string): Promise<string[]> {
    return withTimeout(`list ${prefix}`, this.timeoutMs, () => this.inner.list(prefix));
  }

  delete(key: string): Promise<void> {
    return withTimeout(`delete ${key}`, this.timeoutMs, () => this.inner.delete(key));
  }

  async close(): Promise<void> {
    await this.inner.close?.();
  }
}
