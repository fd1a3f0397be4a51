import fs from "fs/promises";
import path from "path";

import type { CachedManifest, ManifestCache } from "../ports/manifest-cache";
import type { Clock } from "../ports/clock";
import { systemClock } from "../ports/clock";
import type { Logger } from "../ports/logger";
import { silentLogger } from "../ports/logger";
import { describeError, errorCode } from "../application/errors";
import { decodeManifest, encodeManifest } from "../application/manifest-codec";
import { fingerprintBytes } from "../services/fingerprint";
import { TEMP_MARKER } from "./path-filter";

/** Cache directory for the backups of one destination. */
export function manifestsDir(stateDir: string, destinationDescription: string): string {
  return path.join(stateDir, "manifests", fingerprintBytes(destinationDescription).slice(0, 16));
}

/**
 * Node implementation of the ManifestCache port: one JSON document per
 * backup inside `dir`. A cache that cannot be read is reported and treated
 * as missing; the chain can always rebuild it.
 */
export class NodeManifestCache implements ManifestCache {
  constructor(
    private readonly dir: string,
    private readonly deps: { clock?: Clock; logger?: Logger } = {}
  ) {}

  private manifestFile(backupName: string): string {
    return path.join(this.dir, `${backupName}.json`);
  }

  async load(backupName: string): Promise<CachedManifest | null> {
    const file = this.manifestFile(backupName);
    let content: string;
    try {
      content = await fs.readFile(file, "utf-8");
    } catch (err) {
      if (errorCode(err) === "ENOENT") return null;
      throw err;
    }

    try {
      const decoded = decodeManifest(content);
      if (decoded.backupName !== backupName) return null;
      return decoded;
    } catch (err) {
      (this.deps.logger ?? silentLogger).warn("ignoring unreadable manifest cache", {
        file,
        error: describeError(err),
      });
      return null;
    }
  }

  async save(entry: CachedManifest): Promise<void> {
    const file = this.manifestFile(entry.backupName);
    await fs.mkdir(this.dir, { recursive: true });

    const text = encodeManifest({
      backupName: entry.backupName,
      sequence: entry.sequence,
      manifest: entry.manifest,
      savedAt: (this.deps.clock ?? systemClock).now(),
    });
    const tmp = `${file}${TEMP_MARKER}${process.pid}`;
    await fs.writeFile(tmp, text, "utf-8");
    await fs.rename(tmp, file);
  }

  async clear(backupName: string): Promise<void> {
    await fs.rm(this.manifestFile(backupName), { force: true });
  }
}
