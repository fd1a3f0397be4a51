import type { Manifest, SequenceNumber } from "@offsite/core-domain";

export type CachedManifest = {
  backupName: string;
  sequence: SequenceNumber;
  manifest: Manifest;
};

/** Local copy of the manifest the last committed change-set produced. */
export interface ManifestCache {
  load(backupName: string): Promise<CachedManifest | null>;
  save(entry: CachedManifest): Promise<void>;
  clear(backupName: string): Promise<void>;
}
