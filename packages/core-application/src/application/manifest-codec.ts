import {
  manifestFromEntries,
  sortedEntries,
  type Manifest,
  type SequenceNumber,
} from "@offsite/core-domain";

import { canonicalJson } from "./canonical-json";
import { ManifestDocumentSchema, type ManifestDocument } from "./schemas";

export function encodeManifest(params: {
  backupName: string;
  sequence: SequenceNumber;
  manifest: Manifest;
  savedAt: Date;
}): string {
  const document: ManifestDocument = {
    format: 1,
    backupName: params.backupName,
    sequence: params.sequence,
    savedAtIso: params.savedAt.toISOString(),
    entries: sortedEntries(params.manifest),
  };
  return canonicalJson(document);
}

/** Throws a ZodError or SyntaxError for anything that is not a manifest document. */
export function decodeManifest(text: string): {
  backupName: string;
  sequence: SequenceNumber;
  manifest: Manifest;
} {
  const document = ManifestDocumentSchema.parse(JSON.parse(text));
  return {
    backupName: document.backupName,
    sequence: document.sequence,
    manifest: manifestFromEntries(document.entries),
  };
}
