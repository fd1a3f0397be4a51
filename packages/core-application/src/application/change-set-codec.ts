import type { ChangeSet, SequenceNumber } from "@offsite/core-domain";
import { z } from "zod";

import { canonicalJson } from "./canonical-json";
import { ChangeSetCorruptError } from "./errors";
import { ChangeSetDocumentSchema, ChangeSetSchema, type ChangeSetDocument } from "./schemas";
import { fingerprintBytes } from "../services/fingerprint";

export const CHANGE_SET_FORMAT = 1;

export function changeSetDigest(changeSet: ChangeSet): string {
  return fingerprintBytes(canonicalJson(changeSet));
}

/** Throws a ZodError for a change-set that decodeChangeSet would refuse. */
export function encodeChangeSet(changeSet: ChangeSet): Buffer {
  ChangeSetSchema.parse(changeSet);
  const document: ChangeSetDocument = {
    format: CHANGE_SET_FORMAT,
    digest: changeSetDigest(changeSet),
    changeSet,
  };
  return Buffer.from(canonicalJson(document) + "\n", "utf-8");
}

export function decodeChangeSet(
  key: string,
  data: Buffer,
  expectedSequence: SequenceNumber
): ChangeSet {
  let raw: unknown;
  try {
    raw = JSON.parse(data.toString("utf-8"));
  } catch (err) {
    throw new ChangeSetCorruptError(key, "not valid JSON", err);
  }

  let document: ChangeSetDocument;
  try {
    document = ChangeSetDocumentSchema.parse(raw);
  } catch (err) {
    const reason =
      err instanceof z.ZodError
        ? err.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join("; ")
        : "unexpected document shape";
    throw new ChangeSetCorruptError(key, reason, err);
  }

  const changeSet: ChangeSet = document.changeSet;
  const digest = changeSetDigest(changeSet);
  if (digest !== document.digest) {
    throw new ChangeSetCorruptError(key, `digest mismatch (${digest} != ${document.digest})`);
  }
  if (changeSet.sequence !== expectedSequence) {
    throw new ChangeSetCorruptError(
      key,
      `holds sequence ${changeSet.sequence}, expected ${expectedSequence}`
    );
  }
  return changeSet;
}
