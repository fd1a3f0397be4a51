import { z } from "zod";

import { isFingerprint } from "../services/fingerprint";

export const FingerprintSchema = z.string().refine(isFingerprint, { message: "must be a SHA-256 hex digest" });

export const EntryPathSchema = z
  .string()
  .min(1)
  .refine((p) => !p.startsWith("/") && !p.split("/").some((s) => s === "" || s === "." || s === ".."), {
    message: "must be a normalized relative POSIX path",
  });

export const EntryTypeSchema = z.enum(["file", "directory", "symlink", "special"]);

export const EntrySchema = z.object({
  path: EntryPathSchema,
  type: EntryTypeSchema,
  fingerprint: FingerprintSchema.nullable(),
  size: z.number().int().nonnegative(),
  mtimeMs: z.number().finite(),
  linkTarget: z.string().optional(),
});

export const ChangeOperationSchema = z.discriminatedUnion("op", [
  z.object({ op: z.literal("add"), entry: EntrySchema }),
  z.object({
    op: z.literal("modify"),
    entry: EntrySchema,
    previousFingerprint: FingerprintSchema.nullable(),
  }),
  z.object({
    op: z.literal("remove"),
    path: EntryPathSchema,
    type: EntryTypeSchema,
    previousFingerprint: FingerprintSchema.nullable(),
  }),
]);

export const SequenceSchema = z.number().int().nonnegative();

export const ChangeSetSchema = z.object({
  sequence: SequenceSchema,
  parent: SequenceSchema.nullable(),
  snapshotId: z.string().min(1),
  createdAtIso: z.string().datetime(),
  operations: z.array(ChangeOperationSchema),
});

export const ChangeSetDocumentSchema = z.object({
  format: z.literal(1),
  digest: FingerprintSchema,
  changeSet: ChangeSetSchema,
});

export const ManifestDocumentSchema = z.object({
  format: z.literal(1),
  backupName: z.string().min(1),
  sequence: SequenceSchema,
  savedAtIso: z.string().datetime(),
  entries: z.array(EntrySchema),
});

export type ChangeSetDocument = z.infer<typeof ChangeSetDocumentSchema>;
export type ManifestDocument = z.infer<typeof ManifestDocumentSchema>;
