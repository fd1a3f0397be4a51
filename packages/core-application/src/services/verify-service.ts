import type { SequenceNumber } from "@offsite/core-domain";
import { fileFingerprints } from "@offsite/core-domain";

import type { ContentStore } from "../ports/content-store";
import type { Logger } from "../ports/logger";
import { silentLogger } from "../ports/logger";
import { mapWithConcurrency } from "../infra/concurrency";
import type { ReplayEngine } from "./replay-engine";
import { DEFAULT_CONCURRENCY } from "./snapshot-builder";

export type VerifyReport = {
  sequence: SequenceNumber;
  base: SequenceNumber;
  changeSets: number;
  files: number;
  missingContent: string[];
};

/** Checks that a restore point can be rebuilt: an unbroken chain and all of its content. */
export class VerifyService {
  private readonly logger: Logger;

  constructor(
    private readonly deps: {
      engine: ReplayEngine;
      content: ContentStore;
      logger?: Logger;
      concurrency?: number;
    }
  ) {
    this.logger = deps.logger ?? silentLogger;
  }

  async verify(upTo?: SequenceNumber): Promise<VerifyReport> {
    const restored = await this.deps.engine.restore(upTo);
    const fingerprints = [...fileFingerprints(restored.state)].sort();

    const present = await mapWithConcurrency(
      fingerprints,
      this.deps.concurrency ?? DEFAULT_CONCURRENCY,
      (fp) => this.deps.content.has(fp)
    );
    const missingContent = fingerprints.filter((_, i) => !present[i]);

    let files = 0;
    for (const entry of restored.state.values()) if (entry.type === "file") files += 1;

    const report: VerifyReport = {
      sequence: restored.sequence,
      base: restored.base,
      changeSets: restored.changeSets.length,
      files,
      missingContent,
    };
    if (missingContent.length > 0) {
      this.logger.warn("content missing from the store", { count: missingContent.length });
    }
    return report;
  }
}
