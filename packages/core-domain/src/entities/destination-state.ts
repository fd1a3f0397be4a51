import type { Manifest } from "./manifest";
import type { SequenceNumber } from "./change-set";

/** Reconstructed tree state after replaying a prefix of the chain. */
export type DestinationState = Manifest;

export interface RestoredState {
  state: DestinationState;
  /** Last sequence applied. */
  sequence: SequenceNumber;
  /** Full snapshot the replay started from. */
  base: SequenceNumber;
}
