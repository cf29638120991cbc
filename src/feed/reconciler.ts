import { validateLevelUpdate } from "../engine/book.js";
import type { OrderBook } from "../engine/book.js";
import type { Fill, LevelUpdate, LevelUpdateRejectReason } from "../engine/types.js";
import type { Logger } from "../logger.js";

export type SyncState = "UNINITIALIZED" | "SYNCED" | "GAP" | "RESYNCING";

export type SequenceFaultKind = "GAP" | "MAINTENANCE_RESET";

export interface SequenceFault {
  kind: SequenceFaultKind;
  /** Sequence id the book had applied last. */
  expectedPrevSeqId: number;
  receivedPrevSeqId: number;
  seqId: number;
}

export interface SnapshotEvent {
  seqId: number;
  updates: readonly LevelUpdate[];
}

export interface IncrementalEvent {
  seqId: number;
  prevSeqId: number;
  updates: readonly LevelUpdate[];
}

export type ReconcileResult =
  | {
      applied: true;
      fills: Fill[];
      fault: SequenceFault | null;
      residualCross: boolean;
    }
  | {
      applied: false;
      reason: LevelUpdateRejectReason;
      update: LevelUpdate;
    };

/**
 * Keeps the book's external levels in line with a snapshot + incremental
 * feed and tracks the sequence id.
 *
 * Continuity faults are reported, not enforced: the update is still
 * applied and the sequence id still advances. Requesting a fresh snapshot
 * is up to the transport, which watches `faultCount`.
 */
export class FeedReconciler {
  private state: SyncState = "UNINITIALIZED";
  private faults = 0;
  private readonly book: OrderBook;
  private readonly log: Logger | null;

  constructor(book: OrderBook, log?: Logger) {
    this.book = book;
    this.log = log ?? null;
  }

  get syncState(): SyncState {
    return this.state;
  }

  /** Faults seen since the last snapshot. */
  get faultCount(): number {
    return this.faults;
  }

  get sequenceId(): number | null {
    return this.book.getSequenceId();
  }

  applySnapshot(event: SnapshotEvent): ReconcileResult {
    // Validate before the reset so a bad snapshot leaves the current book alone.
    for (const update of event.updates) {
      const reason = validateLevelUpdate(update);
      if (reason) {
        this.log?.warn({ reason, update, seqId: event.seqId }, "Snapshot rejected");
        return { applied: false, reason, update };
      }
    }

    this.book.applyExternalReset();
    const result = this.book.applyExternalLevelUpdates(event.updates);
    if (!result.applied) return result;

    this.book.setSequenceId(event.seqId);
    this.state = "SYNCED";
    this.faults = 0;
    this.log?.info({ seqId: event.seqId, levels: event.updates.length }, "Snapshot applied");
    return { applied: true, fills: result.fills, fault: null, residualCross: result.residualCross };
  }

  applyIncremental(event: IncrementalEvent): ReconcileResult {
    const fault = this.checkContinuity(event);

    const result = this.book.applyExternalLevelUpdates(event.updates);
    if (!result.applied) {
      this.log?.warn({ reason: result.reason, update: result.update, seqId: event.seqId }, "Incremental update rejected");
      return result;
    }

    if (fault) {
      this.faults++;
      if (this.state !== "RESYNCING") this.state = "GAP";
      this.log?.warn({ ...fault, faultCount: this.faults }, "Sequence continuity fault");
    }

    this.book.setSequenceId(event.seqId);
    return { applied: true, fills: result.fills, fault, residualCross: result.residualCross };
  }

  /** The transport asked the feed for a fresh snapshot. */
  markResyncing(): void {
    this.state = "RESYNCING";
  }

  private checkContinuity(event: IncrementalEvent): SequenceFault | null {
    const last = this.book.getSequenceId();
    if (last === null || event.prevSeqId === last) return null;
    return {
      kind: event.seqId < event.prevSeqId ? "MAINTENANCE_RESET" : "GAP",
      expectedPrevSeqId: last,
      receivedPrevSeqId: event.prevSeqId,
      seqId: event.seqId,
    };
  }
}
