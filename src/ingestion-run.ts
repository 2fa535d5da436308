/**
 * One run of the library's write state machine:
 *
 *   RECEIVED → PARSED → CLASSIFIED → PERSISTED → CHUNKED → EMBEDDED → INDEXED → DONE
 *
 * with FAILED reachable from any stage. Steps that change durable state
 * register an undo action; on failure (or cancellation) the undo actions run
 * in reverse order so the stores end up as they were before the run.
 */

export type Stage =
  | "RECEIVED"
  | "PARSED"
  | "CLASSIFIED"
  | "PERSISTED"
  | "CHUNKED"
  | "EMBEDDED"
  | "INDEXED"
  | "DONE"
  | "FAILED";

export type UnitKind = "ingest" | "create" | "update" | "delete" | "rebuild";

export interface StageEvent {
  unit: UnitKind;
  /** Session source or prompt id the unit works on. */
  subject: string;
  stage: Stage;
  error?: unknown;
}

export type StageListener = (event: StageEvent) => void;

interface UndoStep {
  label: string;
  undo: () => Promise<void> | void;
}

export class IngestionRun {
  public readonly kind: UnitKind;
  public readonly subject: string;
  private current: Stage = "RECEIVED";
  private readonly undoSteps: UndoStep[] = [];
  private readonly listener?: StageListener;
  private readonly signal?: AbortSignal;

  public constructor(
    kind: UnitKind,
    subject: string,
    opts: { listener?: StageListener; signal?: AbortSignal } = {},
  ) {
    this.kind = kind;
    this.subject = subject;
    this.listener = opts.listener;
    this.signal = opts.signal;
    this.emit();
  }

  public get stage(): Stage {
    return this.current;
  }

  /**
   * Move to the next stage. Cancellation is honoured here, between steps.
   * @throws The abort reason if the run's signal has fired.
   */
  public advance(stage: Stage): void {
    this.signal?.throwIfAborted();
    this.current = stage;
    this.emit();
  }

  /** Register how to revert a step that has just been applied. */
  public onRollback(label: string, undo: () => Promise<void> | void): void {
    this.undoSteps.push({ label, undo });
  }

  /**
   * Revert every applied step, newest first, and mark the run FAILED. A
   * failing undo step is logged and the rest still run; the caller rethrows
   * the original error.
   */
  public async rollback(cause: unknown): Promise<void> {
    for (const step of this.undoSteps.reverse()) {
      try {
        await step.undo();
      } catch (e) {
        console.error(`[MCP] Rollback step '${step.label}' of ${this.kind} ${this.subject} failed:`, e);
      }
    }
    this.undoSteps.length = 0;
    this.current = "FAILED";
    this.emit(cause);
  }

  private emit(error?: unknown): void {
    if (!this.listener) return;
    const event: StageEvent = { unit: this.kind, subject: this.subject, stage: this.current };
    if (error !== undefined) event.error = error;
    this.listener(event);
  }
}
