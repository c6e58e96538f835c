/**
 * Post-commit dispatcher: runs follow-up work after a save has committed.
 *
 * Work never affects the outcome of the save that scheduled it: failures are
 * logged and dropped. `inline` awaits the task before returning,
 * `background` returns at once and keeps the task until `idle()` sees it
 * settle.
 */

import type { Logger } from "../../infra/logger.ts";

export type DispatchMode = "inline" | "background";

export interface PostCommitTask {
  /** Short label for logs, e.g. `embed domain_document 3f2c…`. */
  label: string;
  run(): Promise<void>;
}

export class PostCommitDispatcher {
  private readonly pending = new Set<Promise<void>>();

  constructor(
    readonly mode: DispatchMode,
    private readonly logger: Logger,
  ) {}

  async dispatch(task: PostCommitTask): Promise<void> {
    const settled = this.isolate(task);
    if (this.mode === "inline") {
      await settled;
      return;
    }
    this.pending.add(settled);
    void settled.finally(() => this.pending.delete(settled));
  }

  /** Resolves once every background task scheduled so far has settled. */
  async idle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(this.pending);
    }
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  private async isolate(task: PostCommitTask): Promise<void> {
    try {
      await task.run();
    } catch (err) {
      this.logger.error("post-commit task failed", { task: task.label, error: err });
    }
  }
}
