/**
 * Abort controllers of runs currently in flight, keyed by run id.
 */
export class ActiveRuns {
  private readonly controllers = new Map<string, AbortController>();

  start(runId: string): AbortSignal {
    if (this.controllers.has(runId)) {
      throw new Error(`Run ${runId} is already in progress`);
    }
    const controller = new AbortController();
    this.controllers.set(runId, controller);
    return controller.signal;
  }

  has(runId: string): boolean {
    return this.controllers.has(runId);
  }

  cancel(runId: string): boolean {
    const controller = this.controllers.get(runId);
    if (!controller) {
      return false;
    }
    controller.abort();
    return true;
  }

  finish(runId: string): void {
    this.controllers.delete(runId);
  }

  cancelAll(): number {
    for (const controller of this.controllers.values()) {
      controller.abort();
    }
    return this.controllers.size;
  }

  ids(): string[] {
    return [...this.controllers.keys()];
  }
}
