export interface SchedulerOptions {
  simulationIntervalMs: number;
  broadcastIntervalMs: number;
  /** Advance the world by `dtMs` */
  onSimulate: (dtMs: number) => void;
  onBroadcast: () => void;
}

/**
 * Drives simulation and broadcast on two independent intervals of the same
 * event loop. Each callback runs to completion before the other can start,
 * so a broadcast never observes a half-applied tick.
 */
export class TickScheduler {
  private simulationTimer: NodeJS.Timeout | null = null;
  private broadcastTimer: NodeJS.Timeout | null = null;

  constructor(private readonly options: SchedulerOptions) {}

  get running(): boolean {
    return this.simulationTimer !== null;
  }

  start(): void {
    if (this.running) return;
    const { simulationIntervalMs, broadcastIntervalMs } = this.options;

    this.simulationTimer = setInterval(
      () => this.guard('simulation', () => this.options.onSimulate(simulationIntervalMs)),
      simulationIntervalMs,
    );
    this.broadcastTimer = setInterval(
      () => this.guard('broadcast', () => this.options.onBroadcast()),
      broadcastIntervalMs,
    );
  }

  stop(): void {
    if (this.simulationTimer) {
      clearInterval(this.simulationTimer);
      this.simulationTimer = null;
    }
    if (this.broadcastTimer) {
      clearInterval(this.broadcastTimer);
      this.broadcastTimer = null;
    }
  }

  // A failing step is logged and the loop keeps going
  private guard(label: string, fn: () => void): void {
    try {
      fn();
    } catch (err) {
      console.error(`[scheduler] ${label} step failed:`, err);
    }
  }
}
