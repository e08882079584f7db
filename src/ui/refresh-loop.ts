import { warn } from './format.js';

export interface Renderable {
  render(): unknown;
}

/**
 * Redraws the dashboard on a fixed interval, independent of task
 * boundaries, until stopped.
 */
export class RefreshLoop {
  private timer: NodeJS.Timeout | null = null;
  private failed = false;

  constructor(
    private readonly renderer: Renderable,
    private readonly intervalMs: number,
    private readonly reportError: (message: string) => void = (message) => console.error(message),
  ) {}

  isRunning(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer || this.failed) return;
    this.timer = setInterval(() => this.renderNow(), this.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Draw a frame outside the interval, e.g. at a status change. After the
   * first render error no further frames are drawn.
   */
  renderNow(): void {
    if (this.failed) return;
    try {
      this.renderer.render();
    } catch (err) {
      // stop redrawing; the task flow carries on
      this.failed = true;
      this.stop();
      this.reportError(warn(`Live summary stopped: ${err instanceof Error ? err.message : String(err)}`));
    }
  }
}
