export type RenderOutcome = "ok" | "error" | "timeout";

/**
 * Metrics for a finished render.
 */
export interface RenderSessionMetrics {
  generation: number;
  startTime: number;
  endTime: number;
  duration: number; // milliseconds
  totalPixels: number;
  pixelsPerSecond: number;
  outcome: RenderOutcome;
}

interface RenderSession {
  generation: number;
  startTime: number;
  totalPixels: number;
}

/**
 * Tracks timing and throughput of dispatched renders, keyed by generation.
 *
 * Usage:
 * ```typescript
 * const monitor = new PerformanceMonitor();
 * monitor.startRender(request.generation, width * height);
 * // ...render...
 * const metrics = monitor.endRender(request.generation, "ok");
 * console.log(`Render took ${metrics.duration}ms at ${metrics.pixelsPerSecond} px/s`);
 * ```
 */
export class PerformanceMonitor {
  private activeSessions = new Map<number, RenderSession>();
  private completedSessions: RenderSessionMetrics[] = [];
  private readonly maxHistorySize = 50;

  constructor(private readonly now: () => number = () => performance.now()) {}

  startRender(generation: number, totalPixels: number): void {
    this.activeSessions.set(generation, {
      generation,
      startTime: this.now(),
      totalPixels,
    });
  }

  /**
   * Closes the session for `generation` and records its metrics.
   *
   * @throws Error if no session was started for the generation
   */
  endRender(generation: number, outcome: RenderOutcome): RenderSessionMetrics {
    const session = this.activeSessions.get(generation);
    if (!session) {
      throw new Error(`PerformanceMonitor: Unknown render generation ${generation}`);
    }

    const endTime = this.now();
    const duration = endTime - session.startTime;
    const pixelsPerSecond = outcome === "ok" && duration > 0 ? (session.totalPixels / duration) * 1000 : 0;

    const metrics: RenderSessionMetrics = {
      generation,
      startTime: session.startTime,
      endTime,
      duration,
      totalPixels: session.totalPixels,
      pixelsPerSecond,
      outcome,
    };

    this.completedSessions.push(metrics);
    if (this.completedSessions.length > this.maxHistorySize) {
      this.completedSessions.shift();
    }

    this.activeSessions.delete(generation);

    return metrics;
  }

  getLastRenderMetrics(): RenderSessionMetrics | null {
    if (this.completedSessions.length === 0) {
      return null;
    }
    return this.completedSessions[this.completedSessions.length - 1];
  }

  /**
   * Summary across the recorded history. Throughput and duration averages only
   * count successful renders.
   */
  getStats(): {
    totalRenders: number;
    failedRenders: number;
    averageDuration: number;
    averagePixelsPerSecond: number;
  } {
    const succeeded = this.completedSessions.filter((m) => m.outcome === "ok");
    const failedRenders = this.completedSessions.length - succeeded.length;

    if (succeeded.length === 0) {
      return {
        totalRenders: this.completedSessions.length,
        failedRenders,
        averageDuration: 0,
        averagePixelsPerSecond: 0,
      };
    }

    const totalDuration = succeeded.reduce((sum, m) => sum + m.duration, 0);
    const totalPixelsPerSecond = succeeded.reduce((sum, m) => sum + m.pixelsPerSecond, 0);

    return {
      totalRenders: this.completedSessions.length,
      failedRenders,
      averageDuration: totalDuration / succeeded.length,
      averagePixelsPerSecond: totalPixelsPerSecond / succeeded.length,
    };
  }
}
