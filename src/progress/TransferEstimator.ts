import { ProgressSample } from '../types';
import { formatBytes, formatDuration, formatPercent } from './format';

const MIN_SPEED_INTERVAL_MS = 1000;

export interface TransferEstimate {
  percent: number;
  bytesDone?: number;
  bytesTotal?: number;
  /** Rolling average in bytes per second */
  speed?: number;
  etaSeconds?: number;
}

export type Clock = () => number;

/**
 * TransferEstimator - turns a stream of progress samples into speed and ETA.
 * Byte speeds are sampled at most once per second and averaged over the
 * last `windowSize` non-zero readings.
 */
export class TransferEstimator {
  private readonly speeds: number[] = [];
  private readonly startedAt: number;
  private lastReading?: { time: number; bytes: number };

  constructor(
    private readonly clock: Clock = Date.now,
    private readonly windowSize: number = 10,
  ) {
    this.startedAt = clock();
  }

  update(sample: ProgressSample): TransferEstimate {
    const now = this.clock();
    if (sample.bytesDone !== undefined) {
      this.recordBytes(now, sample.bytesDone);
    }

    const speed = this.averageSpeed();
    let etaSeconds: number | undefined;

    if (
      speed !== undefined &&
      sample.bytesDone !== undefined &&
      sample.bytesTotal !== undefined
    ) {
      etaSeconds = Math.max(0, sample.bytesTotal - sample.bytesDone) / speed;
    } else if (sample.percent > 0 && sample.percent < 100) {
      // No byte rate yet: extrapolate linearly from elapsed time
      const elapsed = (now - this.startedAt) / 1000;
      if (elapsed > 0) {
        etaSeconds = (elapsed * (100 - sample.percent)) / sample.percent;
      }
    }

    return {
      percent: sample.percent,
      bytesDone: sample.bytesDone,
      bytesTotal: sample.bytesTotal,
      speed,
      etaSeconds,
    };
  }

  /**
   * Mean of the speed window, or undefined before the first non-zero reading
   */
  averageSpeed(): number | undefined {
    if (this.speeds.length === 0) {
      return undefined;
    }
    const sum = this.speeds.reduce((acc, value) => acc + value, 0);
    return sum / this.speeds.length;
  }

  private recordBytes(now: number, bytes: number): void {
    if (!this.lastReading) {
      this.lastReading = { time: now, bytes };
      return;
    }

    const elapsedMs = now - this.lastReading.time;
    if (elapsedMs < MIN_SPEED_INTERVAL_MS) {
      return;
    }

    const speed = (bytes - this.lastReading.bytes) / (elapsedMs / 1000);
    if (speed > 0) {
      this.speeds.push(speed);
      if (this.speeds.length > this.windowSize) {
        this.speeds.shift();
      }
    }
    this.lastReading = { time: now, bytes };
  }
}

/**
 * Status line for one progress update, e.g.
 * "Downloading: 45.5% (1.00 GB / 2.20 GB) at 5.00 MB/s, ~4m 5s remaining"
 */
export function describeProgress(phase: string, estimate: TransferEstimate): string {
  let text = `${phase}: ${formatPercent(estimate.percent)}`;
  if (estimate.bytesDone !== undefined && estimate.bytesTotal !== undefined) {
    text += ` (${formatBytes(estimate.bytesDone)} / ${formatBytes(estimate.bytesTotal)})`;
  }
  if (estimate.speed !== undefined) {
    text += ` at ${formatBytes(estimate.speed)}/s`;
  }
  if (estimate.etaSeconds !== undefined) {
    text += `, ~${formatDuration(estimate.etaSeconds)} remaining`;
  }
  return text;
}
