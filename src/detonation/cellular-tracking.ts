/**
 * Cellular Tracking History
 *
 * Fixed-capacity record of per-step front diagnostics. When full, the oldest
 * entry is overwritten. Each engine owns its own history.
 */

export interface CellularTrackingData {
  time: number;                     // s - trajectory time at the end of the run
  maxPressure: number;              // Pa
  pressureGradient: number;         // Pa/m
  triplePointVelocity: number;      // m/s
  cellHistory: number[];            // m - local cell sizes along the trajectory
}

export const DEFAULT_TRACKING_CAPACITY = 1000;

export class CellularTrackingHistory {
  private readonly entries: Array<CellularTrackingData | undefined>;
  private readonly capacity: number;
  private start = 0;
  private count = 0;

  constructor(capacity: number = DEFAULT_TRACKING_CAPACITY) {
    this.capacity = Math.max(1, Math.floor(capacity));
    this.entries = new Array<CellularTrackingData | undefined>(this.capacity).fill(undefined);
  }

  /**
   * Append an entry, evicting the oldest when at capacity.
   */
  record(data: CellularTrackingData): void {
    if (this.count < this.capacity) {
      this.entries[(this.start + this.count) % this.capacity] = data;
      this.count++;
      return;
    }
    this.entries[this.start] = data;
    this.start = (this.start + 1) % this.capacity;
  }

  /**
   * Entries oldest first.
   */
  getEntries(): CellularTrackingData[] {
    const result: CellularTrackingData[] = [];
    for (let i = 0; i < this.count; i++) {
      const entry = this.entries[(this.start + i) % this.capacity];
      if (entry) result.push(entry);
    }
    return result;
  }

  latest(): CellularTrackingData | null {
    if (this.count === 0) return null;
    return this.entries[(this.start + this.count - 1) % this.capacity] ?? null;
  }

  get size(): number {
    return this.count;
  }

  get maxSize(): number {
    return this.capacity;
  }

  clear(): void {
    this.entries.fill(undefined);
    this.start = 0;
    this.count = 0;
  }
}
