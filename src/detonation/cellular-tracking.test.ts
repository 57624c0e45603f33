import { describe, it, expect } from 'vitest';
import { CellularTrackingHistory, type CellularTrackingData } from './cellular-tracking';

function entry(time: number): CellularTrackingData {
  return {
    time,
    maxPressure: 1e6,
    pressureGradient: 1e9,
    triplePointVelocity: 700,
    cellHistory: [0.001],
  };
}

describe('CellularTrackingHistory', () => {
  it('starts empty', () => {
    const history = new CellularTrackingHistory();
    expect(history.size).toBe(0);
    expect(history.maxSize).toBe(1000);
    expect(history.latest()).toBeNull();
    expect(history.getEntries()).toEqual([]);
  });

  it('evicts the oldest entry once full', () => {
    const history = new CellularTrackingHistory(3);
    for (let t = 0; t < 5; t++) {
      history.record(entry(t));
    }

    expect(history.size).toBe(3);
    expect(history.getEntries().map((e) => e.time)).toEqual([2, 3, 4]);
    expect(history.latest()?.time).toBe(4);
  });

  it('holds at most 1000 entries by default', () => {
    const history = new CellularTrackingHistory();
    for (let t = 0; t <= 1000; t++) {
      history.record(entry(t));
    }

    const entries = history.getEntries();
    expect(entries).toHaveLength(1000);
    expect(entries[0].time).toBe(1);
    expect(entries[999].time).toBe(1000);
  });

  it('clears back to empty', () => {
    const history = new CellularTrackingHistory(2);
    history.record(entry(0));
    history.record(entry(1));
    history.record(entry(2));
    history.clear();

    expect(history.size).toBe(0);
    history.record(entry(7));
    expect(history.getEntries().map((e) => e.time)).toEqual([7]);
  });
});
