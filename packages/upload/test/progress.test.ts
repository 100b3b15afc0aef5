import { describe, it, expect } from 'vitest';
import { ProgressTracker } from '../src/progress.js';

const MB = 1024 * 1024;

function clock(start: number = 0) {
  let time = start;
  return {
    now: () => time,
    set: (value: number) => {
      time = value;
    },
  };
}

describe('ProgressTracker', () => {
  it('reports an unknown ETA before any bytes arrive', () => {
    const c = clock();
    const tracker = new ProgressTracker('A', 'movie.mkv', 100 * MB, { sink: () => undefined, now: c.now });

    expect(tracker.snapshot().etaSeconds).toBeUndefined();
    expect(tracker.render()).toBe('[A] 0.0% | 0.00/0.10 GB | Speed: 0.00 MB/s | ETA: Unknown');
  });

  it('emits at most one line per interval', () => {
    const c = clock();
    const lines: string[] = [];
    const tracker = new ProgressTracker('A', 'movie.mkv', 100 * MB, { sink: (l) => lines.push(l), now: c.now });

    c.set(500);
    tracker.onBytesTransferred(10 * MB);
    c.set(1000);
    tracker.onBytesTransferred(10 * MB);
    c.set(1500);
    tracker.onBytesTransferred(10 * MB);
    c.set(2000);
    tracker.onBytesTransferred(10 * MB);

    expect(lines).toHaveLength(2);
    expect(lines[0]).toBe('[A] 20.0% | 0.02/0.10 GB | Speed: 20.00 MB/s | ETA: 0:00:04');
    expect(tracker.snapshot().transferredBytes).toBe(40 * MB);
  });

  it('computes the ETA from the average rate since start', () => {
    const c = clock();
    const tracker = new ProgressTracker('A', 'movie.mkv', 100 * MB, { sink: () => undefined, now: c.now });

    tracker.onBytesTransferred(25 * MB);
    c.set(5000);

    const snapshot = tracker.snapshot();
    expect(snapshot.speedMBps).toBe(5);
    expect(snapshot.etaSeconds).toBe(15);
    expect(snapshot.percentage).toBe(25);
  });

  it('suppresses percentage and ETA when the total is not positive', () => {
    const c = clock();
    const lines: string[] = [];
    const tracker = new ProgressTracker('B', 'stream.bin', 0, { sink: (l) => lines.push(l), now: c.now });

    tracker.onBytesTransferred(10 * MB);
    c.set(2000);
    tracker.finish();

    expect(tracker.snapshot().percentage).toBeUndefined();
    expect(lines).toEqual(['[B] 0.01 GB | Speed: 5.00 MB/s | ETA: Unknown']);
  });

  it('always emits on finish', () => {
    const c = clock();
    const lines: string[] = [];
    const tracker = new ProgressTracker('A', 'small.txt', 4, { sink: (l) => lines.push(l), now: c.now });

    tracker.onBytesTransferred(4);
    tracker.finish();

    expect(lines).toHaveLength(1);
    expect(lines[0]?.startsWith('[A] 100.0% |')).toBe(true);
  });
});
