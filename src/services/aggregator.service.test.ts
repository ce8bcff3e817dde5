import { describe, it, expect } from 'vitest';

import { aggregate } from './aggregator.service.js';
import { DuplicateFrameOutcomeError, NoFramesProcessedError } from '../utils/errors.js';
import type { FrameOutcome } from '../types/detection.types.js';

const ok = (index: number, count: number): FrameOutcome => ({
  status: 'success',
  index,
  name: `frame_${String(index).padStart(5, '0')}.jpg`,
  timestamp: index - 1,
  attempts: 1,
  count,
});

const failed = (index: number): FrameOutcome => ({
  status: 'failed',
  index,
  name: `frame_${String(index).padStart(5, '0')}.jpg`,
  timestamp: index - 1,
  attempts: 3,
  error: { kind: 'WORKER_UNREACHABLE', message: 'Worker returned HTTP 503' },
});

describe('aggregate', () => {
  it('sums counts and averages over processed frames', () => {
    const report = aggregate([ok(1, 2), ok(2, 0), ok(3, 3)]);

    expect(report.totalFrames).toBe(3);
    expect(report.framesProcessed).toBe(3);
    expect(report.successfulFrames).toBe(3);
    expect(report.failedFrameCount).toBe(0);
    expect(report.totalDetections).toBe(5);
    expect(report.averagePerFrame).toBeCloseTo(5 / 3, 10);
    expect(report.partial).toBe(false);
  });

  it('counts failed frames in the average denominator', () => {
    const report = aggregate([ok(1, 4), failed(2), ok(3, 2)]);

    expect(report.successfulFrames).toBe(2);
    expect(report.failedFrameCount).toBe(1);
    expect(report.totalDetections).toBe(6);
    expect(report.averagePerFrame).toBe(2);
  });

  it('reports zero average when every frame failed', () => {
    const report = aggregate([failed(1), failed(2)]);

    expect(report.totalDetections).toBe(0);
    expect(report.averagePerFrame).toBe(0);
    expect(report.failedFrameCount).toBe(2);
  });

  it('orders outcomes by frame index without mutating the input', () => {
    const input = [ok(3, 1), ok(1, 1), failed(2)];

    const report = aggregate(input);

    expect(report.outcomes.map((o) => o.index)).toEqual([1, 2, 3]);
    expect(input.map((o) => o.index)).toEqual([3, 1, 2]);
  });

  it('returns a frozen report', () => {
    const report = aggregate([ok(1, 1)]);

    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.outcomes)).toBe(true);
  });

  it('is deterministic', () => {
    const input = [ok(1, 2), failed(2), ok(3, 7)];
    expect(aggregate(input)).toEqual(aggregate(input));
  });

  it('carries totalFrames and partial for a cancelled run', () => {
    const report = aggregate([ok(1, 2), ok(2, 1)], { totalFrames: 5, partial: true });

    expect(report.totalFrames).toBe(5);
    expect(report.framesProcessed).toBe(2);
    expect(report.partial).toBe(true);
  });

  it('fails on no outcomes', () => {
    expect(() => aggregate([])).toThrow(NoFramesProcessedError);
    expect(() => aggregate([])).toThrow('No frames were processed');
  });

  it('fails on a repeated frame index', () => {
    expect(() => aggregate([ok(1, 1), ok(2, 1), failed(2)])).toThrow(DuplicateFrameOutcomeError);
    expect(() => aggregate([ok(1, 1), ok(1, 2)])).toThrow('Duplicate outcome for frame 1');
  });
});
