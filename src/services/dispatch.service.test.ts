import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../utils/logger.js', () => ({
  createChildLogger: vi.fn(() => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

import { DispatchService, isRetryableOutcome } from './dispatch.service.js';
import { AllFramesFailedError, InvalidConfigurationError } from '../utils/errors.js';
import { PipelineTimer } from '../utils/timer.js';
import type { DetectionProvider, DetectOptions } from '../providers/interfaces/detection.provider.js';
import { FrameErrorKind, type Frame, type FrameOutcome } from '../types/detection.types.js';

const ENDPOINT = 'http://worker.test/';

type Behaviour = (frame: Frame, call: number, options: DetectOptions) => Promise<FrameOutcome> | FrameOutcome;

function makeFrames(n: number): Frame[] {
  return Array.from({ length: n }, (_, i) => ({
    index: i + 1,
    timestamp: i,
    name: `frame_${String(i + 1).padStart(5, '0')}.jpg`,
    data: Buffer.from(`img-${i + 1}`),
  }));
}

const success = (frame: Frame, count: number): FrameOutcome => ({
  status: 'success',
  index: frame.index,
  name: frame.name,
  timestamp: frame.timestamp,
  attempts: 1,
  count,
});

const failure = (frame: Frame, kind: FrameErrorKind, message = 'boom'): FrameOutcome => ({
  status: 'failed',
  index: frame.index,
  name: frame.name,
  timestamp: frame.timestamp,
  attempts: 1,
  error: { kind, message },
});

const wait = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

class FakeDetector implements DetectionProvider {
  readonly providerId = 'fake';
  calls: Frame[] = [];
  private callsPerFrame = new Map<number, number>();

  constructor(private behaviour: Behaviour) {}

  async detect(frame: Frame, _endpoint: string, options: DetectOptions): Promise<FrameOutcome> {
    this.calls.push(frame);
    const call = (this.callsPerFrame.get(frame.index) ?? 0) + 1;
    this.callsPerFrame.set(frame.index, call);
    return this.behaviour(frame, call, options);
  }
}

describe('isRetryableOutcome', () => {
  const frame = makeFrames(1)[0];

  it('retries only unreachable failures', () => {
    expect(isRetryableOutcome(failure(frame, FrameErrorKind.WORKER_UNREACHABLE))).toBe(true);
    expect(isRetryableOutcome(failure(frame, FrameErrorKind.WORKER_REJECTED_FRAME))).toBe(false);
    expect(isRetryableOutcome(failure(frame, FrameErrorKind.MALFORMED_WORKER_RESPONSE))).toBe(false);
    expect(isRetryableOutcome(success(frame, 1))).toBe(false);
  });
});

describe('DispatchService', () => {
  const noSleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it.each([1, 2, 3, 4])('returns outcomes in frame order under random delays (round %i)', async () => {
    const frames = makeFrames(8);
    const delays = frames.map(() => Math.floor(Math.random() * 15));
    const detector = new FakeDetector(async (frame) => {
      await wait(delays[frame.index - 1]);
      return success(frame, frame.index * 10);
    });

    const { outcomes, cancelled } = await new DispatchService(detector).run(frames, {
      endpoint: ENDPOINT,
      concurrency: 4,
    });

    expect(cancelled).toBe(false);
    expect(outcomes.map((o) => o.index)).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
    expect(outcomes.map((o) => (o.status === 'success' ? o.count : -1))).toEqual([10, 20, 30, 40, 50, 60, 70, 80]);
  });

  it('returns outcomes in frame order when later frames finish first', async () => {
    const frames = makeFrames(6);
    const detector = new FakeDetector(async (frame) => {
      await wait((frames.length - frame.index) * 4);
      return success(frame, frame.index);
    });

    const { outcomes } = await new DispatchService(detector).run(frames, { endpoint: ENDPOINT, concurrency: 6 });

    expect(outcomes.map((o) => o.index)).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it('never exceeds the concurrency bound', async () => {
    let inFlight = 0;
    let peak = 0;
    const detector = new FakeDetector(async (frame) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await wait(5);
      inFlight--;
      return success(frame, 1);
    });

    await new DispatchService(detector).run(makeFrames(7), { endpoint: ENDPOINT, concurrency: 2 });

    expect(peak).toBe(2);
    expect(detector.calls).toHaveLength(7);
  });

  it('records a rejected frame without retrying it', async () => {
    const detector = new FakeDetector((frame) =>
      frame.index === 3
        ? failure(frame, FrameErrorKind.WORKER_REJECTED_FRAME, 'Prediction failed')
        : success(frame, 2)
    );

    const { outcomes, totalAttempts } = await new DispatchService(detector).run(makeFrames(5), {
      endpoint: ENDPOINT,
      sleep: noSleep,
    });

    expect(outcomes.filter((o) => o.status === 'failed')).toEqual([
      {
        status: 'failed',
        index: 3,
        name: 'frame_00003.jpg',
        timestamp: 2,
        attempts: 1,
        error: { kind: 'WORKER_REJECTED_FRAME', message: 'Prediction failed' },
      },
    ]);
    expect(totalAttempts).toBe(5);
    expect(noSleep).not.toHaveBeenCalled();
  });

  it('retries unreachable failures with exponential backoff', async () => {
    const detector = new FakeDetector((frame, call) =>
      call <= 2 ? failure(frame, FrameErrorKind.WORKER_UNREACHABLE) : success(frame, 4)
    );

    const { outcomes, totalAttempts } = await new DispatchService(detector).run(makeFrames(1), {
      endpoint: ENDPOINT,
      maxRetries: 2,
      retryDelayMs: 100,
      sleep: noSleep,
    });

    expect(outcomes).toEqual([
      { status: 'success', index: 1, name: 'frame_00001.jpg', timestamp: 0, attempts: 3, count: 4 },
    ]);
    expect(totalAttempts).toBe(3);
    expect(noSleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
  });

  it('gives up after maxRetries and keeps the last failure', async () => {
    const detector = new FakeDetector((frame, call) =>
      failure(frame, FrameErrorKind.WORKER_UNREACHABLE, `refused #${call}`)
    );

    const { outcomes } = await new DispatchService(detector).run(makeFrames(1), {
      endpoint: ENDPOINT,
      maxRetries: 1,
      sleep: noSleep,
    });

    expect(outcomes[0]).toMatchObject({
      status: 'failed',
      attempts: 2,
      error: { kind: 'WORKER_UNREACHABLE', message: 'refused #2' },
    });
  });

  it('does not retry malformed responses', async () => {
    const detector = new FakeDetector((frame) => failure(frame, FrameErrorKind.MALFORMED_WORKER_RESPONSE));

    const { outcomes } = await new DispatchService(detector).run(makeFrames(2), {
      endpoint: ENDPOINT,
      sleep: noSleep,
    });

    expect(outcomes.map((o) => o.attempts)).toEqual([1, 1]);
    expect(detector.calls).toHaveLength(2);
  });

  it('passes the endpoint options through to the detector', async () => {
    const seen: DetectOptions[] = [];
    const controller = new AbortController();
    const detector = new FakeDetector((frame, _call, options) => {
      seen.push(options);
      return success(frame, 0);
    });

    await new DispatchService(detector).run(makeFrames(1), {
      endpoint: ENDPOINT,
      timeoutMs: 1234,
      signal: controller.signal,
    });

    expect(seen).toEqual([{ timeoutMs: 1234, signal: controller.signal }]);
  });

  describe('cancellation', () => {
    it('stops dispatching new frames and keeps completed successes', async () => {
      const controller = new AbortController();
      const detector = new FakeDetector((frame) => {
        if (frame.index === 2) {
          controller.abort();
        }
        return success(frame, 1);
      });

      const result = await new DispatchService(detector).run(makeFrames(5), {
        endpoint: ENDPOINT,
        concurrency: 1,
        signal: controller.signal,
      });

      expect(result.cancelled).toBe(true);
      expect(result.outcomes.map((o) => o.index)).toEqual([1, 2]);
      expect(detector.calls.map((f) => f.index)).toEqual([1, 2]);
    });

    it('abandons a failure that finishes after cancellation', async () => {
      const controller = new AbortController();
      const detector = new FakeDetector((frame) => {
        if (frame.index === 2) {
          controller.abort();
          return failure(frame, FrameErrorKind.WORKER_UNREACHABLE, 'Request failed: This operation was aborted');
        }
        return success(frame, 3);
      });

      const result = await new DispatchService(detector).run(makeFrames(4), {
        endpoint: ENDPOINT,
        concurrency: 1,
        signal: controller.signal,
        sleep: noSleep,
      });

      expect(result.cancelled).toBe(true);
      expect(result.outcomes.map((o) => o.index)).toEqual([1]);
      expect(noSleep).not.toHaveBeenCalled();
    });

    it('dispatches nothing when already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const detector = new FakeDetector((frame) => success(frame, 1));

      const result = await new DispatchService(detector).run(makeFrames(3), {
        endpoint: ENDPOINT,
        signal: controller.signal,
      });

      expect(result).toEqual({ outcomes: [], cancelled: true, totalAttempts: 0 });
    });
  });

  describe('failOnTotalFailure', () => {
    const allRejected = () =>
      new FakeDetector((frame) => failure(frame, FrameErrorKind.WORKER_REJECTED_FRAME));

    it('throws when every frame failed', async () => {
      await expect(
        new DispatchService(allRejected()).run(makeFrames(3), { endpoint: ENDPOINT, failOnTotalFailure: true })
      ).rejects.toThrow(AllFramesFailedError);
    });

    it('returns the failures when disabled', async () => {
      const { outcomes } = await new DispatchService(allRejected()).run(makeFrames(3), { endpoint: ENDPOINT });

      expect(outcomes.every((o) => o.status === 'failed')).toBe(true);
      expect(outcomes).toHaveLength(3);
    });

    it('does not throw when at least one frame succeeded', async () => {
      const detector = new FakeDetector((frame) =>
        frame.index === 1 ? success(frame, 0) : failure(frame, FrameErrorKind.WORKER_REJECTED_FRAME)
      );

      const { outcomes } = await new DispatchService(detector).run(makeFrames(3), {
        endpoint: ENDPOINT,
        failOnTotalFailure: true,
      });
      expect(outcomes).toHaveLength(3);
    });
  });

  it('rejects an out-of-range concurrency', async () => {
    const service = new DispatchService(new FakeDetector((frame) => success(frame, 1)));

    await expect(service.run(makeFrames(1), { endpoint: ENDPOINT, concurrency: 0 })).rejects.toThrow(
      InvalidConfigurationError
    );
    await expect(service.run(makeFrames(1), { endpoint: ENDPOINT, concurrency: 51 })).rejects.toThrow(
      'Concurrency must be an integer between 1 and 50'
    );
  });

  it('records attempts and retries per frame on the run timer', async () => {
    const timer = new PipelineTimer('run-1');
    const detector = new FakeDetector((frame, call) =>
      frame.index === 2 && call === 1
        ? failure(frame, FrameErrorKind.WORKER_UNREACHABLE)
        : frame.index === 3
          ? failure(frame, FrameErrorKind.WORKER_REJECTED_FRAME)
          : success(frame, 1)
    );

    await new DispatchService(detector).run(makeFrames(3), { endpoint: ENDPOINT, timer, sleep: noSleep });

    expect(timer.getSummary().frames).toMatchObject({
      timed: 3,
      failed: 1,
      abandoned: 0,
      retried: 1,
      totalAttempts: 4,
    });
  });
});
