import { randomUUID } from 'crypto';
import path from 'path';

import { createChildLogger } from '../utils/logger.js';
import { getConfig } from '../config/index.js';
import { InvalidConfigurationError } from '../utils/errors.js';
import { PipelineTimer } from '../utils/timer.js';
import { pipelineRequestSchema, type Report } from '../types/detection.types.js';
import { frameSamplerService, openVideoSource, type FrameSamplerService } from './frame-sampler.service.js';
import { dispatchService, type DispatchService } from './dispatch.service.js';
import { aggregate } from './aggregator.service.js';

const logger = createChildLogger({ service: 'pipeline' });

export interface PipelineDependencies {
  sampler?: FrameSamplerService;
  dispatcher?: DispatchService;
}

export interface RunOptions {
  /** Cancels the run; frames already processed are reported as a partial report */
  signal?: AbortSignal;
}

/**
 * PipelineService - sample, dispatch, aggregate
 *
 * Holds no per-run state, so one instance can serve concurrent runs.
 */
export class PipelineService {
  private readonly sampler: FrameSamplerService;
  private readonly dispatcher: DispatchService;

  constructor(deps: PipelineDependencies = {}) {
    this.sampler = deps.sampler ?? frameSamplerService;
    this.dispatcher = deps.dispatcher ?? dispatchService;
  }

  /**
   * Run the pipeline over one video.
   *
   * Sampler errors (SourceNotFound, ExtractionFailed, NoFramesProduced) reject
   * before any frame is dispatched. Frame-level failures land in the report.
   */
  async run(request: unknown, options: RunOptions = {}): Promise<Report> {
    const parsed = pipelineRequestSchema.safeParse(request);
    if (!parsed.success) {
      const fields = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
      throw new InvalidConfigurationError(`Invalid pipeline request: ${fields}`, parsed.error.format());
    }

    const req = parsed.data;
    const config = getConfig().detection;
    const runId = randomUUID();
    const timer = new PipelineTimer(runId);

    const signals: AbortSignal[] = [];
    if (options.signal) signals.push(options.signal);
    if (req.runTimeoutMs !== undefined) signals.push(AbortSignal.timeout(req.runTimeoutMs));
    const signal = signals.length > 0 ? AbortSignal.any(signals) : undefined;

    logger.info(
      {
        runId,
        video: path.basename(req.videoPath),
        intervalSeconds: req.intervalSeconds,
        maxFrames: req.maxFrames,
      },
      'Pipeline started'
    );

    try {
      const video = await openVideoSource(req.videoPath);

      timer.startStep('sample');
      const report = await this.sampler.withSampledFrames(
        video,
        { intervalSeconds: req.intervalSeconds, maxFrames: req.maxFrames },
        async (frames) => {
          timer.startStep('dispatch');
          const { outcomes, cancelled } = await this.dispatcher.run(frames, {
            endpoint: req.endpoint ?? config.workerUrl,
            concurrency: req.concurrency ?? config.concurrency,
            maxRetries: req.maxRetries ?? config.maxRetries,
            retryDelayMs: req.retryDelayMs ?? config.retryDelayMs,
            timeoutMs: req.timeoutMs ?? config.timeoutMs,
            failOnTotalFailure: req.failOnTotalFailure ?? config.failOnTotalFailure,
            signal,
            timer,
          });

          timer.startStep('aggregate');
          return aggregate(outcomes, { totalFrames: frames.length, partial: cancelled });
        }
      );
      timer.endStep();

      logger.info(
        {
          runId,
          totalFrames: report.totalFrames,
          framesProcessed: report.framesProcessed,
          failedFrames: report.failedFrameCount,
          totalDetections: report.totalDetections,
          partial: report.partial,
        },
        report.partial ? 'Pipeline cancelled with partial report' : 'Pipeline completed'
      );

      return report;
    } catch (error) {
      logger.error({ runId, error: error instanceof Error ? error.message : String(error) }, 'Pipeline failed');
      throw error;
    } finally {
      timer.logSummary();
    }
  }
}

export const pipelineService = new PipelineService();

/**
 * Run the pipeline with the default sampler and dispatcher
 */
export function runPipeline(request: unknown, options: RunOptions = {}): Promise<Report> {
  return pipelineService.run(request, options);
}
