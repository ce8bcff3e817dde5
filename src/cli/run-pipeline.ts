#!/usr/bin/env node
/**
 * Pipeline CLI
 *
 * Usage:
 *   npx tsx src/cli/run-pipeline.ts --video clip.mp4 [--step 1] [--max-frames 20]
 *     [--worker http://127.0.0.1:8001/] [--concurrency 2] [--retries 2] [--timeout 30000] [--json]
 *
 * INPUT_PATH, STEP, MAX_FRAMES and WORKER_URL stand in for missing flags.
 * Ctrl+C stops dispatching and prints what has been counted so far.
 */

// Load environment variables from .env file
import 'dotenv/config';

import { input } from '@inquirer/prompts';
import { stat } from 'fs/promises';

import { runPipeline } from '../services/pipeline.service.js';
import { ffmpegFrameExtractionProvider } from '../providers/implementations/ffmpeg-frame-extraction.provider.js';
import { AppError } from '../utils/errors.js';
import { CliUsageError, resolveCliOptions } from './options.js';
import { formatFileSize, printError, printInfo, printLabel, printReport, printWarn } from './utils.js';

function printUsage(): void {
  console.log(`
Count objects in a video, one sampled frame at a time.

Usage:
  npx tsx src/cli/run-pipeline.ts [--video] <path> [options]

Options:
  --step <seconds>      Sampling interval (default: 1, or STEP)
  --max-frames <n>      Keep only the first n frames (or MAX_FRAMES)
  --worker <url>        Detection worker endpoint (or WORKER_URL)
  --concurrency <n>     Requests in flight (default: DETECTION_CONCURRENCY)
  --retries <n>         Retries for an unreachable worker (default: DETECTION_MAX_RETRIES)
  --timeout <ms>        Per-request timeout (default: DETECTION_TIMEOUT_MS)
  --json                Print the report as JSON only
  -h, --help            Show this help
`);
}

async function main(): Promise<number> {
  const options = resolveCliOptions(process.argv.slice(2), process.env);

  if (options.help) {
    printUsage();
    return 0;
  }

  let videoPath = options.videoPath;
  if (!videoPath) {
    if (!process.stdin.isTTY) {
      printError('No video given. Pass --video <path> or set INPUT_PATH.');
      return 1;
    }
    videoPath = await input({
      message: 'Video path:',
      validate: async (value) => {
        try {
          return (await stat(value)).isFile() || 'Not a file';
        } catch {
          return 'File not found';
        }
      },
    });
  }

  if (!options.json) {
    if (!(await ffmpegFrameExtractionProvider.isAvailable())) {
      printWarn('ffmpeg or ffprobe did not answer -version; check FFMPEG_PATH and FFPROBE_PATH');
    }
    printLabel('Video', videoPath);
    // A missing file is reported by the pipeline as SOURCE_NOT_FOUND
    const size = await stat(videoPath).then((s) => formatFileSize(s.size), () => null);
    if (size) printLabel('Size', size);
    printLabel('Interval', `${options.intervalSeconds}s`);
    if (options.maxFrames !== undefined) printLabel('Max frames', options.maxFrames);
    printInfo('Press Ctrl+C to stop and keep the frames counted so far');
  }

  const controller = new AbortController();
  const onSigint = (): void => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    printWarn('Cancelling, waiting for in-flight frames...');
    controller.abort();
  };
  process.on('SIGINT', onSigint);

  try {
    const report = await runPipeline(
      {
        videoPath,
        intervalSeconds: options.intervalSeconds,
        maxFrames: options.maxFrames,
        endpoint: options.endpoint,
        concurrency: options.concurrency,
        maxRetries: options.maxRetries,
        timeoutMs: options.timeoutMs,
      },
      { signal: controller.signal }
    );

    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      printReport(report);
    }
    return report.partial ? 130 : 0;
  } finally {
    process.off('SIGINT', onSigint);
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof AppError || error instanceof CliUsageError) {
      const code = error instanceof AppError ? ` [${error.code}]` : '';
      printError(`${error.message}${code}`);
    } else {
      printError(error instanceof Error ? error.message : String(error));
    }
    process.exitCode = 1;
  });
