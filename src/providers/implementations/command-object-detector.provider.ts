import { spawn } from 'child_process';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { z } from 'zod';

import { createChildLogger } from '../../utils/logger.js';
import { getConfig } from '../../config/index.js';
import { DetectorFailedError } from '../../utils/errors.js';
import type { ObjectDetector } from '../interfaces/object-detector.provider.js';

const logger = createChildLogger({ service: 'command-detector' });

const IMAGE_EXTENSIONS = new Set(['.jpg', '.jpeg', '.png', '.bmp', '.webp']);

const countOutputSchema = z.object({
  count: z.number().int().nonnegative(),
});

export interface CommandObjectDetectorOptions {
  /** Executable to run (default: DETECTOR_COMMAND) */
  command?: string;
  /** Arguments placed before the image path (default: DETECTOR_ARGS) */
  args?: string[];
  /** Kill the process after this long (default: DETECTOR_TIMEOUT_MS) */
  timeoutMs?: number;
  /** Parent directory for per-image temp dirs (default: os.tmpdir()) */
  tempRoot?: string;
}

/**
 * Read a count from detector stdout.
 * The last non-empty line is either a bare integer or JSON with a count field.
 */
export function parseDetectorOutput(stdout: string): number | null {
  const lines = stdout.split('\n').map((l) => l.trim()).filter(Boolean);
  const last = lines.at(-1);
  if (last === undefined) {
    return null;
  }

  if (/^\d+$/.test(last)) {
    return Number.parseInt(last, 10);
  }

  try {
    const parsed = countOutputSchema.safeParse(JSON.parse(last));
    return parsed.success ? parsed.data.count : null;
  } catch {
    return null;
  }
}

/**
 * Command Object Detector
 *
 * Runs an external model script once per image:
 *   <command> ...<args> <imagePath>
 * The image is written to a private temp directory that is removed after
 * the process exits, whatever the outcome.
 */
export class CommandObjectDetector implements ObjectDetector {
  readonly detectorId: string;
  private readonly command: string;
  private readonly args: string[];
  private readonly timeoutMs: number;
  private readonly tempRoot: string;

  constructor(options: CommandObjectDetectorOptions = {}) {
    const config = getConfig().detector;
    this.command = options.command ?? config.command;
    this.args = options.args ?? config.args;
    this.timeoutMs = options.timeoutMs ?? config.timeoutMs;
    this.tempRoot = options.tempRoot ?? os.tmpdir();
    this.detectorId = `command:${path.basename(this.command)}`;
  }

  async countObjects(image: Buffer, filename: string): Promise<number> {
    const tempDir = await mkdtemp(path.join(this.tempRoot, `${getConfig().ffmpeg.tempDirName}-detect-`));
    const ext = path.extname(filename).toLowerCase();
    const imagePath = path.join(tempDir, `image${IMAGE_EXTENSIONS.has(ext) ? ext : '.jpg'}`);

    try {
      await writeFile(imagePath, image);
      const stdout = await this.run(imagePath);

      const count = parseDetectorOutput(stdout);
      if (count === null) {
        throw new DetectorFailedError(`Detector output has no count: ${stdout.trim().slice(0, 200) || '<empty>'}`);
      }

      logger.debug({ filename, count }, 'Detector finished');
      return count;
    } finally {
      await rm(tempDir, { recursive: true, force: true });
    }
  }

  private run(imagePath: string): Promise<string> {
    return new Promise((resolve, reject) => {
      const proc = spawn(this.command, [...this.args, imagePath], { stdio: ['ignore', 'pipe', 'pipe'] });

      let stdout = '';
      let stderr = '';
      let timedOut = false;

      const timer = setTimeout(() => {
        timedOut = true;
        proc.kill('SIGKILL');
      }, this.timeoutMs);

      proc.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });
      proc.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      proc.on('close', (code: number | null) => {
        clearTimeout(timer);
        if (timedOut) {
          reject(new DetectorFailedError(`Detector timed out after ${this.timeoutMs}ms`));
          return;
        }
        if (code !== 0) {
          reject(new DetectorFailedError(`Detector exited with code ${code}: ${stderr.trim()}`, code));
          return;
        }
        resolve(stdout);
      });

      proc.on('error', (err: Error) => {
        clearTimeout(timer);
        reject(new DetectorFailedError(`Detector could not be started: ${err.message}`));
      });
    });
  }
}
