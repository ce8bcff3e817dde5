import { describe, it, expect } from 'vitest';
import { envSchema } from './env.js';
import { buildConfig } from './index.js';

describe('envSchema', () => {
  describe('SERVER configuration', () => {
    it('should use default values when not provided', () => {
      const result = envSchema.safeParse({});

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.NODE_ENV).toBe('development');
        expect(result.data.PORT).toBe(8001);
        expect(result.data.HOST).toBe('0.0.0.0');
      }
    });

    it('should reject invalid NODE_ENV', () => {
      const result = envSchema.safeParse({ NODE_ENV: 'staging' });
      expect(result.success).toBe(false);
    });

    it('should coerce PORT to number', () => {
      const result = envSchema.safeParse({ PORT: '8080' });
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.PORT).toBe(8080);
      }
    });
  });

  describe('DETECTION configuration', () => {
    it('should default to conservative dispatch settings', () => {
      const result = envSchema.safeParse({});

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.DETECTION_CONCURRENCY).toBe(2);
        expect(result.data.DETECTION_MAX_RETRIES).toBe(2);
        expect(result.data.DETECTION_RETRY_DELAY_MS).toBe(500);
        expect(result.data.DETECTION_TIMEOUT_MS).toBe(30000);
        expect(result.data.FAIL_ON_TOTAL_FAILURE).toBe(false);
        expect(result.data.WORKER_COUNT_FIELD).toBe('count');
      }
    });

    it('should reject zero concurrency', () => {
      const result = envSchema.safeParse({ DETECTION_CONCURRENCY: '0' });
      expect(result.success).toBe(false);
    });

    it('should reject concurrency above 50', () => {
      const result = envSchema.safeParse({ DETECTION_CONCURRENCY: '51' });
      expect(result.success).toBe(false);
    });

    it('should parse FAIL_ON_TOTAL_FAILURE flags', () => {
      const on = envSchema.safeParse({ FAIL_ON_TOTAL_FAILURE: '1' });
      const off = envSchema.safeParse({ FAIL_ON_TOTAL_FAILURE: 'false' });

      expect(on.success && on.data.FAIL_ON_TOTAL_FAILURE).toBe(true);
      expect(off.success && off.data.FAIL_ON_TOTAL_FAILURE).toBe(false);
    });

    it('should reject a non-URL WORKER_URL', () => {
      const result = envSchema.safeParse({ WORKER_URL: 'visionmodel' });
      expect(result.success).toBe(false);
    });
  });

  describe('DETECTOR configuration', () => {
    it('should split DETECTOR_ARGS on commas and whitespace', () => {
      const result = envSchema.safeParse({ DETECTOR_ARGS: '--model yolo.onnx, --conf 0.5' });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.DETECTOR_ARGS).toEqual(['--model', 'yolo.onnx', '--conf', '0.5']);
      }
    });
  });
});

describe('buildConfig', () => {
  it('should group env values by concern', () => {
    const env = envSchema.parse({ NODE_ENV: 'test', DETECTION_CONCURRENCY: '4' });
    const config = buildConfig(env);

    expect(config.server.env).toBe('test');
    expect(config.detection.concurrency).toBe(4);
    expect(config.ffmpeg.ffmpegPath).toBe('ffmpeg');
    expect(config.detector.command).toBe('count-objects');
    expect(config.detector.args).toEqual([]);
  });
});
