/**
 * Configuration Loader Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { loadConfig, parseRollingPolicy } from '../../../src/config';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      port: 3000,
      nodeEnv: 'development',
      continuousMode: true,
      rotation: {
        logFile: undefined,
        rollingPolicy: 'size',
        rotateSizeMB: undefined,
        backupCount: undefined,
        rotateDays: undefined,
        checkIntervalMs: undefined,
        recursive: true,
      },
      service: {
        name: 'log-rotation-service',
        version: '1.0.0',
      },
    });
  });

  it('should parse rotation settings', () => {
    const config = loadConfig({
      PORT: '8080',
      CONTINUOUS_MODE: 'false',
      LOG_FILE: '/var/log/app/svc.log',
      LOG_ROTATE_SIZE: '25',
      LOG_BACKUP_COUNT: '-1',
      LOG_ROTATE_CHECK_INTERVAL_MS: '1000',
      LOG_ROTATE_RECURSIVE: 'false',
    });

    expect(config.port).toBe(8080);
    expect(config.continuousMode).toBe(false);
    expect(config.rotation).toMatchObject({
      logFile: '/var/log/app/svc.log',
      rotateSizeMB: 25,
      backupCount: -1,
      checkIntervalMs: 1000,
      recursive: false,
    });
  });

  it('should drop numbers that do not parse', () => {
    expect(loadConfig({ LOG_ROTATE_SIZE: 'large' }).rotation.rotateSizeMB).toBeUndefined();
  });
});

describe('parseRollingPolicy', () => {
  it('should accept date in any case and default to size', () => {
    expect(parseRollingPolicy('DATE')).toBe('date');
    expect(parseRollingPolicy('size')).toBe('size');
    expect(parseRollingPolicy('weekly')).toBe('size');
    expect(parseRollingPolicy(undefined)).toBe('size');
  });
});
