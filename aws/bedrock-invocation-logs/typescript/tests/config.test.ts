/**
 * Configuration tests
 */

import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  DEFAULT_FILTER_PATTERN,
  LOOKBACK_PRESETS_HOURS,
  PipelineConfigBuilder,
  loadConfigFromEnv,
  resolvePipelineConfig,
  windowFromLookback,
} from '../src/index.js';

const NOW = Date.parse('2026-03-01T12:00:00.000Z');
const HOUR = 3_600_000;

function configurationError(action: () => unknown): ConfigurationError {
  try {
    action();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a ConfigurationError');
}

describe('resolvePipelineConfig', () => {
  it('should fill every default', () => {
    const config = resolvePipelineConfig({}, NOW);

    expect(config).toEqual({
      logGroupName: 'bedrock-invoke-logging-us-east-1',
      region: 'us-east-1',
      startTime: NOW - 24 * HOUR,
      endTime: NOW,
      filterPattern: DEFAULT_FILTER_PATTERN,
      streamSelection: 'all',
      reorderWindowMs: 0,
      bufferUntilExhausted: false,
      retry: { maxAttempts: 5, baseDelayMs: 100, maxDelayMs: 5000, jitterFactor: 0.5 },
    });
  });

  it('should derive the window from a lookback', () => {
    const config = resolvePipelineConfig({ lookbackHours: 6 }, NOW);

    expect(config.startTime).toBe(NOW - 6 * HOUR);
    expect(config.endTime).toBe(NOW);
  });

  it('should prefer an explicit window over a lookback', () => {
    const config = resolvePipelineConfig({ startTime: NOW - HOUR, endTime: NOW - 1, lookbackHours: 48 }, NOW);

    expect(config.startTime).toBe(NOW - HOUR);
    expect(config.endTime).toBe(NOW - 1);
  });

  it('should end an open window now', () => {
    const config = resolvePipelineConfig({ startTime: NOW - HOUR }, NOW);

    expect(config.endTime).toBe(NOW);
  });

  it('should turn filtering off for an empty filter pattern', () => {
    expect(resolvePipelineConfig({ filterPattern: '' }, NOW).filterPattern).toBeUndefined();
  });

  it('should merge partial retry settings into the defaults', () => {
    const config = resolvePipelineConfig({ retry: { maxAttempts: 2 } }, NOW);

    expect(config.retry).toEqual({ maxAttempts: 2, baseDelayMs: 100, maxDelayMs: 5000, jitterFactor: 0.5 });
  });

  it('should list every invalid value', () => {
    const error = configurationError(() => resolvePipelineConfig({ region: 'nowhere', maxEvents: 0 }, NOW));

    expect(error.code).toBe('CONFIGURATION');
    expect(error.message).toContain('region: must be an AWS region such as us-east-1');
    expect(error.message).toContain('maxEvents: ');
    expect(error.details?.issues).toHaveLength(2);
  });

  it('should reject a window that ends before it starts', () => {
    const error = configurationError(() => resolvePipelineConfig({ startTime: NOW, endTime: NOW - 1 }, NOW));

    expect(error.message).toBe('Invalid configuration: endTime: endTime must not be before startTime');
  });

  it('should reject a maximum delay below the base delay', () => {
    const error = configurationError(() =>
      resolvePipelineConfig({ retry: { baseDelayMs: 1000, maxDelayMs: 10 } }, NOW)
    );

    expect(error.message).toBe('Invalid configuration: retry.maxDelayMs: maxDelayMs must not be less than baseDelayMs');
  });

  it('should accept GovCloud regions', () => {
    expect(resolvePipelineConfig({ region: 'us-gov-west-1' }, NOW).region).toBe('us-gov-west-1');
  });
});

describe('windowFromLookback', () => {
  it('should cover the given hours up to now', () => {
    expect(windowFromLookback(1, NOW)).toEqual({ startTime: NOW - HOUR, endTime: NOW });
  });

  it('should reject a non-positive lookback', () => {
    expect(() => windowFromLookback(0, NOW)).toThrow(ConfigurationError);
  });

  it('should offer the usual presets', () => {
    expect(LOOKBACK_PRESETS_HOURS).toEqual([1, 6, 12, 24, 48, 96]);
  });
});

describe('loadConfigFromEnv', () => {
  it('should read every supported variable', () => {
    const config = loadConfigFromEnv({
      BEDROCK_LOG_GROUP_NAME: 'team-invocations',
      AWS_REGION: 'eu-west-1',
      BEDROCK_LOG_LOOKBACK_HOURS: '6',
      BEDROCK_LOG_MAX_EVENTS: '500',
      BEDROCK_LOG_LEVEL: 'DEBUG',
      AWS_PROFILE: 'test-profile',
      CLOUDWATCH_LOGS_ENDPOINT: 'http://localhost:4566',
    });

    expect(config).toEqual({
      logGroupName: 'team-invocations',
      region: 'eu-west-1',
      lookbackHours: 6,
      maxEvents: 500,
      logLevel: 'debug',
      profile: 'test-profile',
      endpoint: 'http://localhost:4566',
    });
  });

  it('should fall back to the warn level for an unknown level name', () => {
    expect(loadConfigFromEnv({ BEDROCK_LOG_LEVEL: 'verbose' })).toEqual({ logLevel: 'warn' });
  });

  it('should fall back to AWS_DEFAULT_REGION', () => {
    expect(loadConfigFromEnv({ AWS_DEFAULT_REGION: 'ap-northeast-1' })).toEqual({ region: 'ap-northeast-1' });
  });

  it('should leave unset variables out', () => {
    expect(loadConfigFromEnv({})).toEqual({});
  });

  it('should reject a numeric variable that is not a number', () => {
    const error = configurationError(() => loadConfigFromEnv({ BEDROCK_LOG_LOOKBACK_HOURS: 'soon' }));

    expect(error.message).toBe('BEDROCK_LOG_LOOKBACK_HOURS must be a number, got "soon"');
  });

  it('should resolve into a valid configuration', () => {
    const config = resolvePipelineConfig(loadConfigFromEnv({ AWS_REGION: 'us-west-2', BEDROCK_LOG_LOOKBACK_HOURS: '12' }), NOW);

    expect(config.region).toBe('us-west-2');
    expect(config.startTime).toBe(NOW - 12 * HOUR);
  });
});

describe('PipelineConfigBuilder', () => {
  it('should build a partial configuration', () => {
    const input = new PipelineConfigBuilder()
      .withRegion('us-west-2')
      .withLookbackHours(6)
      .withLatestStreamOnly()
      .withRetryConfig({ maxAttempts: 2 })
      .build();

    const config = resolvePipelineConfig(input, NOW);

    expect(config.region).toBe('us-west-2');
    expect(config.startTime).toBe(NOW - 6 * HOUR);
    expect(config.streamSelection).toBe('latest');
    expect(config.retry.maxAttempts).toBe(2);
  });

  it('should switch to full buffering', () => {
    expect(new PipelineConfigBuilder().withReorderWindow(500).withFullBuffering().build()).toEqual({
      reorderWindowMs: 500,
      bufferUntilExhausted: true,
    });
  });

  it('should replace a lookback with an explicit range', () => {
    const input = PipelineConfigBuilder.from({ lookbackHours: 6 }).withTimeRange(NOW - 2 * HOUR, NOW - HOUR).build();

    expect(input).toEqual({ startTime: NOW - 2 * HOUR, endTime: NOW - HOUR });
  });
});
