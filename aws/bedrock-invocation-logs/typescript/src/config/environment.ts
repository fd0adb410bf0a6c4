/**
 * Environment variable loading for pipeline configuration.
 * @module config/environment
 */

import { ConfigurationError } from '../error/categories.js';
import { parseLogLevel } from '../observability/logging.js';
import type { PipelineConfigInput } from './config.js';
import { DEFAULT_LOG_LEVEL } from './defaults.js';

/**
 * Loads a partial pipeline configuration from environment variables.
 *
 * Supported environment variables:
 * - BEDROCK_LOG_GROUP_NAME: Log group to read
 * - AWS_REGION / AWS_DEFAULT_REGION: Region of the log group
 * - BEDROCK_LOG_LOOKBACK_HOURS: Hours before now to start the window at
 * - BEDROCK_LOG_MAX_EVENTS: Maximum number of log lines to read
 * - BEDROCK_LOG_LEVEL: Console log level (error, warn, info, debug); unknown names mean warn
 * - AWS_PROFILE: Shared config profile for credentials
 * - CLOUDWATCH_LOGS_ENDPOINT: Custom CloudWatch Logs endpoint
 *
 * Unset variables are left out so that `resolvePipelineConfig` applies its defaults.
 *
 * @throws {ConfigurationError} If a numeric variable is not a number
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): PipelineConfigInput {
  const config: { -readonly [K in keyof PipelineConfigInput]: PipelineConfigInput[K] } = {};

  const logGroupName = env.BEDROCK_LOG_GROUP_NAME;
  if (logGroupName) {
    config.logGroupName = logGroupName;
  }

  const region = env.AWS_REGION || env.AWS_DEFAULT_REGION;
  if (region) {
    config.region = region;
  }

  const lookbackHours = readNumber(env, 'BEDROCK_LOG_LOOKBACK_HOURS');
  if (lookbackHours !== undefined) {
    config.lookbackHours = lookbackHours;
  }

  const maxEvents = readNumber(env, 'BEDROCK_LOG_MAX_EVENTS');
  if (maxEvents !== undefined) {
    config.maxEvents = maxEvents;
  }

  if (env.BEDROCK_LOG_LEVEL) {
    config.logLevel = parseLogLevel(env.BEDROCK_LOG_LEVEL, DEFAULT_LOG_LEVEL);
  }

  if (env.AWS_PROFILE) {
    config.profile = env.AWS_PROFILE;
  }

  if (env.CLOUDWATCH_LOGS_ENDPOINT) {
    config.endpoint = env.CLOUDWATCH_LOGS_ENDPOINT;
  }

  return config;
}

function readNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const value = env[key];
  if (value === undefined || value.trim() === '') {
    return undefined;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`${key} must be a number, got "${value}"`, { variable: key });
  }
  return parsed;
}
