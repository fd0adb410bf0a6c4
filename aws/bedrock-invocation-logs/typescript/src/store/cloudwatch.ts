/**
 * CloudWatch Logs Store
 *
 * LogStore backed by the CloudWatch Logs API through the AWS SDK.
 *
 * @module store/cloudwatch
 */

import {
  CloudWatchLogsClient,
  DescribeLogStreamsCommand,
  FilterLogEventsCommand,
  type CloudWatchLogsClientConfig,
  type DescribeLogStreamsCommandInput,
  type DescribeLogStreamsCommandOutput,
  type FilteredLogEvent,
  type FilterLogEventsCommandInput,
  type FilterLogEventsCommandOutput,
} from '@aws-sdk/client-cloudwatch-logs';
import { fromIni } from '@aws-sdk/credential-providers';

import { mapAwsError } from '../error/mapper.js';
import type { RawLogLine } from '../types/events.js';
import type { LogPage, LogPageRequest, LogStore } from './store.js';

/**
 * The two CloudWatch Logs calls the store makes.
 */
export interface CloudWatchLogsApi {
  filterLogEvents(input: FilterLogEventsCommandInput): Promise<FilterLogEventsCommandOutput>;
  describeLogStreams(input: DescribeLogStreamsCommandInput): Promise<DescribeLogStreamsCommandOutput>;
}

export interface CloudWatchConnectionOptions {
  readonly region: string;
  /** Shared config profile; the SDK's default credential chain is used otherwise */
  readonly profile?: string;
  /** Custom endpoint URL */
  readonly endpoint?: string;
}

export type CloudWatchLogsApiFactory = (options: CloudWatchConnectionOptions) => CloudWatchLogsApi;

/**
 * Creates a CloudWatch Logs API backed by the AWS SDK client.
 *
 * The SDK's own retries are disabled: the fetcher's RetryExecutor owns backoff.
 */
export function createCloudWatchLogsApi(options: CloudWatchConnectionOptions): CloudWatchLogsApi {
  const awsConfig: CloudWatchLogsClientConfig = {
    region: options.region,
    endpoint: options.endpoint,
    maxAttempts: 1,
  };

  if (options.profile) {
    awsConfig.credentials = fromIni({ profile: options.profile });
  }

  const client = new CloudWatchLogsClient(awsConfig);

  return {
    filterLogEvents: (input) => client.send(new FilterLogEventsCommand(input)),
    describeLogStreams: (input) => client.send(new DescribeLogStreamsCommand(input)),
  };
}

/**
 * LogStore over CloudWatch Logs `FilterLogEvents` and `DescribeLogStreams`.
 *
 * One SDK client is kept per region. Errors leave the store already mapped to
 * LogStoreError.
 *
 * @example
 * ```typescript
 * const store = new CloudWatchLogStore({ profile: 'observability' });
 * const page = await store.filterPage({
 *   logGroupName: 'bedrock-invoke-logging-us-east-1',
 *   region: 'us-east-1',
 *   startTime: Date.now() - 3_600_000,
 *   endTime: Date.now(),
 * });
 * ```
 */
export class CloudWatchLogStore implements LogStore {
  private readonly clients = new Map<string, CloudWatchLogsApi>();
  private readonly profile?: string;
  private readonly endpoint?: string;
  private readonly createApi: CloudWatchLogsApiFactory;

  constructor(
    options: { profile?: string; endpoint?: string; createApi?: CloudWatchLogsApiFactory } = {}
  ) {
    this.profile = options.profile;
    this.endpoint = options.endpoint;
    this.createApi = options.createApi ?? createCloudWatchLogsApi;
  }

  async filterPage(request: LogPageRequest): Promise<LogPage> {
    const input: FilterLogEventsCommandInput = {
      logGroupName: request.logGroupName,
      startTime: request.startTime,
      endTime: request.endTime,
    };
    if (request.filterPattern !== undefined) {
      input.filterPattern = request.filterPattern;
    }
    if (request.logStreamNames !== undefined && request.logStreamNames.length > 0) {
      input.logStreamNames = [...request.logStreamNames];
    }
    if (request.nextToken !== undefined) {
      input.nextToken = request.nextToken;
    }
    if (request.limit !== undefined) {
      input.limit = request.limit;
    }

    try {
      const output = await this.api(request.region).filterLogEvents(input);
      return {
        lines: (output.events ?? []).map(toRawLogLine),
        nextToken: output.nextToken,
      };
    } catch (error) {
      throw mapAwsError(error);
    }
  }

  async latestStreamName(request: { logGroupName: string; region: string }): Promise<string | undefined> {
    try {
      const output = await this.api(request.region).describeLogStreams({
        logGroupName: request.logGroupName,
        orderBy: 'LastEventTime',
        descending: true,
        limit: 1,
      });
      return output.logStreams?.[0]?.logStreamName;
    } catch (error) {
      throw mapAwsError(error);
    }
  }

  private api(region: string): CloudWatchLogsApi {
    let api = this.clients.get(region);
    if (!api) {
      api = this.createApi({ region, profile: this.profile, endpoint: this.endpoint });
      this.clients.set(region, api);
    }
    return api;
  }
}

/**
 * Events without a message become empty lines, which the parser reports as malformed.
 */
function toRawLogLine(event: FilteredLogEvent): RawLogLine {
  return {
    message: event.message ?? '',
    timestamp: event.timestamp ?? event.ingestionTime ?? 0,
    ingestionTime: event.ingestionTime,
    logStreamName: event.logStreamName,
    eventId: event.eventId,
  };
}
