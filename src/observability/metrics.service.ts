import { Injectable } from '@nestjs/common';
import { collectDefaultMetrics, Counter, Histogram, Registry } from 'prom-client';

// Histogram bucket boundaries in seconds for chat platform request latency
/* eslint-disable no-magic-numbers */
const CHAT_PLATFORM_DURATION_BUCKETS: number[] = [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];
const CHANNEL_MEMBER_BUCKETS: number[] = [1, 2, 5, 10, 25, 50, 100, 250, 500, 1000];
/* eslint-enable no-magic-numbers */

@Injectable()
export class MetricsService {
  private readonly registry: Registry;

  public readonly slashCommandsTotal: Counter<'outcome'>;
  public readonly chatPlatformRequestsTotal: Counter<'operation' | 'status'>;
  public readonly chatPlatformRequestDurationSeconds: Histogram<'operation'>;
  public readonly channelMembersConsidered: Histogram;

  public constructor() {
    this.registry = new Registry();

    collectDefaultMetrics({ register: this.registry });

    this.slashCommandsTotal = new Counter({
      name: 'slash_commands_total',
      help: 'Total number of handled slash command invocations',
      labelNames: ['outcome'] as const,
      registers: [this.registry],
    });

    this.chatPlatformRequestsTotal = new Counter({
      name: 'chat_platform_requests_total',
      help: 'Total number of requests sent to the chat platform API',
      labelNames: ['operation', 'status'] as const,
      registers: [this.registry],
    });

    this.chatPlatformRequestDurationSeconds = new Histogram({
      name: 'chat_platform_request_duration_seconds',
      help: 'Chat platform API request duration in seconds',
      labelNames: ['operation'] as const,
      buckets: CHAT_PLATFORM_DURATION_BUCKETS,
      registers: [this.registry],
    });

    this.channelMembersConsidered = new Histogram({
      name: 'channel_members_considered',
      help: 'Number of human channel members considered per invocation',
      buckets: CHANNEL_MEMBER_BUCKETS,
      registers: [this.registry],
    });
  }

  public async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  public getContentType(): string {
    return this.registry.contentType;
  }
}
