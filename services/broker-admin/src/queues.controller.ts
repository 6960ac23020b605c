import { Body, Controller, Get, Headers, Param, Post } from '@nestjs/common';
import { z } from 'zod';
import {
  ApiResponse,
  correlationIdFrom,
  describeIssues,
  DurableQueue,
  failure,
  ok,
  PipelineHost,
  QueueStats,
  RequestHeaders,
} from '@orderflow/shared';

const operatorBody = z.object({ operator: z.string().min(1) });

@Controller('/queues')
export class QueuesController {
  constructor(private readonly host: PipelineHost) {}

  @Get()
  async list(@Headers() headers: RequestHeaders): Promise<ApiResponse<QueueStats[]>> {
    const { broker } = this.host.pipeline;
    const names = await broker.queueNames();
    const stats = await Promise.all(names.map((name) => this.queue(name).stats()));
    return ok(stats, correlationIdFrom(headers));
  }

  @Get('/:name/stats')
  async stats(@Headers() headers: RequestHeaders, @Param('name') name: string): Promise<ApiResponse<QueueStats>> {
    return ok(await this.queue(name).stats(), correlationIdFrom(headers));
  }

  /** Replays every pending dead letter of the queue. */
  @Post('/:name/replay-dead-letters')
  async replayAll(
    @Headers() headers: RequestHeaders,
    @Param('name') name: string,
    @Body() body: unknown
  ): Promise<ApiResponse<{ replayed: number; rejected: number }>> {
    const correlationId = correlationIdFrom(headers);
    const parsed = operatorBody.safeParse(body);
    if (!parsed.success) {
      return failure('VALIDATION_ERROR', describeIssues(parsed.error), correlationId);
    }
    return ok(await this.host.pipeline.deadLetters.replayAll(name, parsed.data.operator), correlationId);
  }

  private queue(name: string): DurableQueue {
    return this.host.pipeline.broker.queue(name, { maxAttempts: this.host.config.retry.maxAttempts });
  }
}
