import { Body, Controller, Get, Headers, NotFoundException, Param, Post, Query } from '@nestjs/common';
import { z } from 'zod';
import {
  ApiResponse,
  correlationIdFrom,
  DeadLetterCounts,
  DeadLetterNotFoundError,
  DeadLetterRecord,
  describeIssues,
  failure,
  ok,
  PipelineHost,
  ReplayRejectedError,
  ReplayResult,
  RequestHeaders,
} from '@orderflow/shared';

const listQuery = z.object({
  queue: z.string().min(1).optional(),
  status: z.enum(['pending', 'replayed', 'discarded']).optional(),
  eventId: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

const operatorBody = z.object({ operator: z.string().min(1) });

@Controller('/dead-letters')
export class DeadLettersController {
  constructor(private readonly host: PipelineHost) {}

  @Get()
  async list(
    @Headers() headers: RequestHeaders,
    @Query() query: Record<string, string | undefined>
  ): Promise<ApiResponse<DeadLetterRecord[]>> {
    const correlationId = correlationIdFrom(headers);
    const parsed = listQuery.safeParse(query);
    if (!parsed.success) {
      return failure('VALIDATION_ERROR', describeIssues(parsed.error), correlationId);
    }

    const { queue, ...filter } = parsed.data;
    const records = await this.host.pipeline.deadLetters.list({ queueName: queue, ...filter });
    return ok(records, correlationId);
  }

  @Get('/stats')
  async stats(@Headers() headers: RequestHeaders): Promise<ApiResponse<DeadLetterCounts>> {
    return ok(await this.host.pipeline.deadLetters.stats(), correlationIdFrom(headers));
  }

  @Get('/:id')
  async inspect(@Headers() headers: RequestHeaders, @Param('id') id: string): Promise<ApiResponse<DeadLetterRecord>> {
    const record = await this.run(() => this.host.pipeline.deadLetters.inspect(id));
    return ok(record, correlationIdFrom(headers));
  }

  @Post('/:id/replay')
  async replay(
    @Headers() headers: RequestHeaders,
    @Param('id') id: string,
    @Body() body: unknown
  ): Promise<ApiResponse<ReplayResult>> {
    const correlationId = correlationIdFrom(headers);
    const parsed = operatorBody.safeParse(body);
    if (!parsed.success) {
      return failure('VALIDATION_ERROR', describeIssues(parsed.error), correlationId);
    }

    const { operator } = parsed.data;
    return this.resolve(correlationId, () => this.host.pipeline.deadLetters.replay(id, operator));
  }

  @Post('/:id/discard')
  async discard(
    @Headers() headers: RequestHeaders,
    @Param('id') id: string,
    @Body() body: unknown
  ): Promise<ApiResponse<DeadLetterRecord>> {
    const correlationId = correlationIdFrom(headers);
    const parsed = operatorBody.safeParse(body);
    if (!parsed.success) {
      return failure('VALIDATION_ERROR', describeIssues(parsed.error), correlationId);
    }

    const { operator } = parsed.data;
    return this.resolve(correlationId, () => this.host.pipeline.deadLetters.discard(id, operator));
  }

  /** A refused replay or discard is a business answer, not an HTTP error. */
  private async resolve<T>(correlationId: string, action: () => Promise<T>): Promise<ApiResponse<T>> {
    try {
      return ok(await this.run(action), correlationId);
    } catch (error) {
      if (error instanceof ReplayRejectedError) {
        return failure(error.code, error.message, correlationId);
      }
      throw error;
    }
  }

  private async run<T>(action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      if (error instanceof DeadLetterNotFoundError) {
        throw new NotFoundException(error.message);
      }
      throw error;
    }
  }
}
