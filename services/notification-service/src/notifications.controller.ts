import { Controller, Get, Headers, Inject, Param, ParseIntPipe } from '@nestjs/common';
import { ApiResponse, correlationIdFrom, ok, RequestHeaders, UnitOfWork } from '@orderflow/shared';
import { NOTIFICATION_UNIT_OF_WORK } from './constants';
import { Notification } from './entities/Notification';
import type { NotificationScope } from './notifications.repository';

@Controller()
export class NotificationsController {
  constructor(@Inject(NOTIFICATION_UNIT_OF_WORK) private readonly unitOfWork: UnitOfWork<NotificationScope>) {}

  @Get('/orders/:orderId/notifications')
  async forOrder(
    @Headers() headers: RequestHeaders,
    @Param('orderId', ParseIntPipe) orderId: number
  ): Promise<ApiResponse<Notification[]>> {
    const sent = await this.unitOfWork.transaction(({ notifications }) => notifications.listForOrder(orderId));
    return ok(sent, correlationIdFrom(headers));
  }
}
