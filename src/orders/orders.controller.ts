import { BadRequestException, Body, Controller, Get, HttpCode, Logger, Post } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BrokerService } from '../broker/broker.service';
import { toHttpException } from './broker-http.util';
import { validateOrder, validateOrderId } from './order-validation.util';

/** REST access to orders, positions and account data under `/api`. */
@Controller('api')
export class OrdersController {
  private readonly logger = new Logger(OrdersController.name);
  private readonly maxOrderQuantity: number;

  constructor(
    private readonly broker: BrokerService,
    config: ConfigService,
  ) {
    this.maxOrderQuantity = config.get<number>('maxOrderQuantity', 10);
  }

  @Post('place_order')
  @HttpCode(200)
  async placeOrder(@Body() body: unknown) {
    const order = validateOrder(body, this.maxOrderQuantity);
    if (!order.ok) throw new BadRequestException(order.error);

    const { symbol, side, quantity } = order.value;
    this.logger.log(`REST: placing order ${symbol} ${side} ${quantity}`);
    return this.call(() => this.broker.placeOrder(order.value));
  }

  @Post('cancel_order')
  @HttpCode(200)
  async cancelOrder(@Body() body: unknown) {
    const raw = typeof body === 'object' && body !== null && 'order_id' in body ? body.order_id : undefined;
    const orderId = validateOrderId(raw);
    if (!orderId.ok) throw new BadRequestException(orderId.error);

    this.logger.log(`REST: cancelling order ${orderId.value}`);
    return this.call(() => this.broker.cancelOrder(orderId.value));
  }

  @Get('positions')
  positions() {
    return this.call(() => this.broker.queryPositions());
  }

  @Get('account_info')
  accountInfo() {
    return this.call(() => this.broker.queryAccountInfo());
  }

  @Get('subscriptions')
  subscriptions() {
    const { subscriptions } = this.broker.getConnectionStats();
    return { subscriptions, count: subscriptions.length };
  }

  private async call<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw toHttpException(err);
    }
  }
}
