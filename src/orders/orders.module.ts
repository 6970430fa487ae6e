import { Module } from '@nestjs/common';
import { BrokerModule } from '../broker/broker.module';
import { OrdersController } from './orders.controller';

@Module({
  imports: [BrokerModule],
  controllers: [OrdersController],
})
export class OrdersModule {}
