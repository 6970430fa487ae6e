import { Module } from '@nestjs/common';
import { BrokerModule } from '../broker/broker.module';
import { GatewayModule } from '../gateway/gateway.module';
import { HealthController } from './health.controller';
import { StatusController } from './status.controller';

@Module({
  imports: [BrokerModule, GatewayModule],
  controllers: [HealthController, StatusController],
})
export class HealthModule {}
