import { Module } from '@nestjs/common';
import { BrokerModule } from '../broker/broker.module';
import { ClientConnectionService } from './client-connection.service';
import { BrokerGateway } from './ws.gateway';

@Module({
  imports: [BrokerModule],
  providers: [BrokerGateway, ClientConnectionService],
  exports: [ClientConnectionService],
})
export class GatewayModule {}
