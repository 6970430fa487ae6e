import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BrokerConfig } from './broker.types';
import { BrokerService } from './broker.service';
import { SESSION_TRANSPORT_FACTORY, TransportFactory, WsTransport } from './ws-transport';

@Module({
  providers: [
    BrokerService,
    {
      provide: SESSION_TRANSPORT_FACTORY,
      inject: [ConfigService],
      useFactory: (config: ConfigService): TransportFactory => {
        const { pingIntervalMs } = config.getOrThrow<BrokerConfig>('broker');
        return () => new WsTransport(pingIntervalMs);
      },
    },
  ],
  exports: [BrokerService],
})
export class BrokerModule {}
