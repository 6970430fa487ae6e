import { Controller, Get, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BrokerService } from '../broker/broker.service';
import { ClientConnectionService } from '../gateway/client-connection.service';

/** Service banner at `GET /` and, in debug mode only, `GET /api/status`. */
@Controller()
export class StatusController {
  private readonly debug: boolean;
  private readonly version: string;
  private readonly maxOrderQuantity: number;

  constructor(
    private readonly broker: BrokerService,
    private readonly clients: ClientConnectionService,
    config: ConfigService,
  ) {
    this.debug = config.get<boolean>('debug', false);
    this.version = config.get<string>('appVersion', '0.1.0');
    this.maxOrderQuantity = config.get<number>('maxOrderQuantity', 10);
  }

  @Get()
  info() {
    return {
      message: 'Broker Session Gateway Running',
      version: this.version,
      status: 'healthy',
      environment: this.debug ? 'development' : 'production',
    };
  }

  @Get('api/status')
  status() {
    if (!this.debug) throw new NotFoundException();
    return {
      broker: this.broker.getConnectionStats(),
      websocketClients: this.clients.size,
      settings: {
        debug: this.debug,
        maxOrderQuantity: this.maxOrderQuantity,
      },
    };
  }
}
