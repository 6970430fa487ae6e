import { Controller, Get } from '@nestjs/common';
import { BrokerService } from '../broker/broker.service';
import { ClientConnectionService } from '../gateway/client-connection.service';

/** Health-check endpoint at `GET /health`. */
@Controller('health')
export class HealthController {
  constructor(
    private readonly broker: BrokerService,
    private readonly clients: ClientConnectionService,
  ) {}

  /** Broker session state, downstream client count, and connection stats. */
  @Get()
  check() {
    const stats = this.broker.getConnectionStats();
    return {
      status: stats.connected ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      connectedClients: this.clients.size,
      ...stats,
    };
  }
}
