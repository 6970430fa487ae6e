import { Test } from '@nestjs/testing';
import { BrokerService } from '../broker/broker.service';
import { ConnectionStats } from '../broker/broker.types';
import { ClientConnectionService } from '../gateway/client-connection.service';
import { HealthController } from './health.controller';

describe('HealthController', () => {
  const stats: ConnectionStats = {
    connected: true,
    state: 'ready',
    reconnectAttempts: 0,
    activeSubscriptionCount: 1,
    pendingRequestCount: 0,
    subscriptions: ['MES'],
  };
  const broker = { getConnectionStats: jest.fn(() => stats) };
  let controller: HealthController;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      controllers: [HealthController],
      providers: [
        { provide: BrokerService, useValue: broker },
        { provide: ClientConnectionService, useValue: { size: 2 } },
      ],
    }).compile();
    controller = moduleRef.get(HealthController);
  });

  it('reports ok with session stats while ready', () => {
    expect(controller.check()).toEqual({
      status: 'ok',
      timestamp: expect.any(String),
      connectedClients: 2,
      ...stats,
    });
  });

  it('reports degraded while reconnecting', () => {
    broker.getConnectionStats.mockReturnValueOnce({
      ...stats,
      connected: false,
      state: 'reconnecting',
      reconnectAttempts: 2,
    });

    expect(controller.check()).toMatchObject({ status: 'degraded', state: 'reconnecting', reconnectAttempts: 2 });
  });
});
