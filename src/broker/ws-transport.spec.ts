import WebSocket, { WebSocketServer } from 'ws';
import { waitFor } from '../../test/wait-for';
import { listen, shutdown } from '../../test/ws-server';
import { WsTransport } from './ws-transport';

describe('WsTransport', () => {
  let server: WebSocketServer;
  let url: string;
  let peers: WebSocket[];
  let transport: WsTransport;

  beforeEach(async () => {
    ({ server, url } = await listen());
    peers = [];
    server.on('connection', (ws) => peers.push(ws));
    transport = new WsTransport(60_000);
  });

  afterEach(async () => {
    transport.close();
    await shutdown(server);
  });

  it('opens and carries frames both ways', async () => {
    const frames: string[] = [];
    transport.onFrame((raw) => frames.push(raw));

    await transport.open(url);
    expect(transport.connected).toBe(true);
    await waitFor(() => peers.length === 1);

    const received = new Promise<string>((resolve) =>
      peers[0].once('message', (data: WebSocket.RawData) => resolve(data.toString())),
    );
    await transport.send('{"action":"get_positions"}');
    expect(await received).toBe('{"action":"get_positions"}');

    peers[0].send('{"type":"market_data","data":{"symbol":"MES"}}');
    await waitFor(() => frames.length === 1);
    expect(frames).toEqual(['{"type":"market_data","data":{"symbol":"MES"}}']);
  });

  it('reports a server-side close with its code and reason', async () => {
    const reasons: string[] = [];
    transport.onClose((reason) => reasons.push(reason));

    await transport.open(url);
    await waitFor(() => peers.length === 1);
    peers[0].close(4000, 'maintenance');

    await waitFor(() => reasons.length === 1);
    expect(reasons).toEqual(['4000 maintenance']);
    expect(transport.connected).toBe(false);
    await expect(transport.send('{}')).rejects.toThrow('socket not connected');
  });

  it('does not report its own close and tolerates repeated calls', async () => {
    const reasons: string[] = [];
    transport.onClose((reason) => reasons.push(reason));

    await transport.open(url);
    await waitFor(() => peers.length === 1);
    const peerClosed = new Promise<number>((resolve) => peers[0].once('close', (code: number) => resolve(code)));

    transport.close();
    transport.close();

    expect(await peerClosed).toBe(1000);
    expect(transport.connected).toBe(false);
    expect(reasons).toEqual([]);
  });

  it('rejects open when nothing is listening', async () => {
    const { server: gone, url: deadUrl } = await listen();
    await shutdown(gone);

    await expect(transport.open(deadUrl)).rejects.toThrow();
    expect(transport.connected).toBe(false);
  });

  it('refuses to be opened twice', async () => {
    await transport.open(url);
    await expect(transport.open(url)).rejects.toThrow('transport already used');
  });
});
