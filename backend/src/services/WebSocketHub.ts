import WebSocket, { WebSocketServer } from 'ws';
import { EventEmitter } from 'events';
import { IncomingMessage } from 'http';
import { v4 as uuidv4 } from 'uuid';
import { IngestionService } from './IngestionService';
import { AppendResult, TruncateResult } from '../types/reading';
import { log } from '../utils/logger';

export const SUBSCRIPTIONS = ['readings', 'store'] as const;
export type Subscription = (typeof SUBSCRIPTIONS)[number];

interface ClientConnection {
  id: string;
  websocket: WebSocket;
  subscriptions: Set<Subscription>;
  isAlive: boolean;
  metadata: {
    ip?: string;
    connectedAt: Date;
  };
}

interface ClientMessage {
  type: string;
  subscriptions?: unknown;
}

function isSubscription(value: unknown): value is Subscription {
  return typeof value === 'string' && (SUBSCRIPTIONS as readonly string[]).includes(value);
}

function parseClientMessage(raw: string): ClientMessage | null {
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null || !('type' in parsed) || typeof parsed.type !== 'string') {
    return null;
  }
  return {
    type: parsed.type,
    subscriptions: 'subscriptions' in parsed ? parsed.subscriptions : undefined,
  };
}

/**
 * Live push of store changes to dashboards.
 *
 * Clients subscribe to `readings` (every stored row) and/or `store`
 * (truncations, which invalidate any row ids a client has cached).
 */
export class WebSocketHub extends EventEmitter {
  private wss: WebSocketServer | null = null;
  private clients: Map<string, ClientConnection> = new Map();
  private pingInterval: NodeJS.Timeout | null = null;
  private readonly onReadingStored = (event: AppendResult) => {
    this.broadcast('readingStored', { epoch: event.epoch, reading: event.reading }, 'readings');
  };
  private readonly onStoreTruncated = (event: TruncateResult) => {
    this.broadcast('storeTruncated', event, 'store');
  };

  constructor(private ingestion: IngestionService, private pingIntervalMs: number = 30000) {
    super();
    this.ingestion.on('readingStored', this.onReadingStored);
    this.ingestion.on('storeTruncated', this.onStoreTruncated);
  }

  /**
   * Start the WebSocket server. Resolves with the bound port.
   */
  public initialize(port: number): Promise<number> {
    return new Promise((resolve, reject) => {
      const wss = new WebSocketServer({ port, perMessageDeflate: false });
      this.wss = wss;

      wss.on('connection', (ws: WebSocket, request: IncomingMessage) => {
        this.handleNewConnection(ws, request);
      });
      wss.once('error', reject);
      wss.once('listening', () => {
        const address = wss.address();
        const boundPort = typeof address === 'object' && address !== null ? address.port : port;
        this.startPingInterval();
        log.info(` WebSocket server started on port ${boundPort}`, 'WebSocketHub');
        resolve(boundPort);
      });
    });
  }

  private handleNewConnection(ws: WebSocket, request: IncomingMessage): void {
    const clientId = uuidv4();
    const client: ClientConnection = {
      id: clientId,
      websocket: ws,
      subscriptions: new Set(),
      isAlive: true,
      metadata: {
        ip: request.socket.remoteAddress,
        connectedAt: new Date(),
      },
    };
    this.clients.set(clientId, client);
    log.info(` Dashboard connected: ${clientId} (${client.metadata.ip ?? 'unknown'})`, 'WebSocketHub');

    ws.on('message', (data: WebSocket.RawData) => {
      this.handleClientMessage(clientId, data.toString());
    });

    ws.on('pong', () => {
      client.isAlive = true;
    });

    ws.on('close', () => {
      this.handleClientDisconnection(clientId);
    });

    ws.on('error', (error) => {
      log.error(`WebSocket error for client ${clientId}`, 'WebSocketHub', error);
      this.handleClientDisconnection(clientId);
    });

    this.sendToClient(client, 'connected', {
      clientId,
      serverTime: new Date().toISOString(),
      availableSubscriptions: SUBSCRIPTIONS,
    });
    this.emit('clientConnected', { clientId });
  }

  private handleClientDisconnection(clientId: string): void {
    if (this.clients.delete(clientId)) {
      log.info(` Client disconnected: ${clientId}`, 'WebSocketHub');
      this.emit('clientDisconnected', { clientId });
    }
  }

  private handleClientMessage(clientId: string, raw: string): void {
    const client = this.clients.get(clientId);
    if (!client) return;

    let message: ClientMessage | null;
    try {
      message = parseClientMessage(raw);
    } catch (error) {
      log.warn(`Unparseable message from client ${clientId}`, 'WebSocketHub', error);
      this.sendToClient(client, 'error', { error: 'invalid_json' });
      return;
    }
    if (!message) {
      this.sendToClient(client, 'error', { error: 'missing_type' });
      return;
    }

    const requested = Array.isArray(message.subscriptions) ? message.subscriptions.filter(isSubscription) : [];

    switch (message.type) {
      case 'subscribe':
        requested.forEach((subscription) => client.subscriptions.add(subscription));
        this.sendToClient(client, 'subscribed', { subscriptions: Array.from(client.subscriptions) });
        break;

      case 'unsubscribe':
        requested.forEach((subscription) => client.subscriptions.delete(subscription));
        this.sendToClient(client, 'unsubscribed', { subscriptions: Array.from(client.subscriptions) });
        break;

      case 'ping':
        this.sendToClient(client, 'pong', { timestamp: Date.now() });
        break;

      default:
        log.warn(`Unknown message type from client ${clientId}: ${message.type}`, 'WebSocketHub');
        this.sendToClient(client, 'error', { error: 'unknown_type', type: message.type });
    }
  }

  private sendToClient(client: ClientConnection, type: string, data: unknown): void {
    if (client.websocket.readyState !== WebSocket.OPEN) return;
    try {
      client.websocket.send(JSON.stringify({ type, data, timestamp: new Date().toISOString() }));
    } catch (error) {
      log.error(`Error sending ${type} to client ${client.id}`, 'WebSocketHub', error);
    }
  }

  /**
   * Send an event to every client subscribed to `subscription`.
   */
  public broadcast(type: string, data: unknown, subscription: Subscription): number {
    let delivered = 0;
    for (const client of this.clients.values()) {
      if (client.subscriptions.has(subscription)) {
        this.sendToClient(client, type, data);
        delivered++;
      }
    }
    return delivered;
  }

  // Terminate clients that missed the previous ping
  private startPingInterval(): void {
    this.pingInterval = setInterval(() => {
      for (const [clientId, client] of this.clients.entries()) {
        if (!client.isAlive) {
          log.info(` Terminating unresponsive client ${clientId}`, 'WebSocketHub');
          client.websocket.terminate();
          this.handleClientDisconnection(clientId);
          continue;
        }
        client.isAlive = false;
        client.websocket.ping();
      }
    }, this.pingIntervalMs);
  }

  public getClientCount(): number {
    return this.clients.size;
  }

  public async cleanup(): Promise<void> {
    if (this.pingInterval) {
      clearInterval(this.pingInterval);
      this.pingInterval = null;
    }
    this.ingestion.off('readingStored', this.onReadingStored);
    this.ingestion.off('storeTruncated', this.onStoreTruncated);

    for (const client of this.clients.values()) {
      client.websocket.terminate();
    }
    this.clients.clear();

    const wss = this.wss;
    this.wss = null;
    if (wss) {
      await new Promise<void>((resolve, reject) => wss.close((err) => (err ? reject(err) : resolve())));
    }
    this.removeAllListeners();
    log.info(' WebSocket hub cleaned up', 'WebSocketHub');
  }
}
