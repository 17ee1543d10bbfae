import { randomUUID } from 'crypto';
import { WebSocket, WebSocketServer } from 'ws';
import { z } from 'zod';
import { JobEventKind, JobSnapshot, toWireSnapshot } from '../../core/entities/SearchJob.js';
import { IProgressPublisher } from '../../core/interfaces/IProgressPublisher.js';
import { errorMessage } from '../../core/errors.js';
import { Logger, silentLogger } from '../../utils/logger.js';

/**
 * The part of a WebSocket the manager talks to
 */
export interface PushSocket {
  readonly readyState: number;
  send(data: string, callback: (error?: Error) => void): void;
  close(): void;
}

interface ConnectedClient {
  socket: PushSocket;
  connectedAt: Date;
  lastActive: Date;
}

export interface ClientInfo {
  clientId: string;
  connectedAt: string;
  lastActive: string;
}

const InboundMessageSchema = z.object({
  event: z.string().min(1),
  data: z.unknown().optional(),
});

/**
 * Keeps one WebSocket per client id and pushes job snapshots to their owners
 */
export class SocketManager implements IProgressPublisher {
  private clients: Map<string, ConnectedClient> = new Map();

  constructor(
    private logger: Logger = silentLogger,
    private generateId: () => string = randomUUID
  ) {}

  /**
   * Wire every connection of a ws server into the registry
   */
  attach(wss: WebSocketServer): void {
    wss.on('connection', (ws: WebSocket) => {
      const clientId = this.connect(ws);

      ws.on('message', (data) => {
        void this.handleMessage(clientId, data.toString());
      });

      ws.on('close', () => {
        this.disconnect(clientId);
      });

      ws.on('error', (error) => {
        this.logger.error(`Socket error for client ${clientId}: ${error.message}`);
        this.disconnect(clientId);
      });
    });
  }

  /**
   * Register a socket and greet it with its client id
   */
  connect(socket: PushSocket): string {
    const clientId = this.generateId();
    const now = new Date();
    this.clients.set(clientId, { socket, connectedAt: now, lastActive: now });
    this.logger.info(`Client ${clientId} connected (${this.clients.size} total)`);

    void this.send(clientId, 'client_connected', { client_id: clientId });
    return clientId;
  }

  disconnect(clientId: string): boolean {
    const removed = this.clients.delete(clientId);
    if (removed) {
      this.logger.info(`Client ${clientId} disconnected (${this.clients.size} remaining)`);
    }
    return removed;
  }

  isConnected(clientId: string): boolean {
    return this.clients.has(clientId);
  }

  connectedClients(): ClientInfo[] {
    return Array.from(this.clients.entries()).map(([clientId, client]) => ({
      clientId,
      connectedAt: client.connectedAt.toISOString(),
      lastActive: client.lastActive.toISOString(),
    }));
  }

  /**
   * No inbound event is understood yet; every message gets an error reply
   */
  async handleMessage(clientId: string, raw: string): Promise<boolean> {
    const client = this.clients.get(clientId);
    if (client) {
      client.lastActive = new Date();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.logger.warn(`Client ${clientId} sent invalid JSON: ${errorMessage(error)}`);
      return this.send(clientId, 'error', { message: 'Invalid JSON message' });
    }

    const message = InboundMessageSchema.safeParse(parsed);
    if (!message.success) {
      return this.send(clientId, 'error', { message: 'Message must be an object with an "event" field' });
    }

    this.logger.warn(`Client ${clientId} sent unknown event "${message.data.event}"`);
    return this.send(clientId, 'error', { message: `Unknown event: ${message.data.event}` });
  }

  async publish(event: JobEventKind, snapshot: JobSnapshot, clientId: string): Promise<boolean> {
    return this.send(clientId, event, toWireSnapshot(snapshot));
  }

  /**
   * Resolves false instead of rejecting; a failed send drops the client
   */
  send(clientId: string, event: string, data: unknown): Promise<boolean> {
    const client = this.clients.get(clientId);
    if (!client) {
      this.logger.debug(`No client ${clientId} for ${event}`);
      return Promise.resolve(false);
    }
    if (client.socket.readyState !== WebSocket.OPEN) {
      this.logger.debug(`Client ${clientId} socket not open for ${event}`);
      return Promise.resolve(false);
    }

    const payload = JSON.stringify({ event, data });

    return new Promise((resolve) => {
      try {
        client.socket.send(payload, (error) => {
          if (error) {
            this.logger.error(`Failed to send ${event} to ${clientId}: ${error.message}`);
            this.disconnect(clientId);
            resolve(false);
            return;
          }
          client.lastActive = new Date();
          resolve(true);
        });
      } catch (error) {
        this.logger.error(`Failed to send ${event} to ${clientId}: ${errorMessage(error)}`);
        this.disconnect(clientId);
        resolve(false);
      }
    });
  }

  closeAll(): void {
    for (const [clientId, client] of this.clients) {
      try {
        client.socket.close();
      } catch (error) {
        this.logger.warn(`Closing socket for ${clientId} failed: ${errorMessage(error)}`);
      }
    }
    this.clients.clear();
  }
}
