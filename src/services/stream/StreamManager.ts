// src/services/stream/StreamManager.ts
import { WebSocket } from 'ws';
import { BaseService } from '../base/BaseService';
import { errorMessage } from '../../errors';
import { StreamChunk, StreamConfig } from './types';

export class StreamManager extends BaseService {
  // Active WebSocket connections keyed by connectionId
  private connections: Map<string, WebSocket>;

  constructor(config: StreamConfig) {
    super(config);
    this.connections = new Map();
  }

  /**
   * Registers a connection and removes it again on close or error.
   */
  addConnection(connectionId: string, ws: WebSocket): void {
    const existing = this.connections.get(connectionId);
    if (existing) {
      this.logger.warn('Replacing duplicate connection', { connectionId });
      existing.terminate();
    }
    this.connections.set(connectionId, ws);
    this.logger.info('WebSocket connection added', { connectionId });
    this.setupConnectionHandlers(connectionId, ws);
  }

  removeConnection(connectionId: string): boolean {
    const ws = this.connections.get(connectionId);
    if (!ws) {
      this.logger.debug('Attempted to remove non-existent connection', { connectionId });
      return false;
    }
    if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) {
      ws.close(1001, 'Server removing connection');
    }
    this.connections.delete(connectionId);
    this.logger.info('WebSocket connection removed', { connectionId });
    return true;
  }

  hasConnection(connectionId: string): boolean {
    const ws = this.connections.get(connectionId);
    return !!ws && ws.readyState === WebSocket.OPEN;
  }

  private setupConnectionHandlers(connectionId: string, ws: WebSocket): void {
    ws.on('close', (code, reason) => {
      this.logger.info('WebSocket connection closed', { connectionId, code, reason: reason.toString() || 'No reason given' });
      this.connections.delete(connectionId);
    });

    ws.on('error', (error) => {
      this.logger.error('WebSocket error occurred', { connectionId, error: error.message });
      this.connections.delete(connectionId);
      if (ws.readyState !== WebSocket.CLOSED && ws.readyState !== WebSocket.CLOSING) {
        ws.terminate();
      }
    });
  }

  /**
   * Sends one envelope; returns false when the connection is gone.
   */
  sendChunk(connectionId: string, chunk: StreamChunk): boolean {
    const ws = this.connections.get(connectionId);
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      this.logger.warn('Attempted to send chunk to closed connection', { connectionId, type: chunk.type });
      return false;
    }
    try {
      ws.send(JSON.stringify(chunk));
      this.logger.debug('Sent chunk', { connectionId, type: chunk.type });
      return true;
    } catch (error) {
      this.logger.error('Failed to send chunk', { connectionId, type: chunk.type, error: errorMessage(error) });
      return false;
    }
  }

  getActiveConnectionCount(): number {
    let count = 0;
    this.connections.forEach((ws) => {
      if (ws.readyState === WebSocket.OPEN) count++;
    });
    return count;
  }
}
