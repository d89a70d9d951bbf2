/**
 * IPC Client for MPV Unix socket communication
 * Implements the newline-delimited JSON command/response protocol of mpv
 */

import { Socket } from 'net';
import { EventEmitter } from 'events';
import type { Logger } from 'pino';
import { IIPCClient } from '../../domain/playback/interfaces';
import { MPVCommand, MPVResponse, MPVEvent, IPCEventListener } from '../../domain/playback/types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMpvEvent(message: Record<string, unknown>): message is MPVEvent {
  return typeof message.event === 'string';
}

function isMpvResponse(message: Record<string, unknown>): message is Record<string, unknown> & MPVResponse {
  return typeof message.error === 'string';
}

/**
 * IPCClient implementation for communicating with MPV via Unix socket.
 * Reconnection is left to the owner, which restarts mpv when needed.
 */
export class IPCClient extends EventEmitter implements IIPCClient {
  private socket: Socket | null = null;
  private connected = false;
  private requestId = 0;
  private pendingRequests = new Map<number, {
    resolve: (response: MPVResponse) => void;
    reject: (error: Error) => void;
    timeout: NodeJS.Timeout;
  }>();
  private lineBuffer = '';

  constructor(
    private readonly logger: Logger,
    private readonly requestTimeoutMs = 5000,
    private readonly connectTimeoutMs = 5000
  ) {
    super();
  }

  async connect(socketPath: string): Promise<void> {
    if (this.connected) {
      return;
    }

    return new Promise((resolve, reject) => {
      const socket = new Socket();
      this.socket = socket;
      this.lineBuffer = '';
      let settled = false;

      const connectionTimeout = setTimeout(() => {
        settled = true;
        socket.destroy();
        reject(new Error(`Connection timeout to socket: ${socketPath}`));
      }, this.connectTimeoutMs);

      socket.connect(socketPath, () => {
        clearTimeout(connectionTimeout);
        settled = true;
        this.connected = true;
        this.emit('connected');
        resolve();
      });

      socket.on('error', (error) => {
        clearTimeout(connectionTimeout);
        this.connected = false;
        if (!settled) {
          settled = true;
          reject(error);
          return;
        }
        this.logger.warn({ err: error }, 'MPV IPC socket error');
      });

      socket.on('close', () => {
        clearTimeout(connectionTimeout);
        this.connected = false;
        if (this.socket === socket) {
          this.socket = null;
        }
        this.rejectPendingRequests(new Error('Socket closed'));
        this.emit('disconnected');
      });

      socket.on('data', (data) => {
        this.handleIncomingData(data);
      });
    });
  }

  async disconnect(): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return;
    }

    return new Promise((resolve) => {
      this.connected = false;
      this.socket = null;
      this.rejectPendingRequests(new Error('Disconnecting'));
      socket.end(() => {
        socket.destroy();
        resolve();
      });
    });
  }

  async sendCommand(command: MPVCommand): Promise<MPVResponse> {
    const socket = this.socket;
    if (!this.connected || !socket) {
      throw new Error('Not connected to MPV');
    }

    const requestId = command.request_id ?? ++this.requestId;
    const commandWithId: MPVCommand = {
      ...command,
      request_id: requestId
    };

    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        this.pendingRequests.delete(requestId);
        reject(new Error(`Request timeout for command: ${command.command.join(' ')}`));
      }, this.requestTimeoutMs);

      this.pendingRequests.set(requestId, { resolve, reject, timeout });

      socket.write(JSON.stringify(commandWithId) + '\n', (error) => {
        if (error) {
          clearTimeout(timeout);
          this.pendingRequests.delete(requestId);
          reject(error);
        }
      });
    });
  }

  isConnected(): boolean {
    return this.connected && this.socket !== null && !this.socket.destroyed;
  }

  addEventListener(listener: IPCEventListener): void {
    this.on('mpv-event', listener);
  }

  removeEventListener(listener: IPCEventListener): void {
    this.off('mpv-event', listener);
  }

  /**
   * A chunk may carry several messages or end mid-line; the remainder is
   * kept until the next chunk completes it.
   */
  private handleIncomingData(data: Buffer): void {
    this.lineBuffer += data.toString('utf8');
    const lines = this.lineBuffer.split('\n');
    this.lineBuffer = lines.pop() ?? '';

    for (const line of lines) {
      if (line.trim().length === 0) {
        continue;
      }

      let message: unknown;
      try {
        message = JSON.parse(line);
      } catch {
        this.logger.warn({ line }, 'Ignoring malformed MPV IPC message');
        continue;
      }

      if (!isRecord(message)) {
        continue;
      }

      if (isMpvEvent(message)) {
        this.emit('mpv-event', message);
        continue;
      }

      if (isMpvResponse(message) && typeof message.request_id === 'number') {
        const pending = this.pendingRequests.get(message.request_id);
        if (pending) {
          clearTimeout(pending.timeout);
          this.pendingRequests.delete(message.request_id);
          pending.resolve(message);
        }
      }
    }
  }

  private rejectPendingRequests(error: Error): void {
    for (const pending of this.pendingRequests.values()) {
      clearTimeout(pending.timeout);
      pending.reject(error);
    }
    this.pendingRequests.clear();
  }
}
