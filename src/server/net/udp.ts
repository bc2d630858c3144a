import dgram from 'node:dgram';
import type { AddressInfo } from 'node:net';
import { Endpoint } from '../session/sessions.js';

export type DatagramHandler = (data: Buffer, endpoint: Endpoint) => void;

/** Outbound half of the transport; the game server only ever sends. */
export interface DatagramTransport {
  send(endpoint: Endpoint, payload: Buffer): void;
}

export class UdpTransport implements DatagramTransport {
  private socket: dgram.Socket | null = null;

  constructor(
    private readonly host: string,
    private readonly port: number,
  ) {}

  /** Resolves once listening; rejects if the port cannot be bound. */
  bind(onMessage: DatagramHandler): Promise<AddressInfo> {
    const socket = dgram.createSocket('udp4');
    this.socket = socket;

    return new Promise((resolve, reject) => {
      const onStartupError = (err: Error) => {
        this.socket = null;
        reject(err);
      };
      socket.once('error', onStartupError);

      socket.bind(this.port, this.host, () => {
        socket.off('error', onStartupError);
        socket.on('error', (err) => {
          console.error('[udp] Socket error:', err);
        });
        socket.on('message', (data, rinfo) => {
          onMessage(data, { address: rinfo.address, port: rinfo.port });
        });
        resolve(socket.address());
      });
    });
  }

  send(endpoint: Endpoint, payload: Buffer): void {
    if (!this.socket) return;
    this.socket.send(payload, endpoint.port, endpoint.address, (err) => {
      if (err) console.warn(`[udp] Send to ${endpoint.address}:${endpoint.port} failed:`, err.message);
    });
  }

  close(): Promise<void> {
    const socket = this.socket;
    this.socket = null;
    if (!socket) return Promise.resolve();
    return new Promise((resolve) => socket.close(() => resolve()));
  }
}
