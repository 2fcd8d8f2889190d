import type { Transport } from '@/application/interfaces/Transport';
import type { SocketOptions } from '@/infra/socket/interfaces/SocketConnection';
import { TcpSocket } from '@/infra/socket/TcpSocket';

/**
 * インフラ層: TCP 版 Transport
 *
 * TcpSocket に委譲するだけの薄いアダプタ。
 */
export class TcpTransport implements Transport {
  private readonly socket: TcpSocket;

  constructor(host: string, port: number, options?: SocketOptions) {
    this.socket = new TcpSocket({ host, port }, options);
  }

  connect(): Promise<void> {
    return this.socket.connect();
  }

  sendString(payload: string): Promise<number> {
    return this.socket.sendString(payload);
  }

  close(): void {
    this.socket.close();
  }

  isConnected(): boolean {
    return this.socket.isConnected();
  }
}
