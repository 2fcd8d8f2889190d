import type { Transport } from '@/application/interfaces/Transport';
import type { SocketOptions } from '@/infra/socket/interfaces/SocketConnection';
import { UdpSocket } from '@/infra/socket/UdpSocket';

/**
 * インフラ層: UDP 版 Transport
 *
 * UdpSocket に委譲するだけの薄いアダプタ。sendString() は 1 ペイロード = 1 データグラム。
 */
export class UdpTransport implements Transport {
  private readonly socket: UdpSocket;

  constructor(host: string, port: number, options?: SocketOptions) {
    this.socket = new UdpSocket({ host, port }, options);
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
