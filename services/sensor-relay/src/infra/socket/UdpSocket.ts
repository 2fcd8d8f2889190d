import dgram from 'node:dgram';
import type { Logger } from '@/application/interfaces/Logger';
import { ConfigurationError, ConnectionError, errorCode, errorMessage, SendError } from '@/domain/errors';
import { type Endpoint, isValidPortRange } from '@/domain/types';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import type { SocketConnection, SocketOptions } from './interfaces/SocketConnection';
import { type EndpointResolver, type ResolvedAddress, resolveEndpoint, systemResolver } from './resolveEndpoint';

/**
 * インフラ層: UDP データグラムソケット
 *
 * 責務: 既定の送信先（ピア）をハンドルに結び付け、send() ごとにちょうど 1 データグラムを送る。
 * 送信先を固定しておくことで、ICMP 到達不能などの失敗が次の send() で確実に表面化する。
 */
export class UdpSocket implements SocketConnection {
  readonly endpoint: Endpoint;
  private socket: dgram.Socket | null = null;
  private readonly logger: Logger;
  private readonly resolver: EndpointResolver;
  /** 進行中の connect()。完了するまで後続の connect() はこれを待つ */
  private connecting: Promise<void> | null = null;

  constructor(
    endpoint: Endpoint,
    private readonly options?: SocketOptions
  ) {
    this.endpoint = Object.freeze({ host: endpoint.host, port: endpoint.port });
    this.logger = (options?.logger ?? LoggerFactory.create()).child({ component: 'UdpSocket' });
    this.resolver = options?.resolver ?? systemResolver;
  }

  /**
   * 名前解決し、最初にピアを設定できた候補のハンドルを保持する。
   * @throws {ConfigurationError} ホストが空、またはポートが範囲外の場合
   * @throws {ResolutionError} 名前解決に失敗した場合
   * @throws {ConnectionError} ハンドルの作成・ピア設定にすべて失敗した場合
   */
  connect(): Promise<void> {
    if (this.isConnected()) {
      return Promise.resolve();
    }
    if (this.connecting === null) {
      this.connecting = this.openFirstCandidate().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  private async openFirstCandidate(): Promise<void> {
    if (!this.endpoint.host) {
      throw new ConfigurationError('UdpSocket: host cannot be empty');
    }
    if (!isValidPortRange(this.endpoint.port)) {
      throw new ConfigurationError(`UdpSocket: invalid port ${this.endpoint.port} (1..65535)`);
    }

    const candidates = await resolveEndpoint(this.endpoint, this.resolver);

    let lastError: unknown = null;
    for (const candidate of candidates) {
      try {
        this.socket = await this.openCandidate(candidate);
        this.logger.debug('peer set', { host: this.endpoint.host, address: candidate.address, port: this.endpoint.port });
        return;
      } catch (error) {
        lastError = error;
        this.logger.debug('candidate failed', { address: candidate.address, err: error });
      }
    }

    const code = errorCode(lastError) ?? 'ECONNREFUSED';
    const reason = lastError === null ? 'Connection refused' : errorMessage(lastError);
    throw new ConnectionError(`udp connect: ${reason}`, { code, cause: lastError ?? undefined });
  }

  isConnected(): boolean {
    return this.socket !== null;
  }

  /**
   * 1 データグラムを 1 回のシステムコールで送る。短い送信は再送せずエラーにする。
   * @throws {SendError} 未接続、短い送信、OS レベルの送信失敗（EMSGSIZE など）
   */
  async send(data: Uint8Array): Promise<number> {
    const socket = this.socket;
    if (socket === null) {
      throw new SendError('udp send: not connected');
    }

    let sent: number;
    try {
      sent = await new Promise<number>((resolve, reject) => {
        socket.send(data, (error, bytes) => {
          if (error) {
            reject(error);
          } else {
            resolve(bytes);
          }
        });
      });
    } catch (error) {
      throw new SendError(`udp send: ${errorMessage(error)}`, { code: errorCode(error), cause: error });
    }

    if (sent !== data.byteLength) {
      throw new SendError('udp send: short datagram send');
    }
    return sent;
  }

  async sendString(payload: string): Promise<number> {
    return this.send(Buffer.from(payload, 'utf8'));
  }

  /**
   * ハンドルを解放する。UDP ではシャットダウンは不要なので close のみ。
   */
  close(): void {
    const socket = this.socket;
    if (socket === null) {
      return;
    }
    this.socket = null;
    try {
      socket.close();
    } catch (error) {
      // 既に閉じられている場合（ERR_SOCKET_DGRAM_NOT_RUNNING）
      this.logger.debug('close failed', { err: error });
    }
  }

  /**
   * ハンドルの所有権を新しいインスタンスへ移す。移動元は未接続状態になる。
   */
  transfer(): UdpSocket {
    const moved = new UdpSocket(this.endpoint, this.options);
    moved.socket = this.socket;
    this.socket = null;
    return moved;
  }

  private openCandidate(candidate: ResolvedAddress): Promise<dgram.Socket> {
    return new Promise((resolve, reject) => {
      const socket = dgram.createSocket(candidate.family === 6 ? 'udp6' : 'udp4');

      const onError = (error: Error) => {
        socket.removeListener('connect', onConnect);
        reject(error);
        try {
          socket.close();
        } catch (closeError) {
          this.logger.debug('close after failed connect failed', { err: closeError });
        }
      };
      const onConnect = () => {
        socket.removeListener('error', onError);
        // ICMP 到達不能は受信側のエラーとして通知される。次の send() で表面化するのでログのみ。
        socket.on('error', (error) => {
          this.logger.warn('socket error', { host: this.endpoint.host, port: this.endpoint.port, err: error });
        });
        resolve(socket);
      };

      socket.once('error', onError);
      socket.once('connect', onConnect);
      socket.connect(this.endpoint.port, candidate.address);
    });
  }
}
