import net from 'node:net';
import type { Logger } from '@/application/interfaces/Logger';
import { ConfigurationError, ConnectionError, errorCode, errorMessage, SendError } from '@/domain/errors';
import { type Endpoint, isValidPortRange } from '@/domain/types';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import type { SocketConnection, SocketOptions } from './interfaces/SocketConnection';
import { type EndpointResolver, type ResolvedAddress, resolveEndpoint, systemResolver } from './resolveEndpoint';

/** ピアが接続を閉じたことを示すエラーコード */
const PEER_CLOSED_CODES = new Set(['EPIPE', 'ECONNRESET', 'ERR_STREAM_DESTROYED', 'ERR_STREAM_WRITE_AFTER_END']);

/**
 * インフラ層: TCP ストリームソケット
 *
 * 責務: 接続候補を順に試して最初に成功したハンドルを保持し、全バイト送信を保証する。
 *
 * 使い方:
 * ```typescript
 * const socket = new TcpSocket({ host: '127.0.0.1', port: 8080 });
 * await socket.connect();
 * await socket.sendString(payload);
 * socket.close();
 * ```
 */
export class TcpSocket implements SocketConnection {
  readonly endpoint: Endpoint;
  private socket: net.Socket | null = null;
  private readonly logger: Logger;
  private readonly resolver: EndpointResolver;
  /** 進行中の connect()。完了するまで後続の connect() はこれを待つ */
  private connecting: Promise<void> | null = null;

  /**
   * 送信先を保持するだけで、ネットワークにはまだ触らない。
   * @param endpoint 送信先
   * @param options オプション（ロガー、リゾルバ）
   */
  constructor(
    endpoint: Endpoint,
    private readonly options?: SocketOptions
  ) {
    this.endpoint = Object.freeze({ host: endpoint.host, port: endpoint.port });
    this.logger = (options?.logger ?? LoggerFactory.create()).child({ component: 'TcpSocket' });
    this.resolver = options?.resolver ?? systemResolver;
  }

  /**
   * host:port を名前解決し、候補を順に接続する。
   * @throws {ConfigurationError} ホストが空、またはポートが範囲外の場合
   * @throws {ResolutionError} 名前解決に失敗した場合
   * @throws {ConnectionError} すべての候補で接続に失敗した場合
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
      throw new ConfigurationError('TcpSocket: host cannot be empty');
    }
    if (!isValidPortRange(this.endpoint.port)) {
      throw new ConfigurationError(`TcpSocket: invalid port ${this.endpoint.port} (1..65535)`);
    }

    const candidates = await resolveEndpoint(this.endpoint, this.resolver);

    // 最後に失敗した候補のエラーを保持しておき、全滅したらそれを報告する
    let lastError: unknown = null;
    for (const candidate of candidates) {
      try {
        this.socket = await this.openCandidate(candidate);
        this.logger.debug('connected', { host: this.endpoint.host, address: candidate.address, port: this.endpoint.port });
        return;
      } catch (error) {
        lastError = error;
        this.logger.debug('candidate failed', { address: candidate.address, err: error });
      }
    }

    const code = errorCode(lastError) ?? 'ECONNREFUSED';
    const reason = lastError === null ? 'Connection refused' : errorMessage(lastError);
    throw new ConnectionError(`connect: ${reason}`, { code, cause: lastError ?? undefined });
  }

  isConnected(): boolean {
    return this.socket !== null;
  }

  /**
   * 全バイトを書き込む。部分書き込みと EINTR の再試行は Node のストリーム層が行う。
   * @param data 送信するバイト列
   * @returns 送信したバイト数（常に data.byteLength）
   * @throws {SendError} 未接続、ピア切断、その他の書き込み失敗
   */
  async send(data: Uint8Array): Promise<number> {
    const socket = this.socket;
    if (socket === null) {
      throw new SendError('send: not connected');
    }
    if (data.byteLength > 0 && (socket.destroyed || !socket.writable)) {
      throw new SendError('send: connection closed by peer', { code: 'EPIPE' });
    }

    try {
      await new Promise<void>((resolve, reject) => {
        socket.write(data, (error) => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      });
    } catch (error) {
      const code = errorCode(error);
      if (code !== undefined && PEER_CLOSED_CODES.has(code)) {
        throw new SendError('send: connection closed by peer', { code, cause: error });
      }
      throw new SendError(`send: ${errorMessage(error)}`, { code, cause: error });
    }

    return data.byteLength;
  }

  async sendString(payload: string): Promise<number> {
    return this.send(Buffer.from(payload, 'utf8'));
  }

  /**
   * 両方向をシャットダウンしてからハンドルを無条件に解放する。
   */
  close(): void {
    const socket = this.socket;
    if (socket === null) {
      return;
    }
    this.socket = null;
    socket.end();
    socket.destroy();
    this.logger.debug('closed', { host: this.endpoint.host, port: this.endpoint.port });
  }

  /**
   * ハンドルの所有権を新しいインスタンスへ移す。移動元は未接続状態になる。
   */
  transfer(): TcpSocket {
    const moved = new TcpSocket(this.endpoint, this.options);
    moved.socket = this.socket;
    this.socket = null;
    return moved;
  }

  /**
   * 1 つの候補アドレスに対してハンドシェイクを行う。
   */
  private openCandidate(candidate: ResolvedAddress): Promise<net.Socket> {
    return new Promise((resolve, reject) => {
      const socket = net.createConnection({
        host: candidate.address,
        port: this.endpoint.port,
        family: candidate.family,
      });

      const onError = (error: Error) => {
        socket.removeListener('connect', onConnect);
        socket.destroy();
        reject(error);
      };
      const onConnect = () => {
        socket.removeListener('error', onError);
        this.attachLifecycleListeners(socket);
        resolve(socket);
      };

      socket.once('error', onError);
      socket.once('connect', onConnect);
    });
  }

  /**
   * 接続後のイベント処理。
   * 受信データは読み捨てる（読まないとピアの切断を検知できない）。
   * エラーは次回の send() で呼び出し元に届く。
   */
  private attachLifecycleListeners(socket: net.Socket): void {
    socket.on('error', (error) => {
      this.logger.warn('socket error', { host: this.endpoint.host, port: this.endpoint.port, err: error });
    });
    socket.on('end', () => {
      this.logger.debug('peer closed connection', { host: this.endpoint.host, port: this.endpoint.port });
    });
    socket.resume();
  }
}
