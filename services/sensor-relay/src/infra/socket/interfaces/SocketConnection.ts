import type { Logger } from '@/application/interfaces/Logger';
import type { Endpoint } from '@/domain/types';
import type { EndpointResolver } from '@/infra/socket/resolveEndpoint';

/**
 * インフラ層: OS のソケットハンドルを 1 つだけ所有する接続ラッパ（インターフェース）
 *
 * 責務: 名前解決・接続・送信・切断。ストリーム（TCP）とデータグラム（UDP）で同じ形を持つ。
 * ハンドルを保持していないこと ⇔ 未接続。
 */
export interface SocketConnection {
  /** 送信先（生成後は変更しない） */
  readonly endpoint: Endpoint;

  /**
   * 名前解決して接続する。接続済みの場合は何もしない。
   */
  connect(): Promise<void>;

  /**
   * ハンドルを保持しているかどうか（副作用なし）
   */
  isConnected(): boolean;

  /**
   * バイト列を送信する。
   * @returns 送信したバイト数（成功時は常に data.byteLength）
   */
  send(data: Uint8Array): Promise<number>;

  /**
   * 文字列を UTF-8 にして送信する。
   */
  sendString(payload: string): Promise<number>;

  /**
   * ハンドルを解放する。冪等で、例外を投げない。
   */
  close(): void;
}

/**
 * ソケット生成時のオプション
 */
export interface SocketOptions {
  /** ロガー（未指定の場合は LoggerFactory から取得） */
  logger?: Logger;
  /** 名前解決の実装（未指定の場合は systemResolver） */
  resolver?: EndpointResolver;
}
