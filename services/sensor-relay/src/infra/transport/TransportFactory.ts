import type { Transport } from '@/application/interfaces/Transport';
import { ConfigurationError } from '@/domain/errors';
import { isValidPortRange, type TransportConfig } from '@/domain/types';
import type { SocketOptions } from '@/infra/socket/interfaces/SocketConnection';
import { TcpTransport } from './TcpTransport';
import { UdpTransport } from './UdpTransport';

/**
 * トランスポートファクトリー
 *
 * 設定の kind（大文字小文字を区別しない）に応じた Transport を生成する。
 * 接続はしない。いつ connect() するかは呼び出し側が決める。
 */
class TransportFactory {
  /**
   * @param config トランスポート設定
   * @param options ソケットに渡すオプション（ロガー、リゾルバ）
   * @throws {ConfigurationError} kind / host が空、ポートが範囲外、未対応の kind の場合
   */
  static make(config: TransportConfig, options?: SocketOptions): Transport {
    if (!config.kind) {
      throw new ConfigurationError("TransportFactory: empty 'kind'");
    }
    if (!config.host) {
      throw new ConfigurationError('TransportFactory: empty host');
    }
    if (!isValidPortRange(config.port)) {
      throw new ConfigurationError('TransportFactory: invalid port (1..65535)');
    }

    switch (config.kind.toLowerCase()) {
      case 'tcp':
        return new TcpTransport(config.host, config.port, options);
      case 'udp':
        return new UdpTransport(config.host, config.port, options);
      default:
        throw new ConfigurationError(`TransportFactory: unsupported kind '${config.kind}'`);
    }
  }
}

export { TransportFactory };
