import pino from 'pino';
import type { Logger } from '@/application/interfaces/Logger';

/**
 * PinoLogger の初期化オプション
 */
export interface PinoLoggerOptions {
  /** ログレベル（debug, info, warn, error） */
  level?: string;
  /** pino-pretty で人間可読形式にするか */
  pretty?: boolean;
  /** 指定された場合、このファイルにも JSON 形式で追記する */
  file?: string;
}

/**
 * 出力先（transport）の設定を組み立てる。
 * 標準出力は pretty / JSON のどちらか、ファイルは常に JSON。
 * target ごとの level を省略すると info になるため、ロガーと同じ level を渡す。
 */
function buildTargets(options: { level: string; pretty: boolean; file?: string }): pino.TransportTargetOptions[] {
  const targets: pino.TransportTargetOptions[] = [];

  if (options.pretty) {
    targets.push({
      target: 'pino-pretty',
      level: options.level,
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
      },
    });
  } else {
    targets.push({ target: 'pino/file', level: options.level, options: { destination: 1 } });
  }

  if (options.file) {
    targets.push({ target: 'pino/file', level: options.level, options: { destination: options.file, mkdir: true } });
  }

  return targets;
}

/**
 * pino を使用したロガー実装
 *
 * 環境変数 `LOG_LEVEL` でログレベルを制御。
 * 開発環境では `pino-pretty` を使用して人間可読形式で出力。
 * 本番環境では JSON 形式で出力。
 */
export class PinoLogger implements Logger {
  private readonly pinoLogger: pino.Logger;

  constructor(options?: PinoLoggerOptions | pino.Logger) {
    if (options !== undefined && 'child' in options) {
      // child() から既存の pino インスタンスを受け取った場合
      this.pinoLogger = options;
      return;
    }

    const level = options?.level ?? process.env.LOG_LEVEL ?? 'info';
    const pretty = options?.pretty ?? process.env.NODE_ENV !== 'production';
    const file = options?.file;

    if (!pretty && !file) {
      // 本番環境で出力先が標準出力だけなら transport（ワーカースレッド）は使わない
      this.pinoLogger = pino({ level });
    } else {
      this.pinoLogger = pino({ level, transport: { targets: buildTargets({ level, pretty, file }) } });
    }
  }

  debug(msg: string, meta?: object): void {
    this.pinoLogger.debug(meta ?? {}, msg);
  }

  info(msg: string, meta?: object): void {
    this.pinoLogger.info(meta ?? {}, msg);
  }

  warn(msg: string, meta?: object): void {
    this.pinoLogger.warn(meta ?? {}, msg);
  }

  error(msg: string, meta?: object): void {
    this.pinoLogger.error(meta ?? {}, msg);
  }

  child(bindings: object): Logger {
    return new PinoLogger(this.pinoLogger.child(bindings));
  }
}
