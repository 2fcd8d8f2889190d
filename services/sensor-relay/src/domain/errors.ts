/**
 * ドメイン層: リレー全体で使うエラー分類
 *
 * code には OS のエラーコード（ECONNREFUSED など）が分かる場合に入る。
 */
interface RelayErrorOptions {
  code?: string;
  cause?: unknown;
}

export class RelayError extends Error {
  readonly code: string | undefined;

  constructor(message: string, options?: RelayErrorOptions) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'RelayError';
    this.code = options?.code;
  }
}

/** 空のホスト・不正な kind / ポート・不正なセンサー設定など。起動時に同期的に投げる。 */
export class ConfigurationError extends RelayError {
  constructor(message: string, options?: RelayErrorOptions) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/** ホスト名の名前解決に失敗した */
export class ResolutionError extends RelayError {
  constructor(message: string, options?: RelayErrorOptions) {
    super(message, options);
    this.name = 'ResolutionError';
  }
}

/** すべての候補アドレスへの接続に失敗した、またはハンドルを作成できなかった */
export class ConnectionError extends RelayError {
  constructor(message: string, options?: RelayErrorOptions) {
    super(message, options);
    this.name = 'ConnectionError';
  }
}

/** 未接続での送信、ピア切断、短いデータグラム送信、その他の書き込み失敗 */
export class SendError extends RelayError {
  constructor(message: string, options?: RelayErrorOptions) {
    super(message, options);
    this.name = 'SendError';
  }
}

/** データソースからの読み取り失敗 */
export class AcquisitionError extends RelayError {
  constructor(message: string, options?: RelayErrorOptions) {
    super(message, options);
    this.name = 'AcquisitionError';
  }
}

/**
 * 例外から OS のエラーコードを取り出す。
 * @param error 任意の例外
 * @returns エラーコード。取り出せない場合は undefined
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * 例外からメッセージ文字列を取り出す。
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
