import { lookup } from 'node:dns/promises';
import { errorCode, errorMessage, ResolutionError } from '@/domain/errors';
import type { Endpoint } from '@/domain/types';

/**
 * 名前解決の結果得られた接続候補
 */
export interface ResolvedAddress {
  address: string;
  family: 4 | 6;
}

/**
 * ホスト名を接続候補の一覧に変換する関数。
 * テストではループバック固定の実装に差し替える。
 */
export type EndpointResolver = (host: string) => Promise<ResolvedAddress[]>;

/**
 * OS のリゾルバ（getaddrinfo）を使う既定の実装。
 * IPv4 / IPv6 の候補をプラットフォームの優先順のまま返す。
 */
export const systemResolver: EndpointResolver = async (host) => {
  const results = await lookup(host, { all: true });
  return results.map((result) => ({
    address: result.address,
    family: result.family === 6 ? 6 : 4,
  }));
};

/**
 * エンドポイントを名前解決する。
 * @param endpoint 送信先
 * @param resolver 使用するリゾルバ
 * @returns 接続候補（空の場合もある）
 * @throws {ResolutionError} 名前解決に失敗した場合
 */
export async function resolveEndpoint(endpoint: Endpoint, resolver: EndpointResolver): Promise<ResolvedAddress[]> {
  try {
    return await resolver(endpoint.host);
  } catch (error) {
    throw new ResolutionError(`getaddrinfo('${endpoint.host}', ${endpoint.port}): ${errorMessage(error)}`, {
      code: errorCode(error),
      cause: error,
    });
  }
}
