import { z } from 'zod';

/**
 * 数値フィールドは型違い・非有限値を欠損として扱う（フレーム全体は捨てない）
 */
const lenientNumber = z.number().finite().nullish().catch(null);

/**
 * ticker.<instrument>.raw チャネルの data 部
 */
export const DeribitTickerDataSchema = z.object({
  instrument_name: z.string().min(1),
  mark_price: lenientNumber,
  last_price: lenientNumber,
  mark_iv: lenientNumber,
  greeks: z.object({ delta: lenientNumber }).nullish().catch(null),
  timestamp: lenientNumber,
});
export type DeribitTickerData = z.infer<typeof DeribitTickerDataSchema>;

/**
 * JSON-RPC 応答。通知（id なし）はこのスキーマに一致しない
 */
export const DeribitRpcResponseSchema = z.object({
  id: z.number(),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number(),
      message: z.string(),
    })
    .optional(),
});
export type DeribitRpcResponse = z.infer<typeof DeribitRpcResponseSchema>;

export const DeribitAuthResultSchema = z.object({
  access_token: z.string().min(1),
});

/** public/subscribe の result は購読できたチャネル名の配列 */
export const DeribitSubscribeResultSchema = z.array(z.string());

/**
 * public/get_instruments の 1 要素。必須フィールドが欠けた要素は読み飛ばす
 */
export const DeribitInstrumentSchema = z.object({
  instrument_name: z.string().min(1),
  is_active: z.boolean(),
  expiration_timestamp: z.number(),
});

export const DeribitInstrumentsResponseSchema = z.object({
  result: z.array(z.unknown()),
});

export const DeribitAuthResponseSchema = z.object({
  result: DeribitAuthResultSchema,
});

export type DeribitMethod = 'public/auth' | 'public/subscribe' | 'public/test';

/**
 * 送信する JSON-RPC リクエスト
 */
export interface DeribitRequest {
  jsonrpc: '2.0';
  id: number;
  method: DeribitMethod;
  params?: Record<string, unknown>;
}

export function tickerChannel(instrumentName: string): string {
  return `ticker.${instrumentName}.raw`;
}
