import { USDMClient } from "binance";
import { config, type BarInterval } from "../config";
import type { Bar, SymbolMeta } from "../types";
import { logger } from "../utils/logger";

const isTestnet = config.binance.baseUrl.includes("testnet");

export const restClient = new USDMClient({
  api_key: config.binance.apiKey,
  api_secret: config.binance.apiSecret,
  baseUrl: config.binance.baseUrl,
  beautifyResponses: true,
  testnet: isTestnet
});

const KLINE_PAGE_LIMIT = 1500;

let cachedSymbols: SymbolMeta[] | null = null;

export async function fetchTradingSymbols(quoteAsset: string): Promise<SymbolMeta[]> {
  if (!cachedSymbols) {
    const info = await restClient.getExchangeInfo();
    cachedSymbols = info.symbols as unknown as SymbolMeta[];
  }

  return cachedSymbols.filter(
    (s) => s.status === "TRADING" && s.quoteAsset === quoteAsset && !s.symbol.includes("_")
  );
}

export function symbolMeta(symbol: string): SymbolMeta | undefined {
  return cachedSymbols?.find((s) => s.symbol === symbol);
}

type KlineRequest = {
  symbol: string;
  interval: BarInterval;
  limit: number;
  endTime?: number;
};

async function fetchKlinePage(request: KlineRequest): Promise<Array<Bar & { closeTime: number }>> {
  const data = await restClient.getKlines(request);

  return data.map((kline) => ({
    timestamp: Number(kline[0]),
    open: Number(kline[1]),
    high: Number(kline[2]),
    low: Number(kline[3]),
    close: Number(kline[4]),
    volume: Number(kline[5]),
    closeTime: Number(kline[6])
  }));
}

function closedOnly(bars: Array<Bar & { closeTime: number }>, now: number): Bar[] {
  return bars
    .filter((bar) => bar.closeTime < now)
    .map(({ closeTime: _closeTime, ...bar }) => bar);
}

/** Latest closed bars, oldest first. The still-forming bar is dropped. */
export async function fetchBars(
  symbol: string,
  interval: BarInterval,
  limit: number,
  now: number = Date.now()
): Promise<Bar[]> {
  const page = await fetchKlinePage({
    symbol,
    interval,
    limit: Math.min(limit + 1, KLINE_PAGE_LIMIT)
  });
  return closedOnly(page, now).slice(-limit);
}

/** Walks back through history with `endTime` until `total` closed bars are collected. */
export async function fetchKlineHistory(
  symbol: string,
  interval: BarInterval,
  total: number,
  now: number = Date.now()
): Promise<Bar[]> {
  const byTimestamp = new Map<number, Bar>();
  let endTime: number | undefined;

  while (byTimestamp.size < total) {
    const page = await fetchKlinePage({ symbol, interval, limit: KLINE_PAGE_LIMIT, endTime });
    if (page.length === 0) break;

    for (const bar of closedOnly(page, now)) {
      byTimestamp.set(bar.timestamp, bar);
    }

    const oldest = page[0].timestamp;
    logger.debug({ symbol, collected: byTimestamp.size, oldest }, "Fetched kline page");
    if (page.length < KLINE_PAGE_LIMIT) break;
    endTime = oldest - 1;
  }

  return [...byTimestamp.values()]
    .sort((a, b) => a.timestamp - b.timestamp)
    .slice(-total);
}
