/**
 * Market Data Service
 *
 * REST client for the MEXC perpetual-futures API.
 * Every call returns a FetchResult: transport and parse failures become
 * `ERROR`, successful calls with nothing in them become `EMPTY`.
 * Responses are validated field by field; malformed rows are dropped.
 */

import axios, { AxiosInstance } from 'axios';
import {
  Candle,
  ExchangeConfig,
  FetchResult,
  LoggerService,
  OrderbookLevel,
  RawFundingRate,
  RawLiquidation,
  RawOrderBook,
  Trade,
  TradeSide,
} from '../types';
import { TIME_MULTIPLIERS } from '../constants';
import { emptyResult, getErrorMessage, toFetchError } from '../utils/error.utils';

// ============================================================================
// TYPES
// ============================================================================

export type KlineInterval = 'Min1' | 'Min5' | 'Min15';

/**
 * Everything the monitor reads from an exchange
 */
export interface MarketDataSource {
  fetchCandles(symbol: string, interval: KlineInterval, limit: number): Promise<FetchResult<Candle[]>>;
  fetchOrderBook(symbol: string, depth: number): Promise<FetchResult<RawOrderBook>>;
  fetchTrades(symbol: string, limit: number): Promise<FetchResult<Trade[]>>;
  fetchFundingRate(symbol: string): Promise<FetchResult<RawFundingRate>>;
  /**
   * EMPTY when the exchange exposes no liquidation feed for the symbol
   */
  fetchLiquidations(symbol: string): Promise<FetchResult<RawLiquidation[]>>;
}

const HTTP_NOT_FOUND = 404;
const DEAL_SIDE_BUY = 1;

// ============================================================================
// PARSING HELPERS
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Numbers arrive either as JSON numbers or numeric strings
 */
function toNumber(value: unknown): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    return Number(value);
  }
  return NaN;
}

function toNumberArray(value: unknown): number[] {
  return Array.isArray(value) ? value.map(toNumber) : [];
}

function parseLevels(value: unknown): OrderbookLevel[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const levels: OrderbookLevel[] = [];
  for (const row of value) {
    if (!Array.isArray(row) || row.length < 2) {
      continue;
    }
    const price = toNumber(row[0]);
    const size = toNumber(row[1]);
    if (Number.isFinite(price) && Number.isFinite(size) && price > 0 && size > 0) {
      levels.push([price, size]);
    }
  }
  return levels;
}

/**
 * Kline payload is columnar: { time: [...], open: [...], ... }, time in seconds
 */
export function parseKlines(data: unknown): Candle[] {
  if (!isRecord(data)) {
    return [];
  }
  const times = toNumberArray(data.time);
  const opens = toNumberArray(data.open);
  const highs = toNumberArray(data.high);
  const lows = toNumberArray(data.low);
  const closes = toNumberArray(data.close);
  const volumes = toNumberArray(data.vol);
  const amounts = toNumberArray(data.amount);

  const candles: Candle[] = [];
  for (let i = 0; i < times.length; i++) {
    const candle: Candle = {
      timestamp: times[i] * TIME_MULTIPLIERS.MILLISECONDS_PER_SECOND,
      open: opens[i],
      high: highs[i],
      low: lows[i],
      close: closes[i],
      volume: volumes[i],
      quoteVolume: amounts[i] ?? 0,
    };
    const numeric = [candle.timestamp, candle.open, candle.high, candle.low, candle.close, candle.volume];
    if (numeric.every((v) => Number.isFinite(v)) && candle.close > 0) {
      candles.push(candle);
    }
  }
  return candles;
}

/**
 * Deal rows: [timestampMs, price, volume, side (1 = buy), id], newest first
 */
export function parseDeals(data: unknown): Trade[] {
  if (!Array.isArray(data)) {
    return [];
  }
  const trades: Trade[] = [];
  for (const row of data) {
    let timestamp: number;
    let price: number;
    let size: number;
    let side: unknown;
    if (Array.isArray(row)) {
      [timestamp, price, size, side] = [toNumber(row[0]), toNumber(row[1]), toNumber(row[2]), row[3]];
    } else if (isRecord(row)) {
      // object form: { t, p, v, T }
      [timestamp, price, size, side] = [toNumber(row.t), toNumber(row.p), toNumber(row.v), row.T];
    } else {
      continue;
    }
    if (!Number.isFinite(timestamp) || !Number.isFinite(price) || !Number.isFinite(size)) {
      continue;
    }
    trades.push({
      timestamp,
      price,
      size,
      side: toNumber(side) === DEAL_SIDE_BUY ? TradeSide.BUY : TradeSide.SELL,
    });
  }
  return trades;
}

export function parseLiquidations(data: unknown): RawLiquidation[] {
  if (!Array.isArray(data)) {
    return [];
  }
  const entries: RawLiquidation[] = [];
  for (const row of data) {
    if (!isRecord(row)) {
      continue;
    }
    const timestamp = toNumber(row.timestamp);
    const price = toNumber(row.price);
    const size = toNumber(row.size);
    if (!Number.isFinite(timestamp) || !Number.isFinite(size)) {
      continue;
    }
    const side = typeof row.side === 'string' ? row.side.toLowerCase() : '';
    entries.push({
      timestamp,
      price: Number.isFinite(price) ? price : 0,
      size,
      // buy/long = long position liquidated
      side: side === 'buy' || side === 'long' ? TradeSide.BUY : TradeSide.SELL,
    });
  }
  return entries;
}

// ============================================================================
// MEXC MARKET DATA SERVICE
// ============================================================================

export class MexcMarketDataService implements MarketDataSource {
  private readonly http: AxiosInstance;

  constructor(
    config: ExchangeConfig,
    private logger: LoggerService,
    http?: AxiosInstance,
  ) {
    this.http =
      http ??
      axios.create({
        baseURL: config.baseUrl,
        timeout: config.requestTimeoutMs,
        headers: { 'Content-Type': 'application/json' },
      });
  }

  async fetchCandles(symbol: string, interval: KlineInterval, limit: number): Promise<FetchResult<Candle[]>> {
    const result = await this.get(`/api/v1/contract/kline/${symbol}`, { interval, limit });
    if (!result.ok) {
      return result;
    }
    const candles = parseKlines(result.value);
    if (candles.length === 0) {
      return emptyResult('no candles');
    }
    // the endpoint ignores limit for some intervals
    return { ok: true, value: candles.slice(-limit) };
  }

  async fetchOrderBook(symbol: string, depth: number): Promise<FetchResult<RawOrderBook>> {
    const result = await this.get(`/api/v1/contract/depth/${symbol}`, { limit: depth });
    if (!result.ok) {
      return result;
    }
    if (!isRecord(result.value)) {
      return emptyResult('no order book');
    }
    const bids = parseLevels(result.value.bids).slice(0, depth);
    const asks = parseLevels(result.value.asks).slice(0, depth);
    if (bids.length === 0 || asks.length === 0) {
      return emptyResult('one-sided order book');
    }
    const timestamp = toNumber(result.value.timestamp);
    return {
      ok: true,
      value: {
        symbol,
        timestamp: Number.isFinite(timestamp) ? timestamp : Date.now(),
        bids,
        asks,
      },
    };
  }

  async fetchTrades(symbol: string, limit: number): Promise<FetchResult<Trade[]>> {
    const result = await this.get(`/api/v1/contract/deals/${symbol}`, { limit });
    if (!result.ok) {
      return result;
    }
    const trades = parseDeals(result.value);
    if (trades.length === 0) {
      return emptyResult('no trades');
    }
    return { ok: true, value: trades.slice(0, limit) };
  }

  async fetchFundingRate(symbol: string): Promise<FetchResult<RawFundingRate>> {
    const result = await this.get(`/api/v1/contract/funding_rate/${symbol}`);
    if (!result.ok) {
      return result;
    }
    if (!isRecord(result.value)) {
      return emptyResult('no funding rate');
    }
    const rate = toNumber(result.value.fundingRate);
    if (!Number.isFinite(rate)) {
      return emptyResult('no funding rate');
    }
    const maxRate = toNumber(result.value.maxFundingRate);
    const timestamp = toNumber(result.value.timestamp);
    return {
      ok: true,
      value: {
        symbol,
        rate,
        maxRate: Number.isFinite(maxRate) ? maxRate : 0,
        timestamp: Number.isFinite(timestamp) ? timestamp : Date.now(),
      },
    };
  }

  async fetchLiquidations(symbol: string): Promise<FetchResult<RawLiquidation[]>> {
    const result = await this.get(`/api/v1/contract/liquidation/${symbol}`);
    if (!result.ok) {
      return result;
    }
    const entries = parseLiquidations(result.value);
    if (entries.length === 0) {
      return emptyResult('no liquidations');
    }
    return { ok: true, value: entries };
  }

  // ============================================================================
  // PRIVATE METHODS
  // ============================================================================

  /**
   * GET and unwrap the `{ success, data }` envelope
   */
  private async get(url: string, params?: Record<string, string | number>): Promise<FetchResult<unknown>> {
    try {
      const response = await this.http.get<unknown>(url, { params });
      const body = response.data;
      if (!isRecord(body) || body.success !== true) {
        const message = isRecord(body) && typeof body.message === 'string' ? body.message : 'unsuccessful response';
        this.logger.debug(`⚠️ MEXC ${url}: ${message}`);
        return { ok: false, reason: 'ERROR', error: message };
      }
      if (body.data === undefined || body.data === null) {
        return emptyResult('no data');
      }
      return { ok: true, value: body.data };
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === HTTP_NOT_FOUND) {
        return emptyResult('endpoint not available');
      }
      this.logger.debug(`⚠️ MEXC request failed: ${url}`, { error: getErrorMessage(error) });
      return toFetchError(error);
    }
  }
}
