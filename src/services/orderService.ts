import { fetchTradingSymbols, restClient, symbolMeta } from "../clients/binance";
import type { Direction, OrderRequest, OrderResult, SymbolMeta } from "../types";
import { logger } from "../utils/logger";

export interface OrderExecutor {
	placeOrder(request: OrderRequest): Promise<OrderResult>;
}

type OrderSide = "BUY" | "SELL";

function entrySide(direction: Direction): OrderSide {
	return direction === "LONG" ? "BUY" : "SELL";
}

function exitSide(direction: Direction): OrderSide {
	return direction === "LONG" ? "SELL" : "BUY";
}

function filterValue(
	meta: SymbolMeta,
	filterType: string,
	key: string,
): number | undefined {
	const match = meta.filters.find((f) => f.filterType === filterType);
	const value = match?.[key];
	return value === undefined ? undefined : Number(value);
}

export function applyStepSize(quantity: number, meta: SymbolMeta): number {
	const step =
		filterValue(meta, "MARKET_LOT_SIZE", "stepSize") ||
		filterValue(meta, "LOT_SIZE", "stepSize");
	if (!step) return quantity;

	const adjusted = Math.floor(quantity / step + 1e-9) * step;
	return Number(adjusted.toFixed(8));
}

export function applyTickSize(price: number, meta: SymbolMeta): number {
	const tickSize = filterValue(meta, "PRICE_FILTER", "tickSize");
	if (!tickSize) return price;

	const precision = Math.max(0, Math.ceil(Math.abs(Math.log10(tickSize))));
	const adjusted = Math.round(price / tickSize) * tickSize;
	return Number(adjusted.toFixed(precision));
}

async function ensureSymbolMeta(symbol: string, quoteAsset: string): Promise<SymbolMeta> {
	if (!symbolMeta(symbol)) {
		await fetchTradingSymbols(quoteAsset);
	}
	const meta = symbolMeta(symbol);
	if (!meta) {
		throw new Error(`Symbol metadata not found for ${symbol}`);
	}
	return meta;
}

/**
 * Market entry on USD-M futures followed by close-position stop and target
 * orders. Failures are reported in the result, never thrown. When a
 * protective order fails after the entry filled, the placed protective orders
 * are cancelled and the position is closed at market.
 */
export class BinanceOrderExecutor implements OrderExecutor {
	constructor(private readonly quoteAsset = "USDT") {}

	async placeOrder(request: OrderRequest): Promise<OrderResult> {
		let meta: SymbolMeta;
		let quantity: number;
		let entryOrderId: number;
		try {
			meta = await ensureSymbolMeta(request.symbol, this.quoteAsset);
			quantity = applyStepSize(request.quantity, meta);
			if (quantity <= 0) {
				return {
					success: false,
					error: `Quantity ${request.quantity} rounds to zero for ${request.symbol}`,
				};
			}

			const entry = await restClient.submitNewOrder({
				symbol: request.symbol,
				side: entrySide(request.direction),
				type: "MARKET",
				quantity,
			});
			entryOrderId = entry.orderId;
		} catch (err) {
			logger.error({ symbol: request.symbol, err }, "Order placement failed");
			return { success: false, error: errorMessage(err) };
		}

		logger.info(
			{ symbol: request.symbol, orderId: entryOrderId, quantity },
			"Placed market entry",
		);

		const protectiveOrderIds: number[] = [];
		try {
			const stop = await restClient.submitNewOrder({
				symbol: request.symbol,
				side: exitSide(request.direction),
				type: "STOP_MARKET",
				stopPrice: applyTickSize(request.stopLoss, meta),
				closePosition: "true",
				workingType: "MARK_PRICE",
			});
			protectiveOrderIds.push(stop.orderId);

			const target = await restClient.submitNewOrder({
				symbol: request.symbol,
				side: exitSide(request.direction),
				type: "TAKE_PROFIT_MARKET",
				stopPrice: applyTickSize(request.takeProfit, meta),
				closePosition: "true",
				workingType: "MARK_PRICE",
			});
			protectiveOrderIds.push(target.orderId);
		} catch (err) {
			logger.error(
				{ symbol: request.symbol, orderId: entryOrderId, err },
				"Protective order failed after entry filled, unwinding position",
			);
			const closed = await this.unwind(request, quantity, protectiveOrderIds);
			return {
				success: false,
				error: closed
					? `Protective order failed, position closed: ${errorMessage(err)}`
					: `Protective order failed and position could not be closed: ${errorMessage(err)}`,
			};
		}

		return { success: true, orderId: String(entryOrderId) };
	}

	private async unwind(
		request: OrderRequest,
		quantity: number,
		protectiveOrderIds: number[],
	): Promise<boolean> {
		for (const orderId of protectiveOrderIds) {
			try {
				await restClient.cancelOrder({ symbol: request.symbol, orderId });
			} catch (err) {
				logger.error(
					{ symbol: request.symbol, orderId, err },
					"Failed to cancel protective order",
				);
			}
		}

		try {
			const close = await restClient.submitNewOrder({
				symbol: request.symbol,
				side: exitSide(request.direction),
				type: "MARKET",
				quantity,
				reduceOnly: "true",
			});
			logger.warn(
				{ symbol: request.symbol, orderId: close.orderId, quantity },
				"Closed unprotected position at market",
			);
			return true;
		} catch (err) {
			logger.fatal(
				{ symbol: request.symbol, quantity, err },
				"Position left open without a stop, close it manually",
			);
			return false;
		}
	}
}

function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
