import type { AssetClass, SymbolRiskProfile } from "../types";

type AssetClassDefaults = Omit<SymbolRiskProfile, "symbol" | "riskAmount">;

// forex: 100k units per standard lot; metal: 100 oz per lot; crypto: 1 coin per unit
const ASSET_CLASSES: Record<AssetClass, AssetClassDefaults> = {
	forex: {
		assetClass: "forex",
		contractMultiplier: 100_000,
		minSize: 0.01,
		sizeStep: 0.01,
	},
	metal: {
		assetClass: "metal",
		contractMultiplier: 100,
		minSize: 0.01,
		sizeStep: 0.01,
	},
	crypto: {
		assetClass: "crypto",
		contractMultiplier: 1,
		minSize: 0.001,
		sizeStep: 0.001,
	},
};

const SYMBOL_ASSET_CLASSES: Record<string, AssetClass> = {
	EURUSD: "forex",
	GBPUSD: "forex",
	USDJPY: "forex",
	XAUUSD: "metal",
	XAGUSD: "metal",
};

const SYMBOL_OVERRIDES: Record<
	string,
	Partial<Omit<SymbolRiskProfile, "symbol">>
> = {
	BTCUSDT: { minSize: 0.001, sizeStep: 0.001 },
	ETHUSDT: { minSize: 0.001, sizeStep: 0.001 },
	SOLUSDT: { minSize: 0.1, sizeStep: 0.1 },
};

export function assetClassFor(symbol: string): AssetClass {
	return SYMBOL_ASSET_CLASSES[symbol] ?? "crypto";
}

export function getSymbolRiskProfile(
	symbol: string,
	riskAmount: number,
): SymbolRiskProfile {
	const base = ASSET_CLASSES[assetClassFor(symbol)];
	const override = SYMBOL_OVERRIDES[symbol] ?? {};
	return { symbol, riskAmount, ...base, ...override };
}
