import type { AssetClass } from "../types";

const FRIDAY = 5;
const SATURDAY = 6;
const SUNDAY = 0;
const ROLLOVER_HOUR_UTC = 22;

/**
 * Forex and metals trade from Sunday 22:00 UTC to Friday 22:00 UTC; crypto
 * never closes. Holidays are not modeled.
 */
export function isMarketOpen(assetClass: AssetClass, now: Date): boolean {
	if (assetClass === "crypto") return true;

	const day = now.getUTCDay();
	const hour = now.getUTCHours();
	if (day === SATURDAY) return false;
	if (day === FRIDAY && hour >= ROLLOVER_HOUR_UTC) return false;
	if (day === SUNDAY && hour < ROLLOVER_HOUR_UTC) return false;
	return true;
}
