import { describe, expect, it } from "vitest";
import { isMarketOpen } from "./marketHours";

// 2024-01-05 is a Friday
const at = (day: number, hour: number, minute = 0) =>
	new Date(Date.UTC(2024, 0, day, hour, minute));

describe("isMarketOpen", () => {
	it("never closes crypto", () => {
		expect(isMarketOpen("crypto", at(6, 12))).toBe(true);
	});

	it("closes forex and metals over the weekend", () => {
		expect(isMarketOpen("forex", at(3, 12))).toBe(true);
		expect(isMarketOpen("forex", at(5, 21, 59))).toBe(true);
		expect(isMarketOpen("forex", at(5, 22))).toBe(false);
		expect(isMarketOpen("metal", at(6, 12))).toBe(false);
		expect(isMarketOpen("forex", at(7, 21, 59))).toBe(false);
		expect(isMarketOpen("forex", at(7, 22))).toBe(true);
	});
});
