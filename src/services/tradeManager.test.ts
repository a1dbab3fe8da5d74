import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { tradeParams } from "../__fixtures__/bars";
import { DEFAULT_LIFECYCLE_RULES } from "../strategy/lifecycle";
import type {
	AdvisoryVerdict,
	Bar,
	ClosedTrade,
	OpenTrade,
	StopAdjustment,
	Trade,
	TradeParams,
} from "../types";
import type { TradeNotifier } from "./notifier";
import type { TradeJournal } from "./tradeLogger";
import { TradeManager } from "./tradeManager";
import { TradeStore } from "./tradeStore";

class RecordingNotifier implements TradeNotifier {
	trailed: Array<{ trade: OpenTrade; adjustment: StopAdjustment; price: number }> = [];
	closed: ClosedTrade[] = [];
	historyAtClose: number[] = [];

	constructor(
		private readonly store: TradeStore,
		private readonly fail = false,
	) {}

	async signalRaised(_params: TradeParams, _verdict: AdvisoryVerdict): Promise<boolean> {
		return true;
	}

	async stopTrailed(trade: OpenTrade, adjustment: StopAdjustment, price: number): Promise<boolean> {
		if (this.fail) throw new Error("notifier down");
		this.trailed.push({ trade, adjustment, price });
		return true;
	}

	async tradeClosed(trade: ClosedTrade): Promise<boolean> {
		this.historyAtClose.push(this.store.history().length);
		if (this.fail) throw new Error("notifier down");
		this.closed.push(trade);
		return true;
	}
}

class MemoryJournal implements TradeJournal {
	entries: Trade[] = [];

	async record(trade: Trade): Promise<void> {
		this.entries.push(trade);
	}
}

function bar(timestamp: number, high: number, low: number, close = (high + low) / 2): Bar {
	return { timestamp, open: close, high, low, close, volume: 10 };
}

describe("TradeManager", () => {
	let dir: string;
	let store: TradeStore;
	let journal: MemoryJournal;

	beforeEach(async () => {
		dir = await fs.mkdtemp(path.join(os.tmpdir(), "trade-manager-"));
		store = new TradeStore({ filePath: path.join(dir, "state.json"), historyLimit: 100 });
		await store.load();
		journal = new MemoryJournal();
	});

	afterEach(async () => {
		await fs.rm(dir, { recursive: true, force: true });
	});

	it("opens a trade once per identity", async () => {
		const manager = new TradeManager(store, new RecordingNotifier(store), DEFAULT_LIFECYCLE_RULES, journal);

		const first = await manager.openTrade("EURUSD", "LONG", tradeParams(), 1_000, "order-1");
		const again = await manager.openTrade("EURUSD", "LONG", tradeParams({ stopLoss: 1.09 }), 1_000);

		expect(again).toEqual(first);
		expect(again.orderId).toBe("order-1");
		expect(manager.openTradesFor("EURUSD")).toHaveLength(1);
		expect(journal.entries).toHaveLength(1);
	});

	it("tracks a second trade on the same symbol opened at another time", async () => {
		const manager = new TradeManager(store, new RecordingNotifier(store), DEFAULT_LIFECYCLE_RULES, journal);

		await manager.openTrade("EURUSD", "LONG", tradeParams(), 1_000);
		await manager.openTrade("EURUSD", "LONG", tradeParams(), 2_000);

		expect(manager.openTradesFor("EURUSD").map((t) => t.id)).toEqual([
			"EURUSD_1000",
			"EURUSD_2000",
		]);
	});

	it("trails, closes and reports a trade across bars", async () => {
		const notifier = new RecordingNotifier(store);
		const manager = new TradeManager(store, notifier, DEFAULT_LIFECYCLE_RULES, journal);
		await manager.openTrade("EURUSD", "LONG", tradeParams(), 1_000);

		const results = await manager.onBars("EURUSD", [
			bar(2_000, 1.108, 1.104, 1.107),
			bar(3_000, 1.106, 1.1005),
		]);

		expect(results).toHaveLength(1);
		expect(results[0].state).toBe("CLOSED_WIN");
		expect(notifier.trailed).toHaveLength(1);
		expect(notifier.trailed[0].price).toBe(1.107);
		expect(notifier.trailed[0].adjustment.newStop).toBeCloseTo(1.101, 10);
		expect(notifier.closed).toHaveLength(1);
		expect(notifier.historyAtClose).toEqual([1]);
		expect(manager.openTradesFor("EURUSD")).toEqual([]);
		expect(store.history()).toHaveLength(1);
		expect(journal.entries.map((t) => t.state)).toEqual(["OPEN_ARMED", "CLOSED_WIN"]);
	});

	it("ignores bars it has already applied", async () => {
		const notifier = new RecordingNotifier(store);
		const manager = new TradeManager(store, notifier, DEFAULT_LIFECYCLE_RULES, journal);
		await manager.openTrade("EURUSD", "LONG", tradeParams(), 1_000);

		const bars = [bar(500, 1.09, 1.08), bar(1_000, 1.09, 1.08), bar(2_000, 1.108, 1.104)];
		await manager.onBars("EURUSD", bars);
		await manager.onBars("EURUSD", bars);

		const [trade] = manager.openTradesFor("EURUSD");
		expect(trade.state).toBe("OPEN_TRAILED");
		expect(trade.lastBarAt).toBe(2_000);
		expect(trade.stopAdjustments).toHaveLength(1);
		expect(notifier.trailed).toHaveLength(1);
	});

	it("persists progress so a restart replays only newer bars", async () => {
		const manager = new TradeManager(store, new RecordingNotifier(store), DEFAULT_LIFECYCLE_RULES, journal);
		await manager.openTrade("EURUSD", "LONG", tradeParams(), 1_000);
		await manager.onBars("EURUSD", [bar(2_000, 1.103, 1.098)]);

		const restarted = new TradeStore({ filePath: path.join(dir, "state.json"), historyLimit: 100 });
		await restarted.load();
		expect(restarted.get("EURUSD_1000")?.lastBarAt).toBe(2_000);
		expect(restarted.get("EURUSD_1000")?.lowestPrice).toBe(1.098);
	});

	it("keeps state consistent when the notifier throws", async () => {
		const manager = new TradeManager(store, new RecordingNotifier(store, true), DEFAULT_LIFECYCLE_RULES, journal);
		await manager.openTrade("EURUSD", "LONG", tradeParams(), 1_000);

		await manager.onBars("EURUSD", [bar(2_000, 1.092, 1.09)]);

		expect(manager.openTradesFor("EURUSD")).toEqual([]);
		expect(store.history().map((t) => t.state)).toEqual(["CLOSED_LOSS"]);
	});

	it("summarizes closed trades", async () => {
		const manager = new TradeManager(store, new RecordingNotifier(store), DEFAULT_LIFECYCLE_RULES, journal);
		await manager.openTrade("EURUSD", "LONG", tradeParams(), 1_000);
		await manager.openTrade("GBPUSD", "LONG", tradeParams({ symbol: "GBPUSD" }), 1_000);

		await manager.onBars("EURUSD", [bar(2_000, 1.108, 1.104), bar(3_000, 1.106, 1.1005)]);
		await manager.onBars("GBPUSD", [bar(2_000, 1.092, 1.09)]);

		expect(manager.stats()).toEqual({
			total: 2,
			wins: 1,
			losses: 1,
			breakevens: 0,
			winRate: 50,
			trailedCount: 1,
			savedByTrail: 1,
		});
	});
});
