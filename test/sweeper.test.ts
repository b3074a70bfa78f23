import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import path from "node:path";
import { DocumentStore } from "../src/db";
import { Orders } from "../src/orders";
import { ExpirySweeper } from "../src/sweeper";
import { makeProfile, makeTempDir, removeDir } from "./fixtures";

const T0 = new Date("2024-05-01T12:00:00.000Z");
const HOUR = 60 * 60 * 1000;

describe("ExpirySweeper", () => {
    let dir = "";
    let store: DocumentStore;

    beforeEach(async () => {
        dir = makeTempDir("sweeper-");
        store = new DocumentStore({ filePath: path.join(dir, "data.json") });
        await store.update((document) => {
            document.profiles.push(makeProfile(3));
            const input = { profileId: 3, amount: 50, wallet: "trc20", currency: "USD" };
            Orders.quote(document, { ...input, telegramUserId: "stale" }, T0);
            Orders.quote(document, { ...input, telegramUserId: "fresh" }, new Date(T0.getTime() + HOUR));
            Orders.quote(document, { ...input, telegramUserId: "paid" }, T0);
            Orders.book(document, 3, "paid", T0);
        });
        vi.spyOn(console, "log").mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.useRealTimers();
        vi.restoreAllMocks();
        removeDir(dir);
    });

    it("removes expired unpaid orders and persists the result", async () => {
        const sweeper = new ExpirySweeper(store, { now: () => new Date(T0.getTime() + HOUR + 1000) });

        expect(await sweeper.runOnce()).toBe(1);

        const onDisk = await new DocumentStore({ filePath: store.filePath }).load();
        expect(onDisk.orders.map((o) => o.telegram_user_id)).toEqual(["fresh", "paid"]);
    });

    it("does not write when nothing expired", async () => {
        const save = vi.spyOn(store, "save");
        const sweeper = new ExpirySweeper(store, { now: () => T0 });

        expect(await sweeper.runOnce()).toBe(0);
        expect(save).not.toHaveBeenCalled();
    });

    it("logs store failures and keeps its schedule", async () => {
        const errors = vi.spyOn(console, "error").mockImplementation(() => undefined);
        vi.spyOn(store, "load").mockRejectedValueOnce(new Error("disk gone"));
        const sweeper = new ExpirySweeper(store, { now: () => T0 });

        expect(await sweeper.runOnce()).toBe(0);
        expect(errors).toHaveBeenCalledWith("❌ Expiry sweep failed", expect.any(Error));
    });

    it("runs on its interval until stopped", async () => {
        vi.useFakeTimers();
        const sweeper = new ExpirySweeper(store, { intervalMs: 1000, now: () => T0 });
        const runOnce = vi.spyOn(sweeper, "runOnce").mockResolvedValue(0);

        sweeper.start();
        expect(sweeper.isRunning).toBe(true);
        await vi.advanceTimersByTimeAsync(2500);
        expect(runOnce).toHaveBeenCalledTimes(2);

        await sweeper.stop();
        await vi.advanceTimersByTimeAsync(5000);
        expect(runOnce).toHaveBeenCalledTimes(2);
        expect(sweeper.isRunning).toBe(false);
    });
});
