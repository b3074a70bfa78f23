import { CONFIG } from "./config";
import type { DocumentStore } from "./db";
import { Orders } from "./orders";

export type SweeperOptions = {
    intervalMs?: number;
    now?: () => Date;
};

/** Periodically evicts unpaid orders whose payment window has closed. */
export class ExpirySweeper {
    private timer: NodeJS.Timeout | null = null;
    private inFlight: Promise<number> | null = null;
    private readonly intervalMs: number;
    private readonly now: () => Date;

    constructor(private readonly store: DocumentStore, options: SweeperOptions = {}) {
        this.intervalMs = options.intervalMs ?? CONFIG.SWEEP_INTERVAL_MS;
        this.now = options.now ?? (() => new Date());
    }

    get isRunning(): boolean {
        return this.timer !== null;
    }

    /** One pass; the document is only written when something was removed. Never throws. */
    async runOnce(): Promise<number> {
        try {
            const document = await this.store.load();
            const removed = Orders.sweep(document, this.now());
            if (removed > 0) {
                await this.store.save(document);
                console.log(`🗑️ Removed ${removed} expired unpaid order(s)`);
            }
            return removed;
        } catch (error) {
            console.error("❌ Expiry sweep failed", error);
            return 0;
        }
    }

    start(): void {
        if (this.timer) return;
        this.schedule();
        console.log(`✅ Expiry sweeper started (every ${this.intervalMs}ms)`);
    }

    async stop(): Promise<void> {
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        if (this.inFlight) await this.inFlight;
    }

    private schedule(): void {
        this.timer = setTimeout(() => {
            this.inFlight = this.runOnce();
            void this.inFlight.then(() => {
                this.inFlight = null;
                if (this.timer) this.schedule();
            });
        }, this.intervalMs);
        this.timer.unref();
    }
}
