// src/storage/snapshotHistoryStore.ts

import type { MarketSnapshot } from "../types/snapshotTypes.js";
import { RollingWindow } from "../utils/rollingWindow.js";

/**
 * Upstream query contract: the last `limit` snapshots for one
 * (symbol, expiry) pair, newest first.
 */
export interface ISnapshotHistoryProvider {
    getRecentSnapshots(
        symbol: string,
        expiry: string,
        limit: number
    ): Promise<MarketSnapshot[]>;
}

/**
 * In-process history keyed by (symbol, expiry). Each key keeps the last
 * `capacity` snapshots; older ones fall off.
 */
export class SnapshotHistoryStore implements ISnapshotHistoryProvider {
    private readonly windows = new Map<string, RollingWindow<MarketSnapshot>>();

    constructor(private readonly capacity: number) {}

    public record(symbol: string, expiry: string, snapshot: MarketSnapshot): void {
        const key = this.key(symbol, expiry);
        let window = this.windows.get(key);
        if (!window) {
            window = new RollingWindow<MarketSnapshot>(this.capacity);
            this.windows.set(key, window);
        }

        // Out-of-order samples would break the newest-first contract
        const latest = window.newest(1)[0];
        if (latest && snapshot.timestamp <= latest.timestamp) {
            throw new RangeError(
                `Snapshot for ${key} at ${snapshot.timestamp} is not newer than ${latest.timestamp}`
            );
        }
        window.push(snapshot);
    }

    public getRecentSnapshots(
        symbol: string,
        expiry: string,
        limit: number
    ): Promise<MarketSnapshot[]> {
        const window = this.windows.get(this.key(symbol, expiry));
        return Promise.resolve(window ? window.newest(limit) : []);
    }

    public clear(symbol?: string, expiry?: string): void {
        if (symbol === undefined) {
            this.windows.clear();
            return;
        }
        for (const key of [...this.windows.keys()]) {
            const [keySymbol, keyExpiry] = key.split("|");
            if (
                keySymbol === symbol &&
                (expiry === undefined || keyExpiry === expiry)
            ) {
                this.windows.delete(key);
            }
        }
    }

    public keys(): { symbol: string; expiry: string }[] {
        return [...this.windows.keys()].map((key) => {
            const [symbol = "", expiry = ""] = key.split("|");
            return { symbol, expiry };
        });
    }

    private key(symbol: string, expiry: string): string {
        return `${symbol}|${expiry}`;
    }
}
