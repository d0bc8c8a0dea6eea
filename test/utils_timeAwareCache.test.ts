import { describe, it, expect, vi } from "vitest";
import { TimeAwareCache } from "../src/utils/timeAwareCache.js";

describe("utils/TimeAwareCache", () => {
    it("expires entries older than the ttl", () => {
        let now = 0;
        const cache = new TimeAwareCache<string, number>(1_000, () => now);
        cache.set("a", 1);

        now = 1_000;
        expect(cache.get("a")).toBe(1);

        now = 1_001;
        expect(cache.get("a")).toBeUndefined();
        expect(cache.size()).toBe(0);
    });

    it("shares one in-flight load between callers", async () => {
        const cache = new TimeAwareCache<string, string>(60_000);
        const loader = vi.fn(async (key: string) => `${key}-2025-10-28`);

        const [first, second] = await Promise.all([
            cache.getOrLoad("NIFTY", loader),
            cache.getOrLoad("NIFTY", loader),
        ]);

        expect(first).toBe("NIFTY-2025-10-28");
        expect(second).toBe("NIFTY-2025-10-28");
        expect(loader).toHaveBeenCalledTimes(1);

        await cache.getOrLoad("NIFTY", loader);
        expect(loader).toHaveBeenCalledTimes(1);
    });

    it("does not cache failed loads", async () => {
        const cache = new TimeAwareCache<string, string>(60_000);
        const loader = vi
            .fn<(key: string) => Promise<string>>()
            .mockRejectedValueOnce(new Error("upstream down"))
            .mockResolvedValueOnce("2025-10-28");

        await expect(cache.getOrLoad("NIFTY", loader)).rejects.toThrow(
            "upstream down"
        );
        expect(cache.has("NIFTY")).toBe(false);

        await expect(cache.getOrLoad("NIFTY", loader)).resolves.toBe(
            "2025-10-28"
        );
        expect(cache.has("NIFTY")).toBe(true);
    });

    it("deletes and clears", () => {
        const cache = new TimeAwareCache<string, number>(1_000);
        cache.set("a", 1);
        cache.set("b", 2);
        cache.delete("a");
        expect(cache.has("a")).toBe(false);
        cache.clear();
        expect(cache.size()).toBe(0);
    });
});
