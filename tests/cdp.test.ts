/**
 * Tests for the DevTools protocol client and the Chrome helpers.
 * The connection is driven through an in-memory transport; no browser is started.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { CdpConnection, CdpError } from "../src/plugins/cdp.js";
import { findChrome, parseDevToolsEndpoint } from "../src/plugins/browser.js";

class MemoryTransport {
    frames: Record<string, unknown>[] = [];
    readonly send = (frame: string): void => {
        this.frames.push(JSON.parse(frame));
    };
}

describe("CdpConnection", () => {
    let transport: MemoryTransport;
    let cdp: CdpConnection;

    beforeEach(() => {
        transport = new MemoryTransport();
        cdp = new CdpConnection(transport.send, 1_000);
    });

    afterEach(() => {
        cdp.close();
    });

    it("should number commands and resolve with their result", async () => {
        const enabled = cdp.send("Page.enable");
        const navigated = cdp.send("Page.navigate", { url: "https://example.com/" }, "session-1");

        expect(transport.frames).toEqual([
            { id: 1, method: "Page.enable", params: {} },
            { id: 2, method: "Page.navigate", params: { url: "https://example.com/" }, sessionId: "session-1" },
        ]);

        cdp.dispatch(JSON.stringify({ id: 2, result: { frameId: "F1" } }));
        cdp.dispatch(JSON.stringify({ id: 1, result: {} }));

        expect(await navigated).toEqual({ frameId: "F1" });
        expect(await enabled).toEqual({});
    });

    it("should reject with a CdpError on a protocol error", async () => {
        const pending = cdp.send("Target.attachToTarget", { targetId: "missing" });
        cdp.dispatch(JSON.stringify({ id: 1, error: { code: -32602, message: "No target with given id found" } }));

        await expect(pending).rejects.toThrow(CdpError);
        await expect(pending).rejects.toMatchObject({
            method: "Target.attachToTarget",
            code: -32602,
            message: "Target.attachToTarget: No target with given id found",
        });
    });

    it("should time out commands without a response", async () => {
        const slow = new CdpConnection(transport.send, 20);
        await expect(slow.send("Runtime.evaluate")).rejects.toThrow("Runtime.evaluate: no response within 20ms");
    });

    it("should reject when the transport throws", async () => {
        const broken = new CdpConnection(() => {
            throw new Error("socket not open");
        });
        await expect(broken.send("Page.enable")).rejects.toThrow("socket not open");
    });

    it("should ignore malformed and unknown frames", () => {
        expect(() => cdp.dispatch("not json")).not.toThrow();
        expect(() => cdp.dispatch("[1, 2]")).not.toThrow();
        expect(() => cdp.dispatch(JSON.stringify({ id: 99, result: {} }))).not.toThrow();
    });

    it("should resolve a waiter on the first matching event of its session", async () => {
        const waiter = cdp.waitForEvent("Page.lifecycleEvent", (p) => p.name === "networkIdle", 1_000, "S1");

        cdp.dispatch(JSON.stringify({ method: "Page.lifecycleEvent", params: { name: "load" }, sessionId: "S1" }));
        cdp.dispatch(JSON.stringify({ method: "Page.lifecycleEvent", params: { name: "networkIdle" }, sessionId: "S2" }));
        cdp.dispatch(JSON.stringify({ method: "Page.lifecycleEvent", params: { name: "networkIdle", ts: 7 }, sessionId: "S1" }));

        expect(await waiter.promise).toEqual({ name: "networkIdle", ts: 7 });
    });

    it("should time out a waiter", async () => {
        const waiter = cdp.waitForEvent("Page.loadEventFired", () => true, 20);
        await expect(waiter.promise).rejects.toThrow("Page.loadEventFired: not received within 20ms");
    });

    it("should reject everything in flight on close", async () => {
        const command = cdp.send("Page.enable");
        const waiter = cdp.waitForEvent("Page.loadEventFired", () => true, 1_000);

        const commandRejected = expect(command).rejects.toThrow("Browser connection closed");
        const waiterRejected = expect(waiter.promise).rejects.toThrow("Browser connection closed");

        cdp.close(new Error("Browser connection closed"));

        await commandRejected;
        await waiterRejected;
        await expect(cdp.send("Page.enable")).rejects.toThrow("Browser connection closed");
        expect(cdp.isClosed).toBe(true);
    });
});

describe("parseDevToolsEndpoint", () => {
    it("should extract the WebSocket URL from Chrome's stderr", () => {
        expect(parseDevToolsEndpoint("DevTools listening on ws://127.0.0.1:38211/devtools/browser/abc-123"))
            .toBe("ws://127.0.0.1:38211/devtools/browser/abc-123");
        expect(parseDevToolsEndpoint("[1234:5678:ERROR:gpu_init.cc] something else")).toBeNull();
    });
});

describe("findChrome", () => {
    afterEach(() => {
        vi.unstubAllEnvs();
    });

    it("should prefer an explicit path, then CHROME_PATH", () => {
        vi.stubEnv("CHROME_PATH", "/env/chrome");
        expect(findChrome("/explicit/chrome", () => false)).toBe("/explicit/chrome");
        expect(findChrome(undefined, () => false)).toBe("/env/chrome");
    });

    it("should fall back to well-known install locations", () => {
        vi.stubEnv("CHROME_PATH", "");
        expect(findChrome(undefined, (p) => p === "/usr/bin/chromium")).toBe("/usr/bin/chromium");
    });

    it("should fail when no browser can be found", () => {
        vi.stubEnv("CHROME_PATH", "");
        expect(() => findChrome(undefined, () => false))
            .toThrow("Chrome not found. Set CHROME_PATH or scraper.chrome_path in the config.");
    });
});
