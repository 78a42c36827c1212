/**
 * pagechat Browser — headless Chrome page fetcher over CDP.
 *
 * Every render launches its own Chrome process with a throwaway profile
 * directory, opens one page in a fresh browser context, navigates, waits
 * for the network to go idle plus a fixed settle pause, and returns
 * `document.documentElement.outerHTML`. The process, the socket and the
 * profile directory are released on every exit path.
 *
 * No puppeteer/playwright dependency — Chrome's own debugging endpoint
 * is driven through `ws`.
 */

import { spawn, type ChildProcess } from "node:child_process";
import { existsSync } from "node:fs";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createInterface } from "node:readline";
import WebSocket from "ws";
import { CdpConnection, CdpError, isRecord, type CdpPayload } from "./cdp.js";
import type { PageFetcher, RenderOptions } from "../scraper/types.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("Browser");

export interface BrowserConfig {
    /** Chrome/Chromium executable path. Default: CHROME_PATH or a well-known install location. */
    executablePath?: string;
    /** Run headless. Default: true */
    headless?: boolean;
    /** Viewport width. Default: 1280 */
    width?: number;
    /** Viewport height. Default: 720 */
    height?: number;
    /** Time allowed for Chrome to start and expose its endpoint (ms). Default: 15000 */
    launchTimeoutMs?: number;
}

const CHROME_CANDIDATES = [
    "/Applications/Google Chrome.app/Contents/MacOS/Google Chrome",
    "/Applications/Chromium.app/Contents/MacOS/Chromium",
    "/usr/bin/google-chrome",
    "/usr/bin/google-chrome-stable",
    "/usr/bin/chromium-browser",
    "/usr/bin/chromium",
    "C:\\Program Files\\Google\\Chrome\\Application\\chrome.exe",
    "C:\\Program Files (x86)\\Google\\Chrome\\Application\\chrome.exe",
];

const DEVTOOLS_ENDPOINT_RE = /DevTools listening on (ws:\/\/\S+)/;

/** Extract the browser WebSocket endpoint from a line of Chrome's stderr. */
export function parseDevToolsEndpoint(line: string): string | null {
    return DEVTOOLS_ENDPOINT_RE.exec(line)?.[1] ?? null;
}

export function findChrome(
    explicit?: string,
    exists: (path: string) => boolean = existsSync,
): string {
    if (explicit) return explicit;
    const fromEnv = process.env.CHROME_PATH;
    if (fromEnv) return fromEnv;
    const found = CHROME_CANDIDATES.find((p) => exists(p));
    if (found) return found;
    throw new Error("Chrome not found. Set CHROME_PATH or scraper.chrome_path in the config.");
}

function rawDataToString(data: WebSocket.RawData): string {
    if (Buffer.isBuffer(data)) return data.toString("utf-8");
    if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
    return Buffer.from(data).toString("utf-8");
}

interface LaunchedBrowser {
    process: ChildProcess;
    endpoint: string;
}

export class ChromePageFetcher implements PageFetcher {
    readonly name = "chrome";
    private readonly config: Required<Omit<BrowserConfig, "executablePath">> & { executablePath?: string };

    constructor(config?: BrowserConfig) {
        this.config = {
            headless: true,
            width: 1280,
            height: 720,
            launchTimeoutMs: 15_000,
            ...config,
        };
    }

    async render(url: string, options: RenderOptions): Promise<string> {
        const userDataDir = await mkdtemp(join(tmpdir(), "pagechat-chrome-"));
        let browser: LaunchedBrowser | null = null;
        let socket: WebSocket | null = null;
        let cdp: CdpConnection | null = null;

        try {
            browser = await this.launch(userDataDir);
            socket = await this.connect(browser.endpoint);

            const ws = socket;
            const connection = new CdpConnection((frame) => ws.send(frame), options.timeoutMs);
            cdp = connection;
            ws.on("message", (data) => connection.dispatch(rawDataToString(data)));
            ws.on("close", () => connection.close(new Error("Browser connection closed")));
            ws.on("error", (err) => connection.close(err));

            const sessionId = await this.openPage(connection);
            await this.prepare(connection, sessionId, options.headers);
            await this.navigate(connection, sessionId, url, options.timeoutMs);

            if (options.settleWaitMs > 0) {
                await new Promise((r) => setTimeout(r, options.settleWaitMs));
            }

            const html = await this.readHtml(connection, sessionId);
            log.info(`Rendered ${url}`, { bytes: html.length });
            return html;
        } finally {
            cdp?.close();
            socket?.close();
            if (browser) await this.terminate(browser.process);
            await rm(userDataDir, { recursive: true, force: true }).catch((err: unknown) => {
                log.warn(`Failed to remove ${userDataDir}: ${err instanceof Error ? err.message : String(err)}`);
            });
        }
    }

    // ── Lifecycle ───────────────────────────────────────────────

    private launch(userDataDir: string): Promise<LaunchedBrowser> {
        const chromePath = findChrome(this.config.executablePath);
        const args = [
            "--remote-debugging-port=0",
            `--user-data-dir=${userDataDir}`,
            `--window-size=${this.config.width},${this.config.height}`,
            "--no-first-run",
            "--no-default-browser-check",
            "--disable-extensions",
            "--disable-background-networking",
            "--disable-sync",
            "--mute-audio",
        ];
        if (this.config.headless) args.push("--headless=new", "--disable-gpu");
        args.push("about:blank");

        const child = spawn(chromePath, args, { stdio: ["ignore", "ignore", "pipe"] });
        log.debug(`Launching ${chromePath}`, { pid: child.pid });

        return new Promise<LaunchedBrowser>((resolve, reject) => {
            const stderr = child.stderr ? createInterface({ input: child.stderr }) : null;

            const settle = (err: Error | null, endpoint?: string): void => {
                clearTimeout(timer);
                stderr?.close();
                child.off("exit", onExit);
                child.off("error", onError);
                if (err || !endpoint) {
                    child.kill();
                    reject(err ?? new Error("Chrome did not report a DevTools endpoint"));
                } else {
                    child.on("error", (e) => log.warn(`Chrome process error: ${e.message}`));
                    resolve({ process: child, endpoint });
                }
            };

            const onExit = (code: number | null): void => settle(new Error(`Chrome exited during startup (code ${code})`));
            const onError = (err: Error): void => settle(err);
            const timer = setTimeout(
                () => settle(new Error(`Chrome did not start within ${this.config.launchTimeoutMs}ms`)),
                this.config.launchTimeoutMs,
            );

            child.once("exit", onExit);
            child.once("error", onError);
            stderr?.on("line", (line) => {
                const endpoint = parseDevToolsEndpoint(line);
                if (endpoint) settle(null, endpoint);
            });
        });
    }

    private connect(endpoint: string): Promise<WebSocket> {
        return new Promise<WebSocket>((resolve, reject) => {
            const ws = new WebSocket(endpoint, { perMessageDeflate: false });
            ws.once("open", () => {
                ws.off("error", reject);
                resolve(ws);
            });
            ws.once("error", reject);
        });
    }

    private async terminate(child: ChildProcess): Promise<void> {
        if (child.exitCode !== null || child.signalCode !== null) return;
        const exited = new Promise<void>((resolve) => child.once("exit", () => resolve()));
        child.kill();
        const escalate = setTimeout(() => child.kill("SIGKILL"), 5_000);
        await exited;
        clearTimeout(escalate);
        log.debug("Browser closed", { pid: child.pid });
    }

    // ── Page ────────────────────────────────────────────────────

    /** New isolated browser context with one blank page; returns its session id. */
    private async openPage(cdp: CdpConnection): Promise<string> {
        const context = await cdp.send("Target.createBrowserContext", { disposeOnDetach: true });
        const browserContextId = requireString(context, "browserContextId", "Target.createBrowserContext");

        const target = await cdp.send("Target.createTarget", { url: "about:blank", browserContextId });
        const targetId = requireString(target, "targetId", "Target.createTarget");

        const attached = await cdp.send("Target.attachToTarget", { targetId, flatten: true });
        return requireString(attached, "sessionId", "Target.attachToTarget");
    }

    private async prepare(cdp: CdpConnection, sessionId: string, headers: Record<string, string>): Promise<void> {
        await cdp.send("Page.enable", {}, sessionId);
        await cdp.send("Page.setLifecycleEventsEnabled", { enabled: true }, sessionId);
        await cdp.send("Network.enable", {}, sessionId);

        const userAgent = Object.entries(headers).find(([name]) => name.toLowerCase() === "user-agent")?.[1];
        if (userAgent) {
            await cdp.send("Network.setUserAgentOverride", { userAgent }, sessionId);
        }
        await cdp.send("Network.setExtraHTTPHeaders", { headers }, sessionId);
    }

    /**
     * Navigate and wait for `networkIdle` of the document this navigation
     * created. Idle events from subframes or the previous document are
     * ignored; ones that arrive before the command response are kept until
     * the frame and loader ids are known.
     */
    private async navigate(cdp: CdpConnection, sessionId: string, url: string, timeoutMs: number): Promise<void> {
        let loader: { frameId: string; loaderId: string } | null = null;
        const early: CdpPayload[] = [];
        const isLoaderIdle = (params: CdpPayload): boolean =>
            loader !== null && params.frameId === loader.frameId && params.loaderId === loader.loaderId;

        const idle = cdp.waitForEvent(
            "Page.lifecycleEvent",
            (params) => {
                if (params.name !== "networkIdle") return false;
                if (loader) return isLoaderIdle(params);
                early.push(params);
                return false;
            },
            timeoutMs,
            sessionId,
        );
        let idledEarly: () => void = () => undefined;
        const seenEarly = new Promise<void>((resolve) => { idledEarly = resolve; });

        try {
            await Promise.all([
                cdp.send("Page.navigate", { url }, sessionId).then((result) => {
                    if (typeof result.errorText === "string" && result.errorText) {
                        throw new CdpError("Page.navigate", result.errorText);
                    }
                    loader = {
                        frameId: requireString(result, "frameId", "Page.navigate"),
                        loaderId: requireString(result, "loaderId", "Page.navigate"),
                    };
                    if (early.some(isLoaderIdle)) idledEarly();
                }),
                Promise.race([idle.promise, seenEarly]),
            ]);
        } finally {
            idle.cancel();
        }
    }

    private async readHtml(cdp: CdpConnection, sessionId: string): Promise<string> {
        const evaluated = await cdp.send("Runtime.evaluate", {
            expression: "document.documentElement.outerHTML",
            returnByValue: true,
        }, sessionId);

        const remote = evaluated.result;
        if (isRecord(remote) && typeof remote.value === "string") return remote.value;
        throw new CdpError("Runtime.evaluate", "page returned no HTML");
    }
}

function requireString(payload: CdpPayload, key: string, method: string): string {
    const value = payload[key];
    if (typeof value !== "string" || !value) {
        throw new CdpError(method, `response is missing '${key}'`);
    }
    return value;
}
