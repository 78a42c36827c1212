/**
 * pagechat CDP — minimal Chrome DevTools Protocol client.
 *
 * Transport-agnostic: outgoing frames go through the `send` callback given
 * to the constructor, incoming frames are fed to `dispatch()`. The browser
 * plugin wires it to a WebSocket; tests wire it to an in-process fake.
 */

import { createLogger } from "../utils/logger.js";

const log = createLogger("CDP");

export type CdpPayload = Record<string, unknown>;

export interface CdpEvent {
    method: string;
    params: CdpPayload;
    sessionId?: string;
}

export class CdpError extends Error {
    constructor(
        readonly method: string,
        message: string,
        readonly code?: number,
    ) {
        super(`${method}: ${message}`);
        this.name = "CdpError";
    }
}

export interface EventWaiter {
    promise: Promise<CdpPayload>;
    /** Stop waiting; the promise stays pending. */
    cancel(): void;
}

interface PendingCommand {
    method: string;
    resolve: (result: CdpPayload) => void;
    reject: (err: Error) => void;
    timer: NodeJS.Timeout;
}

interface ActiveWaiter {
    reject: (err: Error) => void;
    cancel: () => void;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class CdpConnection {
    private nextId = 0;
    private closed: Error | null = null;
    private pending = new Map<number, PendingCommand>();
    private listeners = new Set<(event: CdpEvent) => void>();
    private waiters = new Set<ActiveWaiter>();

    constructor(
        private readonly transport: (frame: string) => void,
        private readonly commandTimeoutMs = 30_000,
    ) {}

    /** Send a command and resolve with its `result` object. */
    send(method: string, params: CdpPayload = {}, sessionId?: string): Promise<CdpPayload> {
        if (this.closed) return Promise.reject(this.closed);

        const id = ++this.nextId;
        return new Promise<CdpPayload>((resolve, reject) => {
            const timer = setTimeout(() => {
                this.pending.delete(id);
                reject(new CdpError(method, `no response within ${this.commandTimeoutMs}ms`));
            }, this.commandTimeoutMs);

            this.pending.set(id, { method, resolve, reject, timer });
            const frame: CdpPayload = { id, method, params };
            if (sessionId) frame.sessionId = sessionId;

            try {
                this.transport(JSON.stringify(frame));
            } catch (err) {
                clearTimeout(timer);
                this.pending.delete(id);
                reject(err instanceof Error ? err : new Error(String(err)));
            }
        });
    }

    /** Feed one incoming frame. Malformed frames are logged and dropped. */
    dispatch(frame: string): void {
        let message: unknown;
        try {
            message = JSON.parse(frame);
        } catch {
            log.debug(`Dropping non-JSON frame (${frame.length} bytes)`);
            return;
        }
        if (!isRecord(message)) return;

        if (typeof message.id === "number") {
            const command = this.pending.get(message.id);
            if (!command) return;
            this.pending.delete(message.id);
            clearTimeout(command.timer);

            if (isRecord(message.error)) {
                const text = typeof message.error.message === "string" ? message.error.message : "unknown error";
                const code = typeof message.error.code === "number" ? message.error.code : undefined;
                command.reject(new CdpError(command.method, text, code));
            } else {
                command.resolve(isRecord(message.result) ? message.result : {});
            }
            return;
        }

        if (typeof message.method === "string") {
            const event: CdpEvent = {
                method: message.method,
                params: isRecord(message.params) ? message.params : {},
                sessionId: typeof message.sessionId === "string" ? message.sessionId : undefined,
            };
            for (const listener of [...this.listeners]) listener(event);
        }
    }

    /**
     * Wait for the first event matching `method`, `sessionId` and `predicate`.
     * Rejects after `timeoutMs` or when the connection closes. Register the
     * waiter before sending the command that triggers the event.
     */
    waitForEvent(
        method: string,
        predicate: (params: CdpPayload) => boolean,
        timeoutMs: number,
        sessionId?: string,
    ): EventWaiter {
        let cancel: () => void = () => undefined;

        const promise = new Promise<CdpPayload>((resolve, reject) => {
            if (this.closed) {
                reject(this.closed);
                return;
            }

            const listener = (event: CdpEvent): void => {
                if (event.method !== method) return;
                if (sessionId && event.sessionId !== sessionId) return;
                if (!predicate(event.params)) return;
                cancel();
                resolve(event.params);
            };

            const waiter: ActiveWaiter = {
                reject: (err) => { cancel(); reject(err); },
                cancel: () => {
                    clearTimeout(timer);
                    this.listeners.delete(listener);
                    this.waiters.delete(waiter);
                },
            };
            const timer = setTimeout(() => {
                waiter.reject(new CdpError(method, `not received within ${timeoutMs}ms`));
            }, timeoutMs);

            cancel = waiter.cancel;
            this.listeners.add(listener);
            this.waiters.add(waiter);
        });

        return { promise, cancel: () => cancel() };
    }

    /** Reject everything in flight; later sends fail immediately. */
    close(reason: Error = new Error("CDP connection closed")): void {
        if (this.closed) return;
        this.closed = reason;

        for (const command of this.pending.values()) {
            clearTimeout(command.timer);
            command.reject(reason);
        }
        this.pending.clear();

        for (const waiter of [...this.waiters]) waiter.reject(reason);
        this.listeners.clear();
    }

    get isClosed(): boolean {
        return this.closed !== null;
    }
}
