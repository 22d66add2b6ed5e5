import type { EventEmitter } from "events";
import type { HttpClient } from "./http/HttpClient";
import type { LoggerFunc } from "./Logger";
import { StartupError } from "./errors";

export const DEFAULT_HOST = "localhost";
export const DEFAULT_PORT = 5280;
export const DEFAULT_PATH = "/http-bind";

export interface BoshEndpoint {
    readonly host: string,
    readonly port: number,
    readonly path: string,
    // https for the HTTP layer only; the stream itself never negotiates TLS.
    readonly secure: boolean,
}

export interface BoshConnectOptions {
    host?: string,
    port?: number,
    path?: string,
    secure?: boolean,
    /**
     * Per-request timeout in milliseconds. `0` leaves requests open until the
     * HTTP layer gives up.
     */
    requestTimeout?: number,
    /**
     * Receives `"stanza"` and `"sessionFailed"` notifications. A fresh
     * emitter is created when omitted.
     */
    owner?: EventEmitter,
    logger?: LoggerFunc,
    httpClient?: HttpClient,
    initialRid?: bigint,
}

export function resolveEndpoint(opts: BoshConnectOptions): BoshEndpoint {
    const host = opts.host ?? DEFAULT_HOST;
    const port = opts.port ?? DEFAULT_PORT;
    const path = opts.path ?? DEFAULT_PATH;
    if (host.trim().length === 0) {
        throw new StartupError("BOSH host must not be empty");
    }
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
        throw new StartupError(`Invalid BOSH port ${port}`);
    }
    return {
        host,
        port,
        path: path.startsWith("/") ? path : `/${path}`,
        secure: opts.secure ?? false,
    };
}

export function resolveTimeout(opts: BoshConnectOptions): number {
    const timeout = opts.requestTimeout ?? 0;
    if (!Number.isFinite(timeout) || timeout < 0) {
        throw new StartupError(`Invalid request timeout ${timeout}`);
    }
    return timeout;
}

export function endpointUrl(endpoint: BoshEndpoint): string {
    return `${endpoint.secure ? "https" : "http"}://${endpoint.host}:${endpoint.port}${endpoint.path}`;
}

/**
 * Initial request id: microseconds since the epoch, so a restarted client
 * does not reuse the ids of its previous run.
 */
export function seedRid(): bigint {
    const subMillisecond = (process.hrtime.bigint() / 1000n) % 1000n;
    return BigInt(Date.now()) * 1000n + subMillisecond;
}
