import type { Element } from "@xmpp/xml";
import type { BoshEndpoint } from "./config";
import type { Reply, SessionControl, SessionMessage, StopResult } from "./SessionMessages";
import type { StreamItem } from "./xmpp/StreamElements";

export type UnsupportedCapability = "not_supported";

/**
 * Handle on a BOSH session, handed to the owner by `connect` and attached to
 * every notification.
 */
export class BoshTransport {
    public readonly tls = false;
    public readonly compress = false;

    constructor(public readonly endpoint: BoshEndpoint, private readonly control: SessionControl) {}

    /**
     * Queue a stream item. Items are wrapped and posted in call order, one per
     * HTTP request.
     */
    public send(item: StreamItem): void {
        this.control.post({ type: "send", item });
    }

    /**
     * Post a prebuilt `<body/>` as is. It still takes a request id slot, so
     * mixing this with `send` leaves the rid on the wire out of step with the
     * session's own count.
     */
    public sendRaw(body: Element): void {
        this.control.post({ type: "sendRaw", body });
    }

    /**
     * Whether the session is still running. Says nothing about the endpoint.
     */
    public isConnected(): boolean {
        return this.control.alive;
    }

    public resetParser(): void {
        this.control.post({ type: "resetParser" });
    }

    public stop(): Promise<StopResult> {
        if (!this.control.alive) {
            return Promise.resolve("already_stopped");
        }
        return this.call<StopResult>((reply) => ({ type: "stop", reply }));
    }

    public upgradeToTls(): UnsupportedCapability {
        return "not_supported";
    }

    public useZlib(): UnsupportedCapability {
        return "not_supported";
    }

    public getSid(): Promise<string | undefined> {
        return this.call<string | undefined>((reply) => ({ type: "getSid", reply }));
    }

    public getRid(): Promise<bigint> {
        return this.call<bigint>((reply) => ({ type: "getRid", reply }));
    }

    public getTransport(): Promise<BoshTransport> {
        return this.call<BoshTransport>((reply) => ({ type: "getTransport", reply }));
    }

    private call<T>(message: (reply: Reply<T>) => SessionMessage): Promise<T> {
        return new Promise<T>((resolve, reject) => {
            this.control.post(message({ resolve, reject }));
        });
    }
}
