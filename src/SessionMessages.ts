import type { Element } from "@xmpp/xml";
import type { BoshTransport } from "./BoshTransport";
import type { DispatchResult } from "./http/HttpDispatcher";
import type { StreamItem } from "./xmpp/StreamElements";

export type StopResult = "ok" | "already_stopped";

export interface Reply<T> {
    resolve: (value: T) => void,
    reject: (err: Error) => void,
}

/**
 * Everything a session reacts to: commands from its transport handle, calls
 * that expect an answer, and completions of its own HTTP requests.
 */
export type SessionMessage =
    | { type: "send", item: StreamItem }
    | { type: "sendRaw", body: Element }
    | { type: "resetParser" }
    | { type: "stop", reply: Reply<StopResult> }
    | { type: "getSid", reply: Reply<string | undefined> }
    | { type: "getRid", reply: Reply<bigint> }
    | { type: "getTransport", reply: Reply<BoshTransport> }
    | { type: "streamEnded" }
    | { type: "httpCompleted", result: DispatchResult };

/**
 * The only way into a running session.
 */
export interface SessionControl {
    readonly alive: boolean;
    post(message: SessionMessage): void;
}
