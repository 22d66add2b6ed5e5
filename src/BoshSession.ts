import { EventEmitter } from "events";
import { Element } from "@xmpp/xml";
import { BoshTransport } from "./BoshTransport";
import { BoshConnectOptions, resolveEndpoint, resolveTimeout, seedRid } from "./config";
import { BodyParseError, BoshError, SessionStoppedError, StartupError, describeError } from "./errors";
import { AxiosHttpClient } from "./http/AxiosHttpClient";
import { DispatchResult, HttpDispatcher } from "./http/HttpDispatcher";
import { ILogger, loggerFor } from "./Logger";
import type { SessionControl, SessionMessage } from "./SessionMessages";
import { BodyParser } from "./xmpp/BodyParser";
import { BoshEmptyRequest } from "./xmpp/BoshSessionData";
import { WrapContext, stringAttr, unwrapBody, wrapItem } from "./xmpp/BodyWrapper";
import { StreamEnd, StreamItem } from "./xmpp/StreamElements";

export type SessionState = "connecting" | "active" | "stopping" | "stopped";

function allocateParser(): BodyParser {
    try {
        return new BodyParser();
    } catch (ex) {
        throw new StartupError(`Failed to allocate XML parser: ${describeError(ex)}`, ex);
    }
}

/**
 * One BOSH session. All state lives here and is only touched while the
 * mailbox is being drained, one message at a time.
 *
 * Owner notifications:
 *  - `"stanza"` `(transport, item)` for every item unwrapped from a reply, in order.
 *  - `"sessionFailed"` `(transport, error)` when a request or a reply kills the session.
 */
export class BoshSession implements SessionControl {
    public readonly owner: EventEmitter;
    public readonly transport: BoshTransport;
    private state: SessionState = "connecting";
    private readonly mailbox: SessionMessage[] = [];
    private scheduled = false;
    private parser: BodyParser;
    private sid?: string;
    private rid: bigint;
    private pendingRequests = 0;
    private readonly dispatcher: HttpDispatcher;
    private readonly logger: ILogger;

    constructor(opts: BoshConnectOptions = {}) {
        this.logger = loggerFor("BoshSession", opts.logger);
        const endpoint = resolveEndpoint(opts);
        this.owner = opts.owner ?? new EventEmitter();
        this.parser = allocateParser();
        this.rid = opts.initialRid ?? seedRid();
        this.dispatcher = new HttpDispatcher(
            endpoint,
            opts.httpClient ?? new AxiosHttpClient(),
            resolveTimeout(opts),
            opts.logger,
        );
        this.transport = new BoshTransport(endpoint, this);
        this.state = "active";
        this.logger.info(`Session started for ${endpoint.host}:${endpoint.port}${endpoint.path}, rid ${this.rid}`);
    }

    public get alive(): boolean {
        return this.state !== "stopped";
    }

    public get currentState(): SessionState {
        return this.state;
    }

    public get pending(): number {
        return this.pendingRequests;
    }

    public post(message: SessionMessage): void {
        this.mailbox.push(message);
        if (!this.scheduled) {
            this.scheduled = true;
            setImmediate(() => this.drain());
        }
    }

    private drain(): void {
        this.scheduled = false;
        let message = this.mailbox.shift();
        while (message !== undefined) {
            this.handle(message);
            message = this.mailbox.shift();
        }
    }

    private handle(message: SessionMessage): void {
        switch (message.type) {
            case "send":
                if (this.accepting(message.type)) {
                    const { item } = message;
                    this.dispatch((ctx) => wrapItem(item, ctx));
                }
                return;
            case "sendRaw":
                if (this.accepting(message.type)) {
                    const { body } = message;
                    this.dispatch(() => body);
                }
                return;
            case "resetParser":
                if (this.state !== "stopped") {
                    this.parser.reset();
                    this.logger.debug("Parser reset");
                }
                return;
            case "stop":
                message.reply.resolve(this.stop());
                return;
            case "streamEnded":
                if (this.state === "stopping") {
                    this.terminate("stream closed by server");
                }
                return;
            case "getSid":
                if (this.state === "stopped") {
                    message.reply.reject(new SessionStoppedError());
                } else {
                    message.reply.resolve(this.sid);
                }
                return;
            case "getRid":
                if (this.state === "stopped") {
                    message.reply.reject(new SessionStoppedError());
                } else {
                    message.reply.resolve(this.rid);
                }
                return;
            case "getTransport":
                if (this.state === "stopped") {
                    message.reply.reject(new SessionStoppedError());
                } else {
                    message.reply.resolve(this.transport);
                }
                return;
            case "httpCompleted":
                this.onHttpCompleted(message.result);
                return;
            default: {
                const unhandled: never = message;
                this.logger.warn("Unhandled session message", unhandled);
            }
        }
    }

    private accepting(what: string): boolean {
        if (this.state === "active") {
            return true;
        }
        this.logger.debug(`Dropping ${what} on ${this.state} session`);
        return false;
    }

    private stop(): "ok" | "already_stopped" {
        if (this.state === "stopped") {
            return "already_stopped";
        }
        if (this.state === "active") {
            this.state = "stopping";
            this.dispatch((ctx) => wrapItem(new StreamEnd(), ctx));
        }
        this.terminate("stopped by owner");
        return "ok";
    }

    /**
     * Build the next body and post it. The rid written into the body is the
     * one consumed here.
     */
    private dispatch(build: (ctx: WrapContext) => Element): void {
        const body = build({ rid: this.rid, sid: this.sid });
        this.rid += 1n;
        this.pendingRequests += 1;
        this.dispatcher.dispatch(body, (result) => this.post({ type: "httpCompleted", result }));
    }

    private onHttpCompleted(result: DispatchResult): void {
        if (this.state === "stopped") {
            this.logger.debug("Discarding HTTP completion for stopped session");
            return;
        }
        this.pendingRequests -= 1;
        if (!result.ok) {
            this.fail(result.error);
            return;
        }
        try {
            this.handleBody(this.parser.parse(result.reply.body));
        } catch (ex) {
            this.fail(ex instanceof BoshError ? ex : new BodyParseError(describeError(ex), ex));
            return;
        }
        // Keep a request parked at the server so it has something to push on.
        if (this.state === "active" && this.pendingRequests === 0) {
            this.dispatch(({ rid, sid }) => new BoshEmptyRequest(rid, sid).toElement());
        }
    }

    private handleBody(body: Element): void {
        if (this.sid === undefined) {
            const sid = stringAttr(body, "sid");
            if (sid !== undefined) {
                this.sid = sid;
                this.logger.info("Bound session id", sid);
            }
        }
        const items = unwrapBody(body);
        for (const item of items) {
            this.deliver(item);
        }
        if (items.some((item) => item instanceof StreamEnd)) {
            this.state = "stopping";
            this.post({ type: "streamEnded" });
        }
    }

    private deliver(item: StreamItem): void {
        this.notify("stanza", item);
    }

    private fail(error: BoshError): void {
        this.logger.error(`Session failed: ${error.message}`);
        this.terminate("failed");
        this.notify("sessionFailed", error);
    }

    private notify(event: "stanza" | "sessionFailed", payload: StreamItem | BoshError): void {
        try {
            this.owner.emit(event, this.transport, payload);
        } catch (ex) {
            this.logger.error(`Owner failed to handle ${event}:`, ex);
        }
    }

    private terminate(reason: string): void {
        this.state = "stopped";
        this.parser.free();
        this.logger.info(`Session stopped (${reason}), ${this.pendingRequests} request(s) abandoned`);
    }
}

/**
 * Start a BOSH session and return its handle. Nothing is sent until the
 * owner sends a stream start.
 */
export function connect(opts: BoshConnectOptions = {}): BoshTransport {
    return new BoshSession(opts).transport;
}
