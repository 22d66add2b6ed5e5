import { Element } from "@xmpp/xml";
import { BoshEndpoint } from "../config";
import { TransportError, describeError } from "../errors";
import { ILogger, LoggerFunc, loggerFor } from "../Logger";
import { BOSH_CONTENT_TYPE } from "../xmpp/BoshSessionData";
import { HttpClient, HttpReply, HttpRequest } from "./HttpClient";

export type DispatchResult =
    | { ok: true, reply: HttpReply }
    | { ok: false, error: TransportError };

export type DispatchCallback = (result: DispatchResult) => void;

function isSuccess(status: number) {
    return status >= 200 && status < 300;
}

/**
 * Issues one POST per body without waiting for it. The outcome, success or
 * failure, always comes back through the callback.
 */
export class HttpDispatcher {
    private readonly logger: ILogger;

    constructor(
        private readonly endpoint: BoshEndpoint,
        private readonly client: HttpClient,
        private readonly timeout: number,
        logger?: LoggerFunc,
    ) {
        this.logger = loggerFor("HttpDispatcher", logger);
    }

    public dispatch(body: Element, onComplete: DispatchCallback): void {
        const request: HttpRequest = {
            host: this.endpoint.host,
            port: this.endpoint.port,
            secure: this.endpoint.secure,
            path: this.endpoint.path,
            method: "POST",
            headers: { "Content-Type": BOSH_CONTENT_TYPE },
            body: body.toString(),
            timeout: this.timeout,
        };
        this.logger.debug("TX:", request.body);
        let pending: Promise<HttpReply>;
        try {
            pending = this.client.post(request);
        } catch (ex) {
            pending = Promise.reject(ex);
        }
        pending.then(
            (reply): DispatchResult => {
                this.logger.debug(`RX (${reply.status}):`, reply.body);
                if (!isSuccess(reply.status)) {
                    return {
                        ok: false,
                        error: new TransportError(`BOSH endpoint answered with HTTP ${reply.status}`, { status: reply.status }),
                    };
                }
                return { ok: true, reply };
            },
            (err: unknown): DispatchResult => ({
                ok: false,
                error: new TransportError(`HTTP request failed: ${describeError(err)}`, { cause: err }),
            }),
        ).then(onComplete).catch((ex: unknown) => {
            this.logger.error("Failed to hand back HTTP completion:", ex);
        });
    }
}
