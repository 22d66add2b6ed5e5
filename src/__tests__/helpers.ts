import { Element } from "@xmpp/xml";
import { HttpClient, HttpReply, HttpRequest } from "../http/HttpClient";
import { BodyParser } from "../xmpp/BodyParser";

interface PendingRequest {
    request: HttpRequest,
    resolve: (reply: HttpReply) => void,
    reject: (err: Error) => void,
}

/**
 * In-process stand-in for the HTTP layer. Requests stay open until the test
 * answers them.
 */
export class FakeHttpClient implements HttpClient {
    public readonly requests: PendingRequest[] = [];

    post(request: HttpRequest): Promise<HttpReply> {
        return new Promise((resolve, reject) => {
            this.requests.push({ request, resolve, reject });
        });
    }

    body(index: number): Element {
        return new BodyParser().parse(this.request(index).body);
    }

    request(index: number): HttpRequest {
        const pending = this.requests[index];
        if (!pending) {
            throw new Error(`No request #${index}, only ${this.requests.length} sent`);
        }
        return pending.request;
    }

    reply(index: number, body: string, status = 200): void {
        const pending = this.requests[index];
        if (!pending) {
            throw new Error(`No request #${index}, only ${this.requests.length} sent`);
        }
        pending.resolve({ status, headers: { "content-type": "text/xml" }, body });
    }

    fail(index: number, err: Error): void {
        const pending = this.requests[index];
        if (!pending) {
            throw new Error(`No request #${index}, only ${this.requests.length} sent`);
        }
        pending.reject(err);
    }
}

/**
 * Let pending promise callbacks and mailbox drains run.
 */
export async function settle(rounds = 10): Promise<void> {
    for (let i = 0; i < rounds; i++) {
        await new Promise<void>((resolve) => setImmediate(resolve));
    }
}
