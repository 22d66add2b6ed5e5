import xml, { Element } from "@xmpp/xml";
import { presence } from "./StreamElements";

export const NS_HTTP_BIND = "http://jabber.org/protocol/httpbind";
export const NS_BOSH = "urn:xmpp:xbosh";
export const BOSH_CONTENT_TYPE = "text/xml; charset=utf-8";

export type BodyAttrs = Record<string, string>;

export interface BoshSessionData {
    toElement(): Element;
    toXML(): string;
}

export function packRid(rid: bigint): string {
    return rid.toString(10);
}

abstract class BoshBody implements BoshSessionData {
    constructor(protected readonly rid: bigint, protected readonly sid?: string) {}

    protected abstract extraAttrs(): BodyAttrs;

    protected children(): Element[] {
        return [];
    }

    toElement(): Element {
        // sid is left out entirely until the server has assigned one
        const attrs: BodyAttrs = {
            rid: packRid(this.rid),
            xmlns: NS_HTTP_BIND,
            ...(this.sid !== undefined ? { sid: this.sid } : {}),
            ...this.extraAttrs(),
        };
        return xml("body", attrs, ...this.children());
    }

    toXML(): string {
        return this.toElement().toString();
    }
}

export interface SessionCreationOpts {
    version?: string,
    lang?: string,
    sid?: string,
}

export class BoshSessionCreationRequest extends BoshBody {
    private readonly version: string;
    private readonly lang: string;

    constructor(rid: bigint, private readonly to: string, opts: SessionCreationOpts = {}) {
        super(rid, opts.sid);
        this.version = opts.version ?? "1.0";
        this.lang = opts.lang ?? "en";
    }

    protected extraAttrs(): BodyAttrs {
        return {
            content: BOSH_CONTENT_TYPE,
            "xmlns:xmpp": NS_BOSH,
            "xmpp:version": this.version,
            hold: "1",
            wait: "60",
            "xml:lang": this.lang,
            to: this.to,
            // A bound sid means this is a stream restart, not a new session.
            ...(this.sid !== undefined ? { "xmpp:restart": "true" } : {}),
        };
    }
}

export class BoshSessionTerminationRequest extends BoshBody {
    protected extraAttrs(): BodyAttrs {
        return { type: "terminate" };
    }

    protected children(): Element[] {
        return [presence("unavailable")];
    }
}

export class BoshEmptyRequest extends BoshBody {
    constructor(rid: bigint, sid?: string, private readonly attrs: BodyAttrs = {}) {
        super(rid, sid);
    }

    protected extraAttrs(): BodyAttrs {
        return this.attrs;
    }
}

export class BoshStanzaRequest extends BoshBody {
    constructor(rid: bigint, sid: string | undefined, private readonly stanza: Element) {
        super(rid, sid);
    }

    protected extraAttrs(): BodyAttrs {
        return {};
    }

    protected children(): Element[] {
        return [this.stanza];
    }
}
