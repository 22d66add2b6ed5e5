import xml, { Element } from "@xmpp/xml";

export const NS_CLIENT = "jabber:client";
export const NS_STREAM = "http://etherx.jabber.org/streams";

export interface StreamStartAttrs {
    to?: string,
    from?: string,
    version?: string,
    "xml:lang"?: string,
    xmlns?: string,
    "xmlns:stream"?: string,
    [name: string]: string | undefined,
}

/**
 * The opening `<stream:stream>` tag. Sent to open or restart a stream, and
 * synthesized from a reply that carries `xmpp:version`.
 */
export class StreamStart {
    public readonly kind = "streamStart";
    constructor(public readonly attrs: StreamStartAttrs = {}) {}

    public get xml(): string {
        const attrs: Record<string, string> = {};
        for (const [name, value] of Object.entries(this.attrs)) {
            if (value !== undefined) {
                attrs[name] = value;
            }
        }
        return xml("stream:stream", attrs).toString().replace(/\/>$/, ">");
    }
}

export class StreamEnd {
    public readonly kind = "streamEnd";

    public get xml(): string {
        return "</stream:stream>";
    }
}

export type StreamItem = StreamStart | StreamEnd | Element;

export function isStanza(item: StreamItem): item is Element {
    return item instanceof Element;
}

export function presence(type?: string): Element {
    return xml("presence", type ? { type } : {});
}
