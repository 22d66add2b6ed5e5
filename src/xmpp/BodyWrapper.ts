import { Element } from "@xmpp/xml";
import { BodyParseError } from "../errors";
import {
    BoshSessionCreationRequest,
    BoshSessionTerminationRequest,
    BoshStanzaRequest,
} from "./BoshSessionData";
import { NS_CLIENT, NS_STREAM, StreamEnd, StreamItem, StreamStart, StreamStartAttrs } from "./StreamElements";

export interface WrapContext {
    rid: bigint,
    sid?: string,
}

export type BodyType =
    | { type: "streamStart", version: string }
    | { type: "streamEnd" }
    | { type: "normal" };

export function stringAttr(element: Element, name: string): string | undefined {
    const value: unknown = element.attrs[name];
    return typeof value === "string" ? value : undefined;
}

/**
 * Put a single stream item into the `<body/>` that carries it.
 */
export function wrapItem(item: StreamItem, { rid, sid }: WrapContext): Element {
    if (item instanceof StreamStart) {
        return new BoshSessionCreationRequest(rid, item.attrs.to ?? "localhost", {
            version: item.attrs.version,
            lang: item.attrs["xml:lang"],
            sid,
        }).toElement();
    }
    if (item instanceof StreamEnd) {
        return new BoshSessionTerminationRequest(rid, sid).toElement();
    }
    return new BoshStanzaRequest(rid, sid, item).toElement();
}

export function detectBodyType(body: Element): BodyType {
    if (stringAttr(body, "type") === "terminate") {
        return { type: "streamEnd" };
    }
    const version = stringAttr(body, "xmpp:version");
    if (version !== undefined) {
        return { type: "streamStart", version };
    }
    return { type: "normal" };
}

/**
 * Turn a reply `<body/>` into the stream items it stands for: a synthesized
 * stream start or end (if any) followed by the body's child elements.
 */
export function unwrapBody(body: Element): StreamItem[] {
    if (body.name !== "body") {
        throw new BodyParseError(`Expected a <body/> reply, got <${body.name}/>`);
    }
    const items: StreamItem[] = [];
    const bodyType = detectBodyType(body);
    if (bodyType.type === "streamStart") {
        const from = stringAttr(body, "from");
        const attrs: StreamStartAttrs = {
            ...(from !== undefined ? { from } : {}),
            version: bodyType.version,
            "xml:lang": "en",
            xmlns: NS_CLIENT,
            "xmlns:stream": NS_STREAM,
        };
        items.push(new StreamStart(attrs));
    } else if (bodyType.type === "streamEnd") {
        items.push(new StreamEnd());
    }
    for (const child of body.children) {
        if (child instanceof Element) {
            items.push(child);
        }
    }
    return items;
}
