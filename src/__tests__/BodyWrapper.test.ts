import { describe, it, expect } from "vitest";
import xml, { Element } from "@xmpp/xml";
import { BodyParseError } from "../errors";
import { detectBodyType, stringAttr, unwrapBody, wrapItem } from "../xmpp/BodyWrapper";
import { NS_HTTP_BIND } from "../xmpp/BoshSessionData";
import { NS_STREAM, StreamEnd, StreamStart } from "../xmpp/StreamElements";

describe('wrapItem', () => {
    it('should apply defaults to a bare stream start', () => {
        const body = wrapItem(new StreamStart(), { rid: 100n });

        expect(body.attrs).toEqual({
            rid: "100",
            xmlns: NS_HTTP_BIND,
            content: "text/xml; charset=utf-8",
            "xmlns:xmpp": "urn:xmpp:xbosh",
            "xmpp:version": "1.0",
            hold: "1",
            wait: "60",
            "xml:lang": "en",
            to: "localhost",
        });
        expect(body.children).toHaveLength(0);
    });

    it('should carry the stream attributes over', () => {
        const body = wrapItem(
            new StreamStart({ to: "example.com", version: "1.1", "xml:lang": "de" }),
            { rid: 7n },
        );

        expect(body.attrs).toMatchObject({ to: "example.com", "xmpp:version": "1.1", "xml:lang": "de" });
    });

    it('should restart the stream once a sid is bound', () => {
        const body = wrapItem(new StreamStart({ to: "example.com" }), { rid: 8n, sid: "s1" });

        expect(Object.keys(body.attrs)).toEqual([
            "rid", "xmlns", "sid", "content", "xmlns:xmpp", "xmpp:version",
            "hold", "wait", "xml:lang", "to", "xmpp:restart",
        ]);
        expect(body.attrs["xmpp:restart"]).toBe("true");
    });

    it('should turn a stream end into a terminate body with a farewell presence', () => {
        const body = wrapItem(new StreamEnd(), { rid: 9n, sid: "s1" });

        expect(body.attrs).toEqual({ rid: "9", xmlns: NS_HTTP_BIND, sid: "s1", type: "terminate" });
        expect(body.children).toHaveLength(1);
        expect(body.getChild("presence")?.attrs).toEqual({ type: "unavailable" });
    });

    it('should put a stanza in as the only child', () => {
        const message = xml("message", { to: "juliet@example.com" }, xml("body", {}, "hi"));
        const body = wrapItem(message, { rid: 10n, sid: "s1" });

        expect(body.attrs).toEqual({ rid: "10", xmlns: NS_HTTP_BIND, sid: "s1" });
        expect(body.children).toEqual([message]);
    });

    it('should not send an empty sid before one is bound', () => {
        const body = wrapItem(xml("iq", { type: "get" }), { rid: 11n });

        expect("sid" in body.attrs).toBe(false);
    });
});

describe('detectBodyType', () => {
    it('should prefer terminate over a version', () => {
        const body = xml("body", { type: "terminate", "xmpp:version": "1.0" });

        expect(detectBodyType(body)).toEqual({ type: "streamEnd" });
    });

    it('should read the version of a stream start', () => {
        expect(detectBodyType(xml("body", { "xmpp:version": "1.0" }))).toEqual({ type: "streamStart", version: "1.0" });
    });

    it('should classify anything else as normal', () => {
        expect(detectBodyType(xml("body", { sid: "s1" }))).toEqual({ type: "normal" });
    });
});

describe('unwrapBody', () => {
    it('should synthesize a stream start before the children', () => {
        const features = xml("stream:features", {});
        const items = unwrapBody(xml("body", { "xmpp:version": "1.0", from: "example.com" }, features));

        expect(items).toHaveLength(2);
        expect(items[0]).toBeInstanceOf(StreamStart);
        expect(items[0] instanceof StreamStart && items[0].attrs).toEqual({
            from: "example.com",
            version: "1.0",
            "xml:lang": "en",
            xmlns: "jabber:client",
            "xmlns:stream": NS_STREAM,
        });
        expect(items[1]).toBe(features);
    });

    it('should leave from out when the body has none', () => {
        const [start] = unwrapBody(xml("body", { "xmpp:version": "1.0" }));

        expect(start instanceof StreamStart && "from" in start.attrs).toBe(false);
    });

    it('should synthesize a stream end for a terminate body', () => {
        const items = unwrapBody(xml("body", { type: "terminate" }));

        expect(items).toHaveLength(1);
        expect(items[0]).toBeInstanceOf(StreamEnd);
    });

    it('should skip text between elements', () => {
        const message = xml("message", {});
        const iq = xml("iq", {});
        const items = unwrapBody(xml("body", {}, "\n  ", message, "\n", iq));

        expect(items).toEqual([message, iq]);
    });

    it('should refuse anything but a body', () => {
        expect(() => unwrapBody(xml("html", {}))).toThrow(BodyParseError);
    });

    it('should recover the stream defaults through a wrap and a reply', () => {
        const request = wrapItem(new StreamStart(), { rid: 1n });
        const reply = xml("body", {
            sid: "s1",
            "xmpp:version": stringAttr(request, "xmpp:version"),
            from: stringAttr(request, "to"),
        });

        const [start] = unwrapBody(reply);

        expect(start instanceof StreamStart && start.attrs).toMatchObject({
            from: "localhost",
            version: "1.0",
            "xml:lang": "en",
        });
    });
});

describe('stringAttr', () => {
    it('should only return string values', () => {
        const element = new Element("body", { rid: "5" });
        element.attrs.count = 3;

        expect(stringAttr(element, "rid")).toBe("5");
        expect(stringAttr(element, "count")).toBeUndefined();
        expect(stringAttr(element, "missing")).toBeUndefined();
    });
});
