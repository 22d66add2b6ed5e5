import { Element, Parser } from "@xmpp/xml";
import { BodyParseError, describeError } from "../errors";

/**
 * Owned XML parser for reply bodies. Each HTTP reply is one complete
 * document; the underlying stream parser is replaced after every document.
 */
export class BodyParser {
    private parser: Parser | null;
    private root: Element | null = null;
    private complete = false;
    private failure: Error | null = null;

    constructor() {
        this.parser = this.createParser();
    }

    public get freed(): boolean {
        return this.parser === null;
    }

    public parse(data: string): Element {
        const parser = this.parser;
        if (!parser) {
            throw new BodyParseError("Parser has been freed");
        }
        try {
            // Whitespace ahead of the root is legal XML but not a stream child.
            parser.write(data.replace(/^\s+/, ""));
        } catch (ex) {
            this.reset();
            throw new BodyParseError(`Malformed body: ${describeError(ex)}`, ex);
        }
        const { root, complete, failure } = this;
        this.reset();
        if (failure) {
            throw new BodyParseError(`Malformed body: ${failure.message || failure.name}`, failure);
        }
        if (!root || !complete) {
            throw new BodyParseError("Incomplete body");
        }
        return root;
    }

    public reset(): void {
        this.free();
        this.parser = this.createParser();
    }

    public free(): void {
        this.parser?.removeAllListeners();
        this.parser = null;
        this.root = null;
        this.complete = false;
        this.failure = null;
    }

    private createParser(): Parser {
        const parser = new Parser();
        parser.on("start", (element: Element) => {
            this.root = element;
        });
        // Top level children are handed out instead of being attached.
        parser.on("element", (element: Element) => {
            if (this.complete) {
                this.failure = this.failure ?? new Error(`<${element.name}/> after the end of the body`);
                return;
            }
            this.root?.append(element);
        });
        parser.on("end", () => {
            this.complete = true;
        });
        parser.on("error", (err: Error) => {
            this.failure = this.failure ?? err;
        });
        return parser;
    }
}
