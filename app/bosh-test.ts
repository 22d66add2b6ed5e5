import { EventEmitter } from "events";
import { BoshTransport, FancyLogger, StreamEnd, StreamItem, StreamStart, connect, isStanza } from "../src";

// usage: bosh-test [host] [domain] [port] [path]
const [host = "localhost", domain = host, port = "5280", path = "/http-bind"] = process.argv.slice(2);
const RUN_FOR_MS = 10000;

const log = new FancyLogger("bosh-test");

async function main() {
    const owner = new EventEmitter();
    owner.on("stanza", (_transport: BoshTransport, item: StreamItem) => {
        if (item instanceof StreamStart) {
            log.info("Stream opened by", item.attrs.from);
        } else if (item instanceof StreamEnd) {
            log.info("Server closed the stream");
        } else if (isStanza(item)) {
            log.info("Received", item.toString());
        }
    });
    owner.once("sessionFailed", (_transport: BoshTransport, err: Error) => {
        log.error("Session failed:", err.message);
        process.exitCode = 1;
    });
    const transport = connect({
        host,
        port: Number(port),
        path,
        owner,
        logger: (s) => new FancyLogger(s),
    });
    transport.send(new StreamStart({ to: domain }));
    await new Promise((resolve) => setTimeout(resolve, RUN_FOR_MS));
    log.info("Stopping:", await transport.stop());
}

main().catch((ex) => {
    console.error("Failed:", ex);
    process.exit(1);
});
