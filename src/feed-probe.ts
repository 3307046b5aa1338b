import { XMLParser, XMLValidator } from "fast-xml-parser";
import { TextDecoder } from "node:util";
import type { FeedProbeResult } from "./types.js";

export const FEED_PROBE_USER_AGENT = "radio-config-admin/0.1 (+feed probe)";
export const FEED_PROBE_TIMEOUT_MS = 10_000;

const parser = new XMLParser({
    ignoreAttributes: true,
    ignoreDeclaration: true,
    ignorePiTags: true,
    parseTagValue: false,
    textNodeName: "#text",
});

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function failure(message: string): FeedProbeResult {
    return { success: false, message };
}

/**
 * Fetch a podcast feed once and pull the channel-level author and lastBuildDate
 * out of it. Never throws: every failure comes back as `{ success: false }`.
 */
export async function probeFeed(feedUrl: string): Promise<FeedProbeResult> {
    const url = feedUrl.trim();
    if (!url) {
        return failure("Feed URL is required.");
    }

    let parsedUrl: URL;
    try {
        parsedUrl = new URL(url);
    } catch {
        return failure(`Failed to fetch feed: '${url}' is not a valid URL.`);
    }
    if (parsedUrl.protocol !== "http:" && parsedUrl.protocol !== "https:") {
        return failure(`Failed to fetch feed: unsupported URL scheme '${parsedUrl.protocol}'.`);
    }

    let body: string;
    try {
        const response = await fetch(parsedUrl, {
            headers: {
                "User-Agent": FEED_PROBE_USER_AGENT,
                Accept: "application/rss+xml, application/xml;q=0.9, text/xml;q=0.8, */*;q=0.5",
            },
            signal: AbortSignal.timeout(FEED_PROBE_TIMEOUT_MS),
        });

        if (!response.ok) {
            console.warn(`[feed-probe] ${url} answered HTTP ${response.status}`);
            return failure(`Failed to fetch feed: HTTP ${response.status} ${response.statusText}`.trim());
        }
        body = decodeFeedBody(new Uint8Array(await response.arrayBuffer()), response.headers.get("content-type"));
    } catch (err) {
        const reason = describeFetchError(err);
        console.warn(`[feed-probe] Fetching ${url} failed: ${reason}`);
        return failure(`Failed to fetch feed: ${reason}`);
    }

    return extractFeedMetadata(body);
}

const CHARSET_PARAM = /;\s*charset\s*=\s*"?([^";\s]+)"?/i;
const XML_DECLARED_ENCODING = /^<\?xml[^>]*?\sencoding\s*=\s*["']([^"']+)["']/;

/**
 * Decode a feed the way an XML parser would: a byte-order mark wins, then the
 * Content-Type charset, then the encoding in the XML declaration, then UTF-8.
 */
export function decodeFeedBody(bytes: Uint8Array, contentType: string | null): string {
    if (bytes[0] === 0xfe && bytes[1] === 0xff) return decodeAs(bytes, "utf-16be");
    if (bytes[0] === 0xff && bytes[1] === 0xfe) return decodeAs(bytes, "utf-16le");
    if (bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf) return decodeAs(bytes, "utf-8");

    const fromHeader = contentType ? CHARSET_PARAM.exec(contentType)?.[1] : undefined;
    // The declaration itself is ASCII, so a single-byte read of the head is enough to find it
    const head = new TextDecoder("latin1").decode(bytes.subarray(0, 200));
    const fromDeclaration = XML_DECLARED_ENCODING.exec(head)?.[1];

    return decodeAs(bytes, fromHeader ?? fromDeclaration ?? "utf-8");
}

function decodeAs(bytes: Uint8Array, label: string): string {
    let decoder: TextDecoder;
    try {
        decoder = new TextDecoder(label);
    } catch {
        console.warn(`[feed-probe] Unknown charset '${label}', decoding as UTF-8`);
        decoder = new TextDecoder("utf-8");
    }
    return decoder.decode(bytes);
}

/**
 * Parse a feed body and read the channel metadata. Exported separately so the
 * XML handling can be exercised without a network round-trip.
 */
export function extractFeedMetadata(xml: string): FeedProbeResult {
    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
        const { msg, line, col } = validation.err;
        return failure(`Failed to parse feed XML: ${msg} (line ${line}, column ${col})`);
    }

    let doc: unknown;
    try {
        doc = parser.parse(xml);
    } catch (err) {
        return failure(`Failed to parse feed XML: ${err instanceof Error ? err.message : String(err)}`);
    }

    const channel = findChannel(doc);
    if (!channel) {
        return failure("RSS feed is missing a channel element.");
    }

    return {
        success: true,
        author: findAuthor(channel),
        last_build_date: textOf(channel.lastBuildDate),
    };
}

/** The document's root element: the first element-valued entry of the parsed document. */
function rootElement(doc: unknown): unknown {
    if (!isNode(doc)) return undefined;
    const [first] = Object.values(doc);
    return first;
}

/** First direct child with the given tag; `<channel/>` counts as an empty element. */
function child(node: unknown, tag: string): XmlNode | undefined {
    if (!isNode(node) || !(tag in node)) return undefined;
    const raw = node[tag];
    const value: unknown = Array.isArray(raw) ? raw[0] : raw;
    return isNode(value) ? value : {};
}

function findChannel(doc: unknown): XmlNode | undefined {
    const root = rootElement(doc);
    return child(root, "channel") ?? child(child(root, "rss"), "channel");
}

/** First child whose local name is `author`, any namespace prefix and any case (itunes:author, Author). */
function findAuthor(channel: XmlNode): string {
    for (const tag of Object.keys(channel)) {
        const localName = tag.slice(tag.indexOf(":") + 1);
        if (localName.toLowerCase() === "author") {
            return textOf(channel[tag]);
        }
    }
    return "";
}

function textOf(value: unknown): string {
    if (Array.isArray(value)) {
        return value.length > 0 ? textOf(value[0]) : "";
    }
    if (typeof value === "string") return value.trim();
    if (typeof value === "number" || typeof value === "boolean") return String(value);
    if (isNode(value)) return textOf(value["#text"]);
    return "";
}

function describeFetchError(err: unknown): string {
    if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) {
        return `request timed out after ${FEED_PROBE_TIMEOUT_MS / 1000} seconds`;
    }
    if (err instanceof Error) {
        const cause: unknown = err.cause;
        if (cause instanceof Error) {
            const code = "code" in cause && typeof cause.code === "string" ? cause.code : cause.message;
            return `${err.message} (${code})`;
        }
        return err.message;
    }
    return String(err);
}
