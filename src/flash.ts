/**
 * One-shot messages carried across a redirect in a signed cookie.
 */
import { createHmac, timingSafeEqual } from "node:crypto";
import type { Request, Response } from "express";

export type FlashCategory = "success" | "error";

export interface FlashMessage {
    category: FlashCategory;
    message: string;
}

const FLASH_COOKIE = "radio_admin_flash";

function sign(encoded: string, secret: string): string {
    return createHmac("sha256", secret).update(encoded).digest("base64url");
}

export function encodeFlashes(messages: FlashMessage[], secret: string): string {
    const encoded = Buffer.from(JSON.stringify(messages)).toString("base64url");
    return `${encoded}.${sign(encoded, secret)}`;
}

/** Returns the messages of a cookie value, or [] when it is malformed or not signed by `secret`. */
export function decodeFlashes(token: string, secret: string): FlashMessage[] {
    const [encoded, sig] = token.split(".");
    if (!encoded || !sig) return [];

    const expected = Buffer.from(sign(encoded, secret));
    const actual = Buffer.from(sig);
    if (expected.length !== actual.length || !timingSafeEqual(expected, actual)) return [];

    let payload: unknown;
    try {
        payload = JSON.parse(Buffer.from(encoded, "base64url").toString("utf-8"));
    } catch {
        return [];
    }
    if (!Array.isArray(payload)) return [];
    const items: unknown[] = payload;

    const messages: FlashMessage[] = [];
    for (const item of items) {
        if (typeof item !== "object" || item === null) continue;
        if (!("category" in item) || !("message" in item)) continue;
        const { category, message } = item;
        if ((category === "success" || category === "error") && typeof message === "string") {
            messages.push({ category, message });
        }
    }
    return messages;
}

export function parseCookies(header: string): Record<string, string> {
    const cookies: Record<string, string> = {};
    header.split(";").forEach((part) => {
        const [key, ...rest] = part.trim().split("=");
        if (key) cookies[key] = rest.join("=");
    });
    return cookies;
}

/**
 * Flash store bound to the signing secret. Messages pushed during a request
 * accumulate and are shown by the next page that takes them.
 */
export class Flash {
    private readonly pending = new WeakMap<Response, FlashMessage[]>();

    constructor(private readonly secret: string) {}

    push(req: Request, res: Response, category: FlashCategory, message: string): void {
        const queue = this.pending.get(res) ?? this.read(req);
        queue.push({ category, message });
        this.pending.set(res, queue);
        res.cookie(FLASH_COOKIE, encodeFlashes(queue, this.secret), {
            httpOnly: true,
            sameSite: "lax",
            path: "/",
        });
    }

    /** Read and clear the messages waiting for this request. */
    take(req: Request, res: Response): FlashMessage[] {
        const messages = this.read(req);
        if (req.headers.cookie?.includes(`${FLASH_COOKIE}=`)) {
            res.clearCookie(FLASH_COOKIE, { path: "/" });
        }
        return messages;
    }

    private read(req: Request): FlashMessage[] {
        const token = parseCookies(req.headers.cookie || "")[FLASH_COOKIE];
        return token ? decodeFlashes(token, this.secret) : [];
    }
}
