import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { once } from "node:events";
import type { Server } from "node:http";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { createServer } from "../src/server.js";
import { storePaths } from "../src/config.js";
import { ConfigStore } from "../src/store.js";
import { addLog, clearLogs } from "../src/logs.js";
import { decodeFlashes, encodeFlashes, type FlashMessage } from "../src/flash.js";
import type { AppConfig, DocumentId } from "../src/types.js";

const SECRET = "test-secret";
const FLASH_COOKIE = "radio_admin_flash";

// Requests to the app under test go through the real fetch; the feed probe sees a stub
const realFetch = globalThis.fetch;

function flashesOf(res: Response): FlashMessage[] {
    // Each push re-sets the cookie; the last one carries every message
    const cookie = res.headers
        .getSetCookie()
        .filter((c) => c.startsWith(`${FLASH_COOKIE}=`))
        .pop();
    if (!cookie) return [];
    const token = cookie.split(";")[0].slice(FLASH_COOKIE.length + 1);
    return decodeFlashes(token, SECRET);
}

describe("admin server", () => {
    let tempDir: string;
    let store: ConfigStore;
    let server: Server;
    let baseUrl: string;

    beforeEach(async () => {
        tempDir = mkdtempSync(join(tmpdir(), "radio-admin-server-test-"));
        const config: AppConfig = {
            server: { port: 0, secret_key: SECRET },
            shows: { field_defaults: {} },
            data_dir: tempDir,
        };
        store = new ConfigStore(storePaths(config));

        server = createServer(config, store).listen(0, "127.0.0.1");
        await once(server, "listening");
        const address = server.address();
        if (address === null || typeof address === "string") {
            throw new Error("Server did not bind to a TCP port");
        }
        baseUrl = `http://127.0.0.1:${address.port}`;

        vi.spyOn(console, "log").mockImplementation(() => {});
        vi.spyOn(console, "warn").mockImplementation(() => {});
        vi.spyOn(console, "error").mockImplementation(() => {});
    });

    afterEach(async () => {
        server.closeAllConnections();
        await new Promise<void>((resolve) => server.close(() => resolve()));
        rmSync(tempDir, { recursive: true, force: true });
        vi.unstubAllGlobals();
        vi.restoreAllMocks();
    });

    function seed(documentId: DocumentId, doc: Record<string, unknown>): void {
        writeFileSync(store.pathOf(documentId), JSON.stringify(doc), "utf-8");
    }

    function get(path: string, cookie?: string): Promise<Response> {
        return realFetch(baseUrl + path, {
            redirect: "manual",
            headers: cookie ? { cookie } : {},
        });
    }

    function post(path: string, form: Record<string, string>): Promise<Response> {
        return realFetch(baseUrl + path, {
            method: "POST",
            redirect: "manual",
            body: new URLSearchParams(form),
        });
    }

    function postJson(path: string, body: string): Promise<Response> {
        return realFetch(baseUrl + path, {
            method: "POST",
            headers: { "Content-Type": "application/json" },
            body,
        });
    }

    const morningShow = {
        show_key: "morning-show",
        show: "Morning Show",
        station: "p1",
        artwork_file: "/art/morning.png",
        remote_directory: "/recordings/morning",
        frequency: "weekly",
        playlist_db_slug: "morning",
    };

    const showRecord = (station: string) => ({
        show: "Late",
        station,
        "artwork-file": "/art/late.png",
        "remote-directory": "/recordings/late",
        frequency: "daily",
        "playlist-db-slug": "late",
    });

    it("redirects the root to the show listing", async () => {
        const res = await get("/");

        expect(res.status).toBe(302);
        expect(res.headers.get("location")).toBe("/shows");
    });

    describe("shows", () => {
        it("creates a show and flashes a confirmation", async () => {
            const res = await post("/shows/new", morningShow);

            expect(res.status).toBe(302);
            expect(res.headers.get("location")).toBe("/shows");
            expect(flashesOf(res)).toEqual([{ category: "success", message: "Show 'morning-show' saved successfully." }]);
            expect(store.loadShows()).toEqual({
                "morning-show": {
                    show: "Morning Show",
                    station: "p1",
                    "artwork-file": "/art/morning.png",
                    "remote-directory": "/recordings/morning",
                    frequency: "weekly",
                    "playlist-db-slug": "morning",
                },
            });
        });

        it("sends an incomplete form back with the missing field named", async () => {
            const res = await post("/shows/new", { ...morningShow, frequency: "  " });

            expect(res.headers.get("location")).toBe("/shows/new");
            expect(flashesOf(res)).toEqual([{ category: "error", message: "Field 'frequency' is required." }]);
            expect(existsSync(store.pathOf("shows"))).toBe(false);
        });

        it("shows pending flashes once and clears the cookie", async () => {
            seed("shows", { late: showRecord("p1") });
            const cookie = `${FLASH_COOKIE}=${encodeFlashes([{ category: "success", message: "Show 'late' saved successfully." }], SECRET)}`;

            const res = await get("/shows", cookie);
            const html = await res.text();

            expect(res.status).toBe(200);
            expect(html).toContain('<div class="flash success">Show &#39;late&#39; saved successfully.</div>');
            expect(html).toContain('<a href="/shows/late/edit">late</a>');
            expect(res.headers.getSetCookie()[0]).toMatch(/^radio_admin_flash=; Path=\/; Expires=Thu, 01 Jan 1970/);
        });

        it("sends a colliding rename back to the edit form", async () => {
            seed("shows", { late: showRecord("p1"), "morning-show": showRecord("p2") });
            const before = readFileSync(store.pathOf("shows"), "utf-8");

            const res = await post("/shows/late/edit", morningShow);

            expect(res.headers.get("location")).toBe("/shows/late/edit");
            expect(flashesOf(res)).toEqual([
                { category: "error", message: "A show with key 'morning-show' already exists." },
            ]);
            expect(readFileSync(store.pathOf("shows"), "utf-8")).toBe(before);
        });

        it("redirects to the listing when editing a missing show", async () => {
            const res = await get("/shows/nope/edit");

            expect(res.headers.get("location")).toBe("/shows");
            expect(flashesOf(res)).toEqual([{ category: "error", message: "Show 'nope' was not found." }]);
        });

        it("deletes a show", async () => {
            seed("shows", { late: showRecord("p1") });

            const res = await post("/shows/late/delete", {});

            expect(flashesOf(res)).toEqual([{ category: "success", message: "Show 'late' deleted." }]);
            expect(store.load("shows")).toEqual({});
        });

        it("renders a storage error for an unreadable document", async () => {
            writeFileSync(store.pathOf("shows"), "{ broken", "utf-8");

            const res = await get("/shows");

            expect(res.status).toBe(500);
            expect(await res.text()).toContain('<div class="flash error">Storage error: Malformed JSON in ');
        });

        it("flashes a storage error when saving into an unreadable document", async () => {
            writeFileSync(store.pathOf("shows"), "{ broken", "utf-8");

            const res = await post("/shows/new", morningShow);

            expect(res.headers.get("location")).toBe("/shows");
            const [message] = flashesOf(res);
            expect(message.category).toBe("error");
            expect(message.message).toMatch(/^Storage error: Malformed JSON in /);
        });
    });

    describe("stations", () => {
        it("reports the shows that followed a rename", async () => {
            seed("stations", { old: "http://stream.example/old" });
            seed("shows", { late: showRecord("old") });

            const res = await post("/stations/old/edit", { station_id: "new", stream_url: "http://stream.example/new" });

            expect(res.headers.get("location")).toBe("/stations");
            expect(flashesOf(res)).toEqual([
                { category: "success", message: "Station 'new' saved successfully." },
                { category: "success", message: "Updated the station of 1 show(s): late." },
            ]);
            expect(store.loadShows().late.station).toBe("new");
        });

        it("refuses to delete a station in use", async () => {
            seed("stations", { p1: "http://stream.example/p1" });
            seed("shows", { late: showRecord("p1") });

            const res = await post("/stations/p1/delete", {});

            expect(res.headers.get("location")).toBe("/stations");
            expect(flashesOf(res)).toEqual([{ category: "error", message: "Station 'p1' is still used by: late." }]);
            expect(store.loadStations()).toEqual({ p1: "http://stream.example/p1" });
        });
    });

    describe("podcasts", () => {
        it("creates a podcast from a checkbox form", async () => {
            const res = await post("/podcasts/new", {
                podcast_id: "news",
                rss_feed: "http://feeds.example/news.xml",
                download_old_episodes: "on",
            });

            expect(flashesOf(res)).toEqual([{ category: "success", message: "Podcast 'news' saved successfully." }]);
            expect(store.loadPodcasts()).toEqual({
                news: { rss_feed: "http://feeds.example/news.xml", download_old_episodes: true },
            });
        });

        it("rejects a feed test without a URL", async () => {
            const fetchMock = vi.fn();
            vi.stubGlobal("fetch", fetchMock);

            const res = await postJson("/podcasts/test", JSON.stringify({ feed_url: "  " }));

            expect(res.status).toBe(400);
            expect(await res.json()).toEqual({ success: false, message: "Feed URL is required." });
            expect(fetchMock).not.toHaveBeenCalled();
        });

        it("answers a malformed JSON body with a JSON error", async () => {
            const res = await postJson("/podcasts/test", "{ nope");

            expect(res.status).toBe(400);
            expect(await res.json()).toEqual({ success: false, message: "Request body must be JSON." });
        });

        it("returns the probed metadata", async () => {
            vi.stubGlobal(
                "fetch",
                vi.fn().mockResolvedValue(
                    new Response(
                        "<rss><channel><author>Jane Doe</author><lastBuildDate>Mon, 01 Jan 2024 00:00:00 GMT</lastBuildDate></channel></rss>"
                    )
                )
            );

            const res = await postJson("/podcasts/test", JSON.stringify({ feed_url: "http://feeds.example/news.xml" }));

            expect(res.status).toBe(200);
            expect(await res.json()).toEqual({
                success: true,
                author: "Jane Doe",
                last_build_date: "Mon, 01 Jan 2024 00:00:00 GMT",
            });
        });

        it("passes probe failures through with a 502", async () => {
            vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response("gone", { status: 410, statusText: "Gone" })));

            const res = await postJson("/podcasts/test", JSON.stringify({ feed_url: "http://feeds.example/old.xml" }));

            expect(res.status).toBe(502);
            expect(await res.json()).toEqual({ success: false, message: "Failed to fetch feed: HTTP 410 Gone" });
        });
    });

    it("lists recent activity", async () => {
        clearLogs();
        addLog("info", "[catalog] Saved show 'late'");

        const html = await (await get("/logs")).text();

        expect(html).toContain("<td>catalog</td>");
        expect(html).toContain("<td>Saved show &#39;late&#39;</td>");
    });

    it("reports document counts on /health", async () => {
        seed("stations", { p1: "http://stream.example/p1", p2: "http://stream.example/p2" });

        const res = await get("/health");

        expect(await res.json()).toEqual({ status: "ok", shows: 0, stations: 2, podcasts: 0 });
    });
});
