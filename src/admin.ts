import { Router, type Request, type Response } from "express";
import type { Catalog } from "./catalog.js";
import { NotFoundError, StoreError, ValidationError } from "./errors.js";
import { probeFeed } from "./feed-probe.js";
import type { Flash } from "./flash.js";
import { getLogs } from "./logs.js";
import type { FormSubmission, ShowsConfig } from "./types.js";
import {
    renderLogsPage,
    renderPodcastForm,
    renderPodcastList,
    renderShowForm,
    renderShowList,
    renderStationForm,
    renderStationList,
} from "./views.js";

function isFormSubmission(value: unknown): value is FormSubmission {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function formBody(req: Request): FormSubmission {
    const body: unknown = req.body;
    return isFormSubmission(body) ? body : {};
}

function editPath(section: string, key: string): string {
    return `/${section}/${encodeURIComponent(key)}/edit`;
}

/**
 * Create an Express Router with the show, station and podcast pages.
 */
export function createAdminRouter(catalog: Catalog, flash: Flash, showsPolicy: ShowsConfig): Router {
    const router = Router();

    /**
     * Turn a known failure into flash + redirect. Validation problems go back to the
     * form; missing keys and storage failures go to the listing. Anything else is rethrown.
     */
    const fail = (req: Request, res: Response, err: unknown, formPath: string, listPath: string): void => {
        if (err instanceof ValidationError) {
            flash.push(req, res, "error", err.message);
            res.redirect(formPath);
        } else if (err instanceof NotFoundError) {
            flash.push(req, res, "error", err.message);
            res.redirect(listPath);
        } else if (err instanceof StoreError) {
            console.error(`[admin] ${req.method} ${req.originalUrl}: ${err.message}`);
            flash.push(req, res, "error", `Storage error: ${err.message}`);
            res.redirect(listPath);
        } else {
            throw err;
        }
    };

    /** Station choices for the show form; an unreadable stations file just means no suggestions. */
    const stationChoices = (): string[] => {
        try {
            return catalog.stationIds();
        } catch (err) {
            if (!(err instanceof StoreError)) throw err;
            console.error(`[admin] ${err.message}`);
            return [];
        }
    };

    router.get("/", (_req, res) => {
        res.redirect("/shows");
    });

    // ── Shows ──

    router.get("/shows", (req, res) => {
        const flashes = flash.take(req, res);
        try {
            res.send(renderShowList(catalog.listShows(), flashes));
        } catch (err) {
            if (!(err instanceof StoreError)) throw err;
            console.error(`[admin] ${err.message}`);
            res.status(500).send(renderShowList([], flashes, `Storage error: ${err.message}`));
        }
    });

    router.get("/shows/new", (req, res) => {
        res.send(renderShowForm({
            action: "/shows/new",
            showKey: "",
            stationIds: stationChoices(),
            policy: showsPolicy,
            flashes: flash.take(req, res),
        }));
    });

    router.post("/shows/new", (req, res) => {
        try {
            const key = catalog.saveShow(formBody(req));
            flash.push(req, res, "success", `Show '${key}' saved successfully.`);
            res.redirect("/shows");
        } catch (err) {
            fail(req, res, err, "/shows/new", "/shows");
        }
    });

    router.get("/shows/:key/edit", (req, res) => {
        const key = req.params.key;
        try {
            const show = catalog.getShow(key);
            res.send(renderShowForm({
                action: editPath("shows", key),
                showKey: key,
                show,
                stationIds: stationChoices(),
                policy: showsPolicy,
                flashes: flash.take(req, res),
            }));
        } catch (err) {
            fail(req, res, err, "/shows", "/shows");
        }
    });

    router.post("/shows/:key/edit", (req, res) => {
        const originalKey = req.params.key;
        try {
            const key = catalog.saveShow(formBody(req), originalKey);
            flash.push(req, res, "success", `Show '${key}' saved successfully.`);
            res.redirect("/shows");
        } catch (err) {
            fail(req, res, err, editPath("shows", originalKey), "/shows");
        }
    });

    router.post("/shows/:key/delete", (req, res) => {
        const key = req.params.key;
        try {
            catalog.deleteShow(key);
            flash.push(req, res, "success", `Show '${key}' deleted.`);
            res.redirect("/shows");
        } catch (err) {
            fail(req, res, err, "/shows", "/shows");
        }
    });

    // ── Stations ──

    router.get("/stations", (req, res) => {
        const flashes = flash.take(req, res);
        try {
            res.send(renderStationList(catalog.listStations(), flashes));
        } catch (err) {
            if (!(err instanceof StoreError)) throw err;
            console.error(`[admin] ${err.message}`);
            res.status(500).send(renderStationList([], flashes, `Storage error: ${err.message}`));
        }
    });

    router.get("/stations/new", (req, res) => {
        res.send(renderStationForm({
            action: "/stations/new",
            stationId: "",
            streamUrl: "",
            flashes: flash.take(req, res),
        }));
    });

    const stationSaved = (req: Request, res: Response, key: string, updatedShows: string[]): void => {
        flash.push(req, res, "success", `Station '${key}' saved successfully.`);
        if (updatedShows.length > 0) {
            flash.push(req, res, "success", `Updated the station of ${updatedShows.length} show(s): ${updatedShows.join(", ")}.`);
        }
        res.redirect("/stations");
    };

    router.post("/stations/new", (req, res) => {
        try {
            const { key, updatedShows } = catalog.saveStation(formBody(req));
            stationSaved(req, res, key, updatedShows);
        } catch (err) {
            fail(req, res, err, "/stations/new", "/stations");
        }
    });

    router.get("/stations/:key/edit", (req, res) => {
        const key = req.params.key;
        try {
            const streamUrl = catalog.getStation(key);
            res.send(renderStationForm({
                action: editPath("stations", key),
                stationId: key,
                streamUrl,
                flashes: flash.take(req, res),
            }));
        } catch (err) {
            fail(req, res, err, "/stations", "/stations");
        }
    });

    router.post("/stations/:key/edit", (req, res) => {
        const originalKey = req.params.key;
        try {
            const { key, updatedShows } = catalog.saveStation(formBody(req), originalKey);
            stationSaved(req, res, key, updatedShows);
        } catch (err) {
            fail(req, res, err, editPath("stations", originalKey), "/stations");
        }
    });

    router.post("/stations/:key/delete", (req, res) => {
        const key = req.params.key;
        try {
            catalog.deleteStation(key);
            flash.push(req, res, "success", `Station '${key}' deleted.`);
            res.redirect("/stations");
        } catch (err) {
            fail(req, res, err, "/stations", "/stations");
        }
    });

    // ── Podcasts ──

    router.get("/podcasts", (req, res) => {
        const flashes = flash.take(req, res);
        try {
            res.send(renderPodcastList(catalog.listPodcasts(), flashes));
        } catch (err) {
            if (!(err instanceof StoreError)) throw err;
            console.error(`[admin] ${err.message}`);
            res.status(500).send(renderPodcastList([], flashes, `Storage error: ${err.message}`));
        }
    });

    router.get("/podcasts/new", (req, res) => {
        res.send(renderPodcastForm({
            action: "/podcasts/new",
            podcastId: "",
            flashes: flash.take(req, res),
        }));
    });

    router.post("/podcasts/new", (req, res) => {
        try {
            const key = catalog.savePodcast(formBody(req));
            flash.push(req, res, "success", `Podcast '${key}' saved successfully.`);
            res.redirect("/podcasts");
        } catch (err) {
            fail(req, res, err, "/podcasts/new", "/podcasts");
        }
    });

    // ── API: Probe a feed for author / lastBuildDate ──
    router.post("/podcasts/test", (req, res, next) => {
        const feedUrl = formBody(req).feed_url;
        if (typeof feedUrl !== "string" || feedUrl.trim() === "") {
            res.status(400).json({ success: false, message: "Feed URL is required." });
            return;
        }

        probeFeed(feedUrl)
            .then((result) => {
                res.status(result.success ? 200 : 502).json(result);
            })
            .catch(next);
    });

    router.get("/podcasts/:key/edit", (req, res) => {
        const key = req.params.key;
        try {
            const podcast = catalog.getPodcast(key);
            res.send(renderPodcastForm({
                action: editPath("podcasts", key),
                podcastId: key,
                podcast,
                flashes: flash.take(req, res),
            }));
        } catch (err) {
            fail(req, res, err, "/podcasts", "/podcasts");
        }
    });

    router.post("/podcasts/:key/edit", (req, res) => {
        const originalKey = req.params.key;
        try {
            const key = catalog.savePodcast(formBody(req), originalKey);
            flash.push(req, res, "success", `Podcast '${key}' saved successfully.`);
            res.redirect("/podcasts");
        } catch (err) {
            fail(req, res, err, editPath("podcasts", originalKey), "/podcasts");
        }
    });

    router.post("/podcasts/:key/delete", (req, res) => {
        const key = req.params.key;
        try {
            catalog.deletePodcast(key);
            flash.push(req, res, "success", `Podcast '${key}' deleted.`);
            res.redirect("/podcasts");
        } catch (err) {
            fail(req, res, err, "/podcasts", "/podcasts");
        }
    });

    // ── Activity ──

    router.get("/logs", (req, res) => {
        res.send(renderLogsPage(getLogs({ limit: 200 }), flash.take(req, res)));
    });

    return router;
}
