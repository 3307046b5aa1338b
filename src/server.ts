import express, { type NextFunction, type Request, type Response } from "express";
import type { AppConfig } from "./types.js";
import type { ConfigStore } from "./store.js";
import { Catalog } from "./catalog.js";
import { Flash } from "./flash.js";
import { createAdminRouter } from "./admin.js";
import { errorMessage } from "./errors.js";

function httpStatusOf(err: unknown): number {
    if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
        return err.status;
    }
    return 500;
}

export function createServer(config: AppConfig, store: ConfigStore) {
    const app = express();
    const catalog = new Catalog(store, config.shows);
    const flash = new Flash(config.server.secret_key);

    // Form posts from the admin pages, JSON for the feed test API (limit size to prevent abuse)
    app.use(express.urlencoded({ extended: false, limit: "1mb" }));
    app.use(express.json({ limit: "1mb" }));

    app.use(createAdminRouter(catalog, flash, config.shows));

    /**
     * GET /health: healthcheck that also proves the three documents are readable
     */
    app.get("/health", (_req, res) => {
        try {
            res.json({
                status: "ok",
                shows: Object.keys(store.load("shows")).length,
                stations: Object.keys(store.load("stations")).length,
                podcasts: Object.keys(store.load("podcasts")).length,
            });
        } catch (err) {
            console.error("[server] Health check failed:", errorMessage(err));
            res.status(500).json({ status: "error", message: errorMessage(err) });
        }
    });

    app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
        const status = httpStatusOf(err);
        if (status >= 500) {
            console.error(`[server] ${req.method} ${req.originalUrl} failed:`, err);
        }
        if (req.path === "/podcasts/test") {
            res.status(status).json({ success: false, message: status === 400 ? "Request body must be JSON." : errorMessage(err) });
            return;
        }
        res.status(status).send(status === 400 ? "Bad Request" : "Internal Server Error");
    });

    return app;
}
