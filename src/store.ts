import { readFileSync, writeFileSync, renameSync, mkdirSync, rmSync } from "node:fs";
import { dirname } from "node:path";
import { StoreError, errorMessage } from "./errors.js";
import type {
    DocumentId,
    Podcast,
    PodcastsDocument,
    Show,
    ShowsDocument,
    StationsDocument,
    StationUrl,
    StorePaths,
} from "./types.js";

export type JsonDocument = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Deep copy with object keys in sorted order, so output is stable across saves. */
function sortKeys(value: unknown): unknown {
    if (Array.isArray(value)) {
        return value.map(sortKeys);
    }
    if (isRecord(value)) {
        // fromEntries defines every key as an own property, `__proto__` included
        return Object.fromEntries(
            Object.keys(value)
                .sort()
                .map((key): [string, unknown] => [key, sortKeys(value[key])])
        );
    }
    return value;
}

export function serializeDocument(doc: JsonDocument): string {
    return JSON.stringify(sortKeys(doc), null, 2) + "\n";
}

/**
 * Load/save of the shows, stations and podcasts documents.
 * Each document is read fresh on every load and written whole on every save;
 * nothing is cached and nothing is locked.
 */
export class ConfigStore {
    constructor(readonly paths: StorePaths) {}

    pathOf(documentId: DocumentId): string {
        return this.paths[documentId];
    }

    load(documentId: DocumentId): JsonDocument {
        const filePath = this.pathOf(documentId);

        let content: string;
        try {
            content = readFileSync(filePath, "utf-8");
        } catch (err) {
            if (err instanceof Error && "code" in err && err.code === "ENOENT") {
                return {};
            }
            throw new StoreError(`Could not read ${filePath}: ${errorMessage(err)}`, filePath, { cause: err });
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(content);
        } catch (err) {
            throw new StoreError(`Malformed JSON in ${filePath}: ${errorMessage(err)}`, filePath, { cause: err });
        }

        if (!isRecord(parsed)) {
            throw new StoreError(`Expected a JSON object at the top level of ${filePath}`, filePath);
        }
        return parsed;
    }

    /** Persist a whole document (write temp → rename). */
    save(documentId: DocumentId, doc: JsonDocument): void {
        const filePath = this.pathOf(documentId);
        const tmpPath = filePath + ".tmp";
        try {
            mkdirSync(dirname(filePath), { recursive: true });
            writeFileSync(tmpPath, serializeDocument(doc), "utf-8");
            renameSync(tmpPath, filePath);
        } catch (err) {
            removeLeftover(tmpPath);
            throw new StoreError(`Could not write ${filePath}: ${errorMessage(err)}`, filePath, { cause: err });
        }
    }

    // ── Typed views (read side; writes go through the raw document) ──

    loadShows(): ShowsDocument {
        return Object.fromEntries(
            Object.entries(this.load("shows")).map(([key, value]): [string, Show] => [key, toShow(value)])
        );
    }

    loadStations(): StationsDocument {
        return Object.fromEntries(
            Object.entries(this.load("stations")).map(([key, value]): [string, StationUrl] => [key, text(value)])
        );
    }

    loadPodcasts(): PodcastsDocument {
        return Object.fromEntries(
            Object.entries(this.load("podcasts")).map(([key, value]): [string, Podcast] => [key, toPodcast(value)])
        );
    }
}

function removeLeftover(tmpPath: string): void {
    try {
        rmSync(tmpPath, { force: true });
    } catch (err) {
        console.warn(`[store] Could not remove ${tmpPath}: ${errorMessage(err)}`);
    }
}

function text(value: unknown): string {
    if (typeof value === "string") return value;
    if (typeof value === "number" || typeof value === "boolean") return String(value);
    return "";
}

function toShow(value: unknown): Show {
    const record: Record<string, unknown> = isRecord(value) ? value : {};
    return {
        show: text(record.show),
        station: text(record.station),
        "artwork-file": text(record["artwork-file"]),
        "remote-directory": text(record["remote-directory"]),
        frequency: text(record.frequency),
        "playlist-db-slug": text(record["playlist-db-slug"]),
    };
}

function toPodcast(value: unknown): Podcast {
    const record: Record<string, unknown> = isRecord(value) ? value : {};
    const podcast: Podcast = {
        rss_feed: text(record.rss_feed),
        download_old_episodes: record.download_old_episodes === true,
    };
    if (typeof record.author === "string") podcast.author = record.author;
    if (typeof record.last_build_date === "string") podcast.last_build_date = record.last_build_date;
    return podcast;
}
