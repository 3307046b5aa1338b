import { NotFoundError, ValidationError } from "./errors.js";
import { findStationReferences, propagateStationRename } from "./consistency.js";
import type { ConfigStore, JsonDocument } from "./store.js";
import { validatePodcast, validateShow, validateStation } from "./validation.js";
import type {
    DocumentId,
    FormSubmission,
    Podcast,
    Show,
    ShowsConfig,
    StationUrl,
} from "./types.js";

interface DocumentMessages {
    noun: string;
    notFound: (key: string) => string;
    exists: (key: string) => string;
}

const MESSAGES: Record<DocumentId, DocumentMessages> = {
    shows: {
        noun: "show",
        notFound: (key) => `Show '${key}' was not found.`,
        exists: (key) => `A show with key '${key}' already exists.`,
    },
    stations: {
        noun: "station",
        notFound: (key) => `Station '${key}' was not found.`,
        exists: (key) => `Station '${key}' already exists.`,
    },
    podcasts: {
        noun: "podcast",
        notFound: (key) => `Podcast '${key}' was not found.`,
        exists: (key) => `A podcast with key '${key}' already exists.`,
    },
};

export interface StationSaveResult {
    key: string;
    /** Shows whose station reference followed a rename. */
    updatedShows: string[];
}

export function compareKeys(a: string, b: string): number {
    const left = a.toLowerCase();
    const right = b.toLowerCase();
    return left < right ? -1 : left > right ? 1 : 0;
}

/** Entries ordered case-insensitively by key, as every listing shows them. */
export function sortByKey<T>(doc: Record<string, T>): Array<[string, T]> {
    return Object.entries(doc).sort(([a], [b]) => compareKeys(a, b));
}

/**
 * Load-modify-store operations behind the admin forms.
 * Every call re-reads the document it touches; nothing is cached between requests.
 */
export class Catalog {
    constructor(
        private readonly store: ConfigStore,
        private readonly showsPolicy: ShowsConfig
    ) {}

    // ── Shows ──

    listShows(): Array<[string, Show]> {
        return sortByKey(this.store.loadShows());
    }

    getShow(key: string): Show {
        const shows = this.store.loadShows();
        if (!Object.hasOwn(shows, key)) {
            throw new NotFoundError(MESSAGES.shows.notFound(key));
        }
        return shows[key];
    }

    saveShow(form: FormSubmission, originalKey?: string): string {
        const { key, show } = validateShow(form, this.showsPolicy);
        this.upsert("shows", key, show, originalKey);
        return key;
    }

    deleteShow(key: string): void {
        this.remove("shows", key);
    }

    // ── Stations ──

    listStations(): Array<[string, StationUrl]> {
        return sortByKey(this.store.loadStations());
    }

    getStation(key: string): StationUrl {
        const stations = this.store.loadStations();
        if (!Object.hasOwn(stations, key)) {
            throw new NotFoundError(MESSAGES.stations.notFound(key));
        }
        return stations[key];
    }

    /** Station IDs in listing order, for the show form's station picker. */
    stationIds(): string[] {
        return this.listStations().map(([key]) => key);
    }

    saveStation(form: FormSubmission, originalKey?: string): StationSaveResult {
        const { key, streamUrl } = validateStation(form);
        this.upsert("stations", key, streamUrl, originalKey);

        // Second, separate write: the stations document is already saved at this point
        const updatedShows =
            originalKey !== undefined ? propagateStationRename(this.store, originalKey, key) : [];
        return { key, updatedShows };
    }

    /**
     * Deleting a station that shows still point at is refused; the shows have to be
     * moved to another station (or deleted) first.
     */
    deleteStation(key: string): void {
        const stations = this.store.load("stations");
        if (!Object.hasOwn(stations, key)) {
            throw new NotFoundError(MESSAGES.stations.notFound(key));
        }

        const references = findStationReferences(this.store.loadShows(), key).sort(compareKeys);
        if (references.length > 0) {
            throw new ValidationError(`Station '${key}' is still used by: ${references.join(", ")}.`);
        }

        this.remove("stations", key);
    }

    // ── Podcasts ──

    listPodcasts(): Array<[string, Podcast]> {
        return sortByKey(this.store.loadPodcasts());
    }

    getPodcast(key: string): Podcast {
        const podcasts = this.store.loadPodcasts();
        if (!Object.hasOwn(podcasts, key)) {
            throw new NotFoundError(MESSAGES.podcasts.notFound(key));
        }
        return podcasts[key];
    }

    savePodcast(form: FormSubmission, originalKey?: string): string {
        const { key, podcast } = validatePodcast(form);
        this.upsert("podcasts", key, podcast, originalKey);
        return key;
    }

    deletePodcast(key: string): void {
        this.remove("podcasts", key);
    }

    // ── Shared ──

    /**
     * Create (no originalKey) or update/rename a record. A key already taken by a
     * different record is rejected before anything is written.
     */
    private upsert(documentId: DocumentId, key: string, value: unknown, originalKey?: string): void {
        const messages = MESSAGES[documentId];
        const doc: JsonDocument = this.store.load(documentId);

        if (originalKey !== undefined && !Object.hasOwn(doc, originalKey)) {
            throw new NotFoundError(messages.notFound(originalKey));
        }
        if (key !== originalKey && Object.hasOwn(doc, key)) {
            const hint = originalKey === undefined ? ` Edit the existing ${messages.noun} instead.` : "";
            throw new ValidationError(messages.exists(key) + hint, "key");
        }

        if (originalKey !== undefined && originalKey !== key) {
            delete doc[originalKey];
        }
        // A plain assignment of `__proto__` would swap the prototype instead of adding a record
        Object.defineProperty(doc, key, { value, enumerable: true, writable: true, configurable: true });
        this.store.save(documentId, doc);

        if (originalKey !== undefined && originalKey !== key) {
            console.log(`[catalog] Renamed ${messages.noun} '${originalKey}' → '${key}'`);
        } else {
            console.log(`[catalog] Saved ${messages.noun} '${key}'`);
        }
    }

    private remove(documentId: DocumentId, key: string): void {
        const doc = this.store.load(documentId);
        if (!Object.hasOwn(doc, key)) {
            throw new NotFoundError(MESSAGES[documentId].notFound(key));
        }
        delete doc[key];
        this.store.save(documentId, doc);
        console.log(`[catalog] Deleted ${MESSAGES[documentId].noun} '${key}'`);
    }
}
