import type { ConfigStore } from "./store.js";
import type { ShowsDocument } from "./types.js";

/** Keys of the shows whose `station` points at the given station ID. */
export function findStationReferences(shows: ShowsDocument, stationId: string): string[] {
    return Object.entries(shows)
        .filter(([, show]) => show.station === stationId)
        .map(([key]) => key);
}

/**
 * After a station rename, rewrite every show still pointing at the old ID.
 * The shows document is only written when something changed.
 * Returns the keys of the shows that were updated.
 */
export function propagateStationRename(store: ConfigStore, oldId: string, newId: string): string[] {
    if (oldId === newId) return [];

    const shows = store.load("shows");
    const updated: string[] = [];

    for (const [key, record] of Object.entries(shows)) {
        if (typeof record !== "object" || record === null || Array.isArray(record)) continue;
        if (!("station" in record) || record.station !== oldId) continue;
        record.station = newId;
        updated.push(key);
    }

    if (updated.length > 0) {
        store.save("shows", shows);
        console.log(`[consistency] Station '${oldId}' → '${newId}': updated ${updated.length} show(s): ${updated.join(", ")}`);
    }
    return updated;
}
