import { ValidationError } from "./errors.js";
import type { FormSubmission, Podcast, Show, ShowField, ShowsConfig } from "./types.js";

export interface ValidatedShow {
    key: string;
    show: Show;
}

export interface ValidatedStation {
    key: string;
    streamUrl: string;
}

export interface ValidatedPodcast {
    key: string;
    podcast: Podcast;
}

const TRUTHY_FLAGS = new Set(["on", "true", "1", "yes"]);

/** Trimmed string value of a form field; anything that is not a string reads as empty. */
export function formValue(form: FormSubmission, name: string): string {
    const value = form[name];
    if (typeof value === "string") return value.trim();
    // Repeated fields arrive as arrays from the urlencoded parser; the last one wins
    if (Array.isArray(value)) {
        const last: unknown = value[value.length - 1];
        return typeof last === "string" ? last.trim() : "";
    }
    return "";
}

export function formFlag(form: FormSubmission, name: string): boolean {
    const value = form[name];
    if (typeof value === "boolean") return value;
    return TRUTHY_FLAGS.has(formValue(form, name).toLowerCase());
}

/** Show fields are posted with underscores: artwork-file → artwork_file. */
export function formFieldName(field: ShowField): string {
    return field.replace(/-/g, "_");
}

export function validateShow(form: FormSubmission, policy: ShowsConfig): ValidatedShow {
    const key = formValue(form, "show_key");
    if (!key) {
        throw new ValidationError("A slug is required for the show.", "show_key");
    }

    const read = (field: ShowField): string => {
        const value = formValue(form, formFieldName(field)) || defaultFor(field, policy);
        if (!value) {
            throw new ValidationError(`Field '${field}' is required.`, field);
        }
        return value;
    };

    // Checked in SHOW_FIELDS order so the first missing field is the one reported
    const show: Show = {
        show: read("show"),
        station: read("station"),
        "artwork-file": read("artwork-file"),
        "remote-directory": read("remote-directory"),
        frequency: read("frequency"),
        "playlist-db-slug": read("playlist-db-slug"),
    };

    return { key, show };
}

function defaultFor(field: ShowField, policy: ShowsConfig): string {
    if (field === "artwork-file" || field === "remote-directory") {
        return policy.field_defaults[field] ?? "";
    }
    return "";
}

export function validateStation(form: FormSubmission): ValidatedStation {
    const key = formValue(form, "station_id");
    const streamUrl = formValue(form, "stream_url");
    if (!key || !streamUrl) {
        throw new ValidationError(
            "Both station ID and stream URL are required.",
            key ? "stream_url" : "station_id"
        );
    }
    return { key, streamUrl };
}

export function validatePodcast(form: FormSubmission): ValidatedPodcast {
    const key = formValue(form, "podcast_id");
    if (!key) {
        throw new ValidationError("A podcast ID is required.", "podcast_id");
    }

    const rssFeed = formValue(form, "rss_feed");
    if (!rssFeed) {
        throw new ValidationError("Field 'rss_feed' is required.", "rss_feed");
    }

    const podcast: Podcast = {
        rss_feed: rssFeed,
        download_old_episodes: formFlag(form, "download_old_episodes"),
    };

    const author = formValue(form, "author");
    if (author) podcast.author = author;

    const lastBuildDate = formValue(form, "last_build_date");
    if (lastBuildDate) podcast.last_build_date = lastBuildDate;

    return { key, podcast };
}
