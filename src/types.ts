// ── Shared types for radio-config-admin ──

export interface ServerConfig {
    port: number;
    secret_key: string;
}

/** Show fields that may fall back to a configured value instead of being required. */
export type DefaultableShowField = "artwork-file" | "remote-directory";

export interface ShowsConfig {
    field_defaults: Partial<Record<DefaultableShowField, string>>;
}

export interface AppConfig {
    server: ServerConfig;
    shows: ShowsConfig;
    data_dir: string;
}

// ── Documents ──

export type DocumentId = "shows" | "stations" | "podcasts";

export interface StorePaths {
    shows: string;
    stations: string;
    podcasts: string;
}

export const SHOW_FIELDS = [
    "show",
    "station",
    "artwork-file",
    "remote-directory",
    "frequency",
    "playlist-db-slug",
] as const;

export type ShowField = (typeof SHOW_FIELDS)[number];

export const SHOW_FIELD_LABELS: Record<ShowField, string> = {
    show: "Show name",
    station: "Station",
    "artwork-file": "Artwork file",
    "remote-directory": "Remote directory",
    frequency: "Frequency",
    "playlist-db-slug": "Playlist DB slug",
};

export type Show = Record<ShowField, string>;

/** A station record is just its stream URL. */
export type StationUrl = string;

export interface Podcast {
    rss_feed: string;
    author?: string;
    last_build_date?: string;
    download_old_episodes: boolean;
}

export type ShowsDocument = Record<string, Show>;
export type StationsDocument = Record<string, StationUrl>;
export type PodcastsDocument = Record<string, Podcast>;

// ── Form submissions ──

/** Raw form body as parsed by express.urlencoded. */
export type FormSubmission = Record<string, unknown>;

// ── Feed probe ──

export type FeedProbeResult =
    | { success: true; author: string; last_build_date: string }
    | { success: false; message: string };
