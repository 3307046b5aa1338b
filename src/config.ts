import { readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import yaml from "js-yaml";
import type { AppConfig, StorePaths } from "./types.js";

export const INSECURE_SECRET_KEY = "dev";

const DEFAULTABLE_FIELDS = ["artwork-file", "remote-directory"];

export const DOCUMENT_FILES = {
    shows: "config_shows.json",
    stations: "config_stations.json",
    podcasts: "config_podcasts.json",
} as const;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function getNestedValue(obj: Record<string, unknown>, path: string): unknown {
    return path.split(".").reduce<unknown>((acc, key) => {
        if (isRecord(acc)) {
            return acc[key];
        }
        return undefined;
    }, obj);
}

function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
    const parts = path.split(".");
    let target = obj;
    for (let i = 0; i < parts.length - 1; i++) {
        const next = target[parts[i]];
        if (isRecord(next)) {
            target = next;
        } else {
            const created: Record<string, unknown> = {};
            target[parts[i]] = created;
            target = created;
        }
    }
    target[parts[parts.length - 1]] = value;
}

function applyEnvOverrides(config: Record<string, unknown>): void {
    const envMap: Record<string, string> = {
        PORT: "server.port",
        SECRET_KEY: "server.secret_key",
        DATA_DIR: "data_dir",
        DEFAULT_ARTWORK_FILE: "shows.field_defaults.artwork-file",
        DEFAULT_REMOTE_DIRECTORY: "shows.field_defaults.remote-directory",
    };

    for (const [envKey, configPath] of Object.entries(envMap)) {
        const envValue = process.env[envKey];
        if (envValue === undefined) continue;

        // Convert port to number
        if (configPath === "server.port") {
            setNestedValue(config, configPath, Number(envValue));
        } else {
            setNestedValue(config, configPath, envValue);
        }
    }
}

const DEFAULTS: Record<string, unknown> = {
    "server.port": 5000,
    "server.secret_key": INSECURE_SECRET_KEY,
    "shows.field_defaults": {},
    "data_dir": "config",
};

function applyDefaults(config: Record<string, unknown>): void {
    for (const [path, defaultValue] of Object.entries(DEFAULTS)) {
        const current = getNestedValue(config, path);
        if (current !== undefined && current !== null) continue;
        setNestedValue(config, path, structuredClone(defaultValue));
    }
}

function validate(config: Record<string, unknown>): AppConfig {
    const problems: string[] = [];

    const port = getNestedValue(config, "server.port");
    if (typeof port !== "number" || !Number.isInteger(port) || port < 0 || port > 65535) {
        problems.push(`server.port must be an integer between 0 and 65535 (got ${String(port)})`);
    }

    const secretKey = getNestedValue(config, "server.secret_key");
    if (typeof secretKey !== "string" || secretKey === "") {
        problems.push("server.secret_key must be a non-empty string");
    }

    const dataDir = config.data_dir;
    if (typeof dataDir !== "string" || dataDir === "") {
        problems.push("data_dir must be a non-empty string");
    }

    const fieldDefaults: Record<string, string> = {};
    const rawDefaults = getNestedValue(config, "shows.field_defaults");
    if (!isRecord(rawDefaults)) {
        problems.push("shows.field_defaults must be a mapping");
    } else {
        for (const [field, value] of Object.entries(rawDefaults)) {
            if (!DEFAULTABLE_FIELDS.includes(field)) {
                problems.push(
                    `shows.field_defaults.${field} is not allowed (only ${DEFAULTABLE_FIELDS.join(", ")})`
                );
            } else if (typeof value !== "string" || value.trim() === "") {
                problems.push(`shows.field_defaults.${field} must be a non-empty string`);
            } else {
                fieldDefaults[field] = value.trim();
            }
        }
    }

    if (problems.length > 0 || typeof port !== "number" || typeof secretKey !== "string" || typeof dataDir !== "string") {
        throw new Error(`Invalid config: ${problems.join("; ")}`);
    }

    return {
        server: { port, secret_key: secretKey },
        shows: { field_defaults: fieldDefaults },
        data_dir: dataDir,
    };
}

export function loadConfig(configPath?: string): AppConfig {
    const filePath = configPath ?? process.env.CONFIG_PATH ?? "config.yaml";
    const resolved = resolve(filePath);

    let raw: Record<string, unknown> = {};

    try {
        const content = readFileSync(resolved, "utf-8");
        const parsed = yaml.load(content);
        if (isRecord(parsed)) {
            raw = parsed;
        } else if (parsed !== undefined && parsed !== null) {
            throw new Error(`Config file ${resolved} must contain a mapping at the top level`);
        }
    } catch (err) {
        if (err instanceof Error && "code" in err && err.code === "ENOENT") {
            console.warn(`[config] Config file not found at ${resolved}, using env + defaults`);
        } else {
            throw err;
        }
    }

    applyDefaults(raw);
    applyEnvOverrides(raw);
    return validate(raw);
}

/**
 * Paths of the three documents, derived from data_dir.
 */
export function storePaths(config: AppConfig): StorePaths {
    const dir = resolve(config.data_dir);
    return {
        shows: join(dir, DOCUMENT_FILES.shows),
        stations: join(dir, DOCUMENT_FILES.stations),
        podcasts: join(dir, DOCUMENT_FILES.podcasts),
    };
}
