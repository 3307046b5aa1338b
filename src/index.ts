import { INSECURE_SECRET_KEY, loadConfig, storePaths } from "./config.js";
import { installConsoleLogCapture } from "./logs.js";
import { ConfigStore } from "./store.js";
import { createServer } from "./server.js";

async function main() {
    installConsoleLogCapture();
    console.log("📻 Radio config admin starting...");

    // 1. Load config
    const config = loadConfig();
    if (config.server.secret_key === INSECURE_SECRET_KEY) {
        console.warn("[config] Using the insecure development secret key; set SECRET_KEY for real deployments");
    }

    // 2. Point the store at the three documents
    const paths = storePaths(config);
    const store = new ConfigStore(paths);
    console.log(`[store] Shows: ${paths.shows}`);
    console.log(`[store] Stations: ${paths.stations}`);
    console.log(`[store] Podcasts: ${paths.podcasts}`);

    // 3. Start HTTP server
    const app = createServer(config, store);

    await new Promise<void>((resolve, reject) => {
        const server = app.listen(config.server.port, () => {
            console.log(`[server] Listening on port ${config.server.port}`);
            resolve();
        });
        server.on("error", reject);
    });
}

main().catch((err) => {
    console.error("Fatal error:", err);
    process.exit(1);
});
