import type { FlashMessage } from "./flash.js";
import type { LogEntry } from "./logs.js";
import {
    SHOW_FIELDS,
    SHOW_FIELD_LABELS,
    type Podcast,
    type Show,
    type ShowsConfig,
    type StationUrl,
} from "./types.js";
import { formFieldName } from "./validation.js";

type Section = "shows" | "stations" | "podcasts" | "logs";

export function escapeHtml(text: string): string {
    return text
        .replace(/&/g, "&amp;")
        .replace(/</g, "&lt;")
        .replace(/>/g, "&gt;")
        .replace(/"/g, "&quot;")
        .replace(/'/g, "&#39;");
}

function keyPath(section: Section, key: string, action: "edit" | "delete"): string {
    return `/${section}/${encodeURIComponent(key)}/${action}`;
}

// ── Layout ──

function layout(
    title: string,
    active: Section,
    flashes: FlashMessage[],
    body: string,
    script = ""
): string {
    const nav = (section: Section, label: string) =>
        `<a class="tab${section === active ? " active" : ""}" href="/${section}">${label}</a>`;

    const messages = flashes
        .map((f) => `<div class="flash ${f.category}">${escapeHtml(f.message)}</div>`)
        .join("\n");

    return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${escapeHtml(title)} · Radio Config</title>
<style>${styles()}</style>
</head>
<body>
<div class="container">
  <header>
    <h1>📻 Radio Config</h1>
  </header>
  <nav class="tabs">
    ${nav("shows", "Shows")}
    ${nav("stations", "Stations")}
    ${nav("podcasts", "Podcasts")}
    ${nav("logs", "Activity")}
  </nav>
  ${messages}
  ${body}
</div>
${script ? `<script>${script}</script>` : ""}
</body>
</html>`;
}

function deleteButton(section: Section, key: string, noun: string): string {
    return `<form method="post" action="${keyPath(section, key, "delete")}" class="inline"
      data-prompt="${escapeHtml(`Delete ${noun} '${key}'?`)}" onsubmit="return confirm(this.dataset.prompt)">
      <button type="submit" class="btn btn-danger btn-sm">✕</button>
    </form>`;
}

function emptyRow(colspan: number, text: string): string {
    return `<tr><td colspan="${colspan}" class="empty-state">${text}</td></tr>`;
}

function storageNotice(error: string | undefined): string {
    return error ? `<div class="flash error">${escapeHtml(error)}</div>` : "";
}

// ── Shows ──

export function renderShowList(
    shows: Array<[string, Show]>,
    flashes: FlashMessage[],
    error?: string
): string {
    const rows = shows
        .map(([key, show]) => `<tr>
      <td><a href="${keyPath("shows", key, "edit")}">${escapeHtml(key)}</a></td>
      <td>${escapeHtml(show.show)}</td>
      <td>${escapeHtml(show.station)}</td>
      <td>${escapeHtml(show.frequency)}</td>
      <td class="actions">${deleteButton("shows", key, "show")}</td>
    </tr>`)
        .join("\n");

    return layout("Shows", "shows", flashes, `
  ${storageNotice(error)}
  <div class="card">
    <h2>Shows <a class="btn btn-primary btn-sm" href="/shows/new">＋ New show</a></h2>
    <table>
      <thead><tr><th>Slug</th><th>Name</th><th>Station</th><th>Frequency</th><th></th></tr></thead>
      <tbody>${rows || emptyRow(5, "No shows yet.")}</tbody>
    </table>
  </div>`);
}

export interface ShowFormOptions {
    action: string;
    showKey: string;
    show?: Show;
    stationIds: string[];
    policy: ShowsConfig;
    flashes: FlashMessage[];
}

export function renderShowForm(options: ShowFormOptions): string {
    const { action, showKey, show, stationIds, policy, flashes } = options;

    const inputs = SHOW_FIELDS.map((field) => {
        const name = formFieldName(field);
        const fallback =
            field === "artwork-file" || field === "remote-directory" ? policy.field_defaults[field] : undefined;
        const attrs = [
            `type="text"`,
            `id="${name}"`,
            `name="${name}"`,
            `value="${escapeHtml(show?.[field] ?? "")}"`,
            fallback ? `placeholder="${escapeHtml(fallback)}"` : "required",
            field === "station" ? `list="station-ids"` : "",
        ].filter(Boolean).join(" ");
        const help = fallback
            ? `<div class="form-help">Leave empty to use ${escapeHtml(fallback)}</div>`
            : "";
        return `<div class="form-group">
        <label for="${name}">${SHOW_FIELD_LABELS[field]}</label>
        <input ${attrs}>
        ${help}
      </div>`;
    }).join("\n");

    const stationOptions = stationIds.map((id) => `<option value="${escapeHtml(id)}">`).join("");

    return layout(showKey ? `Edit ${showKey}` : "New show", "shows", flashes, `
  <div class="card">
    <h2>${showKey ? `Edit show <code>${escapeHtml(showKey)}</code>` : "New show"}</h2>
    <form method="post" action="${escapeHtml(action)}">
      <div class="form-grid">
        <div class="form-group full">
          <label for="show_key">Slug</label>
          <input type="text" id="show_key" name="show_key" value="${escapeHtml(showKey)}" required>
        </div>
        ${inputs}
      </div>
      <datalist id="station-ids">${stationOptions}</datalist>
      <div class="form-actions">
        <a class="btn btn-ghost" href="/shows">Cancel</a>
        <button type="submit" class="btn btn-primary">💾 Save</button>
      </div>
    </form>
  </div>`);
}

// ── Stations ──

export function renderStationList(
    stations: Array<[string, StationUrl]>,
    flashes: FlashMessage[],
    error?: string
): string {
    const rows = stations
        .map(([id, url]) => `<tr>
      <td><a href="${keyPath("stations", id, "edit")}">${escapeHtml(id)}</a></td>
      <td class="mono">${escapeHtml(url)}</td>
      <td class="actions">${deleteButton("stations", id, "station")}</td>
    </tr>`)
        .join("\n");

    return layout("Stations", "stations", flashes, `
  ${storageNotice(error)}
  <div class="card">
    <h2>Stations <a class="btn btn-primary btn-sm" href="/stations/new">＋ New station</a></h2>
    <table>
      <thead><tr><th>Station ID</th><th>Stream URL</th><th></th></tr></thead>
      <tbody>${rows || emptyRow(3, "No stations yet.")}</tbody>
    </table>
  </div>`);
}

export interface StationFormOptions {
    action: string;
    stationId: string;
    streamUrl: string;
    flashes: FlashMessage[];
}

export function renderStationForm({ action, stationId, streamUrl, flashes }: StationFormOptions): string {
    return layout(stationId ? `Edit ${stationId}` : "New station", "stations", flashes, `
  <div class="card">
    <h2>${stationId ? `Edit station <code>${escapeHtml(stationId)}</code>` : "New station"}</h2>
    <form method="post" action="${escapeHtml(action)}">
      <div class="form-grid">
        <div class="form-group">
          <label for="station_id">Station ID</label>
          <input type="text" id="station_id" name="station_id" value="${escapeHtml(stationId)}" required>
          ${stationId ? `<div class="form-help">Renaming updates every show that uses this station.</div>` : ""}
        </div>
        <div class="form-group">
          <label for="stream_url">Stream URL</label>
          <input type="url" id="stream_url" name="stream_url" value="${escapeHtml(streamUrl)}" required>
        </div>
      </div>
      <div class="form-actions">
        <a class="btn btn-ghost" href="/stations">Cancel</a>
        <button type="submit" class="btn btn-primary">💾 Save</button>
      </div>
    </form>
  </div>`);
}

// ── Podcasts ──

export function renderPodcastList(
    podcasts: Array<[string, Podcast]>,
    flashes: FlashMessage[],
    error?: string
): string {
    const rows = podcasts
        .map(([id, podcast]) => `<tr>
      <td><a href="${keyPath("podcasts", id, "edit")}">${escapeHtml(id)}</a></td>
      <td>${escapeHtml(podcast.author ?? "")}</td>
      <td class="mono">${escapeHtml(podcast.rss_feed)}</td>
      <td>${podcast.download_old_episodes ? "✓" : ""}</td>
      <td class="actions">${deleteButton("podcasts", id, "podcast")}</td>
    </tr>`)
        .join("\n");

    return layout("Podcasts", "podcasts", flashes, `
  ${storageNotice(error)}
  <div class="card">
    <h2>Podcasts <a class="btn btn-primary btn-sm" href="/podcasts/new">＋ New podcast</a></h2>
    <table>
      <thead><tr><th>Podcast ID</th><th>Author</th><th>RSS feed</th><th>Back catalog</th><th></th></tr></thead>
      <tbody>${rows || emptyRow(5, "No podcasts yet.")}</tbody>
    </table>
  </div>`);
}

export interface PodcastFormOptions {
    action: string;
    podcastId: string;
    podcast?: Podcast;
    flashes: FlashMessage[];
}

export function renderPodcastForm({ action, podcastId, podcast, flashes }: PodcastFormOptions): string {
    return layout(podcastId ? `Edit ${podcastId}` : "New podcast", "podcasts", flashes, `
  <div class="card">
    <h2>${podcastId ? `Edit podcast <code>${escapeHtml(podcastId)}</code>` : "New podcast"}</h2>
    <form method="post" action="${escapeHtml(action)}">
      <div class="form-grid">
        <div class="form-group">
          <label for="podcast_id">Podcast ID</label>
          <input type="text" id="podcast_id" name="podcast_id" value="${escapeHtml(podcastId)}" required>
        </div>
        <div class="form-group">
          <label for="rss_feed">RSS feed</label>
          <input type="url" id="rss_feed" name="rss_feed" value="${escapeHtml(podcast?.rss_feed ?? "")}" required>
          <div class="form-help">
            <button type="button" class="btn btn-ghost btn-sm" id="testFeedBtn" onclick="testFeed()">Test feed</button>
            <span id="testFeedResult"></span>
          </div>
        </div>
        <div class="form-group">
          <label for="author">Author</label>
          <input type="text" id="author" name="author" value="${escapeHtml(podcast?.author ?? "")}">
        </div>
        <div class="form-group">
          <label for="last_build_date">Last build date</label>
          <input type="text" id="last_build_date" name="last_build_date" value="${escapeHtml(podcast?.last_build_date ?? "")}">
        </div>
        <div class="form-group full checkbox">
          <label>
            <input type="checkbox" name="download_old_episodes" value="on"${podcast?.download_old_episodes ? " checked" : ""}>
            Download old episodes
          </label>
        </div>
      </div>
      <div class="form-actions">
        <a class="btn btn-ghost" href="/podcasts">Cancel</a>
        <button type="submit" class="btn btn-primary">💾 Save</button>
      </div>
    </form>
  </div>`, testFeedScript());
}

function testFeedScript(): string {
    return `
async function testFeed() {
  const btn = document.getElementById('testFeedBtn');
  const out = document.getElementById('testFeedResult');
  btn.disabled = true;
  out.textContent = 'Fetching…';
  out.className = '';
  try {
    const r = await fetch('/podcasts/test', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ feed_url: document.getElementById('rss_feed').value })
    });
    const data = await r.json();
    if (data.success) {
      if (data.author) document.getElementById('author').value = data.author;
      if (data.last_build_date) document.getElementById('last_build_date').value = data.last_build_date;
      out.textContent = 'Feed OK';
      out.className = 'ok';
    } else {
      out.textContent = data.message || 'Feed test failed';
      out.className = 'err';
    }
  } catch (e) {
    out.textContent = 'Network error';
    out.className = 'err';
  }
  btn.disabled = false;
}`;
}

// ── Activity log ──

export function renderLogsPage(entries: LogEntry[], flashes: FlashMessage[]): string {
    const rows = entries
        .slice()
        .reverse()
        .map((entry) => `<tr class="log-${entry.level}">
      <td class="mono">${escapeHtml(entry.timestamp)}</td>
      <td>${entry.level}</td>
      <td>${escapeHtml(entry.area)}</td>
      <td>${escapeHtml(entry.message)}</td>
    </tr>`)
        .join("\n");

    return layout("Activity", "logs", flashes, `
  <div class="card">
    <h2>Recent activity</h2>
    <table>
      <thead><tr><th>Time</th><th>Level</th><th>Area</th><th>Message</th></tr></thead>
      <tbody>${rows || emptyRow(4, "Nothing logged yet.")}</tbody>
    </table>
  </div>`);
}

function styles(): string {
    return `
:root {
  --bg: #0f1117;
  --surface: #1a1d27;
  --surface2: #242837;
  --border: #2e3348;
  --text: #e1e4ed;
  --text2: #8b90a5;
  --accent: #6c63ff;
  --accent2: #8b83ff;
  --danger: #ef4444;
  --success: #22c55e;
  --radius: 12px;
  --font: -apple-system, BlinkMacSystemFont, 'Segoe UI', sans-serif;
}
* { box-sizing: border-box; margin: 0; padding: 0; }
body { font-family: var(--font); background: var(--bg); color: var(--text); line-height: 1.6; min-height: 100vh; }
a { color: var(--accent2); text-decoration: none; }
.container { max-width: 1080px; margin: 0 auto; padding: 24px 20px; }
header { margin-bottom: 20px; padding-bottom: 16px; border-bottom: 1px solid var(--border); }
header h1 {
  font-size: 1.5rem; font-weight: 700;
  background: linear-gradient(135deg, var(--accent), var(--accent2));
  -webkit-background-clip: text; -webkit-text-fill-color: transparent;
}
.tabs {
  display: flex; gap: 2px; margin-bottom: 20px; padding: 4px;
  background: var(--surface); border: 1px solid var(--border); border-radius: var(--radius);
}
.tab { flex: 1; padding: 10px; text-align: center; font-size: 0.85rem; font-weight: 600; border-radius: 8px; color: var(--text2); }
.tab:hover { color: var(--text); }
.tab.active { background: var(--accent); color: #fff; }
.card { background: var(--surface); border: 1px solid var(--border); border-radius: var(--radius); padding: 24px; margin-bottom: 20px; }
.card h2 { font-size: 1.1rem; font-weight: 600; margin-bottom: 16px; display: flex; align-items: center; justify-content: space-between; gap: 8px; }
.flash { padding: 12px 16px; border-radius: 10px; margin-bottom: 14px; font-size: 0.9rem; font-weight: 500; }
.flash.success { background: rgba(34,197,94,0.15); color: var(--success); }
.flash.error { background: rgba(239,68,68,0.15); color: var(--danger); }
table { width: 100%; border-collapse: collapse; font-size: 0.9rem; }
th { text-align: left; font-size: 0.75rem; text-transform: uppercase; letter-spacing: 0.5px; color: var(--text2); padding: 8px; border-bottom: 1px solid var(--border); }
td { padding: 10px 8px; border-bottom: 1px solid var(--border); vertical-align: middle; }
tr:last-child td { border-bottom: none; }
td.actions { text-align: right; width: 1%; white-space: nowrap; }
.mono, code { font-family: ui-monospace, SFMono-Regular, Menlo, monospace; font-size: 0.82rem; word-break: break-all; }
code { background: var(--surface2); padding: 2px 6px; border-radius: 4px; }
.log-warn td { color: #f59e0b; }
.log-error td { color: var(--danger); }
.empty-state { text-align: center; padding: 40px 20px; color: var(--text2); }
.btn {
  display: inline-flex; align-items: center; gap: 6px; padding: 8px 18px; border: none; border-radius: 8px;
  font-family: var(--font); font-size: 0.85rem; font-weight: 600; cursor: pointer; transition: all 0.15s ease;
}
.btn:hover { transform: translateY(-1px); }
.btn-primary { background: linear-gradient(135deg, var(--accent), var(--accent2)); color: #fff; }
.btn-danger { background: var(--danger); color: #fff; }
.btn-ghost { background: transparent; color: var(--text2); border: 1px solid var(--border); }
.btn-ghost:hover { background: var(--surface2); color: var(--text); }
.btn-sm { padding: 5px 12px; font-size: 0.78rem; }
form.inline { display: inline; }
.form-grid { display: grid; grid-template-columns: 1fr 1fr; gap: 14px; }
@media (max-width: 600px) { .form-grid { grid-template-columns: 1fr; } }
.form-group { display: flex; flex-direction: column; gap: 4px; }
.form-group.full { grid-column: 1 / -1; }
.form-group label { font-size: 0.78rem; font-weight: 500; color: var(--text2); text-transform: uppercase; letter-spacing: 0.5px; }
.form-group.checkbox label { text-transform: none; font-size: 0.9rem; color: var(--text); display: flex; gap: 8px; align-items: center; }
.form-group input[type=text], .form-group input[type=url] {
  padding: 9px 12px; background: var(--bg); border: 1px solid var(--border); border-radius: 8px;
  color: var(--text); font-family: var(--font); font-size: 0.9rem; outline: none;
}
.form-group input:focus { border-color: var(--accent); }
.form-help { margin-top: 4px; font-size: 0.75rem; color: var(--text2); display: flex; gap: 8px; align-items: center; }
.form-help .ok { color: var(--success); }
.form-help .err { color: var(--danger); }
.form-actions { display: flex; gap: 10px; justify-content: flex-end; margin-top: 20px; }
`;
}
