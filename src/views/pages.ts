import type { GeocoderProvider } from '../config/env';
import { MARKER_CATEGORIES, type MarkerCategory } from '../types/marker';
import type { SessionUser } from '../types/user';
import { isAdmin } from '../types/user';

const APP_TITLE = 'India E-Waste Map';

const CATEGORY_LABELS: Record<MarkerCategory, string> = {
  large: 'Large household appliances',
  small: 'Small appliances',
  devices: 'Mobile phones &amp; laptops',
};

export interface IndexPageModel {
  geocoder: GeocoderProvider;
  geocoderApiKey: string;
  user: SessionUser | null;
}

export interface LoginPageModel {
  error?: string;
  username?: string;
}

function esc(s: string): string {
  return s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

// JSON inside <script> must not be able to close the tag.
function scriptJson(value: unknown): string {
  return JSON.stringify(value).replace(/</g, '\\u003c');
}

function layout(title: string, head: string, body: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${esc(title)}</title>
${head}
</head>
<body>
${body}
</body>
</html>`;
}

function userBar(user: SessionUser): string {
  return `<div class="user-bar">
  <span class="user-name">${esc(user.username)}</span>
  <span class="user-role role-${esc(user.role)}">${esc(user.role)}</span>
  <a class="btn-logout" href="/logout">Log out</a>
</div>`;
}

function markerForm(): string {
  const options = MARKER_CATEGORIES.map((category) => `<option value="${category}">${CATEGORY_LABELS[category]}</option>`).join('');
  return `<div class="modal-overlay" hidden>
    <form class="marker-form">
      <h2>New disposal location</h2>
      <p class="marker-form-hint">Click the map to place the marker.</p>
      <input name="lat" type="hidden">
      <input name="lng" type="hidden">
      <label>State <input name="state" type="text" required></label>
      <label>City <input name="city" type="text" required></label>
      <label>Locality <input name="locality" type="text" required></label>
      <label>Category <select name="category">${options}</select></label>
      <label>Contact <input name="contact" type="text" required></label>
      <p class="marker-form-error" role="alert" hidden></p>
      <button type="submit">Save</button>
      <button type="button" class="btn-cancel">Cancel</button>
    </form>
  </div>`;
}

export function renderIndexPage({ geocoder, geocoderApiKey, user }: IndexPageModel): string {
  const canEdit = user === null || isAdmin(user);
  const config = {
    geocoder,
    geocoderApiKey,
    user: user ? { username: user.username, role: user.role } : null,
    canEdit,
  };

  const head = `<link rel="stylesheet" href="https://unpkg.com/leaflet@1.9.4/dist/leaflet.css">
<link rel="stylesheet" href="/static/css/style.css">`;

  const body = `<header class="app-header">
  <h1>${APP_TITLE}</h1>
  ${user ? userBar(user) : ''}
</header>
<main>
  <div id="map"></div>
  <div class="map-legend">
    ${MARKER_CATEGORIES.map(
      (category) =>
        `<div class="legend-item"><span class="legend-dot dot-${category}"></span>${CATEGORY_LABELS[category]}</div>`
    ).join('\n    ')}
  </div>
  ${canEdit ? `<button type="button" class="btn-add-location">Add location</button>\n  ${markerForm()}` : ''}
</main>
<script>window.APP_CONFIG = ${scriptJson(config)};</script>
<script src="https://unpkg.com/leaflet@1.9.4/dist/leaflet.js"></script>
<script src="/static/js/map.js"></script>`;

  return layout(APP_TITLE, head, body);
}

export function renderLoginPage({ error, username }: LoginPageModel = {}): string {
  const body = `<main class="login">
  <h1>${APP_TITLE}</h1>
  <form class="login-form" method="post" action="/login">
    ${error ? `<p class="login-error" role="alert">${esc(error)}</p>` : ''}
    <label for="username">Username</label>
    <input id="username" name="username" type="text" autocomplete="username" value="${esc(username ?? '')}" required>
    <label for="password">Password</label>
    <input id="password" name="password" type="password" autocomplete="current-password" required>
    <button type="submit">Log in</button>
  </form>
</main>`;

  return layout(`Log in · ${APP_TITLE}`, '<link rel="stylesheet" href="/static/css/style.css">', body);
}
