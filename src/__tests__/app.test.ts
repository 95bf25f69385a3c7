import { type IncomingHttpHeaders, type Server, createServer, request as httpRequest } from 'node:http';
import type { AddressInfo } from 'node:net';

import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';

import { createApp } from '../app';
import { hashPassword, verifyPassword } from '../services/passwords';
import { seedDemoMarkers, seedDemoUsers } from '../services/seedService';
import type { MarkerJson } from '../types/marker';
import { createInMemoryMarkerStore, createInMemoryUserStore } from './fakes';

const FIXED_NOW = new Date('2026-10-01T08:30:00.000Z');

interface TestResponse {
  status: number;
  headers: IncomingHttpHeaders;
  text: string;
}

interface SendOptions {
  json?: unknown;
  rawJson?: string;
  form?: Record<string, string>;
  cookie?: string;
}

function send(port: number, method: string, path: string, options: SendOptions = {}): Promise<TestResponse> {
  let body: string | undefined;
  const headers: Record<string, string> = {};
  if (options.json !== undefined || options.rawJson !== undefined) {
    body = options.rawJson ?? JSON.stringify(options.json);
    headers['Content-Type'] = 'application/json';
  } else if (options.form) {
    body = new URLSearchParams(options.form).toString();
    headers['Content-Type'] = 'application/x-www-form-urlencoded';
  }
  if (options.cookie) {
    headers.Cookie = options.cookie;
  }

  return new Promise((resolve, reject) => {
    const req = httpRequest({ host: '127.0.0.1', port, method, path, headers, agent: false }, (res) => {
      const chunks: Buffer[] = [];
      res.on('data', (chunk: Buffer) => chunks.push(chunk));
      res.on('end', () => {
        resolve({ status: res.statusCode ?? 0, headers: res.headers, text: Buffer.concat(chunks).toString('utf8') });
      });
      res.on('error', reject);
    });
    req.on('error', reject);
    if (body !== undefined) {
      req.write(body);
    }
    req.end();
  });
}

function sessionCookie(response: TestResponse): string {
  const [cookie] = response.headers['set-cookie'] ?? [];
  if (!cookie) {
    throw new Error('Expected a session cookie');
  }
  return cookie.split(';')[0];
}

function listen(server: Server): Promise<number> {
  return new Promise((resolve) => {
    server.listen(0, '127.0.0.1', () => {
      const address = server.address() as AddressInfo;
      resolve(address.port);
    });
  });
}

function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

const markerPayload = {
  lat: 12.9716,
  lng: 77.5946,
  state: ' Karnataka ',
  city: 'Bengaluru',
  locality: 'Indiranagar',
  category: 'small',
  contact: '080-0000-0000',
};

async function buildServer(authEnabled: boolean) {
  const markers = createInMemoryMarkerStore();
  const users = createInMemoryUserStore();
  await seedDemoMarkers({
    countMarkers: markers.countMarkers,
    createMarker: markers.createMarker,
    now: () => FIXED_NOW,
    random: () => 0.5,
  });
  await seedDemoUsers({
    countUsers: users.countUsers,
    createUsers: users.createUsers,
    hashPassword: (password) => hashPassword(password, 4),
  });

  const app = createApp({
    getDbHealth: () => ({ connected: true, readyStateCode: 1, readyState: 'connected' }),
    listMarkers: markers.listMarkers,
    createMarker: markers.createMarker,
    removeMarker: markers.removeMarker,
    setMarkerActive: markers.setMarkerActive,
    findUserByUsername: users.findUserByUsername,
    verifyPassword,
    now: () => FIXED_NOW,
    uptimeSec: () => 1,
    corsOrigins: ['http://localhost:5000'],
    authEnabled,
    sessionSecret: 'test-secret',
    secureCookie: false,
    geocoder: 'nominatim',
    geocoderApiKey: '',
    debug: false,
  });

  const server = createServer(app);
  const port = await listen(server);
  return { server, port, markers };
}

describe('app with authentication', () => {
  let server: Server;
  let port: number;
  let markers: ReturnType<typeof createInMemoryMarkerStore>;

  async function login(username: string, password: string): Promise<string> {
    const response = await send(port, 'POST', '/login', { form: { username, password } });
    expect(response.status).toBe(302);
    expect(response.headers.location).toBe('/');
    return sessionCookie(response);
  }

  beforeAll(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    ({ server, port, markers } = await buildServer(true));
  });

  afterAll(async () => {
    await close(server);
    vi.restoreAllMocks();
  });

  it('401s anonymous API calls', async () => {
    const response = await send(port, 'GET', '/api/markers');

    expect(response.status).toBe(401);
    expect(JSON.parse(response.text)).toEqual({ error: 'Authentication required' });
    expect(response.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('redirects anonymous page requests to the login form', async () => {
    const response = await send(port, 'GET', '/');

    expect(response.status).toBe(302);
    expect(response.headers.location).toBe('/login');
  });

  it('serves the login form and the boundary file without a session', async () => {
    const form = await send(port, 'GET', '/login');
    const geojson = await send(port, 'GET', '/static/data/india.geojson');

    expect(form.status).toBe(200);
    expect(form.text).toContain('<form class="login-form" method="post" action="/login">');
    expect(geojson.status).toBe(200);
    const data = JSON.parse(geojson.text) as { type: string; features: unknown[] };
    expect(data.type).toBe('FeatureCollection');
    expect(data.features).toHaveLength(1);
  });

  it('keeps the bare health check public', async () => {
    const response = await send(port, 'GET', '/health');

    expect(response.status).toBe(200);
    expect(JSON.parse(response.text)).toEqual({ status: 'ok' });
  });

  it('requires a session for the detailed health report', async () => {
    const anonymous = await send(port, 'GET', '/api/health');
    const cookie = await login('user', 'user123');
    const signedIn = await send(port, 'GET', '/api/health', { cookie });

    expect(anonymous.status).toBe(401);
    expect(JSON.parse(anonymous.text)).toEqual({ error: 'Authentication required' });
    expect(signedIn.status).toBe(200);
    expect(JSON.parse(signedIn.text)).toMatchObject({
      status: 'ok',
      service: 'ewaste-map-backend',
      auth: 'enabled',
      database: { connected: true, readyState: 'connected' },
    });
  });

  it('answers an oversized body with 413 instead of a server error', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const oversized = { ...markerPayload, locality: 'x'.repeat(200 * 1024) };

    const response = await send(port, 'POST', '/api/markers', { json: oversized });

    expect(response.status).toBe(413);
    expect(JSON.parse(response.text)).toEqual({ error: 'request entity too large' });
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('re-renders the form and issues no session on bad credentials', async () => {
    const response = await send(port, 'POST', '/login', { form: { username: 'admin', password: 'wrong' } });

    expect(response.status).toBe(401);
    expect(response.text).toContain('Invalid username or password');
    expect(response.headers['set-cookie']).toBeUndefined();
  });

  it('shows the signed-in user on the main page', async () => {
    const cookie = await login('admin', 'admin123');

    const response = await send(port, 'GET', '/', { cookie });

    expect(response.status).toBe(200);
    expect(response.text).toContain('<span class="user-name">admin</span>');
    expect(response.text).toContain('<button type="button" class="btn-add-location">Add location</button>');
    expect(response.text).toContain('<form class="marker-form">');
    expect(response.text).toContain('<option value="devices">Mobile phones &amp; laptops</option>');
    expect(response.text).toContain('"geocoder":"nominatim"');
  });

  it('lets an admin create, toggle and delete a marker', async () => {
    const cookie = await login('admin', 'admin123');

    const created = await send(port, 'POST', '/api/markers', { json: markerPayload, cookie });
    expect(created.status).toBe(201);
    const marker = JSON.parse(created.text) as MarkerJson;
    expect(marker).toEqual({
      id: 3,
      lat: 12.9716,
      lng: 77.5946,
      state: 'Karnataka',
      city: 'Bengaluru',
      locality: 'Indiranagar',
      category: 'small',
      contact: '080-0000-0000',
      is_active: true,
      created_at: '2026-10-01T08:30:00.000Z',
    });

    const shutdown = await send(port, 'PUT', `/api/markers/${marker.id}/shutdown`, { cookie });
    expect(shutdown.status).toBe(200);
    expect(JSON.parse(shutdown.text)).toEqual({ ...marker, is_active: false });

    const reactivated = await send(port, 'PUT', `/api/markers/${marker.id}/reactivate`, { cookie });
    expect(reactivated.status).toBe(200);
    expect(JSON.parse(reactivated.text)).toEqual(marker);

    const removed = await send(port, 'DELETE', `/api/markers/${marker.id}`, { cookie });
    expect(removed.status).toBe(200);
    expect(JSON.parse(removed.text)).toEqual({ message: 'Marker deleted successfully' });

    const list = await send(port, 'GET', '/api/markers', { cookie });
    const ids = (JSON.parse(list.text) as MarkerJson[]).map((item) => item.id);
    expect(ids).toEqual([1, 2]);

    const again = await send(port, 'DELETE', `/api/markers/${marker.id}`, { cookie });
    expect(again.status).toBe(404);
    expect(JSON.parse(again.text)).toEqual({ error: 'Marker not found' });
  });

  it('400s an admin payload outside the bounds', async () => {
    const cookie = await login('admin', 'admin123');

    const response = await send(port, 'POST', '/api/markers', {
      json: { ...markerPayload, lat: 40.0, lng: 100.0 },
      cookie,
    });

    expect(response.status).toBe(400);
    expect(JSON.parse(response.text)).toEqual({ error: 'Location must be within India boundaries' });
  });

  it('400s a malformed JSON body', async () => {
    const cookie = await login('admin', 'admin123');

    const response = await send(port, 'POST', '/api/markers', { rawJson: '{"lat": ', cookie });

    expect(response.status).toBe(400);
    expect(JSON.parse(response.text)).toEqual({ error: 'Malformed JSON body' });
  });

  it('lets a read-only user list but not change markers', async () => {
    const cookie = await login('user', 'user123');
    const before = await markers.listMarkers();

    const list = await send(port, 'GET', '/api/markers', { cookie });
    const create = await send(port, 'POST', '/api/markers', { json: markerPayload, cookie });
    const remove = await send(port, 'DELETE', '/api/markers/1', { cookie });
    const shutdown = await send(port, 'PUT', '/api/markers/1/shutdown', { cookie });
    const reactivate = await send(port, 'PUT', '/api/markers/1/reactivate', { cookie });

    expect(list.status).toBe(200);
    expect([create.status, remove.status, shutdown.status, reactivate.status]).toEqual([403, 403, 403, 403]);
    expect(JSON.parse(create.text)).toEqual({ error: 'Admin access required' });
    expect(await markers.listMarkers()).toEqual(before);
  });

  it('hides the add button from a read-only user', async () => {
    const cookie = await login('user', 'user123');

    const response = await send(port, 'GET', '/', { cookie });

    expect(response.text).toContain('<span class="user-role role-user">user</span>');
    expect(response.text).not.toContain('class="btn-add-location"');
    expect(response.text).not.toContain('class="marker-form"');
    expect(response.text).toContain('"canEdit":false');
  });

  it('ends the session on logout', async () => {
    const cookie = await login('user', 'user123');

    const logout = await send(port, 'GET', '/logout', { cookie });
    const after = await send(port, 'GET', '/api/markers', { cookie });

    expect(logout.status).toBe(302);
    expect(logout.headers.location).toBe('/login');
    expect(after.status).toBe(401);
  });

  it('404s unknown routes for a signed-in user', async () => {
    const cookie = await login('user', 'user123');

    const response = await send(port, 'GET', '/api/unknown', { cookie });

    expect(response.status).toBe(404);
    expect(JSON.parse(response.text)).toEqual({ error: 'Resource not found' });
  });
});

describe('app without authentication', () => {
  let server: Server;
  let port: number;

  beforeAll(async () => {
    ({ server, port } = await buildServer(false));
  });

  afterAll(async () => {
    await close(server);
  });

  it('allows mutations without a session', async () => {
    const created = await send(port, 'POST', '/api/markers', { json: markerPayload });
    const marker = JSON.parse(created.text) as MarkerJson;
    const shutdown = await send(port, 'PUT', `/api/markers/${marker.id}/shutdown`);

    expect(created.status).toBe(201);
    expect(shutdown.status).toBe(200);
  });

  it('serves the main page directly and has no login route', async () => {
    const page = await send(port, 'GET', '/');
    const login = await send(port, 'GET', '/login');

    expect(page.status).toBe(200);
    expect(page.text).toContain('<div id="map"></div>');
    expect(login.status).toBe(404);
  });
});
