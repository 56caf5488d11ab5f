import fastify from 'fastify';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { registerHealthRoutes } from './health.js';

describe('health routes', () => {
  let assetRoot: string;

  beforeAll(async () => {
    assetRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'plist-health-'));
  });

  afterAll(async () => {
    await fs.rm(assetRoot, { recursive: true, force: true });
  });

  it('GET /health returns ok', async () => {
    const app = fastify({ logger: false });
    await registerHealthRoutes(app, { assetRoot });

    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true });
    await app.close();
  });

  it('reports readiness when the asset root is usable', async () => {
    const app = fastify({ logger: false });
    await registerHealthRoutes(app, { assetRoot });

    const res = await app.inject({ method: 'GET', url: '/ops/assets/readiness' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true, assetsReady: true, reasons: [] });
    await app.close();
  });

  it('reports a missing asset root without disclosing its path', async () => {
    const missingRoot = path.join(assetRoot, 'gone');
    const app = fastify({ logger: false });
    await registerHealthRoutes(app, { assetRoot: missingRoot });

    const res = await app.inject({ method: 'GET', url: '/ops/assets/readiness' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true, assetsReady: false, reasons: ['PLIST_ASSET_ROOT missing'] });
    expect(res.body.includes(missingRoot)).toBe(false);
    await app.close();
  });
});
