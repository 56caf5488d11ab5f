import type { FastifyInstance } from 'fastify';

import { checkAssetRoot } from '../plistAssets.js';
import { ok } from './httpResponses.js';

function readinessReasons(check: Awaited<ReturnType<typeof checkAssetRoot>>): string[] {
  return check.ok ? [] : [`PLIST_ASSET_ROOT ${check.reason}`];
}

export async function registerHealthRoutes(app: FastifyInstance, opts: { assetRoot: string }) {
  app.get('/health', async () => ok({}));

  // Reports on the asset root without disclosing where it lives.
  app.get('/ops/assets/readiness', async () => {
    const check = await checkAssetRoot(opts.assetRoot);
    const reasons = readinessReasons(check);
    return ok({
      assetsReady: reasons.length === 0,
      reasons,
    });
  });
}
