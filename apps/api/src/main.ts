import 'dotenv/config';
import { buildApp } from './app.js';
import { loadServerConfig } from './config.js';
import { checkAssetRoot } from './plistAssets.js';

const config = loadServerConfig();
const app = await buildApp({ config });

const assetRoot = await checkAssetRoot(config.assetRoot);
if (!assetRoot.ok) {
  app.log.fatal({ assetRoot: config.assetRoot, reason: assetRoot.reason }, 'asset root unavailable; refusing to start');
  await app.close();
  process.exit(1);
}

app.log.info({ assetRoot: config.assetRoot }, 'asset root ready');

await app.listen({ port: config.port, host: config.host });
