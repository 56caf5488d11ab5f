import type { FastifyInstance } from 'fastify';

import { parseDeviceIdentification } from '../deviceIdentity.js';
import { openPlistAsset, PLIST_FILENAME, streamPlistAsset, type AssetFileSystem } from '../plistAssets.js';
import { handleRouteError, sendForbidden } from './httpResponses.js';

export type PlistRouteOptions = {
  assetRoot: string;
  identificationHeader?: string;
  fileSystem?: AssetFileSystem;
};

// The device is pointed at an arbitrary URL on this host, so every path and
// method that is not an operational route resolves the plist.
export async function registerPlistRoutes(app: FastifyInstance, opts: PlistRouteOptions) {
  const headerName = (opts.identificationHeader ?? 'user-agent').toLowerCase();

  await app.register(async (scope) => {
    // Request bodies carry nothing for this route; read and drop them so no
    // content type can fail the request before the handler runs.
    scope.removeAllContentTypeParsers();
    scope.addContentTypeParser('*', { parseAs: 'buffer' }, (_req, _body, done) => done(null));
    scope.setErrorHandler(handleRouteError);

    scope.all('/*', async (req, reply) => {
      const identification = parseDeviceIdentification(req.headers[headerName]);

      const lookup = await openPlistAsset({
        assetRoot: opts.assetRoot,
        identification,
        fileSystem: opts.fileSystem,
      });

      if (lookup.kind === 'denied') {
        req.log.info({ reason: lookup.reason, ...identification }, 'plist request denied');
        return sendForbidden(reply);
      }

      const { model, build } = lookup.identification;
      req.log.info({ model, build, size: lookup.size }, 'serving plist');

      const stream = streamPlistAsset(lookup.handle, (err) => {
        req.log.warn({ err, model, build }, 'plist stream aborted');
      });

      return reply
        .status(200)
        .header('Content-Description', 'File Transfer')
        .header('Content-Type', 'application/xml')
        .header('Content-Disposition', `attachment; filename="${PLIST_FILENAME}"`)
        .header('Content-Length', String(lookup.size))
        .header('Cache-Control', 'must-revalidate')
        .header('Pragma', 'public')
        .send(stream);
    });
  });
}
