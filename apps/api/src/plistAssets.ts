import fs from 'node:fs/promises';
import { constants as FS_CONSTANTS } from 'node:fs';
import path from 'node:path';
import { finished, type Readable } from 'node:stream';

import {
  containsTraversal,
  isCompleteIdentification,
  type CompleteIdentification,
  type DeviceIdentification,
} from './deviceIdentity.js';

export const PLIST_FILENAME = 'patched.plist';

// The slice of FileHandle the resolver and the delivery stream rely on.
export type AssetFileHandle = {
  stat: () => Promise<{ isFile: () => boolean; size: number }>;
  close: () => Promise<void>;
  createReadStream: () => Readable;
};

export type AssetFileSystem = {
  open: (filePath: string, flags: 'r') => Promise<AssetFileHandle>;
};

export const nodeAssetFileSystem: AssetFileSystem = {
  open: (filePath, flags) => fs.open(filePath, flags),
};

export type PlistDenialReason = 'missing_identification' | 'traversal_attempt' | 'asset_not_found';

export type PlistLookup =
  | {
      kind: 'found';
      identification: CompleteIdentification;
      filePath: string;
      size: number;
      handle: AssetFileHandle;
    }
  | { kind: 'denied'; reason: PlistDenialReason };

export class AssetStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AssetStoreError';
  }
}

// Codes that mean "nothing servable at this path" rather than a broken store.
const NOT_SERVABLE_CODES = new Set(['ENOENT', 'ENOTDIR', 'EISDIR', 'EACCES', 'EPERM', 'ENAMETOOLONG', 'ELOOP']);

function errorCode(error: unknown): string | null {
  if (typeof error !== 'object' || error === null || !('code' in error)) return null;
  return typeof error.code === 'string' ? error.code : null;
}

function isNotServable(error: unknown): boolean {
  const code = errorCode(error);
  return code !== null && NOT_SERVABLE_CODES.has(code);
}

function denied(reason: PlistDenialReason): PlistLookup {
  return { kind: 'denied', reason };
}

export function composePlistPath(assetRoot: string, id: CompleteIdentification): string {
  return path.join(assetRoot, id.model, id.build, PLIST_FILENAME);
}

/**
 * Resolves the identification to `<assetRoot>/<model>/<build>/patched.plist`
 * and opens it. Token checks run before any filesystem access.
 *
 * On `found` the caller owns `handle` and must close it (directly, or through
 * a read stream created from it).
 */
export async function openPlistAsset(args: {
  assetRoot: string;
  identification: DeviceIdentification;
  fileSystem?: AssetFileSystem;
}): Promise<PlistLookup> {
  const { assetRoot, identification } = args;
  const fileSystem = args.fileSystem ?? nodeAssetFileSystem;

  if (!isCompleteIdentification(identification)) return denied('missing_identification');
  if (containsTraversal(identification.model) || containsTraversal(identification.build)) {
    return denied('traversal_attempt');
  }

  const filePath = composePlistPath(assetRoot, identification);

  let handle: AssetFileHandle;
  try {
    handle = await fileSystem.open(filePath, 'r');
  } catch (e) {
    if (isNotServable(e)) return denied('asset_not_found');
    throw new AssetStoreError('Failed to open plist asset', { cause: e });
  }

  try {
    const st = await handle.stat();
    if (!st.isFile()) {
      await handle.close();
      return denied('asset_not_found');
    }
    return { kind: 'found', identification, filePath, size: st.size, handle };
  } catch (e) {
    await handle.close().catch(() => undefined);
    throw new AssetStoreError('Failed to stat plist asset', { cause: e });
  }
}

/**
 * Streams the asset and releases its handle once the stream ends, fails or is
 * destroyed (client disconnect). `onAbort` sees the failure; nothing is rethrown.
 */
export function streamPlistAsset(handle: AssetFileHandle, onAbort: (err: Error) => void): Readable {
  const stream = handle.createReadStream();
  finished(stream, (err) => {
    if (err) onAbort(err);
    handle.close().catch(onAbort);
  });
  return stream;
}

export type AssetRootCheck = { ok: true } | { ok: false; reason: 'missing' | 'not_directory' | 'unreadable' };

export async function checkAssetRoot(assetRoot: string): Promise<AssetRootCheck> {
  try {
    const st = await fs.stat(assetRoot);
    if (!st.isDirectory()) return { ok: false, reason: 'not_directory' };
  } catch (e) {
    const code = errorCode(e);
    return { ok: false, reason: code === 'EACCES' || code === 'EPERM' ? 'unreadable' : 'missing' };
  }

  try {
    await fs.access(assetRoot, FS_CONSTANTS.R_OK | FS_CONSTANTS.X_OK);
  } catch {
    return { ok: false, reason: 'unreadable' };
  }

  return { ok: true };
}
