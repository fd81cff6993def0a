import path from 'path';
import { Router } from 'express';
import { asyncHandler } from '@songharvest/platform-core';
import type { IBlobStore } from '../../application/ports';
import { ValidationError } from '../../application/errors';

function blobPathOf(requestPath: string): string {
  try {
    return requestPath
      .replace(/^\/+/, '')
      .split('/')
      .map(segment => decodeURIComponent(segment))
      .join('/');
  } catch {
    throw new ValidationError(`Invalid blob path: ${requestPath}`);
  }
}

/**
 * Serves stored blobs; mounted under the public base URL path.
 */
export function createFileRoutes(blobStore: IBlobStore): Router {
  const router = Router();

  router.get(
    '*',
    asyncHandler(async (req, res) => {
      const blobPath = blobPathOf(req.path);
      const data = await blobStore.get(blobPath);
      const extension = path.extname(blobPath);
      res.type(extension || 'application/octet-stream');
      res.setHeader('Content-Disposition', `attachment; filename="${encodeURIComponent(path.basename(blobPath))}"`);
      res.send(data);
    })
  );

  return router;
}
