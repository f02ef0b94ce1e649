import { Router, Request, Response } from 'express';
import * as path from 'node:path';
import { z } from 'zod';
import { CloneConfig } from '../config.js';
import { CloneError, CloneErrorKind, describeError } from '../errors.js';
import { STRUCTURAL_INDEX, listRecords, recordName, recordType } from '../index-editor.js';
import { RepositoryLayout, resolveRepositoryRoot } from '../layout.js';
import { MemoryLogger } from '../logger.js';
import { RunnerOverrides, runClone } from '../runner.js';
import { FileArtifactStore } from '../artifact-store.js';
import { CloneRequest } from '../types.js';

const STATUS_BY_KIND: Record<CloneErrorKind, number> = {
  InvalidCloneRequest: 400,
  ConfigError: 400,
  ArtifactNotFound: 404,
  MalformedArtifact: 422,
  MissingIdentifierNodes: 422,
  WriteError: 500
};

function sendError(res: Response, err: unknown): void {
  if (err instanceof CloneError) {
    res.status(STATUS_BY_KIND[err.kind]).json({ error: err.kind, message: err.message, details: err.metadata });
    return;
  }
  res.status(500).json({ error: 'InternalError', message: describeError(err) });
}

const CloneRequestBody = z.object({
  type: z.string(),
  donorName: z.string(),
  cloneName: z.string()
});

function parseCloneRequest(body: unknown): CloneRequest | null {
  const parsed = CloneRequestBody.safeParse(body);
  return parsed.success ? parsed.data : null;
}

/**
 * Create API routes over one repository
 */
export function createApiRoutes(config: CloneConfig, overrides: RunnerOverrides = {}): Router {
  const router = Router();

  /**
   * GET /api/registrations
   * Records of the structural index, optionally filtered by type
   * Query params: ?type=Catalog
   */
  router.get('/registrations', (req: Request, res: Response) => {
    const { type } = req.query;
    try {
      const root = resolveRepositoryRoot(path.resolve(config.repositoryRoot), config.configDir);
      const layout = new RepositoryLayout(root);
      const store = overrides.store ?? new FileArtifactStore();
      const indexPath = layout.indexPath(STRUCTURAL_INDEX);
      const doc = store.load(indexPath, 'structural index');

      let records = listRecords(doc, STRUCTURAL_INDEX, indexPath).map(record => ({
        type: recordType(record, STRUCTURAL_INDEX),
        name: recordName(record)
      }));
      if (type && typeof type === 'string') {
        records = records.filter(r => r.type === type);
      }
      res.json(records);
    } catch (err) {
      sendError(res, err);
    }
  });

  /**
   * POST /api/clone
   * Body: { type, donorName, cloneName }
   */
  router.post('/clone', (req: Request, res: Response) => {
    const request = parseCloneRequest(req.body);
    if (!request) {
      res.status(400).json({ error: 'InvalidCloneRequest', message: 'Body must contain string fields type, donorName and cloneName' });
      return;
    }

    const logger = new MemoryLogger();
    try {
      const report = runClone(request, config, { ...overrides, logger });
      res.json({ report, log: logger.lines });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
