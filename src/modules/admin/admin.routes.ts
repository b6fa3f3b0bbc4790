// modules/admin/admin.routes.ts

import { Router } from 'express';
import path from 'path';
import { readAdminKey, requireAdminKey } from '../../middlewares/adminKey.middleware';
import type { ResultsExporter } from '../export/export.service';
import type { ResultStore } from '../results/result.model';

export function createAdminRouter(deps: {
  exporter: ResultsExporter;
  results: ResultStore;
  adminKey: string;
  exportFile: string;
}): Router {
  const router = Router();

  router.use(requireAdminKey(deps.adminKey));

  router.get('/export', (req, res) => {
    const file = deps.exporter.export(readAdminKey(req), path.resolve(deps.exportFile));
    res.download(file, 'results.xlsx');
  });

  router.get('/results', (_req, res) => {
    res.json({ ok: true, results: deps.results.listAll() });
  });

  return router;
}
