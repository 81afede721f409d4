import { Router, Request, Response } from 'express';
import { Catalog } from '../catalog.js';
import { scanText, ScanResult } from '../extractor.js';
import { registryToJSON } from '../registry.js';
import { Registry } from '../types.js';

const DEFAULT_SOURCE = 'request.sql';

/**
 * Scan the request body into a fresh catalog, or answer 400
 */
function extractFromRequest(req: Request, res: Response, registry: Registry): { catalog: Catalog; result: ScanResult } | null {
  const body: unknown = req.body;
  if (typeof body !== 'string' || body.trim() === '') {
    res.status(400).json({ error: 'Request body must be non-empty SQL text (Content-Type: text/plain or application/sql)' });
    return null;
  }

  const { source } = req.query;
  const sourceName = typeof source === 'string' && source ? source : DEFAULT_SOURCE;

  const catalog = new Catalog();
  const result = scanText(body, sourceName, { registry, catalog });
  return { catalog, result };
}

/**
 * Create API routes for extraction
 */
export function createApiRoutes(registry: Registry): Router {
  const router = Router();

  /**
   * GET /api/registry
   * Translatable columns per table
   */
  router.get('/registry', (_req: Request, res: Response) => {
    res.json(registryToJSON(registry));
  });

  /**
   * POST /api/extract
   * Body: SQL text. Query params: ?source=countries.sql
   * Returns the catalog text, its entries and the scan warnings
   */
  router.post('/extract', (req: Request, res: Response) => {
    const extracted = extractFromRequest(req, res, registry);
    if (!extracted) return;

    const { catalog, result } = extracted;
    res.json({
      catalog: catalog.serialize(),
      entries: catalog.entries(),
      warnings: result.warnings
    });
  });

  /**
   * POST /api/extract.pot
   * Same as /extract, answering with the catalog text only
   */
  router.post('/extract.pot', (req: Request, res: Response) => {
    const extracted = extractFromRequest(req, res, registry);
    if (!extracted) return;

    res.type('text/plain').send(extracted.catalog.serialize());
  });

  return router;
}
