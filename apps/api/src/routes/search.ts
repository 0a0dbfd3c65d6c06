import { Router, type Response } from 'express';
import { z } from 'zod';
import { DataIntegrityError, errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import { DEFAULT_MAX_TOTAL_HITS, type Geocoder, type SearchBackend } from '../search/backend.js';
import { insertProperties } from '../search/ingestion.js';
import { findByPostcode, findGeneric, suggest } from '../search/orchestrator.js';
import { PAGE_SIZE } from '../search/queryBuilder.js';
import { BUILD_TYPES, CONTRACT_TYPES, PROPERTY_TYPES } from '../types.js';

const logger = createLogger('routes');

export interface SearchRouterDeps {
  // Resolved per request so the client registry decides when a client is built.
  backend: () => Promise<SearchBackend>;
  geocoder: Geocoder;
  // Pages past this many matches cannot be reached, so requests for them are rejected.
  maxTotalHits?: number;
  // Admin routes are mounted only when a key is configured.
  adminKey?: string;
}

const filterSchema = z
  .object({
    town: z.string().min(1).max(100).optional(),
    county: z.string().min(1).max(100).optional(),
    locality: z.string().min(1).max(100).optional(),
    district: z.string().min(1).max(100).optional()
  })
  .default({});

const sortSchema = z
  .object({
    sortColumn: z.string().max(50).optional(),
    sortDirection: z.enum(['ascending', 'descending']).optional()
  })
  .default({});

export function lastReachablePage(maxTotalHits: number): number {
  return Math.max(Math.floor(maxTotalHits / PAGE_SIZE) - 1, 0);
}

function searchBodySchemas(maxPage: number) {
  const page = z.coerce.number().int().min(0).max(maxPage).default(0);
  return {
    generic: z.object({
      text: z.string().max(200).optional(),
      filter: filterSchema,
      sort: sortSchema,
      page
    }),
    postcode: z.object({
      postcode: z.string().min(1).max(20),
      maxDistance: z.coerce.number().int().positive().max(1000),
      filter: filterSchema,
      sort: sortSchema,
      page
    })
  };
}

const suggestQuerySchema = z.object({
  text: z.string().min(1).max(100)
});

const transactionSchema = z.object({
  transactionId: z.string().uuid(),
  price: z.number().int().nonnegative(),
  dateOfTransfer: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  buildDetails: z.object({
    propertyType: z.enum(PROPERTY_TYPES).optional(),
    build: z.enum(BUILD_TYPES),
    contract: z.enum(CONTRACT_TYPES)
  }),
  address: z.object({
    building: z.string(),
    street: z.string().optional(),
    locality: z.string().optional(),
    townCity: z.string(),
    district: z.string(),
    county: z.string(),
    postcode: z.string().optional()
  })
});

const ingestBodySchema = z.object({
  transactions: z.array(transactionSchema).min(1).max(10_000)
});

function sendFailure(res: Response, err: unknown, error: string) {
  if (err instanceof DataIntegrityError) {
    logger.error({ err, kind: err.kind, field: err.field }, 'indexed document failed to project');
    return res.status(500).json({ error: 'DATA_INTEGRITY', message: err.message });
  }
  logger.error({ err, error }, 'request failed');
  return res.status(500).json({ error, message: errorMessage(err) });
}

export function createSearchRouter(deps: SearchRouterDeps): Router {
  const router = Router();
  const bodies = searchBodySchemas(lastReachablePage(deps.maxTotalHits ?? DEFAULT_MAX_TOTAL_HITS));

  router.post('/v1/properties/search', async (req, res) => {
    const parsed = bodies.generic.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'VALIDATION_ERROR', details: parsed.error.flatten() });
    }

    try {
      const backend = await deps.backend();
      return res.json(await findGeneric(backend, parsed.data));
    } catch (err) {
      return sendFailure(res, err, 'SEARCH_FAILED');
    }
  });

  router.post('/v1/properties/search/postcode', async (req, res) => {
    const parsed = bodies.postcode.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'VALIDATION_ERROR', details: parsed.error.flatten() });
    }

    try {
      const backend = await deps.backend();
      return res.json(await findByPostcode(backend, deps.geocoder, parsed.data));
    } catch (err) {
      return sendFailure(res, err, 'SEARCH_FAILED');
    }
  });

  router.get('/v1/properties/suggest', async (req, res) => {
    const parsed = suggestQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ error: 'VALIDATION_ERROR', details: parsed.error.flatten() });
    }

    try {
      const backend = await deps.backend();
      return res.json(await suggest(backend, parsed.data));
    } catch (err) {
      return sendFailure(res, err, 'SUGGEST_FAILED');
    }
  });

  router.post('/v1/properties', async (req, res) => {
    const parsed = ingestBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'VALIDATION_ERROR', details: parsed.error.flatten() });
    }

    try {
      const backend = await deps.backend();
      const summary = await insertProperties(backend, deps.geocoder, parsed.data.transactions);
      return res.status(202).json(summary);
    } catch (err) {
      return sendFailure(res, err, 'INGEST_FAILED');
    }
  });

  const { adminKey } = deps;
  if (adminKey !== undefined) {
    router.post('/v1/admin/index', async (req, res) => {
      if (req.get('x-admin-key') !== adminKey) {
        return res.status(401).json({ error: 'UNAUTHORIZED' });
      }

      try {
        const backend = await deps.backend();
        await backend.recreateIndex();
        return res.json({ ok: true });
      } catch (err) {
        return sendFailure(res, err, 'INDEX_FAILED');
      }
    });
  }

  return router;
}
