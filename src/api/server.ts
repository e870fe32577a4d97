/**
 * Express API for the scoring engine
 */

import express, { type Request, type Response } from 'express';
import cors from 'cors';
import { z, ZodError } from 'zod';
import {
  ConsensusRequestSchema,
  EvidenceRecordListSchema,
  SourceEstimateListSchema,
} from '../domain/schemas.js';
import type { ConsensusEstimate } from '../domain/types.js';
import type { InstrumentStore } from '../lookup/instrumentStore.js';
import { buildConsensus } from '../pipeline/consensus.js';
import { aggregateByDisease } from '../pipeline/diseaseAggregation.js';
import { runPipeline, scoreRecords } from '../pipeline/run.js';
import { rankMechanisms } from '../pipeline/tournament.js';
import { EmptyInputError } from '../utils/errors.js';
import { createLogger } from '../utils/log.js';

const logger = createLogger('api-server');

const RecordsBodySchema = z.object({ records: EvidenceRecordListSchema });

const ConsensusBodySchema = z.union([
  z.object({ estimates: SourceEstimateListSchema }),
  z.object({ groups: ConsensusRequestSchema }),
]);

export interface AppDependencies {
  store: InstrumentStore;
}

type Handler = (req: Request, res: Response) => Promise<void>;

function route(name: string, handler: Handler) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      await handler(req, res);
    } catch (error) {
      if (error instanceof ZodError) {
        res.status(400).json({ error: 'Invalid request body', issues: error.issues });
        return;
      }
      if (error instanceof EmptyInputError) {
        res.status(400).json({ error: error.message });
        return;
      }
      logger.error({ error, route: name }, 'Request failed');
      res.status(500).json({ error: error instanceof Error ? error.message : String(error) });
    }
  };
}

export function createApp({ store }: AppDependencies): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '5mb' }));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Score records and run the tournament and disease rollup over them
  app.post(
    '/api/score',
    route('score', async (req, res) => {
      const { records } = RecordsBodySchema.parse(req.body);
      const result = await runPipeline(records, store);
      res.json(result);
    })
  );

  app.post(
    '/api/consensus',
    route('consensus', async (req, res) => {
      const body = ConsensusBodySchema.parse(req.body);
      if ('estimates' in body) {
        res.json(buildConsensus(body.estimates));
        return;
      }
      const results: Record<string, ConsensusEstimate> = {};
      for (const [label, estimates] of Object.entries(body.groups)) {
        results[label] = buildConsensus(estimates);
      }
      res.json(results);
    })
  );

  app.post(
    '/api/rank',
    route('rank', async (req, res) => {
      const { records } = RecordsBodySchema.parse(req.body);
      const { scores } = await scoreRecords(records, store);
      res.json(rankMechanisms(scores));
    })
  );

  app.post(
    '/api/aggregate',
    route('aggregate', async (req, res) => {
      const { records } = RecordsBodySchema.parse(req.body);
      const { scores } = await scoreRecords(records, store);
      res.json(aggregateByDisease(scores));
    })
  );

  return app;
}
