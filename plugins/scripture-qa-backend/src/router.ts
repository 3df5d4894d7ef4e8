/*
 * Copyright (C) 2025-2026 flickleafy
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU General Public License for more details.
 *
 * You should have received a copy of the GNU General Public License
 * along with this program. If not, see <https://www.gnu.org/licenses/>.
 */

/**
 * Express router for the scripture Q&A backend
 * Handles HTTP requests and orchestrates services
 *
 * @packageDocumentation
 */

import express, { Request, Response, Router } from 'express';
import type { Logger } from 'winston';
import { Config } from '@backstage/config';
import { z } from 'zod';
import {
  ConfigService,
  CorpusLoader,
  EvidenceStoreFactory,
  LLMServiceFactory,
  RAGService,
  UserTrackerFactory,
} from './services';
import {
  IConfigService,
  IEvidenceStore,
  ILLMService,
  IRAGService,
  IUserTracker,
} from './interfaces';
import { AskQuestionResponse } from './models';
import { INFO_TOPICS, getInfoText, isInfoTopic } from './messages';
import { errorMessage } from './errors';

const MAX_SEARCH_LIMIT = 50;
const MAX_ITERATIONS_OVERRIDE = 10;

const AskQuestionSchema = z.object({
  question: z.string().trim().min(1, 'question is required'),
  model: z.string().min(1).optional(),
  maxIterations: z.number().int().positive().max(MAX_ITERATIONS_OVERRIDE).optional(),
  user: z
    .object({
      id: z.union([z.string().min(1), z.number()]).transform(String),
      username: z.string().optional(),
      firstName: z.string().optional(),
      lastName: z.string().optional(),
    })
    .optional(),
});

const SearchQuerySchema = z.object({
  q: z.string().trim().min(1, 'q is required'),
  limit: z.coerce.number().int().positive().max(MAX_SEARCH_LIMIT).optional(),
});

function describeIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
}

/**
 * Plugin environment interface
 */
export interface PluginEnvironment {
  logger: Logger;
  config: Config;
}

/**
 * Services the routes are served from
 */
export interface RouterOptions {
  logger: Logger;
  configService: IConfigService;
  ragService: IRAGService;
  llmService: ILLMService;
  evidenceStore: IEvidenceStore;
  userTracker: IUserTracker;
}

/**
 * Create the services from configuration, index the corpus and build the router
 * Follows Dependency Injection and Single Responsibility principles
 */
export async function createRouter(env: PluginEnvironment): Promise<Router> {
  const { logger, config } = env;

  const configService = new ConfigService(config);
  const llmService = LLMServiceFactory.create({ logger, config: configService });
  const evidenceStore = await EvidenceStoreFactory.create(configService, logger);
  const userTracker = await UserTrackerFactory.create(configService, logger);
  const corpusLoader = new CorpusLoader({ logger, config: configService });

  const ragService = new RAGService({
    logger,
    config: configService,
    llmService,
    evidenceStore,
    corpusLoader,
  });

  if (configService.getConfig().corpus.indexOnStartup) {
    try {
      await ragService.indexAllDocuments();
    } catch (error) {
      logger.error(`Initial indexing failed: ${error}`);
    }
  }

  return buildRouter({ logger, configService, ragService, llmService, evidenceStore, userTracker });
}

/**
 * Build the HTTP routes over already constructed services
 */
export function buildRouter(options: RouterOptions): Router {
  const { logger, configService, ragService, llmService, evidenceStore, userTracker } = options;

  const router = Router();
  router.use(express.json());

  /**
   * POST /api/scripture-qa
   * Ask a question
   */
  router.post('/', async (req: Request, res: Response) => {
    try {
      const parsed = AskQuestionSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid request', message: describeIssues(parsed.error) });
        return;
      }

      const { question, model, maxIterations, user } = parsed.data;
      logger.info(`Processing question: "${question.substring(0, 50)}..."`);

      if (user) {
        await userTracker.trackUser(user);
        await userTracker.incrementMessageCount(user.id);
      }

      const result = await ragService.answerQuestion(question, { model, maxIterations });

      const response: AskQuestionResponse = {
        answer: result.answer,
        sources: result.sources,
        model: result.model ?? configService.getConfig().llm.defaultModel,
        action: result.action?.action,
        iterations: result.iterations,
        searchQueries: result.searchQueries,
      };

      res.json(response);
    } catch (error) {
      logger.error(`Failed to process question: ${error}`);
      res.status(500).json({
        error: 'Failed to process question',
        message: errorMessage(error),
      });
    }
  });

  /**
   * GET /api/scripture-qa/search
   * Retrieve context for a query without asking the LLM
   */
  router.get('/search', async (req: Request, res: Response) => {
    try {
      const parsed = SearchQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid request', message: describeIssues(parsed.error) });
        return;
      }

      const { q, limit } = parsed.data;
      const documents = await ragService.retrieveContext(q, limit);

      res.json({ query: q, documents });
    } catch (error) {
      logger.error(`Search failed: ${error}`);
      res.status(500).json({
        error: 'Search failed',
        message: errorMessage(error),
      });
    }
  });

  /**
   * POST /api/scripture-qa/index
   * Trigger indexing of the corpus
   */
  router.post('/index', (_req: Request, res: Response) => {
    logger.info('Triggering document indexing');

    // Run indexing in background
    ragService.indexAllDocuments().catch(error => {
      logger.error(`Background indexing failed: ${error}`);
    });

    res.status(202).json({
      message: 'Indexing started',
      status: 'in-progress',
    });
  });

  /**
   * GET /api/scripture-qa/index/status
   * Get indexing status
   */
  router.get('/index/status', async (_req: Request, res: Response) => {
    try {
      res.json(await ragService.getIndexingStatus());
    } catch (error) {
      logger.error(`Failed to get indexing status: ${error}`);
      res.status(500).json({
        error: 'Failed to get status',
        message: errorMessage(error),
      });
    }
  });

  /**
   * GET /api/scripture-qa/health
   * Health check endpoint
   */
  router.get('/health', async (_req: Request, res: Response) => {
    try {
      const llmHealthy = await llmService.healthCheck();
      const { llm, rag } = configService.getConfig();

      res.json({
        status: llmHealthy ? 'healthy' : 'degraded',
        llm: llmHealthy,
        documentCount: await evidenceStore.count(),
        config: {
          provider: llm.provider,
          defaultModel: llm.defaultModel,
          strategy: rag.strategy,
          maxIterations: rag.maxIterations,
        },
      });
    } catch (error) {
      logger.error(`Health check failed: ${error}`);
      res.status(500).json({
        status: 'unhealthy',
        error: errorMessage(error),
      });
    }
  });

  /**
   * GET /api/scripture-qa/stats
   * Usage counters
   */
  router.get('/stats', async (_req: Request, res: Response) => {
    res.json({
      totalUsers: await userTracker.getUserCount(),
      activeToday: await userTracker.getActiveUsersToday(),
    });
  });

  /**
   * GET /api/scripture-qa/info/:topic
   * Informational texts
   */
  router.get('/info/:topic', (req: Request, res: Response) => {
    const { topic } = req.params;
    if (!isInfoTopic(topic)) {
      res.status(404).json({
        error: `Unknown topic: ${topic}`,
        message: `Available topics: ${INFO_TOPICS.join(', ')}`,
      });
      return;
    }

    res.json({ topic, text: getInfoText(topic) });
  });

  return router;
}
