import { Router, type Request, type Response } from 'express';
import { DEFAULT_LANGUAGE, type EncyclopediaUsecase } from '../../services/encyclopedia-usecase.js';
import { ArticleRequestSchema, PromptRequestSchema, SearchRequestSchema } from '../../types/index.js';
import { asyncRoute, parseBody, sendSuccess, type RouteOptions } from './route-utils.js';

/**
 * Create encyclopedia routes (mounted under `/encyclopedia`)
 */
export function createEncyclopediaRoutes(encyclopedia: EncyclopediaUsecase, options: RouteOptions = {}): Router {
  const router = Router();

  router.get('/health', (_req: Request, res: Response): void => {
    sendSuccess(res, {
      status: 'healthy',
      service: 'encyclopedia',
      sources: encyclopedia.listSources().map((source) => source.name),
    });
  });

  router.get('/sources', (_req: Request, res: Response): void => {
    sendSuccess(res, { sources: encyclopedia.listSources() });
  });

  router.get('/languages', (_req: Request, res: Response): void => {
    sendSuccess(res, { languages: encyclopedia.listLanguages(), default: DEFAULT_LANGUAGE });
  });

  router.post(
    '/search',
    asyncRoute(async (req: Request, res: Response, signal: AbortSignal): Promise<void> => {
      const request = parseBody(SearchRequestSchema, req.body);
      sendSuccess(res, await encyclopedia.searchEncyclopedia(request, signal));
    }, options)
  );

  router.post(
    '/article',
    asyncRoute(async (req: Request, res: Response, signal: AbortSignal): Promise<void> => {
      const request = parseBody(ArticleRequestSchema, req.body);
      sendSuccess(res, await encyclopedia.getArticle(request, signal));
    }, options)
  );

  router.post(
    '/prompt',
    asyncRoute(async (req: Request, res: Response, signal: AbortSignal): Promise<void> => {
      const request = parseBody(PromptRequestSchema, req.body);
      sendSuccess(res, await encyclopedia.generatePrompt(request, signal));
    }, options)
  );

  return router;
}
