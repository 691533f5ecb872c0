import { Router, type Request, type Response } from 'express';
import type { LLMUsecase } from '../../services/llm-usecase.js';
import {
  CompletionRequestSchema,
  EmbeddingRequestSchema,
  LLMRequestSchema,
  type StreamChunk,
} from '../../types/index.js';
import { GatewayError, isGatewayError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import {
  asyncRoute,
  deadlineFailure,
  parseBody,
  sendSuccess,
  type RouteOptions,
} from './route-utils.js';

const log = createLogger('LLMRoutes');

/**
 * Create LLM routes (mounted under `/llama`)
 */
export function createLLMRoutes(llm: LLMUsecase, options: RouteOptions = {}): Router {
  const router = Router();

  router.post(
    '/chat',
    asyncRoute(async (req: Request, res: Response, signal: AbortSignal): Promise<void> => {
      const request = parseBody(LLMRequestSchema, req.body);
      sendSuccess(res, await llm.chat(request, signal));
    }, options)
  );

  /**
   * Server-Sent Events: one `data:` event per chunk, then `data: [DONE]`.
   * The first chunk is awaited before the headers go out, so validation and
   * connection failures still produce a JSON error response.
   */
  router.post(
    '/chat/stream',
    asyncRoute(async (req: Request, res: Response, signal: AbortSignal): Promise<void> => {
      const request = parseBody(LLMRequestSchema, req.body);
      const stream = llm.streamChat(request, signal);
      const first = await stream.next();
      if (res.headersSent) {
        await stream.return();
        return;
      }

      res.status(200);
      res.setHeader('Content-Type', 'text/event-stream');
      res.setHeader('Cache-Control', 'no-cache');
      res.setHeader('Connection', 'keep-alive');
      res.flushHeaders();

      const writeChunk = (chunk: StreamChunk): void => {
        res.write(`data: ${JSON.stringify(chunk)}\n\n`);
      };

      try {
        if (!first.done) {
          writeChunk(first.value);
          for await (const chunk of stream) {
            writeChunk(chunk);
          }
        }
        res.write('data: [DONE]\n\n');
      } catch (error) {
        const deadline = deadlineFailure(signal);
        if (signal.aborted && !deadline) {
          log.debug('client disconnected during stream');
        } else {
          const failure = deadline ?? (isGatewayError(error) ? error : GatewayError.wrap(error, 'stream failed'));
          log.warn('chat stream failed', { code: failure.code, error: failure.message });
          res.write(`event: error\ndata: ${JSON.stringify({ code: failure.code, error: failure.message })}\n\n`);
        }
      } finally {
        res.end();
      }
    }, options)
  );

  router.post(
    '/completion',
    asyncRoute(async (req: Request, res: Response, signal: AbortSignal): Promise<void> => {
      const request = parseBody(CompletionRequestSchema, req.body);
      sendSuccess(res, await llm.completion(request, signal));
    }, options)
  );

  router.post(
    '/embedding',
    asyncRoute(async (req: Request, res: Response, signal: AbortSignal): Promise<void> => {
      const request = parseBody(EmbeddingRequestSchema, req.body);
      sendSuccess(res, await llm.embedding(request, signal));
    }, options)
  );

  router.get(
    '/models',
    asyncRoute(async (_req: Request, res: Response, signal: AbortSignal): Promise<void> => {
      const models = await llm.listModels(signal);
      sendSuccess(res, { object: 'list', data: models });
    }, options)
  );

  return router;
}
