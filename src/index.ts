/**
 * Knowledge Retrieval API - Main Entry Point
 *
 * Express server exposing dataset retrieval over HTTP.
 * Features:
 * - Firebase Authentication for caller identity (tenant + role claims)
 * - Tenant-scoped dataset permission checks
 * - Zod request validation
 * - Standardized error responses
 */

import express, { Express, RequestHandler } from "express";
import cors from "cors";
import helmet from "helmet";
import compression from "compression";

import { PORT, PROJECT_ID, SECRET_KEY, SEGMENT_HIT_COUNT_ENABLED, USER_AUTH_ENABLED, VECTOR_STORE } from "./config";
import { createContentSigner } from "./contentSigning";
import { closePool, getPool } from "./db";
import { GenAIEmbeddingProvider } from "./embeddings";
import { asyncHandler, errorHandler } from "./errors";
import { isGenAIAvailable } from "./genaiClient";
import { PgKnowledgeStore } from "./knowledgeStore";
import { getPrincipal, getValidatedParams, parseOrThrow, userAuthMiddleware, validateParams } from "./middleware";
import { retrieve, RetrievalDeps } from "./retrieval";
import { DatasetIdParamSchema, RetrievalRequestSchema } from "./schemas";
import { generateRequestId, logError, logInfo, withRequestContext } from "./utils";
import { VectorStoreFactory } from "./vectorStores/factory";

export interface AppOptions {
  /** Replaces Firebase token verification (tests, local tooling) */
  authMiddleware?: RequestHandler;
}

/**
 * Build the Express application around explicit retrieval dependencies
 */
export function createApp(deps: RetrievalDeps, options: AppOptions = {}): Express {
  const app = express();
  const auth = options.authMiddleware ?? userAuthMiddleware;

  // Trust proxy for Cloud Run
  app.set('trust proxy', true);

  // ============================================
  // Global Middleware
  // ============================================

  // Security headers
  app.use(helmet({
    contentSecurityPolicy: false, // Disable CSP for API
    crossOriginEmbedderPolicy: false,
  }));

  // CORS configuration
  const allowedOrigins = process.env.ALLOWED_ORIGINS?.split(',') || ['*'];
  app.use(cors({
    origin: allowedOrigins.includes('*') ? '*' : allowedOrigins,
    credentials: true,
    maxAge: 86400, // 24 hours
  }));

  app.use(compression());
  app.use(express.json({ limit: "1mb" }));

  // Request context middleware (for request ID correlation)
  app.use((req, res, next) => {
    const headerId = req.headers['x-request-id'];
    const requestId = typeof headerId === 'string' && headerId ? headerId : generateRequestId();
    res.set('X-Request-Id', requestId);

    withRequestContext(
      { requestId, startTime: Date.now(), path: req.path },
      () => next()
    );
  });

  // ============================================
  // Health (no auth required)
  // ============================================

  /**
   * GET /health - Basic liveness check
   */
  app.get("/health", (_req, res) => {
    res.status(200).json({
      status: "healthy",
      timestamp: new Date().toISOString(),
      service: "knowledge-retrieval-api",
      project: PROJECT_ID,
      vectorStore: VECTOR_STORE,
      embeddingsAvailable: isGenAIAvailable(),
    });
  });

  // ============================================
  // Retrieval
  // ============================================

  /**
   * POST /datasets/retrieval - Retrieve from the dataset named in the body
   */
  app.post("/datasets/retrieval",
    auth,
    asyncHandler(async (req, res) => {
      const { knowledge_id, ...body } = parseOrThrow(RetrievalRequestSchema, req.body);
      const records = await retrieve(deps, knowledge_id, body, getPrincipal(req));
      res.status(200).json({ records });
    })
  );

  /**
   * POST /datasets/:datasetId/retrieve - Hit-test a dataset
   */
  app.post("/datasets/:datasetId/retrieve",
    auth,
    validateParams(DatasetIdParamSchema),
    asyncHandler(async (req, res) => {
      const { datasetId } = getValidatedParams(req, DatasetIdParamSchema);
      const records = await retrieve(deps, datasetId, req.body, getPrincipal(req));
      res.status(200).json({ records });
    })
  );

  // ============================================
  // Global Error Handler (must be last)
  // ============================================
  app.use(errorHandler);

  return app;
}

// ============================================
// Start Server
// ============================================

function main(): void {
  const store = new PgKnowledgeStore(getPool());
  const app = createApp({
    store,
    vectorStores: new VectorStoreFactory(),
    embeddings: new GenAIEmbeddingProvider(),
    signContent: createContentSigner(SECRET_KEY),
    hitCountEnabled: SEGMENT_HIT_COUNT_ENABLED,
  });

  const server = app.listen(PORT, () => {
    logInfo("knowledge-retrieval-api started", {
      port: PORT,
      project: PROJECT_ID,
      vectorStore: VECTOR_STORE,
      userAuthEnabled: USER_AUTH_ENABLED,
    });
  });

  // ============================================
  // Graceful Shutdown
  // ============================================
  const SHUTDOWN_TIMEOUT_MS = 30000;

  function gracefulShutdown(signal: string): void {
    logInfo(`${signal} received, starting graceful shutdown`);

    server.close((err) => {
      if (err) {
        logError('Error during server close', err);
        process.exit(1);
      }
      closePool()
        .then(() => {
          logInfo('Server closed gracefully');
          process.exit(0);
        })
        .catch((poolErr: unknown) => {
          logError('Error closing database pool', poolErr);
          process.exit(1);
        });
    });

    // Force shutdown if graceful close takes too long
    setTimeout(() => {
      logError('Graceful shutdown timeout, forcing exit');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS).unref();
  }

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
}

if (require.main === module) {
  main();
}
