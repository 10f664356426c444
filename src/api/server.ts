import express, { Request, Response, Router, NextFunction, RequestHandler } from 'express';
import { Server } from 'http';
import { v4 as uuidv4 } from 'uuid';
import { ValidationEngine, createValidationEngine } from '../core';
import { isRecord } from '../core/documents';
import { ErrorCode, ValidationError, ValidationStageError, findViolations } from '../core/errors';
import { Logger, defaultLogger } from '../core/logger';
import { SchemaValidationResult } from '../types';

/**
 * HTTP status for a validation failure code
 */
export function statusFor(code: ErrorCode): number {
  switch (code) {
    case 'NOT_INITIALIZED':
    case 'INITIALIZATION':
      return 503;
    case 'SCHEMA_NOT_LOADED':
      return 404;
    case 'PAYLOAD_PARSE':
      return 400;
    default:
      return 422;
  }
}

function sendFailure(res: Response, error: ValidationError): void {
  const violations = findViolations(error);
  res.status(statusFor(error.code)).json({
    requestId: uuidv4(),
    valid: false,
    stage: error instanceof ValidationStageError ? error.stage : undefined,
    code: error.code,
    message: error.message,
    ...(violations ? { violations } : {}),
  });
}

function sendSchemaResult(res: Response, result: SchemaValidationResult): void {
  if (result.valid) {
    res.json({ requestId: uuidv4(), valid: true });
  } else {
    res.status(422).json({
      requestId: uuidv4(),
      valid: false,
      code: 'SCHEMA_VIOLATION',
      violations: result.violations,
    });
  }
}

function requireText(body: unknown, field: string): string {
  const value = isRecord(body) ? body[field] : undefined;
  if (typeof value !== 'string') {
    throw new ValidationError('EMPTY_INPUT', `${field} must be a non-empty string`);
  }
  return value;
}

/**
 * Create the admission API router
 */
export function createApiRouter(engine: ValidationEngine): Router {
  const router = Router();

  /**
   * POST /admission/{policies,workloads,automation-rules}/validate
   * Run every admission stage for a document
   */
  const documentHandler =
    (validate: (input: unknown) => Promise<unknown>): RequestHandler =>
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const document = await validate(req.body);
        res.json({ requestId: uuidv4(), valid: true, document });
      } catch (error) {
        next(error);
      }
    };
  router.post('/policies/validate', express.json(), documentHandler((input) => engine.validatePolicy(input)));
  router.post('/workloads/validate', express.json(), documentHandler((input) => engine.validateWorkload(input)));
  router.post(
    '/automation-rules/validate',
    express.json(),
    documentHandler((input) => engine.validateAutomationRule(input))
  );

  /**
   * POST /admission/expressions/validate
   * Body: { "expression": "<text>" }
   */
  const expressionHandler: RequestHandler = async (
    req: Request,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      await engine.validateExpression(requireText(req.body, 'expression'));
      res.json({ requestId: uuidv4(), valid: true });
    } catch (error) {
      next(error);
    }
  };
  router.post('/expressions/validate', express.json(), expressionHandler);

  /**
   * POST /admission/conditions/validate
   * Body: { "condition": "<text>" }; checked directly by the analyzer, outside the metrics
   */
  const conditionHandler: RequestHandler = (req: Request, res: Response, next: NextFunction): void => {
    try {
      engine.getExpressionAnalyzer().validateCondition(requireText(req.body, 'condition'));
      res.json({ requestId: uuidv4(), valid: true });
    } catch (error) {
      next(error);
    }
  };
  router.post('/conditions/validate', express.json(), conditionHandler);

  /**
   * POST /admission/schemas/:name/validate
   * Raw JSON body, or YAML when the content type says so
   */
  const schemaHandler: RequestHandler = (req: Request, res: Response, next: NextFunction): void => {
    try {
      const payload = typeof req.body === 'string' ? req.body : '';
      const store = engine.getSchemaStore();
      const isYaml = (req.get('content-type') ?? '').includes('yaml');
      const result = isYaml ? store.validateYAML(req.params.name, payload) : store.validate(req.params.name, payload);
      sendSchemaResult(res, result);
    } catch (error) {
      next(error);
    }
  };
  router.post('/schemas/:name/validate', express.text({ type: () => true }), schemaHandler);

  /**
   * GET /admission/schemas
   */
  const schemasHandler: RequestHandler = (_req: Request, res: Response, next: NextFunction): void => {
    try {
      const schemas = engine.getSchemaStore().listSchemas();
      res.json({ schemas, count: schemas.length });
    } catch (error) {
      next(error);
    }
  };
  router.get('/schemas', schemasHandler);

  /**
   * GET /admission/metrics
   */
  const metricsHandler: RequestHandler = async (
    _req: Request,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      res.json(await engine.metrics());
    } catch (error) {
      next(error);
    }
  };
  router.get('/metrics', metricsHandler);

  /**
   * POST /admission/metrics/reset
   */
  const resetHandler: RequestHandler = (_req: Request, res: Response): void => {
    engine.resetMetrics();
    res.json({ success: true, message: 'Metrics reset' });
  };
  router.post('/metrics/reset', resetHandler);

  return router;
}

/**
 * Create a full Express application around an initialized engine
 */
export function createApp(engine: ValidationEngine, logger: Logger = defaultLogger): express.Application {
  const app = express();

  app.use('/admission', createApiRouter(engine));

  // Health check endpoint
  const healthHandler: RequestHandler = async (_req: Request, res: Response): Promise<void> => {
    try {
      await engine.health();
      res.json({ status: 'ok', state: engine.getState() });
    } catch (error) {
      res.status(503).json({
        status: 'unavailable',
        state: engine.getState(),
        message: error instanceof Error ? error.message : String(error),
      });
    }
  };
  app.get('/health', healthHandler);

  // Error handling middleware
  const errorHandler = (err: Error, _req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof ValidationError) {
      sendFailure(res, err);
      return;
    }
    if (err instanceof SyntaxError && 'body' in err) {
      res.status(400).json({ error: 'Invalid request', message: 'Request body must be valid JSON' });
      return;
    }

    logger.error('Unhandled request error', { error: err.message });
    // In production, don't expose internal error details
    const isDevelopment = process.env.NODE_ENV !== 'production';
    res.status(500).json({
      error: 'Internal server error',
      message: isDevelopment ? err.message : 'An unexpected error occurred',
    });
  };
  app.use(errorHandler);

  return app;
}

/**
 * Initialize an engine (unless one is given) and start serving
 */
export async function startServer(
  port: number = 8080,
  engine?: ValidationEngine,
  logger: Logger = defaultLogger
): Promise<Server> {
  const instance = engine ?? createValidationEngine(undefined, logger);
  if (instance.getState() !== 'operating') {
    await instance.initialize();
  }

  return new Promise((resolve) => {
    const server = createApp(instance, logger).listen(port, () => {
      logger.info('Server running', { url: `http://localhost:${port}` });
      resolve(server);
    });
  });
}
