import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import { createServer, type Server } from 'http';
import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import type { IngestEvent, IngestionPipeline } from '../pipeline/ingest.js';
import type { QueryPipeline, QueryResponse } from '../pipeline/query.js';

export interface ServerConfig {
  port: number;
  queryPipeline: QueryPipeline;
  ingestionPipeline: IngestionPipeline;
  /** Reported by the health endpoint when provided */
  vectorCount?: () => Promise<number>;
}

const ingestRecordSchema = z.object({
  bucket: z.string().min(1),
  key: z.string().min(1),
});

// Either a single object or a batch of them
const ingestBodySchema = z.union([
  z.object({ records: z.array(ingestRecordSchema).min(1) }),
  ingestRecordSchema.transform((record) => ({ records: [record] })),
]);

export function parseIngestBody(body: unknown): IngestEvent | null {
  const parsed = ingestBodySchema.safeParse(body ?? {});
  return parsed.success ? parsed.data : null;
}

function isBodyParseError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'type' in error &&
    error.type === 'entity.parse.failed'
  );
}

export class RagServer {
  private app: Express;
  private server: Server;
  private port: number;
  private queryPipeline: QueryPipeline;
  private ingestionPipeline: IngestionPipeline;
  private vectorCount?: () => Promise<number>;

  constructor(config: ServerConfig) {
    this.port = config.port;
    this.queryPipeline = config.queryPipeline;
    this.ingestionPipeline = config.ingestionPipeline;
    this.vectorCount = config.vectorCount;

    // Create Express app
    this.app = express();

    // Enable CORS for all origins; preflight for the query route is answered by the pipeline
    this.app.use(cors({
      origin: '*',
      methods: ['OPTIONS', 'POST', 'GET'],
      allowedHeaders: ['Content-Type', 'Authorization'],
      preflightContinue: true,
    }));
    this.app.use(express.json({ limit: '1mb' }));

    // Create HTTP server
    this.server = createServer(this.app);

    // Setup routes
    this.setupRoutes();
  }

  private setupRoutes(): void {
    // Health check
    this.app.get('/health', async (_req: Request, res: Response) => {
      try {
        const vectorCount = this.vectorCount ? await this.vectorCount() : undefined;
        res.json({ status: 'ok', vectorCount, timestamp: new Date().toISOString() });
      } catch (error) {
        console.error('[Server] Health check failed:', error);
        res.status(503).json({ status: 'error', timestamp: new Date().toISOString() });
      }
    });

    /**
     * OPTIONS|POST /api/query
     * Answer a question from the ingested documents.
     */
    const handleQuery = async (req: Request, res: Response) => {
      const requestId = uuid();
      const response = await this.queryPipeline.handle(
        { method: req.method, body: req.body },
        `[Query ${requestId}]`
      );
      this.send(res, response);
    };
    this.app.options('/api/query', handleQuery);
    this.app.post('/api/query', handleQuery);

    this.app.options('/api/ingest', (_req: Request, res: Response) => {
      res.sendStatus(204);
    });

    /**
     * POST /api/ingest
     * Ingest one object ({ bucket, key }) or several ({ records: [...] }).
     * Waits for completion and returns the per-file chunk counts.
     */
    this.app.post('/api/ingest', async (req: Request, res: Response) => {
      const event = parseIngestBody(req.body);
      if (!event) {
        res.status(400).json({ error: 'bucket and key are required' });
        return;
      }

      const requestId = uuid();
      try {
        console.log(`[Ingest ${requestId}] Received ${event.records.length} object(s)`);
        const response = await this.ingestionPipeline.handleEvent(event);
        res.status(response.statusCode).json(response.body);
      } catch (error) {
        console.error(`[Ingest ${requestId}] Ingestion failed:`, error);
        res.status(500).json({ error: 'Ingestion failed' });
      }
    });

    // Malformed JSON bodies
    this.app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
      if (isBodyParseError(error)) {
        res.status(400).json({ error: 'Invalid JSON body' });
        return;
      }
      console.error('[Server] Unhandled error:', error);
      if (res.headersSent) {
        next(error);
        return;
      }
      res.status(500).json({ error: 'Internal server error' });
    });
  }

  private send(res: Response, response: QueryResponse): void {
    res.status(response.statusCode).set(response.headers).json(response.body);
  }

  async start(): Promise<void> {
    // Start listening
    return new Promise((resolve) => {
      this.server.listen(this.port, '0.0.0.0', () => {
        console.log(`[Server] HTTP server listening on http://0.0.0.0:${this.getPort()}`);
        resolve();
      });
    });
  }

  /**
   * Actual bound port (differs from the configured one when that is 0).
   */
  getPort(): number {
    const address = this.server.address();
    return address !== null && typeof address === 'object' ? address.port : this.port;
  }

  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.close((err) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }
}
