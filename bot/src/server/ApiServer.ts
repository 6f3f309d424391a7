import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import http from 'http';
import { ModerationCommands } from '../core/ModerationCommands';
import { ILogger } from '../core/interfaces/ILogger';
import { IModerationStore } from '../core/interfaces/IModerationStore';
import { BatchSweepProcessor } from '../moderation/sweep/BatchSweepProcessor';
import { ModerationError } from '../utils/errors';

export interface ApiReply {
  status: number;
  body: unknown;
}

export interface ApiServerOptions {
  port: number;
  /** When set, every /api/chats route requires `Authorization: Bearer <token>`. */
  apiToken?: string | undefined;
  /** Recorded as the issuer of commands sent through the API. */
  operatorId?: string;
}

const ERROR_STATUS: Record<string, number> = {
  INVALID_MODE_VALUE: 400,
  INVALID_ARGUMENT: 400,
  CONFIG_INVALID: 400,
  PERMISSION_DENIED: 403,
  PROTECTED_USER: 403,
  TRANSPORT_FAILURE: 502,
  PERSISTENCE_UNAVAILABLE: 503,
  CLASSIFICATION_UNAVAILABLE: 503
};

const MAX_ACTIONS_LIMIT = 200;

/**
 * Operator HTTP surface over the command layer. Route logic lives in plain methods
 * returning an {@link ApiReply}; express only adapts requests to them.
 */
export class ApiServer {
  private app = express();
  private server: http.Server | null = null;
  private commands: ModerationCommands;
  private store: IModerationStore;
  private sweep: BatchSweepProcessor | null;
  private logger: ILogger;
  private options: Required<Pick<ApiServerOptions, 'port' | 'operatorId'>> & { apiToken: string | undefined };
  private startedAt = Date.now();

  constructor(
    commands: ModerationCommands,
    store: IModerationStore,
    sweep: BatchSweepProcessor | null,
    logger: ILogger,
    options: ApiServerOptions
  ) {
    this.commands = commands;
    this.store = store;
    this.sweep = sweep;
    this.logger = logger;
    this.options = {
      port: options.port,
      apiToken: options.apiToken,
      operatorId: options.operatorId ?? 'api'
    };
    this.configure();
  }

  private configure(): void {
    this.app.use(cors());
    this.app.use(express.json());

    this.app.get('/api/health', (_req, res) => {
      this.send(res, this.health());
    });

    this.app.use('/api/chats', (req: Request, res: Response, next: NextFunction) => {
      if (!this.isAuthorized(req.get('authorization'))) {
        this.send(res, { status: 401, body: { message: 'Missing or invalid API token' } });
        return;
      }
      next();
    });

    this.app.get('/api/chats/:chatId/stats', async (req, res) => {
      await this.handle(res, () => this.getStats(req.params['chatId'] ?? ''));
    });

    this.app.get('/api/chats/:chatId/mode', async (req, res) => {
      await this.handle(res, () => this.getMode(req.params['chatId'] ?? ''));
    });

    this.app.put('/api/chats/:chatId/mode', async (req, res) => {
      await this.handle(res, () => this.setMode(req.params['chatId'] ?? '', req.body));
    });

    this.app.delete('/api/chats/:chatId/users/:userId/violations', async (req, res) => {
      await this.handle(res, () => this.resetUser(req.params['chatId'] ?? '', req.params['userId'] ?? ''));
    });

    this.app.post('/api/chats/:chatId/users/:userId/ban', async (req, res) => {
      await this.handle(res, () => this.banUser(req.params['chatId'] ?? '', req.params['userId'] ?? '', req.body));
    });

    this.app.delete('/api/chats/:chatId/users/:userId/ban', async (req, res) => {
      await this.handle(res, () => this.unbanUser(req.params['chatId'] ?? '', req.params['userId'] ?? ''));
    });

    this.app.get('/api/chats/:chatId/actions', async (req, res) => {
      await this.handle(res, () => this.getRecentActions(req.params['chatId'] ?? '', req.query['limit']));
    });
  }

  getApp(): express.Express {
    return this.app;
  }

  isAuthorized(header: string | undefined): boolean {
    if (!this.options.apiToken) {
      return true;
    }
    return header === `Bearer ${this.options.apiToken}`;
  }

  health(): ApiReply {
    return {
      status: 200,
      body: {
        status: 'ok',
        uptimeMs: Date.now() - this.startedAt,
        sweep: this.sweep
          ? { state: this.sweep.getState(), lastReport: this.sweep.getLastReport() }
          : null
      }
    };
  }

  async getStats(chatId: string): Promise<ApiReply> {
    return { status: 200, body: await this.commands.getStats(chatId) };
  }

  async getMode(chatId: string): Promise<ApiReply> {
    return { status: 200, body: { chatId, mode: await this.commands.getSecurityMode(chatId) } };
  }

  async setMode(chatId: string, body: unknown): Promise<ApiReply> {
    const mode = readStringField(body, 'mode');
    if (mode === null) {
      return { status: 400, body: { message: 'Request body must contain a "mode" string' } };
    }
    const updated = await this.commands.setSecurityMode(chatId, mode, this.operator());
    return { status: 200, body: { chatId, mode: updated } };
  }

  async resetUser(chatId: string, userId: string): Promise<ApiReply> {
    const record = await this.commands.resetUser(chatId, userId, this.operator());
    return { status: 200, body: record };
  }

  async banUser(chatId: string, userId: string, body: unknown): Promise<ApiReply> {
    const rawDuration = readField(body, 'durationMs');
    const rawReason = readField(body, 'reason');
    if (rawDuration !== undefined && typeof rawDuration !== 'number') {
      return { status: 400, body: { message: '"durationMs" must be a number' } };
    }
    if (rawReason !== undefined && typeof rawReason !== 'string') {
      return { status: 400, body: { message: '"reason" must be a string' } };
    }
    const durationMs = typeof rawDuration === 'number' ? rawDuration : undefined;
    const reason = typeof rawReason === 'string' ? rawReason : undefined;

    const result = await this.commands.banUser(chatId, userId, this.operator(), { durationMs, reason });
    return { status: 200, body: result };
  }

  async unbanUser(chatId: string, userId: string): Promise<ApiReply> {
    return { status: 200, body: await this.commands.unbanUser(chatId, userId, this.operator()) };
  }

  async getRecentActions(chatId: string, limitParam: unknown): Promise<ApiReply> {
    const parsed = typeof limitParam === 'string' ? Number.parseInt(limitParam, 10) : 50;
    const limit = Number.isNaN(parsed) ? 50 : Math.min(Math.max(parsed, 1), MAX_ACTIONS_LIMIT);
    return { status: 200, body: await this.store.getRecentActions(chatId, limit) };
  }

  /**
   * Map a thrown error to a reply: domain errors by code, everything else as 500.
   */
  toErrorReply(error: unknown): ApiReply {
    const message = error instanceof Error ? error.message : String(error);
    if (error instanceof ModerationError) {
      return { status: ERROR_STATUS[error.code] ?? 500, body: { message, code: error.code } };
    }
    return { status: 500, body: { message } };
  }

  private operator(): { userId: string; trusted: true } {
    return { userId: this.options.operatorId, trusted: true };
  }

  private async handle(res: Response, fn: () => Promise<ApiReply>): Promise<void> {
    try {
      this.send(res, await fn());
    } catch (error) {
      const reply = this.toErrorReply(error);
      if (reply.status >= 500) {
        this.logger.error('API error', { error: error instanceof Error ? error.message : String(error) });
      }
      this.send(res, reply);
    }
  }

  private send(res: Response, reply: ApiReply): void {
    res.status(reply.status).json(reply.body);
  }

  async start(): Promise<void> {
    if (this.server) {
      return;
    }

    await new Promise<void>((resolve) => {
      this.server = this.app.listen(this.options.port, () => {
        this.logger.info(`API server listening on http://localhost:${this.options.port}`);
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
    this.server = null;
  }
}

function readField(body: unknown, field: string): unknown {
  if (typeof body !== 'object' || body === null || !(field in body)) {
    return undefined;
  }
  return Reflect.get(body, field);
}

function readStringField(body: unknown, field: string): string | null {
  const value = readField(body, field);
  return typeof value === 'string' ? value : null;
}
