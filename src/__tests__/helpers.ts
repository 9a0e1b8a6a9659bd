/**
 * Shared test doubles: a manual clock, a scripted completion provider,
 * an in-memory session store and an in-process HTTP server
 */
import type { AddressInfo } from 'net';
import { fileURLToPath } from 'url';
import type { Application } from 'express';
import type {
  ColumnInfo,
  CompletionProvider,
  CompletionRequest,
  CompletionResponse,
  GameStatus,
  SessionStore,
  SessionUpdateResult,
} from '../types/index';
import { LoggerService } from '../services/logger';
import { ResponseCache } from '../services/response-cache';
import { ThrottleService } from '../services/throttle';
import { isJsonObject } from '../utils/validate-request';
import { createApp, type AppServices } from '../app';

export const PERSONAS_DIR = fileURLToPath(new URL('../../personas', import.meta.url));

/**
 * Manual clock; sleeping advances time instantly and is recorded
 */
export class FakeClock {
  time: number;
  readonly sleeps: number[] = [];

  constructor(start: number) {
    this.time = start;
  }

  now = (): number => this.time;

  sleep = (ms: number): Promise<void> => {
    this.sleeps.push(ms);
    this.time += ms;
    return Promise.resolve();
  };
}

type Reply = string | Error;

/**
 * Provider that answers from a queue (or a fixed reply) and records each call
 */
export class FakeProvider implements CompletionProvider {
  readonly name = 'Fake Provider';
  readonly model = 'fake-model';
  isConfigured = true;
  readonly calls: Array<{ request: CompletionRequest; at: number }> = [];
  private readonly replies: Reply[] = [];
  private readonly clock?: FakeClock;
  defaultReply: Reply = 'default reply';

  constructor(clock?: FakeClock) {
    this.clock = clock;
  }

  queue(...replies: Reply[]): this {
    this.replies.push(...replies);
    return this;
  }

  async generate(request: CompletionRequest): Promise<CompletionResponse> {
    this.calls.push({ request, at: this.clock ? this.clock.now() : Date.now() });
    const reply = this.replies.shift() ?? this.defaultReply;
    if (reply instanceof Error) {
      throw reply;
    }
    return { content: reply };
  }
}

/**
 * Session store kept in a Map
 */
export class InMemorySessionStore implements SessionStore {
  readonly isConfigured = true;
  readonly sessions = new Map<string, { status: GameStatus; usernames: string[] }>();
  failNext = false;

  async createSession(gameId: string, usernames: string[]): Promise<string | null> {
    if (this.takeFailure()) return null;
    this.sessions.set(gameId, { status: 'starting', usernames });
    return gameId;
  }

  async updateSession(gameId: string, usernames: string[]): Promise<SessionUpdateResult> {
    if (this.takeFailure()) {
      return { success: false, message: 'Database connection failed' };
    }
    const session = this.sessions.get(gameId);
    if (!session) {
      return {
        success: false,
        message: `Game status update failed: game_id '${gameId}' not found or no update performed.`,
      };
    }
    this.sessions.set(gameId, { status: 'active', usernames });
    return {
      success: true,
      message: `Game status updated to 'active' and usernames updated for game_id: ${gameId}`,
    };
  }

  async deleteSession(gameId: string): Promise<boolean> {
    if (this.takeFailure()) {
      throw new Error('connection reset');
    }
    return this.sessions.delete(gameId);
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async describeColumns(): Promise<ColumnInfo[]> {
    return [
      { name: 'game_id', dataType: 'text' },
      { name: 'status', dataType: 'text' },
    ];
  }

  async close(): Promise<void> {}

  private takeFailure(): boolean {
    const fail = this.failNext;
    this.failNext = false;
    return fail;
  }
}

/**
 * Logger that prints nothing below ERROR
 */
export const quietLogger = (): LoggerService => new LoggerService('ERROR');

/**
 * Starts the app on an ephemeral local port for the duration of fn
 */
export async function withServer<T>(
  app: Application,
  fn: (baseUrl: string) => Promise<T>
): Promise<T> {
  const server = app.listen(0, '127.0.0.1');
  await new Promise<void>((resolve) => server.once('listening', () => resolve()));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    server.close();
    throw new Error('Server did not bind to a TCP port');
  }
  const { port }: AddressInfo = address;

  try {
    return await fn(`http://127.0.0.1:${port}`);
  } finally {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
}

/**
 * POSTs a JSON body
 */
export function postJson(url: string, body: unknown): Promise<Response> {
  return fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

/**
 * Reads a response body that must be a JSON object
 */
export async function readJsonObject(res: Response): Promise<Record<string, unknown>> {
  const body: unknown = await res.json();
  if (!isJsonObject(body)) {
    throw new Error(`Expected a JSON object, got ${JSON.stringify(body)}`);
  }
  return body;
}

export interface TestApp {
  app: Application;
  services: AppServices;
  clock: FakeClock;
  provider: FakeProvider;
}

/**
 * Builds the full application around fakes: a manual clock drives the cache
 * and throttle, and nothing leaves the process
 */
export async function createTestApp(
  store: SessionStore = new InMemorySessionStore(),
  exposeErrorDetail?: boolean
): Promise<TestApp> {
  const clock = new FakeClock(10_000);
  const provider = new FakeProvider(clock);
  const { app, services } = await createApp({
    logger: quietLogger(),
    provider,
    store,
    cache: new ResponseCache({ ttlMs: 300_000, maxEntries: 50 }, clock.now),
    throttle: new ThrottleService(1000, clock.now, clock.sleep),
    personasDir: PERSONAS_DIR,
    exposeErrorDetail,
  });
  return { app, services, clock, provider };
}
