import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';
import { Request } from 'express';

export interface RequestContextData {
  requestId: string;
  /** Who is acting; recorded as `changedBy` on student audit rows. */
  actor?: string;
  ip?: string;
  userAgent?: string;
}

/** The parts of an incoming request the context is built from. */
export type IncomingRequest = Pick<Request, 'headers' | 'ip'>;

const storage = new AsyncLocalStorage<RequestContextData>();

const ACTOR_MAX_LENGTH = 100;

function headerValue(req: IncomingRequest, name: string): string | undefined {
  const value = req.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

export class RequestContext {
  static run<T>(data: RequestContextData, callback: () => T): T {
    return storage.run(data, callback);
  }

  static get(): RequestContextData | undefined {
    return storage.getStore();
  }

  static actor(): string | null {
    return storage.getStore()?.actor ?? null;
  }

  static bindRequest(req: IncomingRequest): RequestContextData {
    const requestId = headerValue(req, 'x-request-id') || randomUUID();
    const actor = headerValue(req, 'x-actor')?.trim().slice(0, ACTOR_MAX_LENGTH);
    const forwarded = headerValue(req, 'x-forwarded-for') ?? '';
    return {
      requestId,
      actor: actor || undefined,
      ip: (req.ip || forwarded).split(',')[0].trim(),
      userAgent: headerValue(req, 'user-agent'),
    };
  }
}
