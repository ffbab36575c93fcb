import { request } from 'undici';
import { Clock, monotonicClock } from './clock.js';
import { classifyResponse, describeReason } from './classifier.js';
import { ConnectionPolicy, FreshConnectionPolicy } from './connection.js';
import { errorCode, errorMessage, truncateError } from './errors.js';
import { Logger, silentLogger } from './logger.js';
import {
  CleanupStatus,
  ParsedBody,
  RawResponse,
  RequestOutcome,
  TargetDescriptor,
  TimeoutPolicy,
  TransportFailure,
  TransportKind,
  WorkItem,
} from './types.js';

export type BodyDecoder = (body: Uint8Array) => unknown | Promise<unknown>;

export interface ExecutorOptions {
  timeouts: TimeoutPolicy;
  insecureTls?: boolean;
  policy?: ConnectionPolicy;
  clock?: Clock;
  decode?: BodyDecoder;
  logger?: Logger;
}

export interface ExecuteContext {
  dispatchedAt: number;
}

export type RequestExecutor = (item: WorkItem, context: ExecuteContext) => Promise<RequestOutcome>;

const utf8 = new TextDecoder('utf-8');

export const decodeJson: BodyDecoder = (body) => JSON.parse(utf8.decode(body));

const TRANSPORT_CODES: Record<string, TransportKind> = {
  UND_ERR_CONNECT_TIMEOUT: 'connect-timeout',
  UND_ERR_HEADERS_TIMEOUT: 'read-timeout',
  UND_ERR_BODY_TIMEOUT: 'read-timeout',
  ETIMEDOUT: 'connect-timeout',
  ECONNREFUSED: 'connection-refused',
  ECONNRESET: 'connection-reset',
  EPIPE: 'connection-reset',
  UND_ERR_SOCKET: 'connection-reset',
  ENOTFOUND: 'dns',
  EAI_AGAIN: 'dns',
  UND_ERR_ABORTED: 'aborted',
  ABORT_ERR: 'aborted',
};

export function toTransportFailure(error: unknown): TransportFailure {
  const message = truncateError(errorMessage(error));
  const cause = error instanceof Error ? error.cause : undefined;
  const code = errorCode(error) ?? errorCode(cause);

  if (message.startsWith('Proxy response')) {
    return { kind: 'proxy', message };
  }
  if (code && code in TRANSPORT_CODES) {
    return { kind: TRANSPORT_CODES[code], message };
  }
  if (code && (code.startsWith('ERR_TLS') || code.startsWith('ERR_SSL') || code.includes('CERT'))) {
    return { kind: 'tls', message };
  }
  if (error instanceof Error && error.name === 'TimeoutError') {
    return { kind: 'read-timeout', message };
  }
  if (error instanceof Error && error.name === 'AbortError') {
    return { kind: 'aborted', message };
  }
  return { kind: 'other', message: code ? `${code}: ${message}` : message };
}

function pickFields(value: unknown, fields: readonly string[]): Record<string, string> | undefined {
  if (fields.length === 0 || typeof value !== 'object' || value === null || Array.isArray(value)) {
    return undefined;
  }
  const captured: Record<string, string> = {};
  for (const field of fields) {
    const raw: unknown = Reflect.get(value, field);
    if (raw !== undefined && raw !== null) {
      captured[field] = typeof raw === 'string' ? raw : JSON.stringify(raw);
    }
  }
  return captured;
}

type Exchange =
  | { kind: 'response'; status: number; body: Uint8Array; endedAt: number }
  | { kind: 'transport'; failure: TransportFailure; endedAt: number };

/**
 * Builds the executor for a set of targets. Each call performs exactly one
 * round trip on a transport opened for it alone, and times only that round
 * trip: decoding, classification and capture happen after the end timestamp.
 */
export function createExecutor(targets: readonly TargetDescriptor[], options: ExecutorOptions): RequestExecutor {
  const byId = new Map(targets.map(target => [target.id, target]));
  const policy = options.policy ?? new FreshConnectionPolicy();
  const clock = options.clock ?? monotonicClock;
  const decode = options.decode ?? decodeJson;
  const logger = options.logger ?? silentLogger;

  return async (item, context) => {
    const target = byId.get(item.targetId);
    if (!target) {
      throw new Error(`Unknown target: ${item.targetId}`);
    }

    const timeouts: TimeoutPolicy = {
      connectMs: target.timeouts?.connectMs ?? options.timeouts.connectMs,
      readMs: target.timeouts?.readMs ?? options.timeouts.readMs,
    };
    const timestamp = new Date().toISOString();
    const connection = policy.open({
      timeouts,
      proxy: item.request.proxy,
      insecureTls: options.insecureTls,
    });

    let exchange: Exchange;
    let received = false;
    let cleanup: CleanupStatus;
    let cleanupError: string | undefined;
    const startedAt = clock.now();

    try {
      const response = await request(item.request.url, {
        dispatcher: connection.dispatcher,
        method: item.request.method ?? 'GET',
        headers: { ...item.request.headers, ...policy.headers },
        body: item.request.body,
        headersTimeout: timeouts.readMs,
        bodyTimeout: timeouts.readMs,
        // Backstop for phases undici does not time on its own.
        signal: AbortSignal.timeout(timeouts.connectMs + timeouts.readMs),
      });
      const body = new Uint8Array(await response.body.arrayBuffer());
      exchange = { kind: 'response', status: response.statusCode, body, endedAt: clock.now() };
      received = true;
    } catch (error) {
      exchange = { kind: 'transport', failure: toTransportFailure(error), endedAt: clock.now() };
    } finally {
      // Runs on every path, cancellation included, before anything else happens.
      const released = await connection.release(received);
      cleanup = released.status;
      cleanupError = released.error;
    }

    if (cleanup === 'failed') {
      logger.warn(`[executor] ${item.targetId}#${item.index}: connection cleanup failed: ${cleanupError}`);
    }

    const raw: RawResponse = {};
    let sizeBytes: number | undefined;
    let parsed: unknown;

    if (exchange.kind === 'transport') {
      raw.transportError = exchange.failure;
    } else {
      raw.status = exchange.status;
      sizeBytes = exchange.body.byteLength;
      if (exchange.status === 200) {
        raw.body = await decodeBody(decode, exchange.body);
        parsed = raw.body.ok ? raw.body.value : undefined;
      }
    }

    const classification = classifyResponse(raw, target.rules);
    const captured = pickFields(parsed, target.captureFields ?? []);

    return {
      targetId: item.targetId,
      group: item.group,
      index: item.index,
      token: item.token,
      label: item.request.label,
      timestamp,
      dispatchedAt: context.dispatchedAt,
      startedAt,
      endedAt: exchange.endedAt,
      elapsedMs: exchange.endedAt - startedAt,
      status: raw.status,
      sizeBytes,
      classification,
      error: classification.ok ? undefined : truncateError(describeReason(classification.reason)),
      captured,
      cleanup,
      cleanupError,
    };
  };
}

async function decodeBody(decode: BodyDecoder, body: Uint8Array): Promise<ParsedBody> {
  try {
    return { ok: true, value: await decode(body) };
  } catch (error) {
    return { ok: false, error: truncateError(errorMessage(error)) };
  }
}
