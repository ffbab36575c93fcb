import { Agent, Dispatcher, Pool, ProxyAgent } from 'undici';
import { errorMessage } from './errors.js';
import { CleanupStatus, TimeoutPolicy } from './types.js';

export interface ConnectionOptions {
  timeouts: TimeoutPolicy;
  proxy?: string;
  insecureTls?: boolean;
}

export interface ReleaseResult {
  status: Exclude<CleanupStatus, 'not-opened'>;
  error?: string;
}

/** A transport owned by exactly one request. */
export interface Connection {
  readonly dispatcher: Dispatcher;
  /** Closes the transport. Graceful after a completed exchange, forced otherwise. Never throws. */
  release(graceful: boolean): Promise<ReleaseResult>;
}

export interface ConnectionPolicy {
  /** Request headers that tell the peer not to keep the connection. */
  readonly headers: Readonly<Record<string, string>>;
  open(options: ConnectionOptions): Connection;
}

class OwnedConnection implements Connection {
  private released: Promise<ReleaseResult> | undefined;

  constructor(readonly dispatcher: Dispatcher) {}

  release(graceful: boolean): Promise<ReleaseResult> {
    // Idempotent: a second release reports the first outcome.
    this.released ??= this.close(graceful);
    return this.released;
  }

  private async close(graceful: boolean): Promise<ReleaseResult> {
    try {
      if (graceful) {
        await this.dispatcher.close();
      } else {
        await this.dispatcher.destroy();
      }
      return { status: 'released' };
    } catch (error) {
      return { status: 'failed', error: errorMessage(error) };
    }
  }
}

/**
 * One fresh transport per request, keep-alive disabled. Pooled connections
 * would let only the first request pay for DNS, TCP and TLS setup.
 */
export class FreshConnectionPolicy implements ConnectionPolicy {
  readonly headers = { connection: 'close' } as const;

  open(options: ConnectionOptions): Connection {
    const { connectMs, readMs } = options.timeouts;
    const tls = { timeout: connectMs, rejectUnauthorized: !options.insecureTls };
    const agentOptions = {
      pipelining: 0,
      connections: 1,
      headersTimeout: readMs,
      bodyTimeout: readMs,
    };

    const dispatcher = options.proxy
      ? new ProxyAgent({
          ...agentOptions,
          uri: options.proxy,
          proxyTls: { timeout: connectMs },
          requestTls: tls,
          // The CONNECT exchange with the proxy runs on its own pool and
          // needs the same deadlines as the tunnelled request.
          clientFactory: (origin, proxyOptions) => new Pool(origin, { ...proxyOptions, ...agentOptions }),
        })
      : new Agent({ ...agentOptions, connect: tls });

    return new OwnedConnection(dispatcher);
  }
}
