/**
 * Bedrock InvokeModel execution with bounded retries and connection refresh.
 *
 * Each executor owns one Bedrock client and the ConnectionState used to
 * rebuild it after throttling / service-unavailable failures. Nothing here is
 * module-global, so independent executors never share counters.
 */

import {
  BedrockRuntimeClient,
  InvokeModelCommand,
  type InvokeModelCommandInput,
} from '@aws-sdk/client-bedrock-runtime';
import { AwsCredentials } from '../config/env';
import {
  InvocationCancelledError,
  PermanentProviderError,
  TransientProviderError,
} from '../models/errors';
import {
  BackoffPolicy,
  DEFAULT_BACKOFF,
  isAbortError,
  randomExponentialBackoff,
  sleep as defaultSleep,
  Sleeper,
} from '../utils/backoff';
import { errorMessage, logger } from '../utils/logger';
import { ProviderEnvelope } from './providerFamilies';

// ─── Connection ─────────────────────────────────────────────────────────────

export interface BedrockConnection {
  invokeModel(input: InvokeModelCommandInput, signal?: AbortSignal): Promise<Uint8Array | undefined>;
}

export type ConnectionFactory = () => BedrockConnection;

export interface BedrockConnectionOptions {
  region: string;
  credentials?: AwsCredentials;
}

export function bedrockConnectionFactory(options: BedrockConnectionOptions): ConnectionFactory {
  return () => {
    const client = new BedrockRuntimeClient({
      region: options.region,
      credentials: options.credentials,
      // InvocationExecutor owns retries.
      maxAttempts: 1,
      requestHandler: {
        connectionTimeout: 10_000,
        requestTimeout: 60_000,
      },
    });

    return {
      async invokeModel(input, signal) {
        const response = await client.send(new InvokeModelCommand(input), { abortSignal: signal });
        return response.body;
      },
    };
  };
}

// ─── Executor ───────────────────────────────────────────────────────────────

export interface ConnectionState {
  attemptCount: number;
  maxAttempts: number;
}

export interface InvocationExecutorOptions {
  modelId: string;
  connect: ConnectionFactory;
  /** Attempts per invoke, including the first. */
  maxAttempts?: number;
  /** Connection refreshes allowed before the next successful call. */
  maxReconnectAttempts?: number;
  backoff?: BackoffPolicy;
  /** Milliseconds per backoff time unit. */
  timeUnitMs?: number;
  sleep?: Sleeper;
  random?: () => number;
}

const TRANSIENT_ERROR_NAMES = new Set(['ThrottlingException', 'ServiceUnavailableException']);

export function isTransientProviderFailure(err: unknown): boolean {
  return err instanceof Error && TRANSIENT_ERROR_NAMES.has(err.name);
}

export class InvocationExecutor {
  readonly modelId: string;

  private readonly connect: ConnectionFactory;
  private readonly maxAttempts: number;
  private readonly backoff: BackoffPolicy;
  private readonly timeUnitMs: number;
  private readonly sleep: Sleeper;
  private readonly random: () => number;
  private readonly state: ConnectionState;

  private connection: BedrockConnection;
  private pendingRefresh: Promise<boolean> | null = null;

  constructor(options: InvocationExecutorOptions) {
    this.modelId = options.modelId;
    this.connect = options.connect;
    this.maxAttempts = options.maxAttempts ?? 3;
    this.backoff = options.backoff ?? DEFAULT_BACKOFF;
    this.timeUnitMs = options.timeUnitMs ?? 1000;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.state = { attemptCount: 0, maxAttempts: options.maxReconnectAttempts ?? 5 };
    this.connection = this.connect();

    logger.info('Bedrock client initialized', { modelId: this.modelId });
  }

  get connectionState(): Readonly<ConnectionState> {
    return { ...this.state };
  }

  /**
   * Send the envelope to Bedrock. Resolves with the parsed JSON response body
   * (or the decoded text when the body is not JSON).
   */
  async invoke(envelope: ProviderEnvelope, signal?: AbortSignal): Promise<unknown> {
    const ctx = { modelId: this.modelId };
    let lastError: TransientProviderError | PermanentProviderError | undefined;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      this.throwIfAborted(signal);

      try {
        const body = await this.connection.invokeModel({
          modelId: this.modelId,
          body: JSON.stringify(envelope.body),
          contentType: 'application/json',
          accept: 'application/json',
        }, signal);

        this.state.attemptCount = 0;
        logger.debug('Bedrock invocation succeeded', ctx, { attempt });
        return decodeBody(body);
      } catch (err) {
        if (signal?.aborted || isAbortError(err)) {
          throw new InvocationCancelledError('Invocation cancelled', { cause: err });
        }

        if (isTransientProviderFailure(err)) {
          lastError = new TransientProviderError(errorMessage(err), attempt, { cause: err });
          logger.warn('Transient Bedrock failure', ctx, { attempt, error: lastError.message });

          const refreshed = await this.refreshConnection(signal);
          if (!refreshed) {
            throw lastError;
          }
        } else {
          lastError = new PermanentProviderError(errorMessage(err), attempt, { cause: err });
          logger.error('Bedrock invocation failed', ctx, { attempt, error: lastError.message });
        }
      }

      if (attempt < this.maxAttempts) {
        const waitUnits = randomExponentialBackoff(attempt, this.backoff, this.random);
        await this.wait(waitUnits, signal);
      }
    }

    if (!lastError) {
      throw new PermanentProviderError('Invocation made no attempts', 0);
    }
    throw lastError;
  }

  /**
   * Rebuild the Bedrock client. Concurrent callers share one in-flight
   * refresh so the attempt counter moves once per rebuild.
   */
  private refreshConnection(signal?: AbortSignal): Promise<boolean> {
    if (!this.pendingRefresh) {
      this.pendingRefresh = this.performRefresh().finally(() => {
        this.pendingRefresh = null;
      });
    }
    return this.raceAbort(this.pendingRefresh, signal);
  }

  private async performRefresh(): Promise<boolean> {
    const ctx = { modelId: this.modelId };

    if (this.state.attemptCount >= this.state.maxAttempts) {
      logger.error('Maximum reconnect attempts reached', ctx, { maxAttempts: this.state.maxAttempts });
      return false;
    }

    const waitUnits = 2 ** this.state.attemptCount;
    this.state.attemptCount += 1;
    logger.info('Reconnecting Bedrock client', ctx, {
      attempt: this.state.attemptCount,
      maxAttempts: this.state.maxAttempts,
      waitUnits,
    });

    await this.sleep(waitUnits * this.timeUnitMs);

    try {
      this.connection = this.connect();
      return true;
    } catch (err) {
      logger.error('Reconnect attempt failed', ctx, { error: errorMessage(err) });
      return false;
    }
  }

  private async wait(units: number, signal?: AbortSignal): Promise<void> {
    try {
      await this.sleep(units * this.timeUnitMs, signal);
    } catch (err) {
      if (signal?.aborted || isAbortError(err)) {
        throw new InvocationCancelledError('Invocation cancelled during backoff', { cause: err });
      }
      throw err;
    }
  }

  private raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
    if (!signal) {
      return promise;
    }
    this.throwIfAborted(signal);

    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => {
        reject(new InvocationCancelledError('Invocation cancelled during reconnect'));
      };
      signal.addEventListener('abort', onAbort, { once: true });
      promise.then(
        (value) => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (err: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(err);
        },
      );
    });
  }

  private throwIfAborted(signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw new InvocationCancelledError('Invocation cancelled');
    }
  }
}

function decodeBody(body: Uint8Array | undefined): unknown {
  if (!body || body.length === 0) {
    return undefined;
  }

  const text = Buffer.from(body).toString('utf8');
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return text;
  }
}
