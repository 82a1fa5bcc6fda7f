/**
 * Tests for InvocationExecutor retry / refresh behaviour.
 *
 * The Bedrock connection, sleeper and random source are injected, so no
 * timers run and no network is touched.
 */

import { InvokeModelCommandInput, ThrottlingException } from '@aws-sdk/client-bedrock-runtime';
import {
  InvocationCancelledError,
  PermanentProviderError,
  TransientProviderError,
} from '../src/models/errors';
import {
  BedrockConnection,
  InvocationExecutor,
  isTransientProviderFailure,
} from '../src/services/invocationExecutor';
import { ProviderEnvelope } from '../src/services/providerFamilies';

const ENVELOPE: ProviderEnvelope = {
  family: 'structured-content',
  body: {
    messages: [{ role: 'user', content: [{ text: 'hi' }] }],
    inferenceConfig: { maxTokens: 64, temperature: 0 },
  },
};

const REPLY = { output: { message: { role: 'assistant', content: [{ text: 'hello' }] } } };

function throttled(): ThrottlingException {
  return new ThrottlingException({ message: 'Rate exceeded', $metadata: {} });
}

function namedError(name: string, message: string): Error {
  const err = new Error(message);
  err.name = name;
  return err;
}

function setup() {
  const invokeModel = jest.fn<Promise<Uint8Array | undefined>, [InvokeModelCommandInput, AbortSignal?]>();
  const connect = jest.fn((): BedrockConnection => ({ invokeModel }));
  const sleep = jest.fn(async (_ms: number, _signal?: AbortSignal): Promise<void> => undefined);
  const executor = new InvocationExecutor({
    modelId: 'amazon.nova-pro-v1:0',
    connect,
    sleep,
    random: () => 0,
  });
  const sleptMs = (): number[] => sleep.mock.calls.map(([ms]) => ms);
  return { invokeModel, connect, sleep, sleptMs, executor };
}

describe('InvocationExecutor', () => {
  test('sends the envelope body as JSON and parses the reply', async () => {
    const { invokeModel, executor } = setup();
    invokeModel.mockResolvedValue(Buffer.from(JSON.stringify(REPLY)));

    await expect(executor.invoke(ENVELOPE)).resolves.toEqual(REPLY);
    expect(invokeModel).toHaveBeenCalledWith({
      modelId: 'amazon.nova-pro-v1:0',
      body: JSON.stringify(ENVELOPE.body),
      contentType: 'application/json',
      accept: 'application/json',
    }, undefined);
  });

  test('returns non-JSON bodies as text and empty bodies as undefined', async () => {
    const { invokeModel, executor } = setup();
    invokeModel.mockResolvedValueOnce(Buffer.from('not json'));
    invokeModel.mockResolvedValueOnce(new Uint8Array(0));

    await expect(executor.invoke(ENVELOPE)).resolves.toBe('not json');
    await expect(executor.invoke(ENVELOPE)).resolves.toBeUndefined();
  });

  test('throttled on attempts 1 and 2, succeeds on 3 and resets the counter', async () => {
    const { invokeModel, connect, sleptMs, executor } = setup();
    invokeModel
      .mockRejectedValueOnce(throttled())
      .mockRejectedValueOnce(throttled())
      .mockResolvedValueOnce(Buffer.from(JSON.stringify(REPLY)));

    await expect(executor.invoke(ENVELOPE)).resolves.toEqual(REPLY);

    expect(invokeModel).toHaveBeenCalledTimes(3);
    expect(connect).toHaveBeenCalledTimes(3);
    // refresh 2^0 units, backoff, refresh 2^1 units, backoff
    expect(sleptMs()).toEqual([1000, 0, 2000, 0]);
    expect(executor.connectionState).toEqual({ attemptCount: 0, maxAttempts: 5 });
  });

  test('stops refreshing once five refreshes have been spent', async () => {
    const { invokeModel, connect, sleptMs, executor } = setup();
    invokeModel.mockRejectedValue(throttled());

    await expect(executor.invoke(ENVELOPE)).rejects.toBeInstanceOf(TransientProviderError);
    expect(invokeModel).toHaveBeenCalledTimes(3);
    expect(executor.connectionState.attemptCount).toBe(3);

    await expect(executor.invoke(ENVELOPE)).rejects.toMatchObject({
      code: 'transient_provider_error',
      attempt: 3,
    });
    expect(invokeModel).toHaveBeenCalledTimes(6);
    expect(executor.connectionState.attemptCount).toBe(5);

    await expect(executor.invoke(ENVELOPE)).rejects.toMatchObject({ attempt: 1 });
    expect(invokeModel).toHaveBeenCalledTimes(7);
    expect(executor.connectionState).toEqual({ attemptCount: 5, maxAttempts: 5 });

    expect(connect).toHaveBeenCalledTimes(6);
    expect(sleptMs().filter((ms) => ms > 0)).toEqual([1000, 2000, 4000, 8000, 16000]);
  });

  test('service-unavailable failures also refresh the client', async () => {
    const { invokeModel, connect, executor } = setup();
    invokeModel
      .mockRejectedValueOnce(namedError('ServiceUnavailableException', 'down'))
      .mockResolvedValueOnce(Buffer.from(JSON.stringify(REPLY)));

    await expect(executor.invoke(ENVELOPE)).resolves.toEqual(REPLY);
    expect(connect).toHaveBeenCalledTimes(2);
  });

  test('other failures are retried without a refresh', async () => {
    const { invokeModel, connect, sleptMs, executor } = setup();
    invokeModel.mockRejectedValue(namedError('ValidationException', 'bad input'));

    const failure = executor.invoke(ENVELOPE);

    await expect(failure).rejects.toBeInstanceOf(PermanentProviderError);
    await expect(failure).rejects.toMatchObject({ message: 'bad input', attempt: 3 });
    expect(invokeModel).toHaveBeenCalledTimes(3);
    expect(connect).toHaveBeenCalledTimes(1);
    expect(sleptMs()).toEqual([0, 0]);
  });

  test('concurrent throttled calls share one refresh', async () => {
    const { invokeModel, connect, sleptMs, executor } = setup();
    invokeModel
      .mockRejectedValueOnce(throttled())
      .mockRejectedValueOnce(throttled())
      .mockResolvedValue(Buffer.from(JSON.stringify(REPLY)));

    await expect(Promise.all([executor.invoke(ENVELOPE), executor.invoke(ENVELOPE)])).resolves.toEqual([REPLY, REPLY]);

    expect(connect).toHaveBeenCalledTimes(2);
    expect(sleptMs().filter((ms) => ms === 1000)).toHaveLength(1);
    expect(executor.connectionState.attemptCount).toBe(0);
  });

  test('cancellation during backoff issues no further call', async () => {
    const { invokeModel, sleep, executor } = setup();
    const controller = new AbortController();
    invokeModel.mockRejectedValue(namedError('ValidationException', 'bad input'));
    sleep.mockImplementation(async () => {
      controller.abort();
    });

    await expect(executor.invoke(ENVELOPE, controller.signal)).rejects.toBeInstanceOf(InvocationCancelledError);
    expect(invokeModel).toHaveBeenCalledTimes(1);
  });

  test('an already aborted signal makes no call', async () => {
    const { invokeModel, executor } = setup();
    const controller = new AbortController();
    controller.abort();

    await expect(executor.invoke(ENVELOPE, controller.signal)).rejects.toBeInstanceOf(InvocationCancelledError);
    expect(invokeModel).not.toHaveBeenCalled();
  });

  test('an abort raised by the transport is reported as cancellation', async () => {
    const { invokeModel, executor } = setup();
    invokeModel.mockRejectedValue(namedError('AbortError', 'Request aborted'));

    await expect(executor.invoke(ENVELOPE)).rejects.toBeInstanceOf(InvocationCancelledError);
    expect(invokeModel).toHaveBeenCalledTimes(1);
  });

  test('executors keep independent connection state', async () => {
    const first = setup();
    const second = setup();
    first.invokeModel.mockRejectedValueOnce(throttled()).mockResolvedValue(new Uint8Array(0));

    await first.executor.invoke(ENVELOPE);

    expect(first.connect).toHaveBeenCalledTimes(2);
    expect(second.executor.connectionState.attemptCount).toBe(0);
  });
});

describe('isTransientProviderFailure', () => {
  test('matches throttling and service-unavailable errors only', () => {
    expect(isTransientProviderFailure(throttled())).toBe(true);
    expect(isTransientProviderFailure(namedError('ServiceUnavailableException', 'x'))).toBe(true);
    expect(isTransientProviderFailure(namedError('AccessDeniedException', 'x'))).toBe(false);
    expect(isTransientProviderFailure('ThrottlingException')).toBe(false);
  });
});
