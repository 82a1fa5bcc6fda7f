import { estimateUsage, outcomeText } from '../src/models/conversation';
import { boundConversation, MAX_CONVERSATION_TURNS } from '../src/models/session';
import { isAbortError, randomExponentialBackoff, sleep } from '../src/utils/backoff';

describe('randomExponentialBackoff', () => {
  test('ceiling doubles per attempt', () => {
    expect(randomExponentialBackoff(1, undefined, () => 1)).toBe(1);
    expect(randomExponentialBackoff(4, undefined, () => 0.5)).toBe(4);
  });

  test('ceiling is capped', () => {
    expect(randomExponentialBackoff(10, undefined, () => 1)).toBe(60);
    expect(randomExponentialBackoff(3, { multiplier: 2, max: 5 }, () => 1)).toBe(5);
  });

  test('zero draw means no wait', () => {
    expect(randomExponentialBackoff(6, undefined, () => 0)).toBe(0);
  });
});

describe('sleep', () => {
  test('rejects with an abort error when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const err: unknown = await sleep(50, controller.signal).catch((reason: unknown) => reason);

    expect(isAbortError(err)).toBe(true);
  });

  test('resolves after the delay', async () => {
    await expect(sleep(1)).resolves.toBeUndefined();
  });
});

describe('conversation helpers', () => {
  test('estimateUsage counts whitespace-separated words', () => {
    expect(estimateUsage('')).toBe(0);
    expect(estimateUsage('   ')).toBe(0);
    expect(estimateUsage('  one two\nthree ')).toBe(3);
  });

  test('outcomeText joins segments or returns the terminal text', () => {
    expect(outcomeText({
      kind: 'interpreted',
      result: { textSegments: ['a', 'b'], toolCalls: [], usageEstimate: 2, rawText: 'a b' },
    })).toBe('a\nb');
    expect(outcomeText({
      kind: 'terminated',
      response: { text: 'final', usageEstimate: 1, searchCount: 2, planningCount: 0 },
    })).toBe('final');
  });

  test('boundConversation keeps the most recent turns', () => {
    const turns = Array.from({ length: MAX_CONVERSATION_TURNS + 2 }, (_, i) => ({ role: 'user' as const, content: `t${i}` }));

    const bounded = boundConversation(turns);

    expect(bounded).toHaveLength(50);
    expect(bounded[0].content).toBe('t2');
  });
});
