import { parseToolCalls } from '../src/services/toolCallParser';

describe('parseToolCalls', () => {
  test('extracts one call between two sentences', () => {
    const text = 'I will look this up. {"name": "web_search", "arguments": {"query": "tide times"}} Results follow.';

    expect(parseToolCalls(text)).toEqual({
      toolCalls: [{ callId: 'call_0', toolName: 'web_search', arguments: { query: 'tide times' } }],
      remainingText: 'I will look this up. Results follow.',
    });
  });

  test('numbers multiple calls in order', () => {
    const text = [
      '{"name": "bash_tool", "arguments": {"command": "ls"}}',
      '{"name": "str_replace_tool", "arguments": {"path": "a.txt", "old": "x", "new": "y"}}',
    ].join('\n');

    const { toolCalls, remainingText } = parseToolCalls(text);

    expect(toolCalls.map((call) => [call.callId, call.toolName])).toEqual([
      ['call_0', 'bash_tool'],
      ['call_1', 'str_replace_tool'],
    ]);
    expect(remainingText).toBe('');
  });

  test('accepts arguments nested one level deep', () => {
    const text = '{"name": "sequential_thinking", "arguments": {"step": {"n": 1, "text": "outline"}}}';

    expect(parseToolCalls(text).toolCalls[0].arguments).toEqual({ step: { n: 1, text: 'outline' } });
  });

  test('repairs single-quoted argument strings', () => {
    const text = "{\"name\": \"web_search\", \"arguments\": {'query': 'coral reefs'}}";

    expect(parseToolCalls(text).toolCalls).toEqual([
      { callId: 'call_0', toolName: 'web_search', arguments: { query: 'coral reefs' } },
    ]);
  });

  test('skips an unparseable call and leaves it in the text', () => {
    const text = 'Before {"name": "bash_tool", "arguments": {"command": ls}} after';

    expect(parseToolCalls(text)).toEqual({ toolCalls: [], remainingText: text });
  });

  test('dropped calls stay in the text', () => {
    const text = 'First. {"name": "web_search", "arguments": {"query": "a"}} Then {"name": "web_search", "arguments": {"query": "b"}} done.';

    expect(parseToolCalls(text, { accept: (name) => name !== 'web_search' })).toEqual({
      toolCalls: [],
      remainingText: text,
    });
  });

  test('a reply that is only a dropped call comes back unchanged', () => {
    const text = '{"name": "web_search", "arguments": {"query": "x"}}';

    expect(parseToolCalls(text, { accept: () => false })).toEqual({ toolCalls: [], remainingText: text });
  });

  test('keeps accepted calls while leaving suppressed ones in the text', () => {
    const text = '{"name": "web_search", "arguments": {"query": "a"}} {"name": "bash_tool", "arguments": {"command": "pwd"}}';

    expect(parseToolCalls(text, { accept: (name) => name !== 'web_search' })).toEqual({
      toolCalls: [{ callId: 'call_0', toolName: 'bash_tool', arguments: { command: 'pwd' } }],
      remainingText: '{"name": "web_search", "arguments": {"query": "a"}}',
    });
  });

  test('plain text passes through', () => {
    expect(parseToolCalls('  Just an answer.  ')).toEqual({ toolCalls: [], remainingText: 'Just an answer.' });
  });

  test('falls back to the original text when nothing remains', () => {
    expect(parseToolCalls('   ')).toEqual({ toolCalls: [], remainingText: '   ' });
  });
});
