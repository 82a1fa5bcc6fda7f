import { ConversationTurn } from '../src/models/conversation';
import {
  analyzeWindow,
  detectLoop,
  isContentGenerationTask,
  isPlanningTurn,
  isSearchTurn,
  recentTurns,
  shouldForceTerminate,
  shouldSuppressSearch,
} from '../src/services/loopGuard';

const user = (content: string): ConversationTurn => ({ role: 'user', content });
const assistant = (content: string): ConversationTurn => ({ role: 'assistant', content });

const SEARCH = assistant('{"name": "web_search", "arguments": {"query": "rust async"}}');
const PLAN = assistant('Planning the next steps for the report.');
const NEUTRAL = assistant('Here is a short summary.');

describe('turn classification', () => {
  test('search markers are case-insensitive', () => {
    expect(isSearchTurn(assistant('I am SEARCHING the docs'))).toBe(true);
    expect(isSearchTurn(SEARCH)).toBe(true);
    expect(isSearchTurn(NEUTRAL)).toBe(false);
  });

  test('planning markers', () => {
    expect(isPlanningTurn(assistant("Let's break this down"))).toBe(true);
    expect(isPlanningTurn(assistant('We need to gather sources first'))).toBe(true);
    expect(isPlanningTurn(assistant('Plan the creation of the page'))).toBe(true);
    expect(isPlanningTurn(NEUTRAL)).toBe(false);
  });

  test('analyzeWindow counts only the last turns', () => {
    const history = [SEARCH, SEARCH, NEUTRAL, NEUTRAL, NEUTRAL, NEUTRAL, PLAN];
    expect(analyzeWindow(history)).toEqual({ searchCount: 0, planningCount: 1 });
    expect(analyzeWindow(history, 7)).toEqual({ searchCount: 2, planningCount: 1 });
  });

  test('a window below one covers only the latest turn', () => {
    const history = [SEARCH, SEARCH, SEARCH];
    expect(recentTurns(history, 0)).toEqual([SEARCH]);
    expect(analyzeWindow(history, 0)).toEqual({ searchCount: 1, planningCount: 0 });
    expect(detectLoop(history, 0)).toBe(false);
  });
});

describe('detectLoop', () => {
  test('histories shorter than three turns never loop', () => {
    expect(detectLoop([])).toBe(false);
    expect(detectLoop([SEARCH])).toBe(false);
    expect(detectLoop([SEARCH, SEARCH])).toBe(false);
  });

  test('two searches in a five-turn window trigger, one does not', () => {
    expect(detectLoop([user('q'), SEARCH, NEUTRAL, SEARCH, NEUTRAL])).toBe(true);
    expect(detectLoop([user('q'), SEARCH, NEUTRAL, NEUTRAL, NEUTRAL])).toBe(false);
  });

  test('three planning turns in a five-turn window trigger, two do not', () => {
    expect(detectLoop([user('q'), PLAN, NEUTRAL, PLAN, PLAN])).toBe(true);
    expect(detectLoop([user('q'), PLAN, NEUTRAL, PLAN, NEUTRAL])).toBe(false);
  });

  test('turns outside the window are ignored', () => {
    expect(detectLoop([SEARCH, SEARCH, NEUTRAL, NEUTRAL, NEUTRAL, NEUTRAL, NEUTRAL])).toBe(false);
  });
});

describe('shouldForceTerminate', () => {
  test('content-generation tasks are exempt', () => {
    const history = [user('q'), SEARCH, NEUTRAL, SEARCH, user('Now write the HTML for it')];
    expect(detectLoop(history)).toBe(true);
    expect(isContentGenerationTask(history)).toBe(true);
    expect(shouldForceTerminate(history)).toBe(false);
  });

  test('other looping histories terminate', () => {
    const history = [user('q'), SEARCH, NEUTRAL, SEARCH, user('anything else?')];
    expect(shouldForceTerminate(history)).toBe(true);
  });

  test('empty history is not a content-generation task', () => {
    expect(isContentGenerationTask([])).toBe(false);
  });
});

describe('shouldSuppressSearch', () => {
  test('one search in the window suppresses further searches', () => {
    expect(shouldSuppressSearch([user('q'), SEARCH])).toBe(true);
    expect(shouldSuppressSearch([user('q'), NEUTRAL])).toBe(false);
  });
});
