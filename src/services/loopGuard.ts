/**
 * Loop guard: spots an agent that keeps searching or re-planning instead of
 * answering, by keyword counts over the most recent turns.
 */

import { ConversationTurn } from '../models/conversation';

export const DEFAULT_LOOP_WINDOW = 5;
export const MIN_HISTORY_FOR_LOOP = 3;
export const SEARCH_THRESHOLD = 2;
export const PLANNING_THRESHOLD = 3;

const SEARCH_MARKERS = ['web_search', 'searching'];
const PLANNING_MARKERS = ["let's plan", "let's break", 'planning', 'we need to', 'plan the creation'];
const CONTENT_GENERATION_MARKERS = ['landing page', 'html', 'css'];

export interface LoopAnalysis {
  searchCount: number;
  planningCount: number;
}

export function isSearchTurn(turn: ConversationTurn): boolean {
  const content = turn.content.toLowerCase();
  return SEARCH_MARKERS.some((marker) => content.includes(marker));
}

export function isPlanningTurn(turn: ConversationTurn): boolean {
  const content = turn.content.toLowerCase();
  return PLANNING_MARKERS.some((marker) => content.includes(marker));
}

/** The last `window` turns; a window below one still covers the latest turn. */
export function recentTurns(
  history: readonly ConversationTurn[],
  window: number = DEFAULT_LOOP_WINDOW,
): readonly ConversationTurn[] {
  return history.slice(-Math.max(1, Math.floor(window)));
}

export function analyzeWindow(
  history: readonly ConversationTurn[],
  window: number = DEFAULT_LOOP_WINDOW,
): LoopAnalysis {
  const recent = recentTurns(history, window);
  return {
    searchCount: recent.filter(isSearchTurn).length,
    planningCount: recent.filter(isPlanningTurn).length,
  };
}

export function detectLoop(
  history: readonly ConversationTurn[],
  window: number = DEFAULT_LOOP_WINDOW,
): boolean {
  if (history.length < MIN_HISTORY_FOR_LOOP) {
    return false;
  }

  const { searchCount, planningCount } = analyzeWindow(history, window);
  return searchCount >= SEARCH_THRESHOLD || planningCount >= PLANNING_THRESHOLD;
}

/** Keyword check on the latest turn; such tasks are never force-terminated. */
export function isContentGenerationTask(history: readonly ConversationTurn[]): boolean {
  const latest = history[history.length - 1];
  if (!latest) {
    return false;
  }
  const content = latest.content.toLowerCase();
  return CONTENT_GENERATION_MARKERS.some((marker) => content.includes(marker));
}

export function shouldForceTerminate(
  history: readonly ConversationTurn[],
  window: number = DEFAULT_LOOP_WINDOW,
): boolean {
  return detectLoop(history, window) && !isContentGenerationTask(history);
}

/** Once a search shows up in the window, further web_search calls are dropped. */
export function shouldSuppressSearch(
  history: readonly ConversationTurn[],
  window: number = DEFAULT_LOOP_WINDOW,
): boolean {
  return analyzeWindow(history, window).searchCount >= 1;
}
