/**
 * Read-side queries for a presentation layer.
 */

import type { ResponseStore } from "./store/responseStore";
import type { ItemResponse } from "./types/records";

export interface ResponseSummary {
  count: number;
  scored: number;
  totalScore: number;
}

/** A task's responses in a session, oldest first. */
export async function fetchTaskResults(
  store: ResponseStore,
  sessionId: string,
  taskId: string
): Promise<ItemResponse[]> {
  return (await store.fetchItemResponses(sessionId))
    .map((response, index) => ({ response, index }))
    .filter(({ response }) => response.taskId === taskId)
    .sort((a, b) => Date.parse(a.response.createdAt) - Date.parse(b.response.createdAt) || a.index - b.index)
    .map(({ response }) => response);
}

export function summarizeResponses(responses: ItemResponse[]): ResponseSummary {
  let scored = 0;
  let totalScore = 0;
  for (const response of responses) {
    if (response.score !== undefined) {
      scored++;
      totalScore += response.score;
    }
  }
  return { count: responses.length, scored, totalScore };
}
