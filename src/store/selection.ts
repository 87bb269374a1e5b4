import type { ItemResponse } from "../types/records";
import type { TrialHandle } from "../types/task";
import type { ResponseStore } from "./responseStore";

/**
 * Pick the response a task should score when it has no explicit handle:
 * among the task's responses, newest first (later insert wins a tie on
 * createdAt), the newest unscored one, else the newest one.
 */
export function selectCurrentResponse(
  responses: ItemResponse[],
  taskId: string
): ItemResponse | undefined {
  const newestFirst = responses
    .map((response, index) => ({ response, index }))
    .filter(({ response }) => response.taskId === taskId)
    .sort((a, b) => {
      const byTime = Date.parse(b.response.createdAt) - Date.parse(a.response.createdAt);
      return byTime !== 0 ? byTime : b.index - a.index;
    })
    .map(({ response }) => response);

  return newestFirst.find((r) => r.score === undefined) ?? newestFirst[0];
}

/**
 * The response a trial should be scored on: the one its handle names if it
 * still exists, otherwise selectCurrentResponse over the session.
 */
export async function resolveTrialResponse(
  store: ResponseStore,
  sessionId: string,
  taskId: string,
  handle: TrialHandle | undefined
): Promise<ItemResponse | undefined> {
  if (handle) {
    const byHandle = await store.fetch("itemResponse", handle.responseId);
    if (byHandle) return byHandle;
  }
  return selectCurrentResponse(await store.fetchItemResponses(sessionId), taskId);
}
