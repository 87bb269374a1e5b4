/**
 * Battery
 *
 * Administers the six tasks for one patient inside a single Session. A task
 * that throws is logged and the battery moves on; cancel() stops the active
 * task and skips the rest.
 */

import { randomUUID } from "node:crypto";
import logger, { describeError } from "./logger";
import { fetchTaskResults, summarizeResponses } from "./results";
import type { TaskRunner } from "./runner/taskRunner";
import type { ResponseStore } from "./store/responseStore";
import { BATTERY_ORDER, createTask, type TaskFactoryOptions } from "./tasks";
import { nowIso, type Patient, type Session } from "./types/records";
import type { Task, TaskKind } from "./types/task";

export type TaskRunStatus = "completed" | "cancelled" | "failed" | "skipped";

export interface TaskSummary {
  kind: TaskKind;
  taskId?: string;
  title?: string;
  status: TaskRunStatus;
  responses: number;
  scored: number;
  totalScore: number;
  error?: string;
}

export interface BatteryResult {
  session: Session;
  tasks: TaskSummary[];
}

export interface BatteryOptions extends TaskFactoryOptions {
  /** Defaults to the full battery order. */
  kinds?: TaskKind[];
  /** Called with each task just before it starts, e.g. to route taps. */
  onTaskStart?: (task: Task) => void;
}

export async function registerPatient(
  store: ResponseStore,
  name: string,
  dateOfBirth?: string
): Promise<Patient> {
  const now = nowIso();
  return store.create("patient", {
    id: randomUUID(),
    name,
    ...(dateOfBirth !== undefined ? { dateOfBirth } : {}),
    createdAt: now,
    updatedAt: now,
  });
}

export class Battery {
  private cancelled = false;
  private active: Task | undefined;

  constructor(
    private readonly runner: TaskRunner,
    private readonly store: ResponseStore,
    private readonly options: BatteryOptions
  ) {}

  get currentTask(): Task | undefined {
    return this.active;
  }

  async run(patientId: string): Promise<BatteryResult> {
    const started = nowIso();
    let session = await this.store.create("session", {
      id: randomUUID(),
      patientId,
      startTime: started,
      status: "in_progress",
      createdAt: started,
      updatedAt: started,
    });
    logger.lifecycle("Battery started", { sessionId: session.id, patientId });

    const tasks: TaskSummary[] = [];
    for (const kind of this.options.kinds ?? BATTERY_ORDER) {
      if (this.cancelled) {
        tasks.push({ kind, status: "skipped", responses: 0, scored: 0, totalScore: 0 });
        continue;
      }
      tasks.push(await this.runTask(kind, session.id));
    }
    this.active = undefined;

    const ended = nowIso();
    session = await this.store.update("session", {
      ...session,
      endTime: ended,
      status: this.cancelled ? "cancelled" : "completed",
      updatedAt: ended,
    });
    logger.lifecycle("Battery finished", { sessionId: session.id, status: session.status });

    return { session, tasks };
  }

  /** Stop the active task and skip the remaining ones. */
  async cancel(): Promise<void> {
    if (this.cancelled) return;
    this.cancelled = true;
    logger.lifecycle("Battery cancelled");
    const state = this.runner.state;
    if (state !== "idle" && state !== "completed") {
      await this.runner.stop();
    }
  }

  private async runTask(kind: TaskKind, sessionId: string): Promise<TaskSummary> {
    const task = createTask(kind, this.options);
    this.active = task;
    this.options.onTaskStart?.(task);
    logger.info("battery", `--- ${task.title} ---`, { taskId: task.id });

    let status: TaskRunStatus;
    let error: string | undefined;
    this.runner.reset();
    try {
      await this.runner.start(task, sessionId);
      status = this.cancelled ? "cancelled" : "completed";
    } catch (err) {
      error = describeError(err);
      logger.error("battery", `${task.title} failed, continuing`, { error });
      status = "failed";
    }

    const summary = summarizeResponses(await fetchTaskResults(this.store, sessionId, task.id));
    return {
      kind,
      taskId: task.id,
      title: task.title,
      status,
      responses: summary.count,
      scored: summary.scored,
      totalScore: summary.totalScore,
      ...(error !== undefined ? { error } : {}),
    };
  }
}
