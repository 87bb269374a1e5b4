/**
 * Response Store
 *
 * Keyed storage for the four record kinds. The runner, tasks and battery only
 * depend on the ResponseStore interface; MemoryResponseStore is the shipped
 * implementation.
 */

import { StoreError } from "../errors";
import logger from "../logger";
import {
  RECORD_SCHEMAS,
  type ItemResponse,
  type RecordKind,
  type RecordTypes,
  type Session,
} from "../types/records";

export interface ResponseStore {
  create<K extends RecordKind>(kind: K, record: RecordTypes[K]): Promise<RecordTypes[K]>;
  fetch<K extends RecordKind>(kind: K, id: string): Promise<RecordTypes[K] | undefined>;
  /** All records of a kind, in insertion order. */
  fetchAll<K extends RecordKind>(kind: K): Promise<RecordTypes[K][]>;
  /** Replace a record. Throws NOT_FOUND if no record has that id. */
  update<K extends RecordKind>(kind: K, record: RecordTypes[K]): Promise<RecordTypes[K]>;
  delete(kind: RecordKind, id: string): Promise<void>;
  fetchSessions(patientId: string): Promise<Session[]>;
  fetchItemResponses(sessionId: string): Promise<ItemResponse[]>;
}

type Tables = { [K in RecordKind]: Map<string, RecordTypes[K]> };

export class MemoryResponseStore implements ResponseStore {
  private readonly tables: Tables = {
    patient: new Map(),
    session: new Map(),
    itemResponse: new Map(),
    audioClip: new Map(),
  };

  async create<K extends RecordKind>(kind: K, record: RecordTypes[K]): Promise<RecordTypes[K]> {
    const table = this.table(kind);
    if (table.has(record.id)) {
      throw new StoreError("INVALID_RECORD", `${kind} ${record.id} already exists`);
    }
    const stored = this.validate(kind, record);
    table.set(stored.id, stored);
    logger.debug("store", `created ${kind}`, { id: stored.id });
    return structuredClone(stored);
  }

  async fetch<K extends RecordKind>(kind: K, id: string): Promise<RecordTypes[K] | undefined> {
    const found = this.table(kind).get(id);
    return found === undefined ? undefined : structuredClone(found);
  }

  async fetchAll<K extends RecordKind>(kind: K): Promise<RecordTypes[K][]> {
    return [...this.table(kind).values()].map((r) => structuredClone(r));
  }

  async update<K extends RecordKind>(kind: K, record: RecordTypes[K]): Promise<RecordTypes[K]> {
    const table = this.table(kind);
    if (!table.has(record.id)) {
      throw new StoreError("NOT_FOUND", `${kind} ${record.id} not found`);
    }
    const stored = this.validate(kind, record);
    table.set(stored.id, stored);
    return structuredClone(stored);
  }

  async delete(kind: RecordKind, id: string): Promise<void> {
    if (!this.tables[kind].delete(id)) {
      throw new StoreError("NOT_FOUND", `${kind} ${id} not found`);
    }
  }

  async fetchSessions(patientId: string): Promise<Session[]> {
    return (await this.fetchAll("session")).filter((s) => s.patientId === patientId);
  }

  async fetchItemResponses(sessionId: string): Promise<ItemResponse[]> {
    return (await this.fetchAll("itemResponse")).filter((r) => r.sessionId === sessionId);
  }

  private table<K extends RecordKind>(kind: K): Map<string, RecordTypes[K]> {
    return this.tables[kind];
  }

  private validate<K extends RecordKind>(kind: K, record: RecordTypes[K]): RecordTypes[K] {
    const parsed = RECORD_SCHEMAS[kind].safeParse(record);
    if (!parsed.success) {
      throw new StoreError("INVALID_RECORD", `Invalid ${kind}: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}
