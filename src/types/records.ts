/**
 * Persistent records: Patient, Session, ItemResponse and AudioClip.
 *
 * Schemas are strict so that a stray field written by a task shows up as an
 * INVALID_RECORD error instead of silently landing in the store.
 */

import { z } from "zod";

const IsoTimestamp = z.string().datetime({ offset: true });

export const PatientSchema = z
  .object({
    id: z.string().min(1),
    name: z.string(),
    dateOfBirth: IsoTimestamp.optional(),
    createdAt: IsoTimestamp,
    updatedAt: IsoTimestamp,
  })
  .strict();

export const SessionStatusSchema = z.enum(["in_progress", "completed", "cancelled"]);

export const SessionSchema = z
  .object({
    id: z.string().min(1),
    patientId: z.string().min(1),
    startTime: IsoTimestamp,
    endTime: IsoTimestamp.optional(),
    status: SessionStatusSchema,
    createdAt: IsoTimestamp,
    updatedAt: IsoTimestamp,
  })
  .strict();

export const ItemResponseSchema = z
  .object({
    id: z.string().min(1),
    sessionId: z.string().min(1),
    taskId: z.string().min(1),
    responseText: z.string().optional(),
    audioClipId: z.string().min(1).optional(),
    score: z.number().finite().optional(),
    correctWords: z.array(z.string()).optional(),
    expectedWords: z.array(z.string()).optional(),
    createdAt: IsoTimestamp,
    updatedAt: IsoTimestamp,
  })
  .strict();

export const AudioClipSchema = z
  .object({
    id: z.string().min(1),
    filePath: z.string().min(1),
    /** Seconds; 0 until capture stops. */
    duration: z.number().nonnegative(),
    transcription: z.string().optional(),
    createdAt: IsoTimestamp,
    updatedAt: IsoTimestamp,
  })
  .strict();

export type Patient = z.infer<typeof PatientSchema>;
export type Session = z.infer<typeof SessionSchema>;
export type SessionStatus = z.infer<typeof SessionStatusSchema>;
export type ItemResponse = z.infer<typeof ItemResponseSchema>;
export type AudioClip = z.infer<typeof AudioClipSchema>;

export interface RecordTypes {
  patient: Patient;
  session: Session;
  itemResponse: ItemResponse;
  audioClip: AudioClip;
}

export type RecordKind = keyof RecordTypes;

export const RECORD_SCHEMAS: { [K in RecordKind]: z.ZodType<RecordTypes[K]> } = {
  patient: PatientSchema,
  session: SessionSchema,
  itemResponse: ItemResponseSchema,
  audioClip: AudioClipSchema,
};

export function nowIso(): string {
  return new Date().toISOString();
}
