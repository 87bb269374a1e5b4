/**
 * Transcription contract. startTranscription returns immediately; the
 * callback fires once, at any later time, with the text or the failure.
 */

export type TranscriptionResult =
  | { ok: true; text: string }
  | { ok: false; error: Error };

export interface Transcriber {
  startTranscription(filePath: string, onComplete: (result: TranscriptionResult) => void): void;
}
