export { loadConfig, type AssessmentConfig, type CancelledTrialPolicy } from "./config";
export { TaskRunnerError, StoreError, ConfigError } from "./errors";
export { TaskRunner, type TaskRunnerOptions, type TranscriptionOutcome } from "./runner/taskRunner";
export { MemoryResponseStore, type ResponseStore } from "./store/responseStore";
export { selectCurrentResponse, resolveTrialResponse } from "./store/selection";
export { fetchTaskResults, summarizeResponses, type ResponseSummary } from "./results";
export { Battery, registerPatient, type BatteryOptions, type BatteryResult, type TaskSummary } from "./battery";
export * from "./tasks";
export * from "./scoring/scorers";
export { normalizeText, tokenize, stripArticles } from "./scoring/normalize";
export { extractDigits, extractNumbers, parseNumberWord, spellNumber, spellOrdinal, spellYear } from "./scoring/numbers";
export { fuzzyWordMatch, containsEitherWay } from "./scoring/matching";
export type { SpeechDevice, Cue } from "./audio/speechDevice";
export { AlsaSpeechDevice, type AlsaSpeechDeviceOptions } from "./audio/alsaSpeechDevice";
export type { Transcriber, TranscriptionResult } from "./transcription/transcriber";
export { WhisperTranscriber, isHallucination } from "./transcription/whisperTranscriber";
export { createOpenAiClient, createSpeechSynthesizer, createWhisperTranscribe } from "./speechServices";
export type * from "./types/records";
export type * from "./types/task";
