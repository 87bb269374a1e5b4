/**
 * Speech & capture contract consumed by the runner and the tasks.
 */

export type Cue = "start" | "end";

export interface SpeechDevice {
  /** Resolves once the text has been spoken. */
  speak(text: string): Promise<void>;
  playCue(cue: Cue): Promise<void>;
  /** Begin capturing to the given file. Rejects if the device cannot record. */
  startRecording(destination: string): Promise<void>;
  /** Stop the active capture and return its length in seconds. */
  stopRecording(): Promise<number>;
  readonly isRecording: boolean;
}
