/**
 * Speech-to-Text abstraction. One-shot transcription of an uploaded recording;
 * the interface allows pluggable backends.
 */

export interface TranscriptionOptions {
  fileName?: string;
  mimeType?: string;
  /** ISO 639-1 or 639-3 code; omitted means auto-detect. */
  languageCode?: string;
  /** Request word-level start/end times. */
  timestamps?: boolean;
}

export interface TranscriptWord {
  text: string;
  start: number;
  end: number;
}

export interface TranscriptionResult {
  text: string;
  languageCode?: string;
  languageProbability?: number;
  words?: TranscriptWord[];
}

export interface ISTTService {
  transcribe(audio: Buffer, options?: TranscriptionOptions): Promise<TranscriptionResult>;
}
