import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { AudioContentType } from "../entities/analysis";

export type SummarizeOptions = {
  maxLength: number;
  minLength: number;
  signal?: AbortSignal;
};

export interface SummarizationPort {
  readonly provider: string;
  summarize(
    text: string,
    options: SummarizeOptions,
  ): Promise<Result<string, AppBoundaryError>>;
}

/**
 * Raw classifier output before normalization, e.g. `{ label: "4 stars", score: 0.41 }`.
 */
export type RawSentimentCandidate = {
  label: string;
  score: number;
};

export interface SentimentModelPort {
  readonly provider: string;
  classify(
    text: string,
    signal?: AbortSignal,
  ): Promise<Result<RawSentimentCandidate[], AppBoundaryError>>;
}

export interface TranslationPort {
  readonly provider: string;
  translate(
    text: string,
    targetLanguage: string,
    signal?: AbortSignal,
  ): Promise<Result<string, AppBoundaryError>>;
}

export type SynthesizedAudio = {
  bytes: Uint8Array;
  contentType: AudioContentType;
};

export interface SpeechSynthesisPort {
  readonly provider: string;
  readonly contentType: AudioContentType;
  synthesize(
    text: string,
    language: string,
    signal?: AbortSignal,
  ): Promise<Result<Uint8Array, AppBoundaryError>>;
}

export type StoredAudio = {
  ref: string;
  byteLength: number;
};

export interface AudioStorePort {
  save(
    audio: SynthesizedAudio,
  ): Promise<Result<StoredAudio, AppBoundaryError>>;
  cleanupOlderThan(maxAgeMs: number): Promise<number>;
}

export interface ClockPort {
  now(): Date;
}

export interface IdGeneratorPort {
  next(): string;
}
