import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { AudioResult, StageIssue } from "../../core/entities/analysis";
import type {
  AudioStorePort,
  SpeechSynthesisPort,
  SynthesizedAudio,
  TranslationPort,
} from "../../core/ports/outboundPorts";
import {
  callBoundary,
  type BoundaryCallPolicy,
} from "../../shared/resilience/boundaryCall";
import { chunkText, sanitize } from "../../shared/text/textUtils";
import { logger } from "../../shared/logger/logger";
import { isInTargetScript } from "../nlp/languageScript";

export type SpeechRendererOptions = {
  defaultLanguage: string;
  maxChunkChars: number;
  maxChunks: number;
  translationTimeoutMs: number;
  synthesisTimeoutMs: number;
  retries: number;
  retryDelayMs: number;
};

export type SpeechOutcome = {
  audio: AudioResult;
  issues: StageIssue[];
};

const EMPTY_TEXT_NOTICE = "No text was provided for conversion to speech.";

const concatBytes = (parts: readonly Uint8Array[]): Uint8Array => {
  const output = new Uint8Array(parts.reduce((sum, part) => sum + part.byteLength, 0));
  let offset = 0;
  parts.forEach((part) => {
    output.set(part, offset);
    offset += part.byteLength;
  });
  return output;
};

const toDataUri = (audio: SynthesizedAudio): string =>
  `data:${audio.contentType};base64,${Buffer.from(audio.bytes).toString("base64")}`;

/**
 * Turns narrative text into stored audio in the target language. Never rejects:
 * translation and synthesis failures degrade to the original text and a fixed notice clip.
 */
export class SpeechRendererService {
  constructor(
    private readonly translator: TranslationPort | null,
    private readonly synthesizer: SpeechSynthesisPort,
    private readonly store: AudioStorePort,
    private readonly fallbackClip: () => SynthesizedAudio,
    private readonly options: SpeechRendererOptions,
  ) {}

  async render(
    text: string,
    request: { language?: string; signal?: AbortSignal } = {},
  ): Promise<SpeechOutcome> {
    const language = (request.language ?? this.options.defaultLanguage).trim().toLowerCase();
    const source = sanitize(text) || EMPTY_TEXT_NOTICE;
    const issues: StageIssue[] = [];

    const translation = await this.translate(source, language, request.signal);
    const spokenText = translation.isOk() ? translation.value : source;
    if (translation.isErr()) {
      issues.push(this.issueFor("translation_failed", translation.error));
    }

    const synthesized = await this.synthesize(spokenText, language, request.signal);
    if (synthesized.isErr()) {
      issues.push(this.issueFor("synthesis_failed", synthesized.error));
      logger.warn(
        { language, reason: synthesized.error.message },
        "Speech synthesis failed; using notice clip",
      );
    }

    const audio = synthesized.isOk()
      ? { bytes: synthesized.value, contentType: this.synthesizer.contentType }
      : this.fallbackClip();
    // An aborted render must not leave a file behind.
    const audioRef = request.signal?.aborted ? toDataUri(audio) : await this.storeAudio(audio);

    const fallbackReason = issues.map((issue) => issue.reason).join("; ");
    return {
      audio: {
        audioRef,
        contentType: audio.contentType,
        byteLength: audio.bytes.byteLength,
        languageCode: language,
        sourceText: spokenText,
        isFallback: issues.length > 0,
        ...(fallbackReason ? { fallbackReason } : {}),
      },
      issues,
    };
  }

  private async translate(
    text: string,
    language: string,
    signal: AbortSignal | undefined,
  ): Promise<Result<string, AppBoundaryError>> {
    if (isInTargetScript(text, language)) {
      return ok(text);
    }

    const translator = this.translator;
    if (!translator) {
      return err({
        source: "translation",
        code: "config_invalid",
        provider: "none",
        message: "No translation backend is configured.",
        retryable: false,
      });
    }

    const translated = await callBoundary(
      this.policy("translation", translator.provider, this.options.translationTimeoutMs),
      (callSignal) => translator.translate(text, language, callSignal),
      signal,
    );
    return translated.map(sanitize).andThen((value) =>
      value
        ? ok(value)
        : err<string, AppBoundaryError>({
            source: "translation",
            code: "malformed_response",
            provider: translator.provider,
            message: "Translation returned empty text.",
            retryable: false,
          }),
    );
  }

  /**
   * Synthesizes chunk by chunk in order; any failed chunk fails the whole text.
   */
  private async synthesize(
    text: string,
    language: string,
    signal: AbortSignal | undefined,
  ): Promise<Result<Uint8Array, AppBoundaryError>> {
    const chunks = chunkText(text, this.options.maxChunkChars);
    if (chunks.length > this.options.maxChunks) {
      return err({
        source: "speech",
        code: "validation_error",
        provider: this.synthesizer.provider,
        message: `Text too long: ${chunks.length} chunks exceeds the limit of ${this.options.maxChunks}.`,
        retryable: false,
      });
    }

    const parts: Uint8Array[] = [];
    for (const chunk of chunks) {
      const part = await callBoundary(
        this.policy("speech", this.synthesizer.provider, this.options.synthesisTimeoutMs),
        (callSignal) => this.synthesizer.synthesize(chunk, language, callSignal),
        signal,
      );
      if (part.isErr()) {
        return err(part.error);
      }
      parts.push(part.value);
    }

    return ok(concatBytes(parts));
  }

  private async storeAudio(audio: SynthesizedAudio): Promise<string> {
    const stored = await this.store.save(audio);
    if (stored.isOk()) {
      return stored.value.ref;
    }

    logger.warn(
      { reason: stored.error.message },
      "Audio could not be stored; returning it inline",
    );
    return toDataUri(audio);
  }

  private policy(
    source: BoundaryCallPolicy["source"],
    provider: string,
    timeoutMs: number,
  ): BoundaryCallPolicy {
    return {
      source,
      provider,
      timeoutMs,
      retries: this.options.retries,
      retryDelayMs: this.options.retryDelayMs,
    };
  }

  private issueFor(
    code: "translation_failed" | "synthesis_failed",
    error: AppBoundaryError,
  ): StageIssue {
    return {
      stage: "render",
      code,
      reason: `${error.code}: ${error.message}`,
      provider: error.provider,
    };
  }
}
