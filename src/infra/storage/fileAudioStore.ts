import { mkdir, readdir, stat, unlink, writeFile } from "node:fs/promises";
import path from "node:path";
import { err, ok, ResultAsync, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { AudioContentType } from "../../core/entities/analysis";
import type {
  AudioStorePort,
  ClockPort,
  IdGeneratorPort,
  StoredAudio,
  SynthesizedAudio,
} from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import { toErrorDetails } from "../../shared/logger/errorDetails";

export const AUDIO_ROUTE_PREFIX = "/static/audio";

const EXTENSIONS: Record<AudioContentType, string> = {
  "audio/mpeg": "mp3",
  "audio/wav": "wav",
};

const isMissingDirectory = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Writes rendered audio under one directory and hands back the public URL it is served from.
 */
export class FileAudioStore implements AudioStorePort {
  constructor(
    private readonly outputDir: string,
    private readonly publicBaseUrl: string,
    private readonly ids: IdGeneratorPort,
    private readonly clock: ClockPort,
  ) {}

  async save(audio: SynthesizedAudio): Promise<Result<StoredAudio, AppBoundaryError>> {
    const fileName = `${this.ids.next()}.${EXTENSIONS[audio.contentType]}`;
    const written = await ResultAsync.fromPromise(
      mkdir(this.outputDir, { recursive: true }).then(() =>
        writeFile(path.join(this.outputDir, fileName), audio.bytes),
      ),
      (error): AppBoundaryError => ({
        source: "storage",
        code: "provider_error",
        provider: "file-audio-store",
        message: error instanceof Error ? error.message : "Audio file could not be written.",
        retryable: false,
        cause: error,
      }),
    );
    if (written.isErr()) {
      return err(written.error);
    }

    const base = this.publicBaseUrl.replace(/\/+$/, "");
    return ok({
      ref: `${base}${AUDIO_ROUTE_PREFIX}/${fileName}`,
      byteLength: audio.bytes.byteLength,
    });
  }

  /**
   * Deletes files last modified more than `maxAgeMs` ago and returns how many were removed.
   */
  async cleanupOlderThan(maxAgeMs: number): Promise<number> {
    let entries: string[];
    try {
      entries = await readdir(this.outputDir);
    } catch (error) {
      if (isMissingDirectory(error)) {
        return 0;
      }
      throw error;
    }

    const cutoff = this.clock.now().getTime() - maxAgeMs;
    let removed = 0;
    for (const entry of entries) {
      const filePath = path.join(this.outputDir, entry);
      try {
        const info = await stat(filePath);
        if (info.isFile() && info.mtimeMs < cutoff) {
          await unlink(filePath);
          removed += 1;
        }
      } catch (error) {
        logger.warn(
          { filePath, error: toErrorDetails(error) },
          "Could not remove old audio file",
        );
      }
    }

    if (removed > 0) {
      logger.info({ removed, outputDir: this.outputDir }, "Removed old audio files");
    }
    return removed;
  }
}
