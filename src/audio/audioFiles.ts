import fs from "node:fs/promises";
import path from "node:path";
import type { ActionLog } from "../store.ts";
import type { FlushSnapshot } from "../recording/sessionRecorder.ts";
import { errorMessage } from "../utils.ts";

export const CAPTURE_SAMPLE_RATE = 48_000;
export const CAPTURE_CHANNELS = 2;
const BITS_PER_SAMPLE = 16;
const WAV_HEADER_BYTES = 44;

const MIME_TYPES: Record<string, string> = {
  ".wav": "audio/wav",
  ".mp3": "audio/mpeg",
  ".ogg": "audio/ogg",
  ".flac": "audio/flac",
  ".m4a": "audio/mp4"
};

export type PersistedAudioFile = {
  speakerId: string;
  path: string;
  bytes: number;
};

type WavFormat = {
  sampleRate?: number;
  channels?: number;
};

export function encodePcm16AsWav(
  pcm: Buffer,
  { sampleRate = CAPTURE_SAMPLE_RATE, channels = CAPTURE_CHANNELS }: WavFormat = {}
) {
  const normalizedRate = Math.max(8000, Math.min(48000, Math.floor(sampleRate) || CAPTURE_SAMPLE_RATE));
  const normalizedChannels = channels === 1 ? 1 : 2;
  const blockAlign = (normalizedChannels * BITS_PER_SAMPLE) / 8;
  const byteRate = normalizedRate * blockAlign;
  const dataSize = pcm.length;
  const buffer = Buffer.alloc(WAV_HEADER_BYTES + dataSize);

  buffer.write("RIFF", 0);
  buffer.writeUInt32LE(36 + dataSize, 4);
  buffer.write("WAVE", 8);
  buffer.write("fmt ", 12);
  buffer.writeUInt32LE(16, 16);
  buffer.writeUInt16LE(1, 20);
  buffer.writeUInt16LE(normalizedChannels, 22);
  buffer.writeUInt32LE(normalizedRate, 24);
  buffer.writeUInt32LE(byteRate, 28);
  buffer.writeUInt16LE(blockAlign, 32);
  buffer.writeUInt16LE(BITS_PER_SAMPLE, 34);
  buffer.write("data", 36);
  buffer.writeUInt32LE(dataSize, 40);
  pcm.copy(buffer, WAV_HEADER_BYTES);

  return buffer;
}

function sanitizeFileSegment(value: string) {
  return value.replace(/[^A-Za-z0-9_-]/g, "_") || "unknown";
}

export function buildAudioFileName({
  sessionId,
  sessionStartedAt,
  sequence,
  speakerId,
  flushedAt,
  extension = ".wav"
}: {
  sessionId: string;
  sessionStartedAt: number;
  sequence: number;
  speakerId: string;
  flushedAt: number;
  extension?: string;
}) {
  return [
    Math.floor(sessionStartedAt),
    sanitizeFileSegment(sessionId),
    Math.floor(sequence),
    sanitizeFileSegment(speakerId),
    `${Math.floor(flushedAt)}${extension}`
  ].join("_");
}

export function mimeTypeForPath(filePath: string) {
  return MIME_TYPES[path.extname(filePath).toLowerCase()] ?? "application/octet-stream";
}

export async function persistSnapshot({
  tempDir,
  sessionId,
  sessionStartedAt,
  snapshot,
  store,
  guildId
}: {
  tempDir: string;
  sessionId: string;
  sessionStartedAt: number;
  snapshot: FlushSnapshot;
  store: ActionLog;
  guildId: string;
}) {
  await fs.mkdir(tempDir, { recursive: true });
  const files: PersistedAudioFile[] = [];

  for (const [speakerId, fragments] of snapshot.speakers) {
    const filePath = path.join(
      tempDir,
      buildAudioFileName({
        sessionId,
        sessionStartedAt,
        sequence: snapshot.sequence,
        speakerId,
        flushedAt: snapshot.flushedAt
      })
    );
    try {
      const wav = encodePcm16AsWav(Buffer.concat(fragments));
      await fs.writeFile(filePath, wav);
      files.push({ speakerId, path: filePath, bytes: wav.length });
    } catch (error) {
      store.logAction({
        kind: "analysis_error",
        guildId,
        userId: speakerId,
        content: `audio_persist_failed: ${errorMessage(error)}`,
        metadata: { path: filePath }
      });
    }
  }

  return files;
}

export async function releaseAudioFiles({
  files,
  store,
  guildId
}: {
  files: readonly Pick<PersistedAudioFile, "path">[];
  store: ActionLog;
  guildId: string;
}) {
  let removed = 0;
  for (const file of files) {
    try {
      await fs.rm(file.path, { force: true });
      removed += 1;
    } catch (error) {
      store.logAction({
        kind: "analysis_error",
        guildId,
        content: `audio_cleanup_failed: ${errorMessage(error)}`,
        metadata: { path: file.path }
      });
    }
  }
  return removed;
}
