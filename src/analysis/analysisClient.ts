import type { AnalysisMode } from "../settings/guildSettings.ts";

export type AudioUploadRequest = {
  label: string;
  path: string;
  mimeType: string;
};

export type AnalysisUpload = {
  label: string;
  name: string;
  uri: string;
  mimeType: string;
};

export type AnalyzeRequest = {
  uploads: readonly AnalysisUpload[];
  mode: AnalysisMode;
  context: string;
};

export interface AnalysisClient {
  uploadAudio(request: AudioUploadRequest): Promise<AnalysisUpload>;
  analyze(request: AnalyzeRequest): Promise<string>;
  deleteUpload(upload: AnalysisUpload): Promise<void>;
}

export class AnalysisServiceError extends Error {
  readonly status: number | null;

  constructor(message: string, { status = null, cause }: { status?: number | null; cause?: unknown } = {}) {
    super(message, { cause });
    this.name = "AnalysisServiceError";
    this.status = status;
  }
}

export class AnalysisRateLimitError extends AnalysisServiceError {
  constructor(message = "Analysis quota exceeded", { status = 429 }: { status?: number | null } = {}) {
    super(message, { status });
    this.name = "AnalysisRateLimitError";
  }
}

export function isRateLimitSignal(status: number | null, text: string) {
  return status === 429 || /quota exceeded|resource[_ ]exhausted/i.test(text);
}
