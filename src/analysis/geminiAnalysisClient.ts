import fs from "node:fs/promises";
import path from "node:path";
import type { AnalysisMode } from "../settings/guildSettings.ts";
import type { ActionLog } from "../store.ts";
import { errorMessage, sleep, shortError } from "../utils.ts";
import {
  AnalysisRateLimitError,
  AnalysisServiceError,
  isRateLimitSignal,
  type AnalysisClient,
  type AnalysisUpload,
  type AnalyzeRequest,
  type AudioUploadRequest
} from "./analysisClient.ts";
import { buildContextPreamble, buildSpeakerLabel, getAnalysisPrompt } from "./prompts.ts";

const DEFAULT_GEMINI_BASE_URL = "https://generativelanguage.googleapis.com";
const UPLOAD_TIMEOUT_MS = 120_000;
const GENERATE_TIMEOUT_MS = 300_000;
const FILE_REQUEST_TIMEOUT_MS = 30_000;
const FILE_POLL_INTERVAL_MS = 2_000;
const FILE_POLL_MAX_ATTEMPTS = 30;

type GeminiFile = {
  name: string;
  uri: string;
  mimeType: string;
  state: string;
};

type GeminiPart = { text: string } | { file_data: { file_uri: string; mime_type: string } };

type GeminiAnalysisClientOptions = {
  apiKey: string;
  model: string;
  baseUrl?: string;
  pollIntervalMs?: number;
  maxPollAttempts?: number;
  uploadTimeoutMs?: number;
  generateTimeoutMs?: number;
  store?: ActionLog | null;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function readString(value: unknown) {
  return typeof value === "string" ? value : "";
}

function parseGeminiFile(value: unknown): GeminiFile | null {
  if (!isRecord(value)) return null;
  const name = readString(value.name);
  if (!name) return null;
  return {
    name,
    uri: readString(value.uri),
    mimeType: readString(value.mimeType),
    state: readString(value.state)
  };
}

export function extractGeminiText(payload: unknown) {
  if (!isRecord(payload) || !Array.isArray(payload.candidates)) return "";
  const [candidate] = payload.candidates;
  if (!isRecord(candidate) || !isRecord(candidate.content)) return "";
  const parts = candidate.content.parts;
  if (!Array.isArray(parts)) return "";
  return parts
    .map((part) => (isRecord(part) ? readString(part.text) : ""))
    .join("")
    .trim();
}

function extractGeminiError(payload: unknown) {
  if (!isRecord(payload) || !isRecord(payload.error)) return null;
  const code = Number(payload.error.code);
  return {
    code: Number.isFinite(code) ? code : null,
    message: readString(payload.error.message) || "unknown Gemini error"
  };
}

export class GeminiAnalysisClient implements AnalysisClient {
  apiKey: string;
  model: string;
  baseUrl: string;
  pollIntervalMs: number;
  maxPollAttempts: number;
  uploadTimeoutMs: number;
  generateTimeoutMs: number;
  store: ActionLog | null;

  constructor({
    apiKey,
    model,
    baseUrl = DEFAULT_GEMINI_BASE_URL,
    pollIntervalMs = FILE_POLL_INTERVAL_MS,
    maxPollAttempts = FILE_POLL_MAX_ATTEMPTS,
    uploadTimeoutMs = UPLOAD_TIMEOUT_MS,
    generateTimeoutMs = GENERATE_TIMEOUT_MS,
    store = null
  }: GeminiAnalysisClientOptions) {
    this.apiKey = String(apiKey || "").trim();
    this.model = String(model || "").trim() || "gemini-2.0-flash";
    this.baseUrl = String(baseUrl || DEFAULT_GEMINI_BASE_URL).replace(/\/+$/, "");
    this.pollIntervalMs = Math.max(0, pollIntervalMs);
    this.maxPollAttempts = Math.max(1, Math.floor(maxPollAttempts));
    this.uploadTimeoutMs = uploadTimeoutMs;
    this.generateTimeoutMs = generateTimeoutMs;
    this.store = store;
  }

  isConfigured() {
    return Boolean(this.apiKey);
  }

  async uploadAudio({ label, path: filePath, mimeType }: AudioUploadRequest): Promise<AnalysisUpload> {
    const bytes = await fs.readFile(filePath);
    const form = new FormData();
    form.append("file", new Blob([bytes], { type: mimeType }), path.basename(filePath));

    const response = await this.request(`${this.baseUrl}/upload/v1beta/files`, {
      method: "POST",
      body: form,
      timeoutMs: this.uploadTimeoutMs
    });
    const payload = await this.readJson(response, "upload");
    const file = parseGeminiFile(isRecord(payload) ? payload.file : null);
    if (!file) {
      throw new AnalysisServiceError("Gemini upload response did not include a file.");
    }

    const upload: AnalysisUpload = {
      label,
      name: file.name,
      uri: file.uri,
      mimeType: file.mimeType || mimeType
    };

    try {
      const active = await this.waitForFileActive(file);
      return { ...upload, uri: active.uri || upload.uri, mimeType: active.mimeType || upload.mimeType };
    } catch (error) {
      await this.deleteUpload(upload).catch((cleanupError: unknown) => {
        this.store?.logAction({
          kind: "analysis_error",
          content: `gemini_orphan_cleanup_failed: ${errorMessage(cleanupError)}`,
          metadata: { file: upload.name, label }
        });
      });
      throw error;
    }
  }

  async waitForFileActive(file: GeminiFile) {
    if (file.state === "ACTIVE") return file;

    for (let attempt = 0; attempt < this.maxPollAttempts; attempt += 1) {
      const response = await this.request(`${this.baseUrl}/v1beta/${file.name}`, {
        method: "GET",
        timeoutMs: FILE_REQUEST_TIMEOUT_MS
      });
      const current = parseGeminiFile(await this.readJson(response, "file status"));
      if (current?.state === "ACTIVE") return current;
      if (current?.state === "FAILED") {
        throw new AnalysisServiceError(`Gemini failed to process ${file.name}.`);
      }
      await sleep(this.pollIntervalMs);
    }

    throw new AnalysisServiceError(`Gemini file ${file.name} was not ready in time.`);
  }

  async analyze({ uploads, mode, context }: AnalyzeRequest) {
    const body = {
      contents: [{ role: "user", parts: buildGeminiParts({ uploads, mode, context }) }],
      tools: [{ google_search: {} }]
    };

    const response = await this.request(
      `${this.baseUrl}/v1beta/models/${encodeURIComponent(this.model)}:generateContent`,
      {
        method: "POST",
        json: body,
        timeoutMs: this.generateTimeoutMs
      }
    );
    const payload = await this.readJson(response, "generation");
    const apiError = extractGeminiError(payload);
    if (apiError) {
      if (isRateLimitSignal(apiError.code, apiError.message)) {
        throw new AnalysisRateLimitError(apiError.message, { status: apiError.code });
      }
      throw new AnalysisServiceError(apiError.message, { status: apiError.code });
    }
    return extractGeminiText(payload);
  }

  async deleteUpload(upload: AnalysisUpload) {
    await this.request(`${this.baseUrl}/v1beta/${upload.name}`, {
      method: "DELETE",
      timeoutMs: FILE_REQUEST_TIMEOUT_MS
    });
  }

  async request(
    url: string,
    {
      method,
      body,
      json,
      timeoutMs
    }: { method: string; body?: FormData; json?: unknown; timeoutMs: number }
  ) {
    const headers: Record<string, string> = {
      "x-goog-api-key": this.apiKey,
      accept: "application/json"
    };
    if (json !== undefined) headers["content-type"] = "application/json";

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers,
        body: json !== undefined ? JSON.stringify(json) : body,
        signal: AbortSignal.timeout(timeoutMs)
      });
    } catch (error) {
      throw new AnalysisServiceError(`Gemini request failed: ${shortError(String(error))}`, { cause: error });
    }

    if (!response.ok) {
      const text = await response.text().catch(() => "");
      if (isRateLimitSignal(response.status, text)) {
        throw new AnalysisRateLimitError(`Gemini HTTP ${response.status}`, { status: response.status });
      }
      throw new AnalysisServiceError(`Gemini HTTP ${response.status}: ${shortError(text)}`, {
        status: response.status
      });
    }
    return response;
  }

  async readJson(response: Response, label: string): Promise<unknown> {
    try {
      const payload: unknown = await response.json();
      return payload;
    } catch (error) {
      throw new AnalysisServiceError(`Gemini returned invalid JSON for ${label}.`, { cause: error });
    }
  }
}

export function buildGeminiParts({
  uploads,
  mode,
  context
}: {
  uploads: readonly AnalysisUpload[];
  mode: AnalysisMode;
  context: string;
}) {
  const parts: GeminiPart[] = [{ text: getAnalysisPrompt(mode) }];
  const preamble = buildContextPreamble(context);
  if (preamble) parts.push({ text: preamble });
  for (const upload of uploads) {
    parts.push({ text: buildSpeakerLabel(upload.label) });
    parts.push({ file_data: { file_uri: upload.uri, mime_type: upload.mimeType } });
  }
  return parts;
}
