import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { AnalysisRateLimitError, AnalysisServiceError } from "./analysisClient.ts";
import { GeminiAnalysisClient, extractGeminiText } from "./geminiAnalysisClient.ts";
import { getAnalysisPrompt } from "./prompts.ts";

type RecordedRequest = {
  url: string;
  method: string;
  apiKey: string | null;
  body: RequestInit["body"];
};

function jsonResponse(payload: unknown, status = 200) {
  return new Response(JSON.stringify(payload), {
    status,
    headers: { "content-type": "application/json" }
  });
}

async function withMockFetch(responses: Array<Response | Error>, run: (calls: RecordedRequest[]) => Promise<void>) {
  const originalFetch = globalThis.fetch;
  const calls: RecordedRequest[] = [];
  const queue = [...responses];
  globalThis.fetch = async (input, init) => {
    calls.push({
      url: String(input),
      method: String(init?.method || "GET"),
      apiKey: new Headers(init?.headers).get("x-goog-api-key"),
      body: init?.body
    });
    const next = queue.shift();
    if (!next) throw new Error("unexpected fetch");
    if (next instanceof Error) throw next;
    return next;
  };
  try {
    await run(calls);
  } finally {
    globalThis.fetch = originalFetch;
  }
}

function createClient() {
  return new GeminiAnalysisClient({
    apiKey: "test-secret",
    model: "gemini-test",
    baseUrl: "https://gemini.test/",
    pollIntervalMs: 0,
    maxPollAttempts: 3
  });
}

async function withAudioFile(run: (filePath: string) => Promise<void>) {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "insight-gemini-test-"));
  const filePath = path.join(dir, "1_alice_2.wav");
  await fs.writeFile(filePath, Buffer.from("RIFF"));
  try {
    await run(filePath);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

test("uploadAudio posts multipart audio and waits until the file is active", async () => {
  await withAudioFile(async (filePath) => {
    await withMockFetch(
      [
        jsonResponse({ file: { name: "files/abc", uri: "", mimeType: "audio/wav", state: "PROCESSING" } }),
        jsonResponse({ name: "files/abc", state: "PROCESSING" }),
        jsonResponse({ name: "files/abc", uri: "https://gemini.test/files/abc", mimeType: "audio/wav", state: "ACTIVE" })
      ],
      async (calls) => {
        const upload = await createClient().uploadAudio({ label: "Alice", path: filePath, mimeType: "audio/wav" });

        assert.deepEqual(upload, {
          label: "Alice",
          name: "files/abc",
          uri: "https://gemini.test/files/abc",
          mimeType: "audio/wav"
        });
        assert.deepEqual(
          calls.map((call) => [call.method, call.url]),
          [
            ["POST", "https://gemini.test/upload/v1beta/files"],
            ["GET", "https://gemini.test/v1beta/files/abc"],
            ["GET", "https://gemini.test/v1beta/files/abc"]
          ]
        );
        assert.equal(calls[0]?.apiKey, "test-secret");
        const body = calls[0]?.body;
        assert.ok(body instanceof FormData);
        assert.ok(body.get("file") instanceof Blob);
      }
    );
  });
});

test("uploadAudio deletes the remote file when processing fails", async () => {
  await withAudioFile(async (filePath) => {
    await withMockFetch(
      [
        jsonResponse({ file: { name: "files/bad", uri: "", mimeType: "audio/wav", state: "PROCESSING" } }),
        jsonResponse({ name: "files/bad", state: "FAILED" }),
        jsonResponse({})
      ],
      async (calls) => {
        await assert.rejects(
          () => createClient().uploadAudio({ label: "Alice", path: filePath, mimeType: "audio/wav" }),
          /failed to process files\/bad/
        );
        assert.deepEqual(calls.at(-1)?.method, "DELETE");
        assert.equal(calls.at(-1)?.url, "https://gemini.test/v1beta/files/bad");
      }
    );
  });
});

test("analyze sends prompt, context and labelled files with search grounding", async () => {
  await withMockFetch(
    [
      jsonResponse({
        candidates: [{ content: { parts: [{ text: "Part one. " }, { text: "Part two." }] } }]
      })
    ],
    async (calls) => {
      const report = await createClient().analyze({
        uploads: [{ label: "Alice", name: "files/a", uri: "https://gemini.test/files/a", mimeType: "audio/wav" }],
        mode: "summary",
        context: "earlier report"
      });

      assert.equal(report, "Part one. Part two.");
      assert.equal(calls[0]?.url, "https://gemini.test/v1beta/models/gemini-test:generateContent");
      assert.equal(calls[0]?.method, "POST");
      assert.deepEqual(JSON.parse(String(calls[0]?.body)), {
        contents: [
          {
            role: "user",
            parts: [
              { text: getAnalysisPrompt("summary") },
              { text: "Previous context:\nearlier report\n---\nCurrent discussion:" },
              { text: "Speaker: Alice" },
              { file_data: { file_uri: "https://gemini.test/files/a", mime_type: "audio/wav" } }
            ]
          }
        ],
        tools: [{ google_search: {} }]
      });
    }
  );
});

test("analyze omits the context preamble when there is no context", async () => {
  await withMockFetch([jsonResponse({ candidates: [] })], async (calls) => {
    const report = await createClient().analyze({ uploads: [], mode: "debate", context: "  " });
    assert.equal(report, "");
    assert.deepEqual(JSON.parse(String(calls[0]?.body)), {
      contents: [{ role: "user", parts: [{ text: getAnalysisPrompt("debate") }] }],
      tools: [{ google_search: {} }]
    });
  });
});

test("analyze classifies HTTP 429 as a rate limit", async () => {
  await withMockFetch([jsonResponse({ error: { code: 429 } }, 429)], async () => {
    await assert.rejects(
      () => createClient().analyze({ uploads: [], mode: "debate", context: "" }),
      AnalysisRateLimitError
    );
  });
});

test("analyze classifies quota text as a rate limit regardless of status", async () => {
  await withMockFetch([new Response("Quota exceeded for metric", { status: 400 })], async () => {
    await assert.rejects(
      () => createClient().analyze({ uploads: [], mode: "debate", context: "" }),
      AnalysisRateLimitError
    );
  });
});

test("analyze maps other failures to AnalysisServiceError", async () => {
  const isPlainServiceError = (error: unknown) =>
    error instanceof AnalysisServiceError && !(error instanceof AnalysisRateLimitError);

  await withMockFetch([new Response("upstream down", { status: 503 })], async () => {
    await assert.rejects(
      () => createClient().analyze({ uploads: [], mode: "debate", context: "" }),
      (error: unknown) => isPlainServiceError(error) && /Gemini HTTP 503: upstream down/.test(String(error))
    );
  });

  await withMockFetch([new Error("socket hang up")], async () => {
    await assert.rejects(
      () => createClient().analyze({ uploads: [], mode: "debate", context: "" }),
      (error: unknown) => isPlainServiceError(error) && /socket hang up/.test(String(error))
    );
  });

  await withMockFetch([jsonResponse({ error: { code: 400, message: "bad request" } })], async () => {
    await assert.rejects(
      () => createClient().analyze({ uploads: [], mode: "debate", context: "" }),
      (error: unknown) => isPlainServiceError(error) && /bad request/.test(String(error))
    );
  });
});

test("extractGeminiText tolerates malformed payloads", () => {
  assert.equal(extractGeminiText(null), "");
  assert.equal(extractGeminiText({ candidates: [{}] }), "");
  assert.equal(extractGeminiText({ candidates: [{ content: { parts: [{ text: " hi " }, { other: 1 }] } }] }), "hi");
});
