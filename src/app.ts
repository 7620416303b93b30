import { appConfig, ensureRuntimeEnv } from "./config.ts";
import { InsightBot } from "./bot.ts";
import { GeminiAnalysisClient } from "./analysis/geminiAnalysisClient.ts";
import { RuntimeActionLogger } from "./runtimeActionLogger.ts";
import { Store } from "./store.ts";
import { errorMessage } from "./utils.ts";

async function main() {
  ensureRuntimeEnv();

  const store = new Store(appConfig.dbPath, {
    defaultRecordingIntervalSeconds: appConfig.defaultRecordingIntervalSeconds
  });
  store.init();

  const runtimeLogger = new RuntimeActionLogger({
    enabled: appConfig.runtimeStructuredLogsEnabled,
    writeToStdout: appConfig.runtimeStructuredLogsStdout,
    logFilePath: appConfig.runtimeStructuredLogsFilePath
  });
  runtimeLogger.attachToStore(store);

  const bot = new InsightBot({
    appConfig,
    store,
    createAnalysisClient: (apiKey) =>
      new GeminiAnalysisClient({
        apiKey,
        model: appConfig.geminiModel,
        baseUrl: appConfig.geminiApiBaseUrl,
        store
      })
  });

  await bot.start();

  let closing = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (closing) return;
    closing = true;

    console.log(`Shutting down (${signal})...`);

    try {
      await bot.stop();
    } catch (error) {
      console.error("Shutdown error:", errorMessage(error));
    }

    runtimeLogger.close();
    store.close();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  console.error("Fatal startup error:", error);
  process.exit(1);
});
