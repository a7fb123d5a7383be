import path from "node:path";
import { appConfig, ensureRuntimeEnv } from "./config.ts";
import { createDashboardServer, VoiceStatusBroadcaster } from "./dashboard.ts";
import { HuddleBot } from "./bot.ts";
import { LLMService } from "./llm.ts";
import { PersonaService } from "./personas.ts";
import { RuntimeActionLogger } from "./runtimeActionLogger.ts";
import { Store } from "./store.ts";
import { shortError } from "./utils.ts";
import { NoveltySoundHandler } from "./voice/novelty/noveltySoundHandler.ts";
import { SpecialPhraseHandler } from "./voice/novelty/specialPhraseHandler.ts";

async function loadNoveltyHandler() {
  const directory = appConfig.voice.noveltySoundsDir;
  if (!directory) return null;
  try {
    const handler = await NoveltySoundHandler.fromDirectory(path.resolve(process.cwd(), directory), appConfig.voice.noveltyTriggers);
    console.log(`Loaded ${handler.clipCount} novelty clips from ${directory}`);
    return handler;
  } catch (error) {
    console.warn(`Novelty sounds disabled: ${shortError(error)}`);
    return null;
  }
}

async function main() {
  ensureRuntimeEnv();

  const dbPath = path.resolve(process.cwd(), appConfig.dataDir, "huddlebot.db");
  const store = new Store(dbPath, {
    actionLogRetentionDays: appConfig.actionLogRetentionDays,
    actionLogMaxRows: appConfig.actionLogMaxRows
  });
  store.init();

  const runtimeLogger = new RuntimeActionLogger({
    enabled: appConfig.runtimeStructuredLogsEnabled,
    writeToStdout: appConfig.runtimeStructuredLogsStdout,
    logFilePath: appConfig.runtimeStructuredLogsFilePath
  });
  runtimeLogger.attachToStore(store);

  const llm = new LLMService({ appConfig, store });
  const personas = new PersonaService({ store });
  const statusBroadcaster = new VoiceStatusBroadcaster();
  const noveltyHandler = await loadNoveltyHandler();
  const specialPhrases = new SpecialPhraseHandler();

  const bot = new HuddleBot({
    appConfig,
    store,
    llm,
    personas,
    statusSink: statusBroadcaster,
    createHandlers: () => (noveltyHandler ? [specialPhrases, noveltyHandler] : [specialPhrases])
  });
  const dashboard = createDashboardServer({
    appConfig,
    store,
    voice: bot.voice,
    statusBroadcaster,
    personas
  });

  await bot.start();

  let closing = false;
  const shutdown = async (signal: string) => {
    if (closing) return;
    closing = true;

    console.log(`Shutting down (${signal})...`);

    try {
      await bot.stop();
    } catch (error) {
      console.warn(`Bot stop failed: ${shortError(error)}`);
    }

    await dashboard.close();
    runtimeLogger.close();
    store.close();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error) => {
      console.error("Shutdown failed:", error);
      process.exit(1);
    });
  };
  process.on("SIGINT", () => onSignal("SIGINT"));
  process.on("SIGTERM", () => onSignal("SIGTERM"));
}

main().catch((error) => {
  console.error("Fatal startup error:", error);
  process.exit(1);
});
