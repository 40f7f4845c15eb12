import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const repoRoot = path.resolve(__dirname, "../../");

dotenv.config({ path: path.resolve(repoRoot, ".env") });

// Dynamic imports so `.env` is loaded before any modules read process.env at import-time.
const { loadConfig } = await import("./config.js");
const { CycleLog } = await import("./cycle_log.js");
const { LastResultStore } = await import("./result_store.js");
const { CycleExecutor } = await import("./executor.js");
const { createApp } = await import("./app.js");
const { runNewsroomCycle } = await import("./pipeline/orchestrator.js");
const { FilePromptProvider, AGENT_NAMES } = await import("./pipeline/prompts.js");
const { AgentsGenerationClient } = await import("./pipeline/generation.js");
const { FakeGenerationClient } = await import("./pipeline/fake_generation.js");

const config = loadConfig();
const log = new CycleLog();
const prompts = new FilePromptProvider();

async function createGenerationClient() {
  if (config.generationMode === "fake") {
    const roles = { researcher: "", writer: "", editor: "" };
    for (const agent of AGENT_NAMES) {
      roles[agent] = (await prompts.getAgentConfig(agent)).system_prompt;
    }
    log.info("Generation mode: fake (NEWSROOM_GENERATION_MODE=fake)");
    return new FakeGenerationClient(roles, { delayMs: config.fakeDelayMs });
  }

  return new AgentsGenerationClient({
    apiKey: config.apiKey ?? "",
    baseURL: config.baseURL,
    temperature: config.temperature,
    timeoutMs: config.generationTimeoutMs,
    onFailure: (message) => log.error(message)
  });
}

const generation = await createGenerationClient();
const store = new LastResultStore();
const executor = new CycleExecutor(
  (request, hooks) =>
    runNewsroomCycle(request, {
      generation,
      prompts,
      model: config.model,
      log: hooks.log,
      onPhase: hooks.onPhase
    }),
  store,
  log,
  { concurrency: config.maxConcurrentCycles }
);

const app = createApp({ executor, store, log, generationMode: config.generationMode, model: config.model });

app.listen(config.port, () => {
  log.info(`Newsroom listening on http://localhost:${config.port} (model: ${config.model})`);
});
