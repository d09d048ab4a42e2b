import "dotenv/config";

import { createApp } from "./app.js";
import { loadConfig, reportMissingConfig } from "./config.js";
import { fetchCollegeData } from "./data/collegeData.js";
import { createLlmClient } from "./llm/client.js";

const cfg = loadConfig();
reportMissingConfig(cfg);

const app = createApp(cfg, {
  llm: createLlmClient(cfg),
  loadData: () => fetchCollegeData(cfg.appsScriptUrl),
});

app.listen(cfg.port, () => {
  console.log(`[server] campus-chat-relay listening on :${cfg.port} (prompt mode: ${cfg.promptMode})`);
});
