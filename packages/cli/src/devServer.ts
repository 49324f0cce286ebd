import { createProjectService } from "./projectService.js";
import { createProjectStore } from "./projectStore.js";
import { loadLingoDeskConfig } from "./config.js";
import { startServer } from "./server.js";

async function main() {
  const loaded = await loadLingoDeskConfig();
  const service = createProjectService(
    createProjectStore(loaded.dataDir),
    loaded.config.export,
  );
  const { port } = await startServer(
    { service, config: loaded.config, uiDistPath: null },
    loaded.config.port,
  );
  console.log(`LingoDesk API running at http://localhost:${port}`);
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
