// api/src/index.ts
import path from "node:path";
import { config } from "./config.js";
import { createApp } from "./app.js";
import { loadDataset } from "./dataset.js";
import { systemRandom } from "./random.js";
import { SessionStore } from "./sessionStore.js";
import { trainModel } from "./trainer.js";

function bootstrap() {
  // dataset and model come before listen; the server does not start without them
  const dataset = loadDataset(path.resolve(config.datasetPath));
  const model = trainModel(dataset);
  console.log(
    `model: ${model.treeCount} trees, held-out accuracy ${(model.accuracy * 100).toFixed(2)}%`
  );

  const app = createApp(
    { model, sessions: new SessionStore({ idleTtlMs: config.sessionIdleMinutes * 60 * 1000 }), random: systemRandom },
    { corsOrigin: config.corsOrigin }
  );

  app.listen(config.port, () => {
    console.log(`api:${config.port} (${config.nodeEnv})`);
  });
}

try {
  bootstrap();
} catch (e) {
  console.error("startup failed:", e instanceof Error ? e.message : e);
  process.exit(1);
}
