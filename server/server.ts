// Service entry point: npx tsx server/server.ts

import { createApp } from "./app";
import { loadServerConfig } from "./config";

const cfg = loadServerConfig(process.env);
const app = createApp(cfg);

app.listen(cfg.port, () => {
  console.log(
    JSON.stringify({
      msg: "sim service listening",
      port: cfg.port,
      bodyLimit: cfg.bodyLimit,
      rateLimit: cfg.rateLimit,
      defaults: cfg.defaults,
      maxProcesses: cfg.maxProcesses,
      maxTotalBurst: cfg.maxTotalBurst,
    })
  );
});
