import express, { type Express } from "express";
import type { ServerConfig } from "./config";
import { createTokenBucket } from "./rateLimit";
import { handleSimulate } from "./simulate";

export function createApp(cfg: ServerConfig, nowMs: () => number = () => Date.now()): Express {
  const bucket = createTokenBucket({ ...cfg.rateLimit, nowMs });

  const app = express();
  app.disable("x-powered-by");

  app.use((req, res, next) => {
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");
    res.setHeader("Access-Control-Max-Age", "600");
    if (req.method === "OPTIONS") {
      res.status(204).end();
      return;
    }
    next();
  });

  // Registered before body parsing so health checks stay cheap.
  app.get("/healthz", (_req, res) => {
    res.status(200).type("text/plain").send("ok");
  });

  app.use(express.json({ limit: cfg.bodyLimit, type: ["application/json", "application/*+json"] }));

  app.post("/simulate", (req, res) => {
    const startMs = nowMs();

    if (!bucket.tryTake(1)) {
      console.warn(JSON.stringify({ event: "rate_limited", path: "/simulate" }));
      res.status(429).json({ error: "rate_limited" });
      return;
    }

    try {
      const out = handleSimulate(req.body, cfg);
      const log = {
        event: out.status === 200 ? "simulated" : "rejected",
        algorithm: out.algorithm,
        traceLength: out.traceLength,
        status: out.status,
        latencyMs: nowMs() - startMs,
      };
      if (out.status === 200) console.log(JSON.stringify(log));
      else console.warn(JSON.stringify(log));
      res.status(out.status).type("application/json").send(out.bodyText);
    } catch (err) {
      console.error(
        JSON.stringify({
          error: "internal_error",
          message: err instanceof Error ? err.message : String(err),
          latencyMs: nowMs() - startMs,
        })
      );
      res.status(500).json({ error: "internal_error" });
    }
  });

  return app;
}
