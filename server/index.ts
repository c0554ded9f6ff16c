import "dotenv/config";
import express, { type Request, Response, NextFunction } from "express";
import compression from "compression";
import { createServer } from "http";
import { registerRoutes } from "./routes";
import { logAIConfig } from "./services/aiClientFactory";
import { createPlanService } from "./services/planService";
import { createProviderRegistry, describeProviders } from "./services/providers";

const app = express();
const httpServer = createServer(app);

// Enable gzip compression for all responses
app.use(compression({
  level: 6, // Balanced speed/compression
  threshold: 1024, // Only compress responses > 1KB
}));

app.use(express.json({ limit: "100kb" }));

export function log(message: string, source = "express") {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  console.log(`${formattedTime} [${source}] ${message}`);
}

app.use((req, res, next) => {
  const start = Date.now();
  const path = req.path;

  res.on("finish", () => {
    const duration = Date.now() - start;
    if (path.startsWith("/api")) {
      log(`${req.method} ${path} ${res.statusCode} in ${duration}ms`);
    }
  });

  next();
});

function errorStatus(err: unknown): number {
  if (typeof err === "object" && err !== null) {
    if ("status" in err && typeof err.status === "number") return err.status;
    if ("statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
  }
  return 500;
}

(async () => {
  logAIConfig();
  const providers = createProviderRegistry();
  const enabled = Object.entries(describeProviders(providers))
    .filter(([, on]) => on)
    .map(([name]) => name);
  console.log(`[Startup] Providers: ${enabled.length > 0 ? enabled.join(", ") : "none"}`);

  const service = createPlanService(providers);
  await registerRoutes(httpServer, app, { service, providers });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = errorStatus(err);
    const message = err instanceof Error ? err.message : "Internal Server Error";

    console.error("[Server] Request failed:", err);
    res.status(status).json({ error: status >= 500 ? "internal_error" : "request_error", message });
  });

  const port = parseInt(process.env.PORT || "5000", 10);
  httpServer.listen({ port, host: "0.0.0.0" }, () => {
    log(`serving on port ${port}`);
  });
})().catch((err) => {
  console.error("[Startup] Failed to start server:", err);
  process.exit(1);
});
