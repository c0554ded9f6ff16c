import type { Express, Request, Response } from "express";
import type { Server } from "http";
import { describeAIConfig, isAIConfigured } from "./services/aiClientFactory";
import { describeProviders } from "./services/providers";
import type { ProviderRegistry } from "./services/providers/types";
import type { PlanService } from "./services/planService";
import { createPlansRouter } from "./routes/plans";

export interface RouteDependencies {
  service: Pick<PlanService, "createPlan" | "getPlan" | "status">;
  providers: ProviderRegistry;
  aiReady?: () => boolean;
  rateLimit?: boolean;
}

export async function registerRoutes(
  httpServer: Server,
  app: Express,
  { service, providers, aiReady = isAIConfigured, rateLimit = true }: RouteDependencies,
): Promise<Server> {
  // Health check with provider configuration
  app.get("/api/health", (_req: Request, res: Response) => {
    res.json({
      status: "ok",
      ai: aiReady(),
      models: describeAIConfig()?.models ?? null,
      providers: describeProviders(providers),
      ...service.status(),
    });
  });

  // Trip planning
  app.use("/api/plans", createPlansRouter({ service, aiReady, rateLimit }));

  return httpServer;
}
