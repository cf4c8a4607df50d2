import type { Express } from "express";
import type { KeyService } from "./services/keyService";
import keyRoutes, { createKeyRouter } from "./routes/keyRoutes";

export function registerRoutes(app: Express, keyService?: KeyService): void {
  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.use(keyService ? createKeyRouter(keyService) : keyRoutes);
}
