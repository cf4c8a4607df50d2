import express, { type Express } from "express";
import { registerRoutes } from "./routes";
import { requestLogger } from "./middleware/requestLogger";
import { errorMiddleware } from "./middleware/errorMiddleware";
import type { KeyService } from "./services/keyService";

export function createApp(keyService?: KeyService): Express {
  const app = express();
  app.disable("x-powered-by");
  app.use(express.json({ limit: "16kb" }));
  app.use(requestLogger);

  registerRoutes(app, keyService);

  app.use(errorMiddleware);
  return app;
}
