import cors from "cors";
import express, { type NextFunction, type Request, type Response } from "express";
import { apiRouter } from "./routes";
import { logger } from "./utils/logger";

export const buildApp = () => {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.use("/api", apiRouter);

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "Not found" });
  });

  // Malformed JSON bodies arrive here from express.json().
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const message = error instanceof Error ? error.message : "Unexpected error";
    const status =
      typeof error === "object" && error !== null && "status" in error && typeof error.status === "number"
        ? error.status
        : 500;
    if (status >= 500) {
      logger.error("Unhandled request error", { error: message });
    } else {
      logger.warn("Request rejected", { error: message, status });
    }
    res.status(status).json({ error: status >= 500 ? "Internal server error" : message });
  });

  return app;
};
