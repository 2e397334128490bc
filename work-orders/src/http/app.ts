import { Logger } from "@preservation/shared-utils";
import express, { Express, NextFunction, Request, Response } from "express";
import { DashboardService } from "../core/refresh";
import { sendError } from "./response";
import { DashboardRoutes } from "./routes";

export interface AppOptions {
  dashboard: DashboardService;
  logger: Logger;
  health?: () => { healthy: boolean; uptimeSeconds: number };
}

export function createApp(options: AppOptions): Express {
  const { dashboard, logger } = options;
  const health = options.health ?? (() => ({ healthy: true, uptimeSeconds: 0 }));

  const app = express();
  app.disable("x-powered-by");

  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.debug(`${req.method} ${req.originalUrl}`);
    next();
  });

  app.use(new DashboardRoutes(dashboard, logger, health).getRouter());

  app.use((_req: Request, res: Response) => {
    sendError(res, 404, "Not found");
  });

  // Express recognizes error handlers by their four parameters
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    logger.error(`Unhandled error on ${req.method} ${req.originalUrl}:`, err);
    sendError(res, 500, "Internal server error");
  });

  return app;
}
