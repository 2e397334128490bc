/**
 * Dashboard HTTP Routes
 *
 * Every request runs one refresh cycle; the feed cache keeps that cheap.
 */

import { Logger } from "@preservation/shared-utils";
import { parseISO } from "date-fns";
import { NextFunction, Request, Response, Router } from "express";
import { z } from "zod";
import { explainClassification } from "../core/classify";
import { CATEGORIES } from "../core/dto";
import { DashboardService } from "../core/refresh";
import { sendError, sendSuccess } from "./response";

export const schemas = {
  viewQuery: z.object({
    today: z
      .string()
      .regex(/^\d{4}-\d{2}-\d{2}$/, "today must be yyyy-MM-dd")
      .refine((s) => !isNaN(parseISO(s).getTime()), "today is not a valid date")
      .optional(),
  }),
  worklistParams: z.object({
    list: z.enum(["urgent", "overdue", "pending", "dueSoon"]),
  }),
  recordsQuery: z.object({
    category: z.enum(CATEGORIES).optional(),
  }),
};

type ViewQuery = z.infer<typeof schemas.viewQuery>;

export class DashboardRoutes {
  private router: Router;

  constructor(
    private dashboard: DashboardService,
    private logger: Logger,
    private health: () => { healthy: boolean; uptimeSeconds: number }
  ) {
    this.router = Router();
    this.setupRoutes();
  }

  getRouter(): Router {
    return this.router;
  }

  private setupRoutes(): void {
    this.router.get("/health", this.handleHealth.bind(this));
    this.router.get("/dashboard", this.wrap(this.handleView.bind(this)));
    this.router.get("/dashboard/metrics", this.wrap(this.handleMetrics.bind(this)));
    this.router.get("/dashboard/records", this.wrap(this.handleRecords.bind(this)));
    this.router.get("/dashboard/properties", this.wrap(this.handleProperties.bind(this)));
    this.router.get("/dashboard/worklists/:list", this.wrap(this.handleWorklist.bind(this)));
  }

  private wrap(handler: (req: Request, res: Response) => Promise<void>) {
    return (req: Request, res: Response, next: NextFunction) => {
      handler(req, res).catch(next);
    };
  }

  private handleHealth(_req: Request, res: Response): void {
    const { healthy, uptimeSeconds } = this.health();
    res.status(healthy ? 200 : 503).json({
      status: healthy ? "healthy" : "unhealthy",
      uptimeSeconds,
      refresh: this.dashboard.getMetrics(),
    });
  }

  private parseView(req: Request, res: Response): ViewQuery | undefined {
    const parsed = schemas.viewQuery.safeParse(req.query);
    if (!parsed.success) {
      sendError(res, 400, parsed.error.issues.map((i) => i.message).join("; "));
      return undefined;
    }
    return parsed.data;
  }

  private refresh(query: ViewQuery) {
    return query.today
      ? this.dashboard.refresh(parseISO(query.today))
      : this.dashboard.refresh();
  }

  private async handleView(req: Request, res: Response): Promise<void> {
    const query = this.parseView(req, res);
    if (!query) return;
    sendSuccess(res, await this.refresh(query));
  }

  private async handleMetrics(req: Request, res: Response): Promise<void> {
    const query = this.parseView(req, res);
    if (!query) return;

    const view = await this.refresh(query);
    sendSuccess(res, {
      today: view.today,
      metrics: view.metrics,
      crews: view.crews,
      dueWindows: view.dueWindows,
      notices: view.notices,
    });
  }

  private async handleRecords(req: Request, res: Response): Promise<void> {
    const query = this.parseView(req, res);
    if (!query) return;
    const filter = schemas.recordsQuery.safeParse(req.query);
    if (!filter.success) {
      sendError(res, 400, "category must be one of " + CATEGORIES.join(", "));
      return;
    }

    const view = await this.refresh(query);
    const category = filter.data.category;
    const records = view.records
      .filter((r) => category === undefined || r.category === category)
      .map((r) => ({ ...r, rule: explainClassification(r.statusText, r.due, view.today) }));

    sendSuccess(res, { today: view.today, records });
  }

  private async handleProperties(_req: Request, res: Response): Promise<void> {
    const view = await this.dashboard.refresh();
    sendSuccess(res, view.properties);
  }

  private async handleWorklist(req: Request, res: Response): Promise<void> {
    const params = schemas.worklistParams.safeParse(req.params);
    if (!params.success) {
      sendError(res, 404, `Unknown worklist: ${req.params.list}`);
      return;
    }
    const query = this.parseView(req, res);
    if (!query) return;

    const view = await this.refresh(query);
    const items = view.worklists[params.data.list];
    this.logger.debug(`Serving ${params.data.list} worklist with ${items.length} items`);
    sendSuccess(res, { today: view.today, list: params.data.list, items });
  }
}
