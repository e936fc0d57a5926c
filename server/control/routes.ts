import express, { Router, type NextFunction, type Request, type Response } from "express";
import { themeModeSchema } from "@shared/clock-config";
import type { BasicCredentials } from "../config/env";
import { metrics, registerMetricsEndpoint } from "../metrics";
import type { NavigationSnapshot, NavigationState } from "../navigation/navigation-state";
import type { Frame } from "../render/frame";
import { encodeFramePng } from "../render/png";
import type { SunWindow, ThemeController } from "../render/theme";
import { createLogger } from "../utils/log";
import { createBasicAuth } from "./basic-auth";
import { createRateLimiter } from "./rate-limit";

const log = createLogger("control");

export type FrameSource = {
  renderCurrent(): Promise<Frame>;
  getLastFrame(): Frame | null;
};

export type ControlPlaneDeps = {
  navigation: NavigationState;
  frames: FrameSource;
  theme: ThemeController;
  sunWindow: () => Promise<SunWindow | null>;
  ratePerSecond: number;
  auth: BasicCredentials | null;
  now?: () => number;
  encodePng?: (frame: Frame) => Promise<Buffer>;
};

export const describePosition = (snapshot: NavigationSnapshot): string =>
  `${snapshot.panel} (${snapshot.index + 1}/${snapshot.count})`;

const sendText = (res: Response, status: number, body: string) => {
  res.status(status).type("text/plain").send(body);
};

export const createControlRouter = (deps: ControlPlaneDeps): Router => {
  const router = Router();
  const now = deps.now ?? Date.now;
  const encodePng = deps.encodePng ?? encodeFramePng;

  router.get("/health", (_req, res) => {
    sendText(res, 200, "OK");
  });

  router.get("/screenshot", async (_req, res, next) => {
    let frame: Frame | null;
    try {
      frame = await deps.frames.renderCurrent();
    } catch (error) {
      log.warn("on-demand render failed, serving last frame", error);
      frame = deps.frames.getLastFrame();
    }
    if (!frame) {
      sendText(res, 503, "No frame available");
      return;
    }
    try {
      const png = await encodePng(frame);
      res.setHeader("Cache-Control", "no-store");
      res.status(200).type("image/png").send(png);
    } catch (error) {
      next(error);
    }
  });

  router.get("/next", (_req, res) => {
    sendText(res, 200, describePosition(deps.navigation.next("control")));
  });

  router.get("/prev", (_req, res) => {
    sendText(res, 200, describePosition(deps.navigation.prev("control")));
  });

  router.get("/view", (_req, res) => {
    sendText(res, 200, describePosition(deps.navigation.snapshot()));
  });

  router.get("/theme", async (_req, res, next) => {
    try {
      res.json(deps.theme.status(new Date(now()), await deps.sunWindow()));
    } catch (error) {
      next(error);
    }
  });

  router.get("/theme/:mode", async (req, res, next) => {
    const parsed = themeModeSchema.safeParse(req.params.mode.toLowerCase());
    if (!parsed.success) {
      sendText(res, 404, "Not Found");
      return;
    }
    deps.theme.setMode(parsed.data);
    deps.navigation.wake.set();
    log.info(`theme mode set to ${parsed.data}`);
    try {
      res.json(deps.theme.status(new Date(now()), await deps.sunWindow()));
    } catch (error) {
      next(error);
    }
  });

  registerMetricsEndpoint(router);
  return router;
};

/** Express app for the control plane: counting, rate limit, then auth, then routes. */
export const createControlApp = (deps: ControlPlaneDeps): express.Express => {
  const app = express();
  app.disable("x-powered-by");

  app.use((_req: Request, res: Response, next: NextFunction) => {
    res.on("finish", () => {
      metrics.controlRequests.inc({ status: String(res.statusCode) });
    });
    next();
  });
  app.use(createRateLimiter({ ratePerSecond: deps.ratePerSecond, now: deps.now }));
  app.use(createBasicAuth(deps.auth));
  app.use(createControlRouter(deps));

  app.use((_req: Request, res: Response) => {
    sendText(res, 404, "Not Found");
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    log.error(`${req.method} ${req.path} failed`, err);
    if (res.headersSent) {
      res.end();
      return;
    }
    sendText(res, 500, "Internal Server Error");
  });

  return app;
};
