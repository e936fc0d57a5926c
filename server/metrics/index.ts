import type { Router } from "express";
import { collectDefaultMetrics, Counter, Gauge, Registry } from "prom-client";

export const registry = new Registry();

if (process.env.CLOCK_DEFAULT_METRICS !== "0") {
  collectDefaultMetrics({ register: registry });
}

const framesRendered = new Counter({
  name: "clock_frames_rendered_total",
  help: "Frames rendered by the scheduler",
  labelNames: ["panel"],
  registers: [registry],
});

const renderFailures = new Counter({
  name: "clock_render_failures_total",
  help: "Panel renders that threw and fell back to an error frame",
  labelNames: ["panel"],
  registers: [registry],
});

const gestures = new Counter({
  name: "clock_gestures_total",
  help: "Classified touch gestures",
  labelNames: ["kind"],
  registers: [registry],
});

const navigationSteps = new Counter({
  name: "clock_navigation_steps_total",
  help: "Panel navigation steps",
  labelNames: ["direction", "source"],
  registers: [registry],
});

const cacheFetches = new Counter({
  name: "clock_cache_fetches_total",
  help: "Timed cache refresh attempts",
  labelNames: ["cache", "outcome"],
  registers: [registry],
});

const controlRequests = new Counter({
  name: "clock_control_requests_total",
  help: "Control plane responses",
  labelNames: ["status"],
  registers: [registry],
});

const activePanelIndex = new Gauge({
  name: "clock_active_panel_index",
  help: "Index of the panel currently shown",
  registers: [registry],
});

export const metrics = {
  framesRendered,
  renderFailures,
  gestures,
  navigationSteps,
  cacheFetches,
  controlRequests,
  activePanelIndex,
};

export function registerMetricsEndpoint(router: Router): void {
  router.get("/metrics", async (_req, res, next) => {
    try {
      const body = await registry.metrics();
      res.setHeader("Content-Type", registry.contentType);
      res.send(body);
    } catch (error) {
      next(error);
    }
  });
}
