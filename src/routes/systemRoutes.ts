import { Router } from "express";
import { renderPrometheusMetrics } from "../observability/metrics.js";

export const systemRouter = Router();

systemRouter.get("/health", (_req, res) => {
  res.json({ ok: true, service: "taskgate-backend" });
});

systemRouter.get("/metrics", (_req, res) => {
  res.setHeader("Content-Type", "text/plain; version=0.0.4; charset=utf-8");
  res.send(renderPrometheusMetrics());
});
