import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from "prom-client";

export const registry = new Registry();

collectDefaultMetrics({ register: registry, prefix: "clearance_refresher_" });

export const cycleCounter = new Counter({
  name: "clearance_refresher_cycles_total",
  help: "Refresh cycles run, by outcome",
  labelNames: ["outcome"],
  registers: [registry],
});

export const upstreamDuration = new Histogram({
  name: "clearance_refresher_upstream_duration_seconds",
  help: "Duration histogram for solver and update endpoint calls",
  labelNames: ["target", "result"],
  buckets: [0.1, 0.5, 1, 5, 10, 30, 60, 120, 300],
  registers: [registry],
});

export const lastSuccessGauge = new Gauge({
  name: "clearance_refresher_last_success_timestamp_seconds",
  help: "Unix time of the last successful cookie publish",
  registers: [registry],
});

export function observeCycle(outcome: string, publishedAt?: Date): void {
  cycleCounter.inc({ outcome });
  if (publishedAt) {
    lastSuccessGauge.set(publishedAt.getTime() / 1000);
  }
}
