import {
  Counter,
  Histogram,
  Registry,
  collectDefaultMetrics
} from "prom-client";

const registry = new Registry();

collectDefaultMetrics({
  prefix: "chomp_",
  register: registry
});

const httpRequestDuration = new Histogram({
  name: "chomp_http_request_duration_seconds",
  help: "HTTP request duration in seconds",
  registers: [registry],
  labelNames: ["method", "route", "status_code"],
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 15, 30]
});

const httpRequestCounter = new Counter({
  name: "chomp_http_requests_total",
  help: "Total number of HTTP requests",
  registers: [registry],
  labelNames: ["method", "route", "status_code"]
});

const discoveryRuns = new Counter({
  name: "chomp_discovery_runs_total",
  help: "Discovery pipeline runs grouped by outcome",
  registers: [registry],
  labelNames: ["outcome"]
});

const discoveryDuration = new Histogram({
  name: "chomp_discovery_duration_seconds",
  help: "Time spent finding one unseen article",
  registers: [registry],
  buckets: [0.5, 1, 2, 5, 10, 20, 40, 80]
});

const discoveryCandidates = new Counter({
  name: "chomp_discovery_candidates_total",
  help: "Candidate URLs handled by the discovery pipeline grouped by outcome",
  registers: [registry],
  labelNames: ["source", "outcome"]
});

const enrichmentCalls = new Counter({
  name: "chomp_enrichment_calls_total",
  help: "Text-generation calls for summaries and topics grouped by status",
  registers: [registry],
  labelNames: ["operation", "status"]
});

export const metrics = {
  registry,
  httpRequestDuration,
  httpRequestCounter,
  discoveryRuns,
  discoveryDuration,
  discoveryCandidates,
  enrichmentCalls
};
