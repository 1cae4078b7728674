import { Registry, Histogram, Counter } from "prom-client";

export const registry = new Registry();

export const constructHist = new Histogram({
  name: "merkle_funnel_construct_ms",
  help: "Time to reduce an item sequence to its root (ms)",
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 5, 25, 100],
  registers: [registry],
});

export const leavesCounter = new Counter({
  name: "merkle_funnel_leaves_total",
  help: "Number of leaves hashed across all constructed trees",
  registers: [registry],
});

export const emptyInputCounter = new Counter({
  name: "merkle_funnel_empty_input_total",
  help: "Number of constructions rejected for having no items",
  registers: [registry],
});
