import { describe, it, expect } from "vitest";
import { RUNTIME_IMPORTS, accessorVerb, deriveMetricIdentifiers, topLevelNames } from "./identifiers.js";

describe("accessorVerb", () => {
  it("maps each kind to its verb", () => {
    expect(accessorVerb("counter")).toBe("Inc");
    expect(accessorVerb("gauge")).toBe("Set");
    expect(accessorVerb("histogram")).toBe("Observe");
  });
});

describe("deriveMetricIdentifiers", () => {
  it("derives value, labels type, accessor and fields for a labeled metric", () => {
    const ids = deriveMetricIdentifiers({
      name: "http_requests_total",
      kind: "counter",
      labels: ["method", "status_code"],
    });

    expect(ids).toEqual({
      value: "HttpRequestsTotal",
      labelsType: "HttpRequestsTotalLabels",
      accessor: "IncHttpRequestsTotal",
      fields: [
        { label: "method", field: "Method" },
        { label: "status_code", field: "StatusCode" },
      ],
    });
  });

  it("uses the kind's verb for the accessor", () => {
    expect(
      deriveMetricIdentifiers({ name: "queue_depth", kind: "gauge", labels: [] }).accessor,
    ).toBe("SetQueueDepth");
    expect(
      deriveMetricIdentifiers({ name: "latency_seconds", kind: "histogram", labels: [] }).accessor,
    ).toBe("ObserveLatencySeconds");
  });
});

describe("topLevelNames", () => {
  it("includes the labels type only for labeled metrics", () => {
    const labeled = deriveMetricIdentifiers({ name: "jobs", kind: "counter", labels: ["queue"] });
    const unlabeled = deriveMetricIdentifiers({ name: "jobs", kind: "counter", labels: [] });

    expect(topLevelNames(labeled)).toEqual(["Jobs", "JobsLabels", "IncJobs"]);
    expect(topLevelNames(unlabeled)).toEqual(["Jobs", "IncJobs"]);
  });
});

describe("RUNTIME_IMPORTS", () => {
  it("holds every prom-client name the generated module imports", () => {
    expect([...RUNTIME_IMPORTS]).toEqual(["Counter", "Gauge", "Histogram", "Registry"]);
  });
});
