import { beforeEach, describe, expect, it, vi } from "vitest";

import { type Analyzer, createAnalysisOrchestrator } from "@/domains/analysis";
import type { Logger } from "@/lib/logger";
import { type AlertStats, createPerformanceStats } from "@/monitoring";

import { createApp } from "./app";

const mockLogger: Logger = {
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

const alertStats: AlertStats = {
  monitoring: false,
  activeAlerts: [],
  totalFired: 0,
  totalResolved: 0,
  activeBySeverity: { info: 0, warning: 0, critical: 0 },
};

const post = (path: string, body: string): Request =>
  new Request(`http://localhost${path}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body,
  });

describe("createApp", () => {
  let whitepaperAnalyze: ReturnType<typeof vi.fn>;
  let servicesAnalyze: ReturnType<typeof vi.fn>;
  let performanceStats: ReturnType<typeof createPerformanceStats>;

  const buildApp = () => {
    const whitepaperAnalyzer: Analyzer = {
      name: "whitepaper",
      analyze: (payload, targets) => whitepaperAnalyze(payload, targets),
    };
    const serviceAnalyzer: Analyzer = {
      name: "services",
      analyze: (payload, targets) => servicesAnalyze(payload, targets),
    };
    return createApp({
      logger: mockLogger,
      orchestrator: createAnalysisOrchestrator({
        whitepaperAnalyzer,
        serviceAnalyzer,
        logger: mockLogger,
      }),
      healthRegistry: {
        getHealthStatus: () => ({
          overallHealthy: true,
          timestamp: "2026-01-01T00:00:00.000Z",
          individualStatus: {},
        }),
      },
      alertManager: { getAlertStats: () => alertStats },
      performanceStats,
      breakers: {},
    });
  };

  beforeEach(() => {
    vi.clearAllMocks();
    whitepaperAnalyze = vi.fn().mockResolvedValue({ overall_score: 80, findings: ["single region"] });
    servicesAnalyze = vi.fn().mockResolvedValue({ overall_score: 60 });
    performanceStats = createPerformanceStats();
  });

  it("should describe the service at the root", async () => {
    const res = await buildApp().fetch(new Request("http://localhost/"));
    const body = (await res.json()) as { service: string; version: string; status: string };

    expect(res.status).toBe(200);
    expect(body.service).toBe("resilience-agent");
    expect(body.version).toBe("0.1.0");
    expect(body.status).toBe("operational");
  });

  it("should answer a CORS preflight for any origin", async () => {
    const res = await buildApp().fetch(
      new Request("http://localhost/analyze/whitepaper", {
        method: "OPTIONS",
        headers: {
          Origin: "http://dashboard.test",
          "Access-Control-Request-Method": "POST",
          "Access-Control-Request-Headers": "Content-Type",
        },
      }),
    );

    expect(res.status).toBe(204);
    expect(res.headers.get("Access-Control-Allow-Origin")).toBe("*");
    expect(res.headers.get("Access-Control-Allow-Methods")).toContain("POST");
  });

  it("should add the CORS header to regular responses", async () => {
    const res = await buildApp().fetch(
      new Request("http://localhost/", { headers: { Origin: "http://dashboard.test" } }),
    );

    expect(res.headers.get("Access-Control-Allow-Origin")).toBe("*");
  });

  it("should gzip a large response when the client accepts it", async () => {
    whitepaperAnalyze.mockResolvedValue({ overall_score: 80, notes: "x".repeat(2000) });

    const res = await buildApp().fetch(
      new Request("http://localhost/analyze/whitepaper", {
        method: "POST",
        headers: { "Content-Type": "application/json", "Accept-Encoding": "gzip" },
        body: JSON.stringify({ architecture_data: { x: 1 } }),
      }),
    );

    expect(res.status).toBe(200);
    expect(res.headers.get("Content-Encoding")).toBe("gzip");
  });

  it("should record every request in the performance stats", async () => {
    const app = buildApp();
    await app.fetch(new Request("http://localhost/"));
    await app.fetch(post("/analyze/services", "{}"));

    const stats = performanceStats.getStats();
    expect(stats.requestsTotal).toBe(2);
    expect(stats.serverErrorsTotal).toBe(0);
    expect(mockLogger.info).toHaveBeenCalledWith(
      "HTTP request",
      expect.objectContaining({ method: "POST", path: "/analyze/services", status: 400 }),
    );
  });

  describe("POST /analyze/whitepaper", () => {
    it("should return the engine output unchanged with the given targets", async () => {
      const res = await buildApp().fetch(
        post("/analyze/whitepaper", JSON.stringify({ architecture_data: { x: 1 }, rpo_target: "30 minutes" })),
      );

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        status: "success",
        analysis_result: { overall_score: 80, findings: ["single region"] },
      });
      expect(whitepaperAnalyze).toHaveBeenCalledWith(
        { x: 1 },
        { rpoTarget: "30 minutes", rtoTarget: "4 hours" },
      );
    });

    it("should reject a missing architecture_data with 400", async () => {
      const res = await buildApp().fetch(post("/analyze/whitepaper", "{}"));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        status: "error",
        kind: "validation",
        error: "architecture_data is required",
      });
      expect(whitepaperAnalyze).not.toHaveBeenCalled();
    });

    it("should map an engine failure to 500", async () => {
      whitepaperAnalyze.mockRejectedValue(new Error("engine down"));

      const res = await buildApp().fetch(
        post("/analyze/whitepaper", JSON.stringify({ architecture_data: { x: 1 } })),
      );

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({
        status: "error",
        kind: "collaborator",
        error: "whitepaper analysis failed: engine down",
      });
    });

    it("should reject malformed JSON with 400", async () => {
      const res = await buildApp().fetch(post("/analyze/whitepaper", "{not json"));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        status: "error",
        kind: "validation",
        error: "Request body must be valid JSON",
      });
    });
  });

  describe("POST /analyze/services", () => {
    it("should require services", async () => {
      const res = await buildApp().fetch(post("/analyze/services", "{}"));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        status: "error",
        kind: "validation",
        error: "services data is required",
      });
    });

    it("should analyze the service list", async () => {
      const res = await buildApp().fetch(
        post("/analyze/services", JSON.stringify({ services: [{ name: "api" }] })),
      );

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        status: "success",
        analysis_result: { overall_score: 60 },
      });
    });
  });

  describe("POST /analyze/comprehensive", () => {
    it("should average the two engine scores", async () => {
      const res = await buildApp().fetch(
        post(
          "/analyze/comprehensive",
          JSON.stringify({ architecture_data: { x: 1 }, services: [{ name: "api" }] }),
        ),
      );

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        status: "success",
        analysis_results: {
          whitepaper_analysis: { overall_score: 80, findings: ["single region"] },
          service_analysis: { overall_score: 60 },
          overall_score: 70,
        },
      });
    });

    it("should omit overall_score when only one payload is given", async () => {
      const res = await buildApp().fetch(
        post("/analyze/comprehensive", JSON.stringify({ services: [{ name: "api" }] })),
      );

      expect(await res.json()).toEqual({
        status: "success",
        analysis_results: { service_analysis: { overall_score: 60 } },
      });
      expect(whitepaperAnalyze).not.toHaveBeenCalled();
    });

    it("should reject a request with neither payload with 400", async () => {
      const res = await buildApp().fetch(post("/analyze/comprehensive", "{}"));

      expect(res.status).toBe(400);
    });

    it("should map a non-numeric score to an aggregation error", async () => {
      whitepaperAnalyze.mockResolvedValue({ overall_score: "high" });

      const res = await buildApp().fetch(
        post(
          "/analyze/comprehensive",
          JSON.stringify({ architecture_data: { x: 1 }, services: [{ name: "api" }] }),
        ),
      );

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({
        status: "error",
        kind: "aggregation",
        error: "whitepaper analysis returned a non-numeric overall_score",
      });
    });
  });

  it("should reject a non-string rpo_target with 400", async () => {
    const res = await buildApp().fetch(
      post("/analyze/whitepaper", JSON.stringify({ architecture_data: { x: 1 }, rpo_target: 60 })),
    );
    const body = (await res.json()) as { kind: string };

    expect(res.status).toBe(400);
    expect(body.kind).toBe("validation");
  });
});
