import { describe, it, expect, beforeEach } from "vitest";
import { buildHarness, deferred, TRADING_NOON, type Harness } from "../../core/__tests__/fakes.js";
import { gradeDay } from "../surface.js";

describe("gradeDay", () => {
  it("grades on P&L, activity and errors", () => {
    expect(gradeDay(2.5, 3, 0, false)).toBe("A");
    expect(gradeDay(2.5, 3, 1, false)).toBe("B");
    expect(gradeDay(1.5, 2, 1, false)).toBe("B");
    expect(gradeDay(0.5, 1, 2, false)).toBe("C");
    expect(gradeDay(-1, 0, 3, false)).toBe("D");
    expect(gradeDay(-1, 0, 4, false)).toBe("F");
    expect(gradeDay(-3, 0, 0, false)).toBe("F");
  });

  it("fails a halted account regardless of P&L", () => {
    expect(gradeDay(5, 10, 0, true)).toBe("F");
  });
});

describe("ControlSurface", () => {
  let h: Harness;

  beforeEach(() => {
    h = buildHarness();
    h.candidates.list = [{ symbol: "AAPL", score: 80, confidence: 9 }];
    h.broker.prices.set("AAPL", 100);
  });

  describe("getHealth", () => {
    it("reports STARTING with unknown connectivity before the first cycle", () => {
      const health = h.surface.getHealth();
      expect(health.status).toBe("STARTING");
      expect(health.scheduler).toBe("STARTING");
      expect(health.mode).toBeNull();
      expect(health.lastCycleSequence).toBeNull();
      expect(Object.values(health.connectivity)).toEqual([null, null, null, null, null, null]);
    });

    it("reports OPERATIONAL after a clean cycle", async () => {
      await h.scheduler.runOnce();

      const health = h.surface.getHealth();
      expect(health.status).toBe("OPERATIONAL");
      expect(health.mode).toBe("TRADING");
      expect(health.lastCycleSequence).toBe(1);
      expect(health.lastCycleAt).toEqual(TRADING_NOON);
      expect(health.connectivity.broker).toBe(true);
      expect(health.connectivity.persistence).toBeNull();
      expect(health.openBreakers).toEqual([]);
    });

    it("reports DEGRADED when an adapter's last call failed", async () => {
      h.broker.hanging.add("ACC2");
      await h.scheduler.runOnce();

      const health = h.surface.getHealth();
      expect(health.status).toBe("DEGRADED");
      expect(health.connectivity.broker).toBe(false);
    });

    it("reports EMERGENCY_STOP as soon as a stop is requested, then STOPPED", async () => {
      await h.scheduler.runOnce();
      h.surface.triggerEmergencyStop("drill", "dashboard");

      expect(h.surface.getHealth().status).toBe("EMERGENCY_STOP");
      expect(h.surface.getHealth().emergencyStop).toMatchObject({ reason: "drill", actor: "dashboard" });

      await h.scheduler.runOnce();
      expect(h.surface.getHealth().status).toBe("STOPPED");
    });
  });

  describe("triggerEmergencyStop", () => {
    it("acknowledges every call but accepts only the first", () => {
      const first = h.surface.triggerEmergencyStop("drill", "operator");
      const second = h.surface.triggerEmergencyStop("again", "dashboard");

      expect(first).toEqual({
        acknowledged: true,
        accepted: true,
        request: { reason: "drill", actor: "operator", requestedAt: TRADING_NOON },
      });
      expect(second.accepted).toBe(false);
      expect(second.request.reason).toBe("drill");
    });
  });

  describe("requestBreakerReset", () => {
    it("queues a reset for a known account", () => {
      expect(h.surface.requestBreakerReset("ACC1")).toEqual({
        accountId: "ACC1",
        accepted: true,
        message: "reset queued for the next cycle",
      });
      expect(h.scheduler.pendingResets()).toEqual(["ACC1"]);
    });

    it("refuses an unknown account", () => {
      expect(h.surface.requestBreakerReset("NOPE")).toEqual({
        accountId: "NOPE",
        accepted: false,
        message: "unknown account NOPE",
      });
    });
  });

  describe("getMetrics", () => {
    it("summarises the equity series recorded by each cycle", async () => {
      for (const equity of [30_000, 31_500, 29_925]) {
        h.broker.setAccount("ACC1", equity);
        await h.scheduler.runOnce();
      }

      const metrics = h.surface.getMetrics();
      expect(metrics.asOfSequence).toBe(3);
      expect(metrics.cycles).toEqual({ recorded: 3, lastDurationMs: 0, lastErrors: 0 });

      const [acc1, acc2] = metrics.accounts;
      expect(acc1).toMatchObject({
        accountId: "ACC1",
        equity: 29_925,
        dailyPnl: -75,
        openPositions: 0,
        breaker: "CLOSED",
        maxDrawdown: 0.05,
      });
      expect(acc2).toMatchObject({ accountId: "ACC2", sharpe: 0, sortino: 0, var95: 0, maxDrawdown: 0 });
    });

    it("never mixes a cycle in progress with the previous snapshot", async () => {
      await h.scheduler.runOnce();
      const gate = deferred();
      h.broker.gate = gate.promise;

      const pending = h.scheduler.runOnce();
      await Promise.resolve();
      await Promise.resolve();

      const during = h.surface.getMetrics();
      expect(during.asOfSequence).toBe(1);
      expect(during.cycles.recorded).toBe(1);

      gate.resolve();
      await pending;

      const after = h.surface.getMetrics();
      expect(after.asOfSequence).toBe(2);
      expect(after.cycles.recorded).toBe(2);
    });
  });

  describe("listCandidates", () => {
    it("returns the list the last cycle loaded", async () => {
      expect(h.surface.listCandidates()).toEqual({ candidates: [], refreshedAt: null });

      await h.scheduler.runOnce();

      expect(h.surface.listCandidates()).toEqual({
        candidates: [{ symbol: "AAPL", score: 80, confidence: 9 }],
        refreshedAt: TRADING_NOON,
      });
    });
  });

  describe("getDailyReport", () => {
    it("grades each account on today's cycles", async () => {
      h.broker.setAccount("ACC1", 30_000);
      await h.scheduler.runOnce();
      h.broker.setAccount("ACC1", 29_925);
      await h.scheduler.runOnce();

      const report = h.surface.getDailyReport();
      expect(report).toMatchObject({
        date: "2026-03-10",
        status: "OPERATIONAL",
        uptimeHours: 0,
        cyclesToday: 2,
        backtestsToday: 0,
      });

      const acc1 = report.accounts[0];
      expect(acc1).toMatchObject({
        accountId: "ACC1",
        equity: 29_925,
        dailyPnl: -75,
        positions: 0,
        tradesToday: 0,
        errors: 0,
        breaker: "CLOSED",
        grade: "D",
      });
      expect(acc1.dailyPnlPct).toBeCloseTo(-0.25, 10);
    });

    it("counts a failing account's errors", async () => {
      h.broker.hanging.add("ACC2");
      await h.scheduler.runOnce();

      const acc2 = h.surface.getDailyReport().accounts[1];
      expect(acc2.accountId).toBe("ACC2");
      expect(acc2.errors).toBe(1);
    });
  });
});
