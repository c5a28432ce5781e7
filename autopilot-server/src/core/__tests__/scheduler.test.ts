import { describe, it, expect, beforeEach, vi } from "vitest";
import { buildHarness, testConfig, type Harness } from "./fakes.js";

describe("ModeScheduler", () => {
  let h: Harness;

  beforeEach(() => {
    h = buildHarness();
    h.candidates.list = [{ symbol: "AAPL", score: 80, confidence: 9 }];
    h.broker.prices.set("AAPL", 100);
  });

  describe("mode selection", () => {
    it("trades while the market is open and backtests once it closes, recording every cycle", async () => {
      const first = await h.scheduler.runOnce();
      expect(first?.mode).toBe("TRADING");
      expect(h.scheduler.getState()).toEqual({ phase: "RUNNING", mode: "TRADING" });

      h.oracle.open = false;
      const second = await h.scheduler.runOnce();
      expect(second?.mode).toBe("BACKTESTING");
      expect(h.scheduler.getState()).toEqual({ phase: "RUNNING", mode: "BACKTESTING" });

      expect(h.cycles.all().map((c) => [c.sequence, c.mode])).toEqual([
        [1, "TRADING"],
        [2, "BACKTESTING"],
      ]);
      expect(h.persistence.cycles.map((c) => c.sequence)).toEqual([1, 2]);
      expect(h.snapshots.get().sequence).toBe(2);
    });

    it("runs every configured backtest and announces a notable best return", async () => {
      h.oracle.open = false;
      const result = await h.scheduler.runOnce();

      expect(h.backtester.runs).toEqual([
        { strategy: "momentum", symbols: ["AAPL"] },
        { strategy: "mean_reversion", symbols: ["AAPL"] },
      ]);
      expect(result?.backtests.map((b) => b.strategy)).toEqual(["momentum", "mean_reversion"]);
      expect(h.persistence.backtests).toHaveLength(2);
      expect(h.notifier.sent).toEqual([
        {
          severity: "info",
          message: "Backtest results\nBest: momentum\nReturn: 6.00%\nTickers: AAPL",
        },
      ]);
    });
  });

  describe("trading cycle", () => {
    it("submits an admitted order and books it against the account", async () => {
      h.strategy.queued.set("ACC1", [
        { kind: "open", symbol: "AAPL", side: "buy", quantity: 10, trigger: "signal", reason: "test entry" },
      ]);

      const result = await h.scheduler.runOnce();

      expect(h.broker.orders).toHaveLength(1);
      expect(h.broker.orders[0].accountId).toBe("ACC1");
      expect(h.broker.orders[0].order).toMatchObject({ symbol: "AAPL", side: "buy", quantity: 10 });
      expect(h.broker.orders[0].order.clientOrderId).toBe("test-ACC1-1-1");

      const acc1 = result?.accounts.find((a) => a.accountId === "ACC1");
      expect(acc1).toMatchObject({ ordersAttempted: 1, ordersFilled: 1, failed: false, equity: 30_000 });
      expect(h.riskEngine.getState("ACC1").tradesToday).toBe(1);
      expect(h.persistence.orders.map((o) => o.status)).toEqual(["filled"]);
    });

    it("clamps an oversized open to the position limit", async () => {
      h.strategy.queued.set("ACC1", [
        { kind: "open", symbol: "AAPL", side: "buy", quantity: 60, trigger: "signal", reason: "test entry" },
      ]);

      await h.scheduler.runOnce();

      expect(h.broker.orders[0].order.quantity).toBe(45);
    });

    it("keeps other accounts trading when one account's broker hangs", async () => {
      h.broker.hanging.add("ACC1");
      h.strategy.queued.set("ACC2", [
        { kind: "open", symbol: "AAPL", side: "buy", quantity: 5, trigger: "signal", reason: "test entry" },
      ]);

      const result = await h.scheduler.runOnce();

      const acc1 = result?.accounts.find((a) => a.accountId === "ACC1");
      const acc2 = result?.accounts.find((a) => a.accountId === "ACC2");
      expect(acc1?.failed).toBe(true);
      expect(acc1?.equity).toBeNull();
      expect(acc2?.ordersFilled).toBe(1);
      expect(h.broker.orders.map((o) => o.accountId)).toEqual(["ACC2"]);
    });
  });

  describe("circuit breaker", () => {
    it("trips after three failed cycles and notifies exactly once", async () => {
      h.broker.hanging.add("ACC1");

      await h.scheduler.runOnce();
      await h.scheduler.runOnce();
      expect(h.riskEngine.isHalted("ACC1")).toBe(false);

      await h.scheduler.runOnce();
      expect(h.riskEngine.isHalted("ACC1")).toBe(true);
      expect(h.riskEngine.isHalted("ACC2")).toBe(false);

      await h.scheduler.runOnce();

      const critical = h.notifier.sent.filter((n) => n.severity === "critical");
      expect(critical).toEqual([
        {
          severity: "critical",
          message: "CIRCUIT BREAKER [ACC1]\nCause: systemic\n3 consecutive failed cycles",
        },
      ]);
      expect(h.persistence.breakerEvents.filter((e) => e.type === "trip")).toHaveLength(1);
    });

    it("applies a queued manual reset at the start of the next cycle", async () => {
      h.broker.hanging.add("ACC1");
      for (let i = 0; i < 3; i++) await h.scheduler.runOnce();
      expect(h.riskEngine.isHalted("ACC1")).toBe(true);

      h.broker.hanging.delete("ACC1");
      expect(h.surface.requestBreakerReset("ACC1")).toEqual({
        accountId: "ACC1",
        accepted: true,
        message: "reset queued for the next cycle",
      });
      expect(h.scheduler.pendingResets()).toEqual(["ACC1"]);
      expect(h.riskEngine.isHalted("ACC1")).toBe(true);

      await h.scheduler.runOnce();

      expect(h.riskEngine.isHalted("ACC1")).toBe(false);
      expect(h.scheduler.pendingResets()).toEqual([]);
      expect(h.notifier.sent.at(-1)).toEqual({ severity: "info", message: "Circuit breaker reset [ACC1] by operator" });
      const view = h.snapshots.get().accounts.find((a) => a.id === "ACC1");
      expect(view?.risk.breaker.status).toBe("CLOSED");
    });

    it("refuses resets for unknown accounts", () => {
      expect(h.surface.requestBreakerReset("NOPE")).toEqual({
        accountId: "NOPE",
        accepted: false,
        message: "unknown account NOPE",
      });
    });
  });

  describe("emergency stop", () => {
    it("halts every account once, cancels open orders and stops", async () => {
      h.broker.ackStatus = "accepted";
      h.strategy.queued.set("ACC1", [
        { kind: "open", symbol: "AAPL", side: "buy", quantity: 10, trigger: "signal", reason: "test entry" },
      ]);
      await h.scheduler.runOnce();

      const first = h.surface.triggerEmergencyStop("drill", "operator");
      const second = h.surface.triggerEmergencyStop("again", "dashboard");
      expect(first.accepted).toBe(true);
      expect(second.accepted).toBe(false);
      expect(second.request).toBe(first.request);
      expect(h.riskEngine.isHalted("ACC1")).toBe(true);
      expect(h.riskEngine.isHalted("ACC2")).toBe(true);

      expect(await h.scheduler.runOnce()).toBeNull();

      expect(h.scheduler.getState()).toEqual({ phase: "STOPPED", reason: "emergency stop: drill" });
      expect(h.broker.cancelled).toEqual(["order-1"]);
      const trips = h.persistence.breakerEvents.filter((e) => e.type === "trip");
      expect(trips.map((e) => e.accountId).sort()).toEqual(["ACC1", "ACC2"]);
      expect(h.notifier.sent.filter((n) => n.severity === "critical")).toEqual([
        { severity: "critical", message: "EMERGENCY STOP\nReason: drill\nActor: operator" },
      ]);

      const health = h.surface.getHealth();
      expect(health.status).toBe("STOPPED");
      expect(health.openBreakers).toEqual(["ACC1", "ACC2"]);
      expect(h.surface.getMetrics().accounts.map((a) => [a.accountId, a.breaker])).toEqual([
        ["ACC1", "OPEN"],
        ["ACC2", "OPEN"],
      ]);
      expect(h.surface.getDailyReport().accounts.map((a) => [a.accountId, a.breaker, a.grade])).toEqual([
        ["ACC1", "OPEN", "F"],
        ["ACC2", "OPEN", "F"],
      ]);
    });

    it("liquidates open positions when configured to", async () => {
      const l = buildHarness(testConfig(["ACC1", "ACC2"], { emergency_conditions: { liquidate_on_emergency_stop: true } }));
      l.broker.setAccount("ACC1", 30_000, [{ symbol: "AAPL", quantity: 10, entryPrice: 95, currentPrice: 100 }]);
      l.broker.prices.set("AAPL", 100);

      l.surface.triggerEmergencyStop("drill", "operator");
      await l.scheduler.runOnce();

      expect(l.broker.orders).toEqual([
        {
          accountId: "ACC1",
          order: {
            symbol: "AAPL",
            side: "sell",
            quantity: 10,
            type: "market",
            timeInForce: "day",
            clientOrderId: "test-ACC1-0-1",
          },
        },
      ]);
      expect(l.scheduler.getState().phase).toBe("STOPPED");
    });

    it("refuses breaker resets while an emergency stop is in force", () => {
      h.surface.triggerEmergencyStop("drill", "operator");
      expect(h.surface.requestBreakerReset("ACC1")).toEqual({
        accountId: "ACC1",
        accepted: false,
        message: "emergency stop in force",
      });
    });

    it("run() exits once an emergency stop arrives while idle", async () => {
      const final = h.scheduler.run();
      h.surface.triggerEmergencyStop("drill", "operator");
      expect(await final).toEqual({ phase: "STOPPED", reason: "emergency stop: drill" });
      expect(h.cycles.size).toBeGreaterThanOrEqual(1);
    });
  });

  describe("ticks", () => {
    it("starts the next cycle only once it is due and stops its tasks on an emergency stop", async () => {
      const final = h.scheduler.run();
      await vi.waitFor(() => expect(h.ticks.tasks).toHaveLength(2));
      expect(h.ticks.tasks.map((t) => t.expression)).toEqual(["0 */1 * * * *", "0 */1 * * * *"]);
      expect(h.cycles.size).toBe(1);

      h.ticks.fire(0);
      expect(h.cycles.size).toBe(1);

      h.clock.advance(300_000);
      h.ticks.fire(0);
      await vi.waitFor(() => expect(h.cycles.size).toBe(2));

      h.surface.triggerEmergencyStop("drill", "operator");
      expect(await final).toEqual({ phase: "STOPPED", reason: "emergency stop: drill" });
      expect(h.ticks.tasks.map((t) => t.stopped)).toEqual([true, true]);
      expect(h.surface.getMetrics().accounts.map((a) => a.breaker)).toEqual(["OPEN", "OPEN"]);
    });

    it("runs the health check on its own tick and stops it on shutdown", async () => {
      const final = h.scheduler.run();
      await vi.waitFor(() => expect(h.ticks.tasks).toHaveLength(2));

      h.ticks.fire(1);
      await vi.waitFor(() => expect(h.healthChecks.count).toBe(1));

      h.scheduler.requestShutdown("received SIGTERM");
      expect(await final).toEqual({ phase: "STOPPED", reason: "received SIGTERM" });
      expect(h.ticks.tasks.map((t) => t.stopped)).toEqual([true, true]);
      expect(h.surface.getHealth().openBreakers).toEqual(["ACC1", "ACC2"]);

      h.ticks.fire(1);
      expect(h.healthChecks.count).toBe(1);
    });
  });

  describe("shutdown", () => {
    it("halts accounts and stops after the in-flight cycle without cancelling orders", async () => {
      h.broker.ackStatus = "accepted";
      h.strategy.queued.set("ACC1", [
        { kind: "open", symbol: "AAPL", side: "buy", quantity: 10, trigger: "signal", reason: "test entry" },
      ]);
      await h.scheduler.runOnce();

      h.scheduler.requestShutdown("received SIGTERM");
      expect(await h.scheduler.runOnce()).toBeNull();

      expect(h.scheduler.getState()).toEqual({ phase: "STOPPED", reason: "received SIGTERM" });
      expect(h.broker.cancelled).toEqual([]);
      expect(h.riskEngine.isHalted("ACC1")).toBe(true);
    });
  });
});
