import { describe, expect, it } from "vitest";
import { EventCoordinator } from "../src/event-coordinator.js";
import { isSettled } from "./helpers/async.js";

describe("EventCoordinator", () => {
  it("blocks a waiting session until an update is raised", async () => {
    const coordinator = new EventCoordinator();
    const subscription = coordinator.subscribe();

    const wait = subscription.waitForWakeup();
    expect(await isSettled(wait)).toBe(false);

    coordinator.requestUpdate();
    expect(await isSettled(wait)).toBe(true);
  });

  it("does not lose an update raised before the session starts waiting", async () => {
    const coordinator = new EventCoordinator();
    const subscription = coordinator.subscribe();

    coordinator.requestUpdate();

    expect(await isSettled(subscription.waitForWakeup())).toBe(true);
  });

  it("acknowledges coalesced updates once", async () => {
    const coordinator = new EventCoordinator();
    const subscription = coordinator.subscribe();

    coordinator.requestUpdate();
    coordinator.requestUpdate();
    coordinator.requestUpdate();

    expect(subscription.observeAndClear()).toEqual({
      updateDue: true,
      shutdownDue: false,
    });
    expect(subscription.observeAndClear()).toEqual({
      updateDue: false,
      shutdownDue: false,
    });
    expect(await isSettled(subscription.waitForWakeup())).toBe(false);
  });

  it("keeps shutdown pending once raised", async () => {
    const coordinator = new EventCoordinator();
    const subscription = coordinator.subscribe();

    coordinator.requestShutdown();
    coordinator.requestShutdown();

    expect(subscription.observeAndClear()).toEqual({
      updateDue: false,
      shutdownDue: true,
    });
    expect(subscription.observeAndClear()).toEqual({
      updateDue: false,
      shutdownDue: true,
    });
    expect(await isSettled(subscription.waitForWakeup())).toBe(true);
    expect(coordinator.isShuttingDown).toBe(true);
  });

  it("reports an update and a shutdown raised in the same cycle", () => {
    const coordinator = new EventCoordinator();
    const subscription = coordinator.subscribe();

    coordinator.requestUpdate();
    coordinator.requestShutdown();

    expect(subscription.observeAndClear()).toEqual({
      updateDue: true,
      shutdownDue: true,
    });
  });

  it("wakes a closed subscription without touching shared state", async () => {
    const coordinator = new EventCoordinator();
    const subscription = coordinator.subscribe();
    const wait = subscription.waitForWakeup();

    subscription.close();

    expect(await isSettled(wait)).toBe(true);
    expect(subscription.closed).toBe(true);
    expect(coordinator.snapshot()).toEqual({
      mode: "broadcast",
      wakeupPending: false,
      updatePending: false,
      shuttingDown: false,
      subscribers: 0,
    });
  });

  describe("broadcast delivery", () => {
    it("lets every subscription observe the same update", () => {
      const coordinator = new EventCoordinator({ mode: "broadcast" });
      const first = coordinator.subscribe();
      const second = coordinator.subscribe();

      coordinator.requestUpdate();

      expect(first.observeAndClear().updateDue).toBe(true);
      expect(coordinator.snapshot().updatePending).toBe(true);
      expect(second.observeAndClear().updateDue).toBe(true);
      expect(coordinator.snapshot().updatePending).toBe(false);
    });

    it("reports nothing pending for an update raised with no subscribers", () => {
      const coordinator = new EventCoordinator();
      coordinator.requestUpdate();

      const subscription = coordinator.subscribe();

      expect(coordinator.snapshot()).toMatchObject({
        wakeupPending: false,
        updatePending: false,
      });
      expect(subscription.observeAndClear().updateDue).toBe(false);
    });

    it("does not replay updates raised before subscribing", async () => {
      const coordinator = new EventCoordinator();
      coordinator.requestUpdate();

      const subscription = coordinator.subscribe();

      expect(await isSettled(subscription.waitForWakeup())).toBe(false);
    });
  });

  describe("first-reader delivery", () => {
    it("hands an update to whichever subscription observes it first", async () => {
      const coordinator = new EventCoordinator({ mode: "first-reader" });
      const first = coordinator.subscribe();
      const second = coordinator.subscribe();

      coordinator.requestUpdate();
      expect(coordinator.snapshot()).toMatchObject({
        wakeupPending: true,
        updatePending: true,
      });

      expect(second.observeAndClear().updateDue).toBe(true);
      expect(first.observeAndClear().updateDue).toBe(false);
      expect(coordinator.snapshot()).toMatchObject({
        wakeupPending: false,
        updatePending: false,
      });
      expect(await isSettled(first.waitForWakeup())).toBe(false);
    });

    it("leaves the wakeup pending while shutting down", () => {
      const coordinator = new EventCoordinator({ mode: "first-reader" });
      const subscription = coordinator.subscribe();

      coordinator.requestShutdown();
      subscription.observeAndClear();

      expect(coordinator.snapshot().wakeupPending).toBe(true);
    });
  });

  describe("withGuard", () => {
    it("runs guarded tasks one at a time in request order", async () => {
      const coordinator = new EventCoordinator();
      const order: string[] = [];
      let release: () => void = () => {};
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });

      const first = coordinator.withGuard(async () => {
        order.push("first:start");
        await gate;
        order.push("first:end");
      });
      const second = coordinator.withGuard(() => {
        order.push("second");
        return 2;
      });

      expect(await isSettled(second)).toBe(false);
      release();

      await first;
      expect(await second).toBe(2);
      expect(order).toEqual(["first:start", "first:end", "second"]);
    });

    it("releases the guard when a task fails", async () => {
      const coordinator = new EventCoordinator();

      const failing = coordinator.withGuard(() => {
        throw new Error("boom");
      });

      await expect(failing).rejects.toThrow("boom");
      await expect(coordinator.withGuard(() => "next")).resolves.toBe("next");
    });
  });
});
