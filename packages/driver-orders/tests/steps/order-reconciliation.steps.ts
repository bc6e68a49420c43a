/**
 * Step Definitions for the Order Status Reconciliation Feature
 *
 * Drives a DriverOrderCoordinator against the in-memory repository, with
 * realtime pushes fed in directly.
 */
import { fileURLToPath } from "node:url";
import { loadFeature, describeFeature } from "@amiceli/vitest-cucumber";
import { expect } from "vitest";
import { createMockLogger, createScenarioHolder, parseListCell } from "@courierflow/core/testing";
import {
  createDriverOrderCoordinator,
  type ActionOutcome,
  type DriverOrderCoordinator,
  type RemoteUpdateResult,
  type SnapshotChangeReason,
} from "../../src/index.js";
import {
  InMemoryOrderRepository,
  createDeliveryConfirmation,
  createTestOrder,
} from "../../src/testing/index.js";
import { createPushClock, toAction, toStatus } from "../support/helpers.js";

// ============================================================================
// Test State
// ============================================================================

const ORDER_ID = "ord-test-1";

interface ScenarioState {
  repository: InMemoryOrderRepository;
  coordinator: DriverOrderCoordinator;
  reasons: SnapshotChangeReason[];
  clock: () => Date;
  pending: Promise<ActionOutcome> | null;
  releaseCommit: (() => void) | null;
  outcome: ActionOutcome | null;
  pushResult: RemoteUpdateResult | null;
}

const scenario = createScenarioHolder<ScenarioState>(() => {
  const repository = new InMemoryOrderRepository();
  const coordinator = createDriverOrderCoordinator({ repository, logger: createMockLogger() });
  const reasons: SnapshotChangeReason[] = [];
  coordinator.subscribe((change) => reasons.push(change.reason));
  return {
    repository,
    coordinator,
    reasons,
    clock: createPushClock(),
    pending: null,
    releaseCommit: null,
    outcome: null,
    pushResult: null,
  };
});

function lastOutcome(): ActionOutcome {
  const { outcome } = scenario.get();
  if (outcome === null) throw new Error("No action was performed in this scenario");
  return outcome;
}

function displayedStatus(): string | undefined {
  return scenario.get().coordinator.getSnapshot(ORDER_ID)?.status;
}

function push(status: string): void {
  const state = scenario.get();
  state.pushResult = state.coordinator.applyRemoteStatus({
    orderId: ORDER_ID,
    status: toStatus(status),
    observedAt: state.clock(),
  });
}

async function perform(action: string): Promise<void> {
  const state = scenario.get();
  state.outcome = await state.coordinator.performAction(ORDER_ID, toAction(action));
}

// ============================================================================
// Feature Tests
// ============================================================================

const feature = await loadFeature(
  fileURLToPath(new URL("../features/behavior/order-reconciliation.feature", import.meta.url))
);

describeFeature(feature, ({ Scenario, Background, AfterEachScenario }) => {
  AfterEachScenario(() => {
    scenario.reset();
  });

  Background(({ Given }) => {
    Given("a tracked order in status {string}", (_ctx: unknown, status: string) => {
      const state = scenario.start();
      const order = createTestOrder({ id: ORDER_ID, status: toStatus(status) });
      state.repository.seed(order);
      state.coordinator.track(order);
    });
  });

  // ==========================================================================
  // Driver actions
  // ==========================================================================

  Scenario("A committed action updates the order", ({ When, Then, And }) => {
    When("the driver performs {string}", async (_ctx: unknown, action: string) => {
      await perform(action);
    });

    Then("the action succeeds", () => {
      expect(lastOutcome().status).toBe("success");
    });

    And("the order shows status {string}", (_ctx: unknown, status: string) => {
      expect(displayedStatus()).toBe(status);
    });

    And("the snapshot changes were {string}", (_ctx: unknown, reasons: string) => {
      expect(scenario.get().reasons).toEqual(parseListCell(reasons));
    });
  });

  Scenario("A network failure rolls the optimistic update back", ({ Given, When, Then, And }) => {
    Given("the next commit fails with a network error", () => {
      const timeout = Object.assign(new Error("connect timed out"), { code: "ETIMEDOUT" });
      scenario.get().repository.failNextCommit(timeout);
    });

    When("the driver performs {string}", async (_ctx: unknown, action: string) => {
      await perform(action);
    });

    Then("the action fails and can be retried", () => {
      expect(lastOutcome()).toMatchObject({ status: "failed", failure: { retryable: true } });
    });

    And("the order shows status {string}", (_ctx: unknown, status: string) => {
      expect(displayedStatus()).toBe(status);
    });

    And("the snapshot changes were {string}", (_ctx: unknown, reasons: string) => {
      expect(scenario.get().reasons).toEqual(parseListCell(reasons));
    });
  });

  Scenario("Another device moved the order first", ({ Given, When, Then, And }) => {
    Given("the backend moved the order to {string}", (_ctx: unknown, status: string) => {
      scenario.get().repository.setStatus(ORDER_ID, toStatus(status));
    });

    When("the driver performs {string}", async (_ctx: unknown, action: string) => {
      await perform(action);
    });

    Then("the action fails with message {string}", (_ctx: unknown, message: string) => {
      expect(lastOutcome()).toMatchObject({ status: "failed", reason: message });
    });

    And("the order shows status {string}", (_ctx: unknown, status: string) => {
      expect(displayedStatus()).toBe(status);
    });
  });

  Scenario("A duplicate delivery shows the order as completed", ({ Given, When, Then, And }) => {
    Given("the driver has reached the customer", () => {
      const state = scenario.get();
      state.repository.setStatus(ORDER_ID, "arrivedAtCustomer");
      push("arrivedAtCustomer");
      expect(state.pushResult).toBe("applied");
    });

    And("the backend moved the order to {string}", (_ctx: unknown, status: string) => {
      scenario.get().repository.setStatus(ORDER_ID, toStatus(status));
    });

    When("the driver confirms delivery with a photo", async () => {
      const state = scenario.get();
      state.outcome = await state.coordinator.performAction(
        ORDER_ID,
        "confirmDeliveryWithPhoto",
        createDeliveryConfirmation({ orderId: ORDER_ID })
      );
    });

    Then("the action fails with message {string}", (_ctx: unknown, message: string) => {
      expect(lastOutcome()).toMatchObject({ status: "failed", reason: message });
    });

    And("the order shows status {string}", (_ctx: unknown, status: string) => {
      expect(displayedStatus()).toBe(status);
    });
  });

  // ==========================================================================
  // Realtime pushes
  // ==========================================================================

  Scenario("A forward push from the backend is applied", ({ When, Then, And }) => {
    When("the backend pushes status {string}", (_ctx: unknown, status: string) => {
      push(status);
    });

    Then("the push result is {string}", (_ctx: unknown, result: string) => {
      expect(scenario.get().pushResult).toBe(result);
    });

    And("the order shows status {string}", (_ctx: unknown, status: string) => {
      expect(displayedStatus()).toBe(status);
    });
  });

  Scenario("A backward push is ignored", ({ Given, When, Then, And }) => {
    Given("the backend pushed status {string}", (_ctx: unknown, status: string) => {
      push(status);
    });

    When("the backend pushes status {string}", (_ctx: unknown, status: string) => {
      push(status);
    });

    Then("the push result is {string}", (_ctx: unknown, result: string) => {
      expect(scenario.get().pushResult).toBe(result);
    });

    And("the order shows status {string}", (_ctx: unknown, status: string) => {
      expect(displayedStatus()).toBe(status);
    });
  });

  Scenario("A push during a commit is applied after it settles", ({ Given, When, Then, And }) => {
    Given("the next commit is held", () => {
      const state = scenario.get();
      state.releaseCommit = state.repository.holdNextCommit();
    });

    When("the driver starts {string}", (_ctx: unknown, action: string) => {
      const state = scenario.get();
      state.pending = state.coordinator.performAction(ORDER_ID, toAction(action));
    });

    And("the backend pushes status {string}", (_ctx: unknown, status: string) => {
      push(status);
    });

    Then("the push result is {string}", (_ctx: unknown, result: string) => {
      expect(scenario.get().pushResult).toBe(result);
    });

    And("the order meanwhile shows status {string}", (_ctx: unknown, status: string) => {
      expect(displayedStatus()).toBe(status);
    });

    When("the held commit completes", async () => {
      const state = scenario.get();
      if (state.releaseCommit === null || state.pending === null) {
        throw new Error("No commit is being held");
      }
      state.releaseCommit();
      state.outcome = await state.pending;
    });

    Then("the action succeeds", () => {
      expect(lastOutcome().status).toBe("success");
    });

    And("the order shows status {string}", (_ctx: unknown, status: string) => {
      expect(displayedStatus()).toBe(status);
    });
  });
});
