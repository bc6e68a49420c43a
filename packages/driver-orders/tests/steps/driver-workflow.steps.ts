/**
 * Step Definitions for the Driver Order Workflow Feature
 *
 * Pure state machine checks; no repository or coordinator involved.
 */
import { fileURLToPath } from "node:url";
import { loadFeature, describeFeature } from "@amiceli/vitest-cucumber";
import { expect } from "vitest";
import { createScenarioHolder, parseListCell } from "@courierflow/core/testing";
import {
  driverOrderStateMachine,
  type DriverOrderStateMachine,
  type TransitionValidation,
} from "../../src/index.js";
import { toStatus } from "../support/helpers.js";

// ============================================================================
// Test State
// ============================================================================

interface ScenarioState {
  machine: DriverOrderStateMachine;
  validation: TransitionValidation | null;
}

const scenario = createScenarioHolder<ScenarioState>(() => ({
  machine: driverOrderStateMachine,
  validation: null,
}));

function lastValidation(): TransitionValidation {
  const { validation } = scenario.get();
  if (validation === null) throw new Error("No transition was checked in this scenario");
  return validation;
}

function moveOrder(from: string, to: string): void {
  const state = scenario.get();
  state.validation = state.machine.validateTransition(toStatus(from), toStatus(to));
}

// ============================================================================
// Feature Tests
// ============================================================================

const feature = await loadFeature(
  fileURLToPath(new URL("../features/behavior/driver-workflow.feature", import.meta.url))
);

describeFeature(feature, ({ Scenario, ScenarioOutline, Background, AfterEachScenario }) => {
  AfterEachScenario(() => {
    scenario.reset();
  });

  Background(({ Given }) => {
    Given("the driver order state machine", () => {
      scenario.start();
    });
  });

  // ==========================================================================
  // Transitions
  // ==========================================================================

  ScenarioOutline(
    "The driver advances one step at a time",
    ({ When, Then }, variables: Record<string, string>) => {
      When('the driver moves the order from "<from>" to "<to>"', () => {
        moveOrder(variables.from, variables.to);
      });

      Then("the transition is allowed", () => {
        expect(lastValidation()).toEqual({ isValid: true });
      });
    }
  );

  ScenarioOutline(
    "Skipping workflow steps is refused",
    ({ When, Then }, variables: Record<string, string>) => {
      When('the driver moves the order from "<from>" to "<to>"', () => {
        moveOrder(variables.from, variables.to);
      });

      Then("the transition is refused for skipping steps", () => {
        expect(lastValidation()).toMatchObject({ isValid: false, code: "SKIPPED_STEPS" });
      });
    }
  );

  Scenario("Jumping past pickup names the pickup rule", ({ When, Then, And }) => {
    When(
      "the driver moves the order from {string} to {string}",
      (_ctx: unknown, from: string, to: string) => {
        moveOrder(from, to);
      }
    );

    Then("the transition is refused with code {string}", (_ctx: unknown, code: string) => {
      expect(lastValidation()).toMatchObject({ isValid: false, code });
    });

    And("the refusal message is {string}", (_ctx: unknown, message: string) => {
      expect(lastValidation()).toMatchObject({ errorMessage: message });
    });
  });

  Scenario("Backward moves are refused", ({ When, Then, And }) => {
    When(
      "the driver moves the order from {string} to {string}",
      (_ctx: unknown, from: string, to: string) => {
        moveOrder(from, to);
      }
    );

    Then("the transition is refused with code {string}", (_ctx: unknown, code: string) => {
      expect(lastValidation()).toMatchObject({ isValid: false, code });
    });

    And("the refusal message is {string}", (_ctx: unknown, message: string) => {
      expect(lastValidation()).toMatchObject({ errorMessage: message });
    });
  });

  Scenario("A delivered order accepts no further transitions", ({ When, Then }) => {
    When(
      "the driver moves the order from {string} to {string}",
      (_ctx: unknown, from: string, to: string) => {
        moveOrder(from, to);
      }
    );

    Then("the transition is refused with code {string}", (_ctx: unknown, code: string) => {
      expect(lastValidation()).toMatchObject({ isValid: false, code });
    });
  });

  Scenario("The driver cannot fail an order", ({ When, Then }) => {
    When(
      "the driver moves the order from {string} to {string}",
      (_ctx: unknown, from: string, to: string) => {
        moveOrder(from, to);
      }
    );

    Then("the transition is refused with code {string}", (_ctx: unknown, code: string) => {
      expect(lastValidation()).toMatchObject({ isValid: false, code });
    });
  });

  // ==========================================================================
  // Actions and confirmations
  // ==========================================================================

  Scenario("Each status offers its actions with the primary one first", ({ Then }) => {
    Then(
      "the available actions are:",
      (_ctx: unknown, table: Array<{ status: string; actions: string }>) => {
        const { machine } = scenario.get();
        for (const row of table) {
          expect(machine.getAvailableActions(toStatus(row.status)), row.status).toEqual(
            parseListCell(row.actions)
          );
        }
      }
    );
  });

  Scenario("Proof is required to leave the restaurant and the customer", ({ Then }) => {
    Then(
      "the required confirmations are:",
      (_ctx: unknown, table: Array<{ status: string; confirmation: string }>) => {
        const { machine } = scenario.get();
        for (const row of table) {
          const expected = row.confirmation === "(none)" ? null : row.confirmation;
          expect(machine.getRequiredConfirmation(toStatus(row.status)), row.status).toBe(expected);
        }
      }
    );
  });
});
