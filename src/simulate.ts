// ============================================================================
// simulate — One-call entry point: registry + policy config → result
// ============================================================================

import { ProcessRegistry } from "./kernel/ProcessRegistry";
import { SimulationResult, Simulator } from "./kernel/Simulator";
import { SimulationState } from "./kernel/SimulationState";
import { PolicyConfig } from "./config/PolicyConfig";
import { createPolicy } from "./policies";

/**
 * Validate the configuration and the dependency graph, reset run-state and
 * run the policy to completion. Synchronous; the registry must not be used
 * by another simulation until this returns.
 */
export function simulate(registry: ProcessRegistry, config: PolicyConfig): SimulationResult {
    const simulator = new Simulator(registry, createPolicy(config));
    const outcome = simulator.run();
    if (outcome.status !== SimulationState.FINISHED) {
        // run() without a signal only stops when finished
        throw new Error(`Unexpected simulation status ${outcome.status}`);
    }
    return outcome.result;
}
