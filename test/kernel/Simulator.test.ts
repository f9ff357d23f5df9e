// ============================================================================
// Simulator.test.ts — Stepping, idle gaps, errors and cancellation
// ============================================================================

import { classicWorkload, proc, registryOf, resetLogger, trace } from "../setup";
import { expect } from "chai";
import { Simulator } from "../../src/kernel/Simulator";
import { SimulationState } from "../../src/kernel/SimulationState";
import { ProcessStatus } from "../../src/kernel/ProcessStatus";
import { ConfigurationError, DeadlockError, EmptyInputError, SchedulerError } from "../../src/kernel/Errors";
import { ProcessSpec } from "../../src/kernel/Process";
import { ProcessRegistry } from "../../src/kernel/ProcessRegistry";
import { PolicyKind } from "../../src/config/PolicyConfig";
import { FcfsPolicy, RoundRobinPolicy, SchedulingPolicy } from "../../src/policies";
import { LogLevel, Logger } from "../../src/utils/Logger";

function thrown(fn: () => unknown): unknown {
    try {
        fn();
    } catch (e) {
        return e;
    }
    return undefined;
}

describe("Simulator", () => {
    describe("stepping", () => {
        it("should start in NOT_STARTED and finish after the last dispatch", () => {
            const sim = new Simulator(classicWorkload(), new FcfsPolicy());
            expect(sim.state).to.equal(SimulationState.NOT_STARTED);

            expect(sim.step()).to.deep.equal({ processId: "P1", start: 0, end: 5 });
            expect(sim.state).to.equal(SimulationState.RUNNING);
            expect(sim.time).to.equal(5);

            sim.step();
            sim.step();
            expect(sim.state).to.equal(SimulationState.FINISHED);
            expect(sim.step()).to.be.null;
            expect(trace(sim.segments)).to.deep.equal(["P1:0-5", "P2:5-8", "P3:8-9"]);
        });

        it("should record the ready set at every decision", () => {
            const sim = new Simulator(classicWorkload(), new FcfsPolicy());
            sim.run();
            expect(sim.readyHistory).to.deep.equal([
                { time: 0, ready: ["P1"] },
                { time: 5, ready: ["P2", "P3"] },
                { time: 8, ready: ["P3"] },
            ]);
        });

        it("should insert an idle segment when nothing is ready", () => {
            const sim = new Simulator(registryOf(proc("P1", 0, 2), proc("P2", 5, 1)), new FcfsPolicy());
            sim.step();
            expect(sim.step()).to.deep.equal({ processId: "idle", start: 2, end: 5 });
            expect(sim.state).to.equal(SimulationState.IDLE);
            sim.step();
            expect(trace(sim.segments)).to.deep.equal(["P1:0-2", "idle:2-5", "P2:5-6"]);
        });

        it("should start with an idle segment when the first arrival is late", () => {
            const sim = new Simulator(registryOf(proc("P1", 3, 2)), new FcfsPolicy());
            sim.run();
            expect(trace(sim.segments)).to.deep.equal(["idle:0-3", "P1:3-5"]);
        });

        it("should run a dependent process after its dependency", () => {
            const r = registryOf(proc("P1", 0, 3), proc("P2", 0, 2, 0, ["P1"]));
            const sim = new Simulator(r, new FcfsPolicy());
            sim.run();
            expect(trace(sim.segments)).to.deep.equal(["P1:0-3", "P2:3-5"]);
        });

        it("should leave every process FINISHED", () => {
            const r = classicWorkload();
            new Simulator(r, new FcfsPolicy()).run();
            expect(r.getAll().map(p => p.status)).to.deep.equal([
                ProcessStatus.FINISHED,
                ProcessStatus.FINISHED,
                ProcessStatus.FINISHED,
            ]);
        });
    });

    describe("errors", () => {
        it("should refuse an empty registry", () => {
            const sim = new Simulator(new ProcessRegistry(), new FcfsPolicy());
            expect(() => sim.run()).to.throw(EmptyInputError);
        });

        it("should refuse a dependency cycle before running anything", () => {
            const r = registryOf(proc("P1", 0, 1, 0, ["P2"]), proc("P2", 0, 1, 0, ["P1"]));
            const sim = new Simulator(r, new FcfsPolicy());
            expect(() => sim.run()).to.throw(ConfigurationError, "Dependency cycle: P1 -> P2 -> P1");
            expect(sim.segments).to.have.length(0);
            expect(sim.state).to.equal(SimulationState.NOT_STARTED);
        });

        it("should reject a policy decision that does not consume time", () => {
            const broken: SchedulingPolicy = {
                kind: PolicyKind.FCFS,
                label: "broken",
                continuous: true,
                decide: context => ({ process: context.ready[0], duration: 0 }),
            };
            const sim = new Simulator(classicWorkload(), broken);
            expect(() => sim.run()).to.throw(SchedulerError, "broken returned an invalid decision");
        });

        it("should fail with the blocked ids when a dependency disappears mid-run", () => {
            const r = registryOf(proc("P1", 0, 2), proc("P2", 0, 1, 0, ["P1"]));
            const sim = new Simulator(r, new FcfsPolicy());
            expect(sim.step()).to.deep.equal({ processId: "P1", start: 0, end: 2 });

            r.remove("P1");
            const error = thrown(() => sim.step());
            expect(error).to.be.instanceOf(DeadlockError);
            if (error instanceof DeadlockError) {
                expect(error.message).to.equal("No process can become ready");
                expect(error.context).to.deep.equal({ time: 2, blocked: ["P2"] });
            }
        });

        it("should stop a policy whose decisions never finish the work", () => {
            // Hands back the time it consumes, so P1 never completes.
            const endless: SchedulingPolicy = {
                kind: PolicyKind.FCFS,
                label: "endless",
                continuous: false,
                decide: context => {
                    const process = context.ready[0];
                    process.remainingTime += 1;
                    return { process, duration: 1 };
                },
            };
            const sim = new Simulator(registryOf(proc("P1", 0, 2)), endless);

            const error = thrown(() => sim.run());
            expect(error).to.be.instanceOf(DeadlockError);
            if (error instanceof DeadlockError) {
                expect(error.message).to.equal("Simulation made no progress");
                expect(error.context).to.deep.equal({ time: 6, blocked: ["P1"] });
            }
            expect(sim.segments).to.have.length(6);
        });
    });

    describe("scale", () => {
        it("should run a long dependency chain in linear steps", function () {
            this.timeout(10000);
            const count = 5000;
            const specs: ProcessSpec[] = [];
            for (let i = 1; i <= count; i++) {
                specs.push(proc(`P${i}`, 0, 1, 0, i > 1 ? [`P${i - 1}`] : []));
            }

            const sim = new Simulator(registryOf(...specs), new FcfsPolicy());
            const outcome = sim.run();
            expect(outcome.status).to.equal(SimulationState.FINISHED);
            expect(sim.time).to.equal(count);
            expect(sim.segments).to.have.length(count);
            expect(sim.segments[count - 1]).to.deep.equal({ processId: `P${count}`, start: count - 1, end: count });
            expect(sim.readyHistory[count - 1]).to.deep.equal({ time: count - 1, ready: [`P${count}`] });
        });
    });

    describe("logging", () => {
        afterEach(() => {
            resetLogger();
        });

        it("should log each run's state changes under its own key", () => {
            const lines: string[] = [];
            Logger.setLevel(LogLevel.TRACE);
            Logger.setSink(line => lines.push(line));

            for (let i = 0; i < 2; i++) {
                const controller = new AbortController();
                controller.abort();
                new Simulator(classicWorkload(), new FcfsPolicy()).run(controller.signal);
            }

            const aborted = lines.filter(line => /\[Δ\] run\d+:state: ABORTED$/.test(line));
            expect(aborted).to.have.length(2);
            expect(aborted[0]).to.not.equal(aborted[1]);
        });
    });

    describe("cancellation", () => {
        it("should return an empty timeline when aborted before the first step", () => {
            const controller = new AbortController();
            controller.abort();
            const sim = new Simulator(classicWorkload(), new FcfsPolicy());
            expect(sim.run(controller.signal)).to.deep.equal({
                status: SimulationState.ABORTED,
                time: 0,
                segments: [],
            });
        });

        it("should keep the partial timeline when aborted between steps", () => {
            const r = registryOf(proc("P1", 0, 5), proc("P2", 1, 3));
            const sim = new Simulator(r, new RoundRobinPolicy(2));
            sim.step();
            sim.step();

            const controller = new AbortController();
            controller.abort();
            const outcome = sim.run(controller.signal);
            expect(outcome.status).to.equal(SimulationState.ABORTED);
            if (outcome.status === SimulationState.ABORTED) {
                expect(outcome.time).to.equal(4);
                expect(trace(outcome.segments)).to.deep.equal(["P1:0-2", "P2:2-4"]);
            }
            expect(sim.step()).to.be.null;
            expect(sim.run().status).to.equal(SimulationState.ABORTED);
        });
    });

    describe("idempotence", () => {
        it("should produce identical results when re-run on the same registry", () => {
            const r = classicWorkload();
            const first = new Simulator(r, new RoundRobinPolicy(2));
            first.run();
            const second = new Simulator(r, new RoundRobinPolicy(2));
            second.run();
            expect(second.result()).to.deep.equal(first.result());
        });
    });
});
