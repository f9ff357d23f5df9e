// ============================================================================
// ReadinessTracker.test.ts — Incremental admission, unblocking and events
// ============================================================================

import { proc, registryOf } from "../setup";
import { expect } from "chai";
import { ReadinessTracker } from "../../src/kernel/ReadinessTracker";
import { ProcessRegistry } from "../../src/kernel/ProcessRegistry";

function finish(registry: ProcessRegistry, tracker: ReadinessTracker, id: string, at: number): void {
    const process = registry.get(id);
    if (!process) throw new Error(`missing ${id}`);
    process.remainingTime = 0;
    process.finishTime = at;
    tracker.finished(process);
}

describe("ReadinessTracker", () => {
    it("should admit arrivals as time advances, sorted by id", () => {
        const r = registryOf(proc("P10", 0, 1), proc("P2", 0, 1), proc("P3", 4, 1));
        const tracker = new ReadinessTracker(r);
        expect(tracker.readyAt(0).map(p => p.id)).to.deep.equal(["P2", "P10"]);
        expect(tracker.readyAt(4).map(p => p.id)).to.deep.equal(["P2", "P3", "P10"]);
    });

    it("should release a dependent when its last dependency finishes", () => {
        const r = registryOf(proc("P1", 0, 3), proc("P2", 0, 1), proc("P3", 0, 1, 0, ["P1", "P2"]));
        const tracker = new ReadinessTracker(r);
        expect(tracker.readyAt(0).map(p => p.id)).to.deep.equal(["P1", "P2"]);

        finish(r, tracker, "P2", 1);
        expect(tracker.readyAt(1).map(p => p.id)).to.deep.equal(["P1"]);

        finish(r, tracker, "P1", 4);
        expect(tracker.readyAt(4).map(p => p.id)).to.deep.equal(["P3"]);
        expect(tracker.done).to.be.false;

        finish(r, tracker, "P3", 5);
        expect(tracker.readyAt(5)).to.deep.equal([]);
        expect(tracker.done).to.be.true;
    });

    it("should drop a dependent whose dependency left the registry", () => {
        const r = registryOf(proc("P1", 0, 2), proc("P2", 0, 1, 0, ["P1"]));
        const tracker = new ReadinessTracker(r);
        tracker.readyAt(0);
        finish(r, tracker, "P1", 2);
        r.remove("P1");
        expect(tracker.readyAt(2)).to.deep.equal([]);
        expect(tracker.nextEventAfter(2)).to.be.null;
    });

    it("should find the next arrival", () => {
        const r = registryOf(proc("P1", 0, 1), proc("P2", 5, 1), proc("P3", 3, 1));
        const tracker = new ReadinessTracker(r);
        expect(tracker.nextArrivalAfter(0)).to.equal(3);
        expect(tracker.nextArrivalAfter(3)).to.equal(5);
        expect(tracker.nextArrivalAfter(5)).to.be.null;
    });

    it("should skip arrivals still waiting on an unfinished dependency", () => {
        const r = registryOf(proc("P1", 0, 4), proc("P2", 2, 1, 0, ["P1"]), proc("P3", 6, 1));
        const tracker = new ReadinessTracker(r);
        expect(tracker.readyAt(0).map(p => p.id)).to.deep.equal(["P1"]);
        expect(tracker.nextEventAfter(0)).to.equal(6);
    });
});
