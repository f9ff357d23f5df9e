// ============================================================================
// Workload.test.ts — Workload file validation and round trips through disk
// ============================================================================

import { proc, registryOf } from "../setup";
import { expect } from "chai";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { loadWorkload, parseWorkload, saveWorkload, toWorkloadFile } from "../../src/config/Workload";
import { PolicyKind } from "../../src/config/PolicyConfig";
import { ConfigurationError, DuplicateIdError, InvalidInputError } from "../../src/kernel/Errors";

describe("Workload", () => {
    describe("parseWorkload", () => {
        it("should accept a bare process array", () => {
            const { registry, policy } = parseWorkload([
                { pid: "A", arrival: 0, burst: 3 },
                { pid: "B", arrival: 1, burst: 2, priority: 4, dependencies: ["A"] },
            ]);
            expect(policy).to.be.undefined;
            expect(registry.getAll().map(p => p.toString())).to.deep.equal([
                "A(arr=0, burst=3, prio=0)",
                "B(arr=1, burst=2, prio=4)",
            ]);
            expect(Array.from(registry.get("B")?.dependencies ?? [])).to.deep.equal(["A"]);
        });

        it("should accept an object with a policy", () => {
            const { policy } = parseWorkload({
                processes: [{ pid: "A", arrival: 0, burst: 1 }],
                policy: { kind: "rr", quantum: 4 },
            });
            expect(policy).to.deep.equal({ kind: PolicyKind.ROUND_ROBIN, quantum: 4 });
        });

        it("should require a quantum for rr", () => {
            expect(() => parseWorkload({ processes: [], policy: { kind: "rr" } }))
                .to.throw(ConfigurationError, "rr: quantum is required");
        });

        it("should reject unknown fields and wrong types", () => {
            expect(() => parseWorkload([{ pid: "A", arrival: 0, burst: 1, colour: "red" }]))
                .to.throw(ConfigurationError, "Invalid workload file");
            expect(() => parseWorkload([{ pid: "A", arrival: "0", burst: 1 }]))
                .to.throw(ConfigurationError, "Invalid workload file");
            expect(() => parseWorkload({ processes: [], policy: { kind: "lottery" } }))
                .to.throw(ConfigurationError, "Invalid workload file");
        });

        it("should pass field range errors through from the registry", () => {
            expect(() => parseWorkload([{ pid: "A", arrival: 0, burst: 0 }])).to.throw(InvalidInputError);
            expect(() => parseWorkload([
                { pid: "A", arrival: 0, burst: 1 },
                { pid: "A", arrival: 2, burst: 1 },
            ])).to.throw(DuplicateIdError);
        });
    });

    describe("toWorkloadFile", () => {
        it("should omit empty dependency lists", () => {
            const r = registryOf(proc("P1", 0, 2, 1), proc("P2", 1, 1, 0, ["P1"]));
            expect(toWorkloadFile(r)).to.deep.equal({
                processes: [
                    { pid: "P1", arrival: 0, burst: 2, priority: 1 },
                    { pid: "P2", arrival: 1, burst: 1, priority: 0, dependencies: ["P1"] },
                ],
            });
        });
    });

    describe("files", () => {
        let dir: string;

        beforeEach(() => {
            dir = fs.mkdtempSync(path.join(os.tmpdir(), "cpusched-"));
        });

        afterEach(() => {
            fs.rmSync(dir, { recursive: true, force: true });
        });

        it("should load what it saved", () => {
            const file = path.join(dir, "workload.json");
            const r = registryOf(proc("P1", 0, 5, 2), proc("P2", 3, 1, 0, ["P1"]));
            saveWorkload(file, r, { kind: PolicyKind.MLFQ, quantum: 2, levels: 4 });

            const loaded = loadWorkload(file);
            expect(loaded.registry.getAll().map(p => p.toSpec())).to.deep.equal(r.getAll().map(p => p.toSpec()));
            expect(loaded.policy).to.deep.equal({ kind: PolicyKind.MLFQ, quantum: 2, levels: 4 });
        });

        it("should report a missing file as a configuration error", () => {
            expect(() => loadWorkload(path.join(dir, "missing.json")))
                .to.throw(ConfigurationError, "Cannot read workload file");
        });

        it("should report malformed JSON as a configuration error", () => {
            const file = path.join(dir, "broken.json");
            fs.writeFileSync(file, "{ not json", "utf8");
            expect(() => loadWorkload(file)).to.throw(ConfigurationError, "Workload file is not valid JSON");
        });
    });
});
