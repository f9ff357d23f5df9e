// ============================================================================
// main.test.ts — End-to-end runs of the command-line program
// ============================================================================

import { resetLogger } from "../setup";
import { expect } from "chai";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { buildProgram } from "../../src/cli/main";
import { ConfigurationError } from "../../src/kernel/Errors";
import { Logger } from "../../src/utils/Logger";

describe("cpusched", () => {
    let dir: string;
    let consoleOutput: string[];
    let logOutput: string[];
    let originalLog: typeof console.log;

    const run = (...args: string[]): void => {
        buildProgram().exitOverride().parse(args, { from: "user" });
    };

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), "cpusched-cli-"));
        consoleOutput = [];
        logOutput = [];
        originalLog = console.log;
        console.log = (...args: unknown[]) => {
            consoleOutput.push(args.join(" "));
        };
        Logger.setSink(line => logOutput.push(line));
    });

    afterEach(() => {
        console.log = originalLog;
        process.exitCode = undefined;
        resetLogger();
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it("should generate a seeded workload file", () => {
        const file = path.join(dir, "generated.json");
        run("generate", file, "--count", "4", "--seed", "42");
        expect(JSON.parse(fs.readFileSync(file, "utf8"))).to.deep.equal({
            processes: [
                { pid: "P1", arrival: 6, burst: 5, priority: 5 },
                { pid: "P2", arrival: 7, burst: 2, priority: 3 },
                { pid: "P3", arrival: 3, burst: 7, priority: 5 },
                { pid: "P4", arrival: 5, burst: 3, priority: 5 },
            ],
        });
    });

    it("should print the report and write CSV files", () => {
        const file = path.join(dir, "workload.json");
        fs.writeFileSync(file, JSON.stringify([
            { pid: "P1", arrival: 0, burst: 5 },
            { pid: "P2", arrival: 1, burst: 3 },
            { pid: "P3", arrival: 2, burst: 1 },
        ]));
        const csv = path.join(dir, "metrics.csv");

        run("run", file, "--policy", "fcfs", "--csv", csv);

        const report = consoleOutput.join("\n").split("\n");
        expect(report[0]).to.equal("--- ⚙️ FCFS ---");
        expect(fs.readFileSync(csv, "utf8").split("\n")[1]).to.equal("P1,0,5,0,0,5,0,5,0");
        expect(fs.readFileSync(path.join(dir, "metrics.segments.csv"), "utf8"))
            .to.equal("process,start,end\nP1,0,5\nP2,5,8\nP3,8,9\n");
    });

    it("should append the segments suffix when the CSV path has no extension", () => {
        const file = path.join(dir, "workload.json");
        fs.writeFileSync(file, JSON.stringify([{ pid: "P1", arrival: 0, burst: 2 }]));

        run("run", file, "--policy", "fcfs", "--csv", path.join(dir, "out"));

        expect(fs.existsSync(path.join(dir, "out"))).to.be.true;
        expect(fs.readFileSync(path.join(dir, "out.segments.csv"), "utf8"))
            .to.equal("process,start,end\nP1,0,2\n");
    });

    it("should use the workload file's policy", () => {
        const file = path.join(dir, "workload.json");
        fs.writeFileSync(file, JSON.stringify({
            processes: [{ pid: "P1", arrival: 0, burst: 1 }],
            policy: { kind: "rr", quantum: 3 },
        }));
        run("run", file);
        expect(consoleOutput[0].split("\n")[0]).to.equal("--- ⚙️ Round Robin (q=3) ---");
    });

    it("should print a comparison with a recommendation", () => {
        const file = path.join(dir, "workload.json");
        fs.writeFileSync(file, JSON.stringify([
            { pid: "P1", arrival: 0, burst: 5 },
            { pid: "P2", arrival: 1, burst: 3 },
            { pid: "P3", arrival: 2, burst: 1 },
        ]));
        run("compare", file);
        const lines = consoleOutput.join("\n").split("\n");
        expect(lines).to.have.length(10);
        expect(lines[9].startsWith("Recommended: ")).to.be.true;
    });

    it("should log engine errors and set the exit code", () => {
        const file = path.join(dir, "workload.json");
        fs.writeFileSync(file, JSON.stringify([
            { pid: "P1", arrival: 0, burst: 1, dependencies: ["P2"] },
            { pid: "P2", arrival: 0, burst: 1, dependencies: ["P1"] },
        ]));
        run("run", file, "--policy", "fcfs");
        expect(process.exitCode).to.equal(1);
        expect(logOutput).to.deep.equal([
            "🛑 [ERROR] [cpusched] ConfigurationError: Dependency cycle: P1 -> P2 -> P1 (processId=P1, cycle=P1|P2|P1)",
        ]);
        expect(consoleOutput).to.have.length(0);
    });

    it("should reject an unknown log level", () => {
        const file = path.join(dir, "workload.json");
        fs.writeFileSync(file, "[]");
        expect(() => run("--log-level", "loud", "run", file)).to.throw(ConfigurationError, 'Unknown log level "loud"');
    });
});
