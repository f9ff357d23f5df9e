#!/usr/bin/env node
// ============================================================================
// cpusched — Command-line entry point
// ============================================================================

import * as fs from "fs";
import { Command } from "commander";
import { ProcessRegistry } from "../kernel/ProcessRegistry";
import { ConfigurationError } from "../kernel/Errors";
import { POLICY_KINDS } from "../config/PolicyConfig";
import { loadWorkload, saveWorkload } from "../config/Workload";
import { simulate } from "../simulate";
import { formatReport } from "../metrics/Report";
import { metricsToCsv, segmentsToCsv } from "../metrics/CsvExport";
import { comparePolicies, defaultPolicyConfigs, formatComparison } from "../analysis/Comparison";
import { generateWorkload } from "../workload/Generator";
import { mulberry32 } from "../utils/Random";
import { Logger } from "../utils/Logger";
import { ErrorReporter } from "./ErrorReporter";
import { DEFAULT_QUANTUM, PolicyFlags, parseInteger, policyFromOptions } from "./options";

const log = new Logger("cpusched");

interface RunOptions extends PolicyFlags {
    csv?: string;
}

interface CompareOptions {
    quantum?: string;
}

interface GenerateOptions {
    count?: string;
    seed?: string;
}

export function buildProgram(): Command {
    const program = new Command("cpusched")
        .description("CPU scheduling simulator")
        .version("1.0.0")
        .option("--log-level <level>", "trace, debug, info, warning or error");

    program.hook("preAction", () => {
        const level = program.opts<{ logLevel?: string }>().logLevel;
        if (level !== undefined && !Logger.setLevelByName(level)) {
            throw new ConfigurationError(`Unknown log level "${level}"`, { parameter: "log-level" });
        }
    });

    program
        .command("run <workload>")
        .description("Simulate one policy and print the report")
        .option("-p, --policy <kind>", `one of ${POLICY_KINDS.join(", ")}`)
        .option("-q, --quantum <n>", "time quantum for rr and mlfq")
        .option("--levels <n>", "number of mlfq levels")
        .option("--order <order>", "priority order: ascending or descending")
        .option("--threshold <n>", "intelligent starvation threshold")
        .option("--slice <n>", "intelligent time slice")
        .option("--weights <w,b,p>", "intelligent weights for waiting, burst and priority")
        .option("--csv <file>", "write metrics CSV to <file> and segments CSV beside it")
        .action(ErrorReporter.wrapCommand((file: string, options: RunOptions) => {
            const workload = loadWorkload(file);
            const config = policyFromOptions(options, workload.policy);
            const result = simulate(workload.registry, config);
            console.log(formatReport(result));

            if (options.csv !== undefined) {
                const segmentsPath = options.csv.replace(/(\.csv)?$/i, ".segments.csv");
                fs.writeFileSync(options.csv, metricsToCsv(result.metrics), "utf8");
                fs.writeFileSync(segmentsPath, segmentsToCsv(result.segments), "utf8");
                log.info(`Wrote ${options.csv} and ${segmentsPath}`);
            }
        }));

    program
        .command("compare <workload>")
        .description("Run every policy and recommend one")
        .option("-q, --quantum <n>", "time quantum for rr and mlfq", String(DEFAULT_QUANTUM))
        .action(ErrorReporter.wrapCommand((file: string, options: CompareOptions) => {
            const quantum = options.quantum !== undefined ? parseInteger("quantum", options.quantum) : DEFAULT_QUANTUM;
            const { registry } = loadWorkload(file);
            console.log(formatComparison(comparePolicies(registry, defaultPolicyConfigs(quantum))));
        }));

    program
        .command("generate <output>")
        .description("Write a random workload file")
        .option("-n, --count <n>", "number of processes (default: random 3-10)")
        .option("-s, --seed <n>", "seed for a reproducible workload")
        .action(ErrorReporter.wrapCommand((output: string, options: GenerateOptions) => {
            const specs = generateWorkload({
                count: options.count !== undefined ? parseInteger("count", options.count) : undefined,
                rng: options.seed !== undefined ? mulberry32(parseInteger("seed", options.seed)) : undefined,
            });
            saveWorkload(output, ProcessRegistry.from(specs));
            log.info(`Wrote ${specs.length} processes to ${output}`);
        }));

    return program;
}

if (require.main === module) {
    try {
        buildProgram().parse(process.argv);
    } catch (e: unknown) {
        ErrorReporter.report(e);
    }
}
