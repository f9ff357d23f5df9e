// ============================================================================
// PolicyConfig.test.ts — Defaults and parameter validation
// ============================================================================

import "../setup";
import { expect } from "chai";
import { PolicyKind, isPolicyKind, resolvePolicyConfig } from "../../src/config/PolicyConfig";
import { ConfigurationError } from "../../src/kernel/Errors";

describe("PolicyConfig", () => {
    it("should apply intelligent defaults", () => {
        expect(resolvePolicyConfig({ kind: PolicyKind.INTELLIGENT })).to.deep.equal({
            kind: PolicyKind.INTELLIGENT,
            weights: { waiting: 1, burst: 1, priority: 1 },
            starvationThreshold: 10,
            slice: 2,
        });
    });

    it("should merge partial weights over the defaults", () => {
        const resolved = resolvePolicyConfig({ kind: PolicyKind.INTELLIGENT, weights: { burst: 0.5 } });
        expect(resolved).to.deep.include({ weights: { waiting: 1, burst: 0.5, priority: 1 } });
    });

    it("should default priority order to ascending and MLFQ to three levels", () => {
        expect(resolvePolicyConfig({ kind: PolicyKind.PRIORITY })).to.deep.equal({
            kind: PolicyKind.PRIORITY,
            order: "ascending",
        });
        expect(resolvePolicyConfig({ kind: PolicyKind.MLFQ, quantum: 2 })).to.deep.equal({
            kind: PolicyKind.MLFQ,
            quantum: 2,
            levels: 3,
        });
    });

    it("should reject non-integer and non-positive parameters", () => {
        expect(() => resolvePolicyConfig({ kind: PolicyKind.ROUND_ROBIN, quantum: 1.5 }))
            .to.throw(ConfigurationError, "rr: quantum must be a positive integer, got 1.5");
        expect(() => resolvePolicyConfig({ kind: PolicyKind.MLFQ, quantum: 1, levels: 0 }))
            .to.throw(ConfigurationError, "mlfq: levels must be a positive integer, got 0");
        expect(() => resolvePolicyConfig({ kind: PolicyKind.INTELLIGENT, slice: -1 }))
            .to.throw(ConfigurationError, "intelligent: slice must be a positive integer, got -1");
    });

    it("should reject negative weights", () => {
        expect(() => resolvePolicyConfig({ kind: PolicyKind.INTELLIGENT, weights: { waiting: -1 } }))
            .to.throw(ConfigurationError, 'intelligent: weight "waiting" must be a finite number >= 0, got -1');
    });

    it("should recognise policy kinds", () => {
        expect(isPolicyKind("mlfq")).to.be.true;
        expect(isPolicyKind("lottery")).to.be.false;
    });
});
