// ============================================================================
// SrtfPolicy — Shortest remaining time first (preemptive SJF)
// ============================================================================

import { PolicyKind } from "../config/PolicyConfig";
import { Process } from "../kernel/Process";
import { PreemptivePolicy } from "./PreemptivePolicy";

export class SrtfPolicy extends PreemptivePolicy {
    readonly kind = PolicyKind.SRTF;
    readonly label = "SJF (preemptive / SRTF)";

    protected rank(process: Process): number {
        return process.remainingTime;
    }
}
