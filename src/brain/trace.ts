import type { TraceDetail, TraceEntry, TracePhase } from '../types/agent.js'

/**
 * Append-only record of one agent run. Step numbers are 1-based and follow
 * insertion order; entries are returned to the caller and never persisted.
 */
export class AgentTrace {
    private readonly entries: TraceEntry[] = []

    constructor(private readonly log: boolean = false) {}

    add(phase: TracePhase, detail: TraceDetail): void {
        const entry: TraceEntry = { step: this.entries.length + 1, phase, detail }
        this.entries.push(entry)
        if (this.log) {
            console.log(`[agent] trace step=${entry.step} phase=${phase}`, JSON.stringify(detail))
        }
    }

    toJSON(): TraceEntry[] {
        return this.entries.map(entry => ({ ...entry, detail: { ...entry.detail } }))
    }
}
