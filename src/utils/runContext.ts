import * as crypto from 'crypto';

export interface RunContext {
    runId: string;
    query: string;
}

export function createRunContext(query: string): RunContext {
    return {
        runId: crypto.randomUUID(),
        query,
    };
}
