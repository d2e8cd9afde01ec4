/* --------------------------------------------------------------------------------------------
 * Copyright (c) Jan Dolejsi. All rights reserved.
 * Licensed under the MIT License. See License.txt in the project root for license information.
 * ------------------------------------------------------------------------------------------ */
'use strict';

/**
 * Raised when the topology, the entity attributes, the initial state or the goal
 * do not describe a consistent problem. Always raised before any planner is invoked.
 */
export class ConfigurationError extends Error {

    /** Individual violations, in a deterministic order. */
    readonly violations: readonly string[];

    constructor(summary: string, violations: string[] = []) {
        super(violations.length
            ? `${summary}\n${violations.map(v => ` - ${v}`).join('\n')}`
            : summary);
        this.name = 'ConfigurationError';
        this.violations = Object.freeze([...violations]);
    }
}

/**
 * Raised when a value falls outside the fixed enumeration the boolean encoding supports,
 * e.g. an unsupported container weight class.
 */
export class EncodingError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'EncodingError';
    }
}

export type PlannerFailureKind = 'unsolvable' | 'timeout' | 'adapter-error';

/**
 * Failure of the external planner. The kinds are never conflated:
 * `unsolvable` means the planner reported there is no plan,
 * `timeout` means the time budget was exceeded,
 * `adapter-error` covers everything else (process failed, output not parseable, plan not valid).
 */
export class PlannerFailure extends Error {
    constructor(public readonly kind: PlannerFailureKind, message: string, public readonly output?: string) {
        super(message);
        this.name = 'PlannerFailure';
    }

    static unsolvable(message: string, output?: string): PlannerFailure {
        return new PlannerFailure('unsolvable', message, output);
    }

    static timeout(timeoutMs: number, output?: string): PlannerFailure {
        return new PlannerFailure('timeout', `Planner exceeded the time budget of ${timeoutMs}ms.`, output);
    }

    static adapterError(message: string, output?: string): PlannerFailure {
        return new PlannerFailure('adapter-error', message, output);
    }
}
