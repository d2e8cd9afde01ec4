/* --------------------------------------------------------------------------------------------
 * Copyright (c) Jan Dolejsi. All rights reserved.
 * Licensed under the MIT License. See License.txt in the project root for license information.
 * ------------------------------------------------------------------------------------------ */
'use strict';

import { Plan } from 'pddl-workspace';
import { ActionInstance } from './ActionInstance';
import { PlannerFailure } from './errors';

export enum PlanningOutcome { SUCCESS, UNSOLVABLE, TIMEOUT, ERROR }

/**
 * Outcome of the planner execution.
 */
export class PlanningResult {
    constructor(public readonly outcome: PlanningOutcome, public readonly actions: readonly ActionInstance[],
        public readonly elapsedTime: number, public readonly plan?: Plan, public readonly error?: PlannerFailure) { }

    /**
     * Creates the result instance for the case of successful planner execution.
     * @param actions validated action sequence
     * @param plan plan as parsed from the planner output
     */
    static success(actions: ActionInstance[], plan: Plan, elapsedTime: number): PlanningResult {
        return new PlanningResult(PlanningOutcome.SUCCESS, Object.freeze([...actions]), elapsedTime, plan, undefined);
    }

    /**
     * Creates the result instance for the case of planner failure.
     * @param error failure; its kind determines the outcome
     */
    static failure(error: PlannerFailure, elapsedTime = Number.NaN): PlanningResult {
        return new PlanningResult(PlanningResult.toOutcome(error), [], elapsedTime, undefined, error);
    }

    private static toOutcome(error: PlannerFailure): PlanningOutcome {
        switch (error.kind) {
            case 'unsolvable': return PlanningOutcome.UNSOLVABLE;
            case 'timeout': return PlanningOutcome.TIMEOUT;
            case 'adapter-error': return PlanningOutcome.ERROR;
        }
    }

    isSuccess(): boolean {
        return this.outcome === PlanningOutcome.SUCCESS;
    }

    /**
     * @returns the validated action sequence
     * @throws PlannerFailure when the planning did not succeed
     */
    getPlanOrThrow(): readonly ActionInstance[] {
        if (this.error) {
            throw this.error;
        }
        return this.actions;
    }
}
