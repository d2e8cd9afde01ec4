/* --------------------------------------------------------------------------------------------
 * Copyright (c) Jan Dolejsi. All rights reserved.
 * Licensed under the MIT License. See License.txt in the project root for license information.
 * ------------------------------------------------------------------------------------------ */
'use strict';

import { PlanValidationResult, PlanValidator } from './PlanValidator';
import { PlanningProblem } from './PlanningProblem';
import { PlanningResult } from './PlanningResult';

/**
 * Receives the planner's progress output.
 */
export interface PlannerResponseHandler {
    handleOutput(outputText: string): void;
}

/** Prints the planner output to the console. */
export class ConsoleResponseHandler implements PlannerResponseHandler {
    handleOutput(outputText: string): void {
        console.log(outputText.replace(/\n$/, ''));
    }
}

export abstract class Planner {

    protected planningProcessKilled = false;

    /**
     * Solves the problem. Never rejects: failures are reported in the result.
     * @param problem validated problem instance
     * @param callbacks output listener
     */
    abstract plan(problem: PlanningProblem, callbacks?: PlannerResponseHandler): Promise<PlanningResult>;

    /**
     * Simulates the actions from the problem's initial state.
     * @param problem problem instance
     * @param actionIds action ids in the order of execution
     */
    validatePlan(problem: PlanningProblem, actionIds: string[]): PlanValidationResult {
        return new PlanValidator(problem).validate(actionIds);
    }

    /**
     * Forces the planner to stop.
     */
    stop(): void {
        this.planningProcessKilled = true;
    }
}
