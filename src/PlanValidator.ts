/* --------------------------------------------------------------------------------------------
 * Copyright (c) Jan Dolejsi. All rights reserved.
 * Licensed under the MIT License. See License.txt in the project root for license information.
 * ------------------------------------------------------------------------------------------ */
'use strict';

import { ActionInstance } from './ActionInstance';
import { State } from './Fluent';
import { PlanningProblem } from './PlanningProblem';
import { ConfigurationError } from './errors';

export interface PlanValidationResult {
    valid: boolean;
    /** First problem found, when not valid. */
    error?: string;
    /** Resolved actions, up to the first failing step. */
    actions: ActionInstance[];
    /** Initial state followed by the state after each applied action. */
    states: State[];
}

/**
 * Simulates a sequence of actions from the initial state of the problem.
 * Every precondition is checked, the invariants are checked after every step and the goal at the end.
 */
export class PlanValidator {

    constructor(private readonly problem: PlanningProblem) { }

    /**
     * @param actionIds action ids in the order of execution; either full ids or steps over the entities
     * only, e.g. `pickup r1 c1 p1 d1`, which are resolved against the state they are applied in
     */
    validate(actionIds: string[]): PlanValidationResult {
        const actions: ActionInstance[] = [];
        const states: State[] = [this.problem.getInitialState()];
        const invalid = (error: string): PlanValidationResult => ({ valid: false, error, actions, states });

        for (const [index, actionId] of actionIds.entries()) {
            const stepLabel = `Step ${index + 1} (${actionId})`;
            const state = states[states.length - 1];
            const action = this.problem.getAction(actionId) ?? this.problem.resolveStep(actionId, state);
            if (!action) {
                return invalid(this.problem.getStepActions(actionId).length
                    ? `${stepLabel}: not applicable.`
                    : `${stepLabel}: unknown action.`);
            }
            const unsatisfied = action.getUnsatisfiedPreconditions(state);
            if (unsatisfied.length) {
                return invalid(`${stepLabel}: unsatisfied precondition(s) ${unsatisfied.join(' ')}.`);
            }
            const successor = action.apply(state);
            actions.push(action);
            states.push(successor);
            try {
                this.problem.encoder.decode(successor);
            }
            catch (err) {
                if (err instanceof ConfigurationError) {
                    return invalid(`${stepLabel}: leads to an invalid state: ${err.violations.join(' ')}`);
                }
                throw err;
            }
        }

        const finalState = states[states.length - 1];
        const unsatisfiedGoals = this.problem.goal.filter(literal => !literal.holdsIn(finalState));
        if (unsatisfiedGoals.length) {
            return invalid(`Goal not satisfied: ${unsatisfiedGoals.join(' ')}.`);
        }
        return { valid: true, actions, states };
    }
}
