/* --------------------------------------------------------------------------------------------
 * Copyright (c) Jan Dolejsi. All rights reserved.
 * Licensed under the MIT License. See License.txt in the project root for license information.
 * ------------------------------------------------------------------------------------------ */
'use strict';

import { ActionSchema } from './ActionGenerator';
import { ActionInstance } from './ActionInstance';
import { ConstraintEncoder, WorldPlacement } from './ConstraintEncoder';
import { Literal, State } from './Fluent';
import { EncodingOptions, FluentVocabulary } from './FluentVocabulary';
import { Registry } from './Registry';

/**
 * `static`: derived from the registry attributes and topology.
 * `assigned`: given by the caller.
 * `default`: dynamic fluent the caller did not mention; false.
 */
export type InitialValueSource = 'static' | 'assigned' | 'default';

export interface InitialValue {
    readonly value: boolean;
    readonly source: InitialValueSource;
}

function normalize(id: string): string {
    return id.trim().split(/\s+/).join(' ').toLowerCase();
}

/**
 * Complete, validated problem instance, ready to be handed to a planner.
 */
export class PlanningProblem {

    private readonly actionIndex: ReadonlyMap<string, ActionInstance>;
    private readonly stepIndex = new Map<string, ActionInstance[]>();
    private readonly initialState: State;

    constructor(public readonly name: string,
        public readonly registry: Registry,
        public readonly vocabulary: FluentVocabulary,
        public readonly encoder: ConstraintEncoder,
        public readonly schemas: readonly ActionSchema[],
        public readonly actions: readonly ActionInstance[],
        public readonly initialValues: ReadonlyMap<string, InitialValue>,
        public readonly goal: readonly Literal[]) {
        this.actionIndex = new Map(actions.map(action => [action.id.toLowerCase(), action]));
        actions.forEach(action => {
            const key = action.step.toLowerCase();
            this.stepIndex.set(key, [...(this.stepIndex.get(key) ?? []), action]);
        });
        this.initialState = new Set([...initialValues.entries()].filter(([, initial]) => initial.value).map(([key]) => key));
    }

    get options(): EncodingOptions {
        return this.vocabulary.options;
    }

    /** Keys of the fluents that are initially true, static ones included. */
    getInitialState(): State {
        return this.initialState;
    }

    getInitialPlacement(): WorldPlacement {
        return this.encoder.decode(this.initialState);
    }

    isGoalSatisfied(state: State): boolean {
        return this.goal.every(literal => literal.holdsIn(state));
    }

    /**
     * Finds the action instance by its id, e.g. `move r1 d1 d2`. Case and extra whitespace are ignored.
     */
    getAction(id: string): ActionInstance | undefined {
        return this.actionIndex.get(normalize(id));
    }

    /**
     * Action instances matching a step over the entities only, e.g. `pickup r1 c1 p1 d1`.
     */
    getStepActions(step: string): ActionInstance[] {
        return [...(this.stepIndex.get(normalize(step)) ?? [])];
    }

    /**
     * Resolves a step over the entities to the action instance applicable in the state.
     * The slot, weight and load arguments follow from the state, so at most one instance applies.
     */
    resolveStep(step: string, state: State): ActionInstance | undefined {
        return this.getStepActions(step).find(action => action.isApplicable(state));
    }

    /**
     * Action instances of the given name, whose arguments start with the given prefix.
     */
    findActions(name: string, argsPrefix: string[] = []): ActionInstance[] {
        const prefix = argsPrefix.map(arg => arg.toLowerCase());
        return this.actions.filter(action => action.name === name.toLowerCase()
            && prefix.every((arg, index) => action.args[index]?.toLowerCase() === arg));
    }

    getApplicableActions(state: State): ActionInstance[] {
        return this.actions.filter(action => action.isApplicable(state));
    }
}
