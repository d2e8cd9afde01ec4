/* --------------------------------------------------------------------------------------------
 * Copyright (c) Jan Dolejsi. All rights reserved.
 * Licensed under the MIT License. See License.txt in the project root for license information.
 * ------------------------------------------------------------------------------------------ */
'use strict';

import { ActionGenerator } from './ActionGenerator';
import { ActionInstance } from './ActionInstance';
import { ConstraintEncoder, WorldPlacement } from './ConstraintEncoder';
import { Literal } from './Fluent';
import { DEFAULT_ENCODING_OPTIONS, EncodingOptions, FluentVocabulary } from './FluentVocabulary';
import { InitialValue, PlanningProblem } from './PlanningProblem';
import { Registry } from './Registry';
import { ConfigurationError } from './errors';

/**
 * Combines the registry, the initial assignment and the goal into a validated `PlanningProblem`.
 */
export class ProblemAssembler {

    readonly vocabulary: FluentVocabulary;
    readonly encoder: ConstraintEncoder;
    readonly generator: ActionGenerator;
    private actions: readonly ActionInstance[] | undefined;

    constructor(public readonly registry: Registry, options: Partial<EncodingOptions> = {}) {
        this.vocabulary = new FluentVocabulary(registry, { ...DEFAULT_ENCODING_OPTIONS, ...options });
        this.encoder = new ConstraintEncoder(this.vocabulary);
        this.generator = new ActionGenerator(this.vocabulary, this.encoder);
    }

    /** Ground action instances; they do not depend on the initial state, so they are generated once. */
    getActions(): readonly ActionInstance[] {
        if (!this.actions) {
            this.actions = Object.freeze(this.generator.generate());
        }
        return this.actions;
    }

    /**
     * Assembles the problem from a structured placement.
     * @param name problem name
     * @param placement robot locations and cargo, pile stacks
     * @param goal goal conjunction
     */
    assembleFromPlacement(name: string, placement: WorldPlacement, goal: Literal[]): PlanningProblem {
        return this.assemble(name, this.encoder.encode(placement), goal);
    }

    /**
     * Assembles the problem from a raw fluent assignment.
     * @param name problem name
     * @param assignment fluent (e.g. `robot-at r1 d1`) to its initial value; dynamic fluents not listed are false
     * @param goal goal conjunction
     * @throws ConfigurationError when the assignment, the decoded world or the goal is invalid
     */
    assemble(name: string, assignment: ReadonlyMap<string, boolean>, goal: Literal[]): PlanningProblem {
        const staticFacts = new Set(this.encoder.staticFacts().map(fact => fact.key));
        const assigned = this.normalizeAssignment(assignment, staticFacts);

        const initialValues = new Map<string, InitialValue>();
        for (const fluent of this.vocabulary.getGroundFluents()) {
            const value = assigned.get(fluent.key);
            const initial: InitialValue = this.vocabulary.isStatic(fluent)
                ? { value: staticFacts.has(fluent.key), source: 'static' }
                : value === undefined ? { value: false, source: 'default' } : { value, source: 'assigned' };
            initialValues.set(fluent.key, initial);
        }

        const trueKeys = new Set([...initialValues.entries()].filter(([, initial]) => initial.value).map(([key]) => key));
        this.encoder.decode(trueKeys);
        this.validateGoal(goal);

        return new PlanningProblem(name, this.registry, this.vocabulary, this.encoder,
            Object.freeze([...this.generator.getSchemas()]), this.getActions(), initialValues, Object.freeze([...goal]));
    }

    private normalizeAssignment(assignment: ReadonlyMap<string, boolean>, staticFacts: ReadonlySet<string>): Map<string, boolean> {
        const violations: string[] = [];
        const normalized = new Map<string, boolean>();
        for (const [fluent, value] of assignment) {
            const key = ProblemAssembler.toKey(fluent);
            if (!this.vocabulary.has(key)) {
                violations.push(`Unknown fluent '${fluent}'.`);
            }
            else if (this.vocabulary.isStatic(key) && staticFacts.has(key) !== value) {
                violations.push(`Fluent '${fluent}' contradicts the static fact derived from the registry.`);
            }
            else if (normalized.has(key) && normalized.get(key) !== value) {
                violations.push(`Fluent '${fluent}' is assigned both true and false.`);
            }
            else if (!this.vocabulary.isStatic(key)) {
                normalized.set(key, value);
            }
        }
        if (violations.length) {
            throw new ConfigurationError('Invalid initial assignment.', violations);
        }
        return normalized;
    }

    private validateGoal(goal: Literal[]): void {
        const violations: string[] = [];
        const polarity = new Map<string, boolean>();
        for (const literal of goal) {
            if (!this.vocabulary.has(literal.atom)) {
                violations.push(`Goal refers to unknown fluent ${literal.atom.toPddl()}.`);
            }
            else if (polarity.has(literal.atom.key) && polarity.get(literal.atom.key) !== literal.positive) {
                violations.push(`Goal requires ${literal.atom.toPddl()} to be both true and false.`);
            }
            polarity.set(literal.atom.key, literal.positive);
        }
        if (violations.length) {
            throw new ConfigurationError('Invalid goal.', violations);
        }
    }

    /** `(robot-at R1 d1)` and `robot-at r1 d1` denote the same fluent. */
    static toKey(fluent: string): string {
        return fluent.trim().replace(/^\(/, '').replace(/\)$/, '').trim().split(/\s+/).join(' ').toLowerCase();
    }
}
