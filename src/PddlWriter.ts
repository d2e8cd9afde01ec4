/* --------------------------------------------------------------------------------------------
 * Copyright (c) Jan Dolejsi. All rights reserved.
 * Licensed under the MIT License. See License.txt in the project root for license information.
 * ------------------------------------------------------------------------------------------ */
'use strict';

import { PlanningProblem } from './PlanningProblem';

/**
 * Renders the lifted domain and the problem instance as PDDL text.
 */
export class PddlWriter {

    static readonly DOMAIN_NAME = 'dock-relocation';
    private static readonly INDENT = '    ';

    constructor(private readonly problem: PlanningProblem) { }

    requiresNegativePreconditions(): boolean {
        return this.problem.options.occupancy === 'single' || this.problem.goal.some(literal => !literal.positive);
    }

    writeDomain(): string {
        const i = PddlWriter.INDENT;
        const requirements = [':strips', ':typing'];
        if (this.requiresNegativePreconditions()) { requirements.push(':negative-preconditions'); }

        const typesPerParent = new Map<string, string[]>();
        this.problem.vocabulary.getTypeDeclarations().forEach(([type, parent]) =>
            typesPerParent.set(parent, [...(typesPerParent.get(parent) ?? []), type]));

        return [
            `(define (domain ${PddlWriter.DOMAIN_NAME})`,
            `${i}(:requirements ${requirements.join(' ')})`,
            `${i}(:types`,
            ...[...typesPerParent.entries()].map(([parent, types]) => `${i}${i}${types.join(' ')} - ${parent}`),
            `${i})`,
            `${i}(:predicates`,
            ...this.problem.vocabulary.declarations.map(declaration =>
                `${i}${i}${declaration.toPddl()}` + (declaration.documentation ? ` ; ${declaration.documentation}` : '')),
            `${i})`,
            ...this.problem.schemas.map(schema => schema.toPddl()),
            `)`,
            ``
        ].join('\n');
    }

    writeProblem(): string {
        const i = PddlWriter.INDENT;
        const initialFacts = [...this.problem.getInitialState()];
        const goal = this.problem.goal.map(literal => `${i}${i}${literal.toPddl()}`);

        return [
            `(define (problem ${this.problem.name})`,
            `${i}(:domain ${PddlWriter.DOMAIN_NAME})`,
            `${i}(:objects`,
            ...[...this.problem.vocabulary.getObjectsPerType().entries()]
                .map(([type, objects]) => `${i}${i}${objects.join(' ')} - ${type}`),
            `${i})`,
            `${i}(:init`,
            `${i}${i}; all fluents not listed are false`,
            ...initialFacts.map(fact => `${i}${i}(${fact})`),
            `${i})`,
            `${i}(:goal (and`,
            ...goal,
            `${i}))`,
            `)`,
            ``
        ].join('\n');
    }
}
