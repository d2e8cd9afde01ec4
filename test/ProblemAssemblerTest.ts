/* --------------------------------------------------------------------------------------------
 * Copyright (c) Jan Dolejsi. All rights reserved.
 * Licensed under the MIT License. See License.txt in the project root for license information.
 * ------------------------------------------------------------------------------------------ */
'use strict';

import * as assert from 'assert';
import { expect } from 'chai';
import { atom, Literal } from '../src/Fluent';
import { Goal } from '../src/Goal';
import { ProblemAssembler } from '../src/ProblemAssembler';
import { Registry } from '../src/Registry';
import { Topology } from '../src/Topology';
import { ConfigurationError } from '../src/errors';
import { createLinePlacement, createLineRegistry } from './fixtures';

function errorOf(fn: () => void): ConfigurationError {
    try {
        fn();
    }
    catch (err) {
        if (err instanceof ConfigurationError) { return err; }
        throw err;
    }
    assert.fail('ConfigurationError expected');
}

/** Initial assignment of the line scenario, listing true fluents only. */
function lineAssignment(): Map<string, boolean> {
    return new Map([
        '(robot-at r1 d1)', '(robot-at r2 d2)',
        '(pile-top p1 c1)', '(pile-top p2 c2)', '(pile-top p3 c3)',
        '(on c1 p1)', '(on c2 p2)', '(on c3 p3)',
        '(in-pile c1 p1)', '(in-pile c2 p2)', '(in-pile c3 p3)',
        '(robot-top r1 slot0)', '(robot-top r2 slot0)',
        '(load r1 load0)', '(load r2 load0)',
    ].map(fluent => [fluent, true]));
}

describe('ProblemAssembler', () => {

    const registry = createLineRegistry();
    const assembler = new ProblemAssembler(registry);

    describe('#assemble', () => {
        it('records the source of every initial value', () => {
            // WHEN
            const problem = assembler.assemble('line', lineAssignment(), [Goal.containerInPile('c1', 'p3')]);

            // THEN
            expect(problem.initialValues.get('robot-at r1 d1')).to.deep.equal({ value: true, source: 'assigned' });
            expect(problem.initialValues.get('robot-at r1 d2')).to.deep.equal({ value: false, source: 'default' });
            expect(problem.initialValues.get('adjacent d1 d2')).to.deep.equal({ value: true, source: 'static' });
            expect(problem.initialValues.get('adjacent d1 d3')).to.deep.equal({ value: false, source: 'static' });
            expect(problem.initialValues.size).to.equal(assembler.vocabulary.size);
        });

        it('accepts an assignment consistent with the static facts', () => {
            const assignment = lineAssignment();
            assignment.set('adjacent d1 d2', true);
            assignment.set('adjacent d1 d3', false);

            const problem = assembler.assemble('line', assignment, []);

            expect(problem.initialValues.get('adjacent d1 d2')?.source).to.equal('static');
        });

        it('rejects two tops of one pile before planning', () => {
            // GIVEN
            const assignment = lineAssignment();
            assignment.set('pile-top p1 p1', true);

            // WHEN
            const error = errorOf(() => assembler.assemble('line', assignment, []));

            // THEN
            expect(error.violations).to.include('Pile p1 must have exactly one top, found c1, p1.');
        });

        it('validates deterministically', () => {
            const assignment = lineAssignment();
            assignment.set('pile-top p1 p1', true);

            const first = errorOf(() => assembler.assemble('line', assignment, []));
            const second = errorOf(() => assembler.assemble('line', assignment, []));

            expect(second.message).to.equal(first.message);
            expect(second.violations).to.deep.equal(first.violations);
        });

        it('rejects unknown fluents and contradictions of static facts', () => {
            // GIVEN
            const assignment = lineAssignment();
            assignment.set('robot-at r9 d1', true);
            assignment.set('adjacent d1 d3', true);

            // WHEN
            const error = errorOf(() => assembler.assemble('line', assignment, []));

            // THEN
            expect(error.violations).to.deep.equal([
                "Unknown fluent 'robot-at r9 d1'.",
                "Fluent 'adjacent d1 d3' contradicts the static fact derived from the registry.",
            ]);
        });

        it('rejects a fluent assigned both ways', () => {
            const assignment = lineAssignment();
            assignment.set('ROBOT-AT r1 d1', false);

            const error = errorOf(() => assembler.assemble('line', assignment, []));

            expect(error.violations).to.deep.equal(["Fluent 'ROBOT-AT r1 d1' is assigned both true and false."]);
        });

        it('rejects a goal on unknown fluents', () => {
            const error = errorOf(() => assembler.assemble('line', lineAssignment(), [Goal.containerInPile('c9', 'p1')]));

            expect(error.violations).to.deep.equal(['Goal refers to unknown fluent (in-pile c9 p1).']);
        });

        it('rejects a contradictory goal', () => {
            const goal = [Goal.robotAt('r1', 'd3'), Goal.not(Goal.robotAt('r1', 'd3'))];

            const error = errorOf(() => assembler.assemble('line', lineAssignment(), goal));

            expect(error.violations).to.deep.equal(['Goal requires (robot-at r1 d3) to be both true and false.']);
        });
    });

    describe('#assembleFromPlacement', () => {
        it('produces the same initial state as the raw assignment', () => {
            const fromPlacement = assembler.assembleFromPlacement('line', createLinePlacement(), []);
            const fromAssignment = assembler.assemble('line', lineAssignment(), []);

            expect([...fromPlacement.getInitialState()]).to.deep.equal([...fromAssignment.getInitialState()]);
            expect(fromPlacement.initialValues.get('robot-at r1 d2')?.source).to.equal('assigned');
        });

        it('rejects a container in two places', () => {
            const placement = createLinePlacement();
            placement.robots.r1.cargo = ['c1'];

            const error = errorOf(() => assembler.assembleFromPlacement('line', placement, []));

            expect(error.violations).to.deep.equal(['Container c1 is in several places: robot r1, pile p1.']);
        });

        it('rejects two robots at a dock in single occupancy mode', () => {
            const single = new ProblemAssembler(registry, { occupancy: 'single' });
            const placement = createLinePlacement();
            placement.robots.r2.at = 'd1';

            const error = errorOf(() => single.assembleFromPlacement('line', placement, []));

            expect(error.violations).to.deep.equal(['Dock d1 hosts several robots: r1, r2.']);
        });
    });

    describe('PlanningProblem', () => {
        const problem = assembler.assembleFromPlacement('line', createLinePlacement(), [Goal.containerAtDock(registry, 'c1', 'd3')]);

        it('is not solved initially', () => {
            expect(problem.isGoalSatisfied(problem.getInitialState())).to.equal(false);
            expect(problem.goal.map(literal => literal.toPddl())).to.deep.equal(['(in-pile c1 p3)']);
        });

        it('finds actions ignoring case and spacing', () => {
            expect(problem.getAction('  MOVE r1   d1 d2 ')?.id).to.equal('move r1 d1 d2');
            expect(problem.getAction('move r1 d1 d3')).to.equal(undefined);
        });

        it('decodes its initial placement', () => {
            expect(problem.getInitialPlacement()).to.deep.equal({
                robots: { r1: { at: 'd1', cargo: [] }, r2: { at: 'd2', cargo: [] } },
                piles: { p1: ['c1'], p2: ['c2'], p3: ['c3'] },
            });
        });
    });
});

describe('Goal', () => {

    it('builds literals', () => {
        expect(Goal.robotAt('r1', 'd2').toPddl()).to.equal('(robot-at r1 d2)');
        expect(Goal.containerOn('c1', 'c2').toPddl()).to.equal('(on c1 c2)');
        expect(Goal.containerOnTop('c1', 'p1').toPddl()).to.equal('(pile-top p1 c1)');
        expect(Goal.pileEmpty('p2').toPddl()).to.equal('(pile-top p2 p2)');
        expect(Goal.not(Goal.pileEmpty('p2')).toPddl()).to.equal('(not (pile-top p2 p2))');
    });

    it('evaluates literals in a state', () => {
        const state = new Set(['robot-at r1 d2']);
        expect(Goal.robotAt('r1', 'd2').holdsIn(state)).to.equal(true);
        expect(Goal.not(Goal.robotAt('r1', 'd2')).holdsIn(state)).to.equal(false);
        expect(new Literal(atom('robot-at', 'R1', 'D2')).holdsIn(state)).to.equal(true);
    });

    describe('#containerAtDock', () => {
        const registry = Registry.create({
            topology: Topology.linear(3),
            robots: [],
            piles: [{ id: 'p1', dock: 'd1' }, { id: 'p2', dock: 'd1' }, { id: 'p3', dock: 'd3' }],
            containers: [{ id: 'c1', weight: 2 }],
        });

        it('resolves the single pile of the dock', () => {
            expect(Goal.containerAtDock(registry, 'c1', 'd3').toPddl()).to.equal('(in-pile c1 p3)');
        });

        it('rejects a dock with several piles', () => {
            expect(() => Goal.containerAtDock(registry, 'c1', 'd1')).to.throw(ConfigurationError, 'it has 2');
        });

        it('rejects a dock without piles', () => {
            expect(() => Goal.containerAtDock(registry, 'c1', 'd2')).to.throw(ConfigurationError, 'it has 0');
        });
    });
});
