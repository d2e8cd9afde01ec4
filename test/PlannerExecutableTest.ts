/* --------------------------------------------------------------------------------------------
 * Copyright (c) Jan Dolejsi. All rights reserved.
 * Licensed under the MIT License. See License.txt in the project root for license information.
 * ------------------------------------------------------------------------------------------ */
'use strict';

import * as assert from 'assert';
import * as fs from 'fs';
import { CommandOptions, CommandResult, CommandRunner } from '../src/CommandRunner';
import { Goal } from '../src/Goal';
import { PlannerExecutable, quote } from '../src/PlannerExecutable';
import { PlannerResponseHandler } from '../src/Planner';
import { PlanningProblem } from '../src/PlanningProblem';
import { PlanningOutcome } from '../src/PlanningResult';
import { ProblemAssembler } from '../src/ProblemAssembler';
import { PlannerConfigurationInput, createPlannerConfiguration } from '../src/configuration';
import { PlannerFailure } from '../src/errors';
import { createLinePlacement, createLineRegistry, LINE_PLAN } from './fixtures';

type Behaviour = (command: string, options: CommandOptions) => Promise<CommandResult>;

/** Stands in for the planner process. */
class FakeRunner implements CommandRunner {
    readonly commands: string[] = [];
    stopped = false;

    constructor(private readonly behaviour: Behaviour) { }

    run(command: string, options: CommandOptions): Promise<CommandResult> {
        this.commands.push(command);
        return this.behaviour(command, options);
    }

    stop(): void {
        this.stopped = true;
    }
}

class CollectingResponseHandler implements PlannerResponseHandler {
    readonly outputs: string[] = [];

    handleOutput(outputText: string): void {
        this.outputs.push(outputText);
    }
}

function exited(exitCode: number | null, stdout = '', signal: string | null = null): Behaviour {
    return async (_command, options) => {
        if (stdout) { options.onStdout(stdout); }
        return { exitCode, signal, timedOut: false };
    };
}

function createProblem(goal = [Goal.containerInPile('c1', 'p3')]): PlanningProblem {
    return new ProblemAssembler(createLineRegistry()).assembleFromPlacement('line', createLinePlacement(), goal);
}

function createPlanner(behaviour: Behaviour, configuration: Partial<PlannerConfigurationInput> = {}): { planner: PlannerExecutable; runner: FakeRunner } {
    const runner = new FakeRunner(behaviour);
    const planner = new PlannerExecutable(createPlannerConfiguration({ path: 'planner', ...configuration }), runner);
    return { planner, runner };
}

const LINE_PLAN_OUTPUT = LINE_PLAN.map(id => `(${id})`).join('\n') + '\n; cost = 4 (unit cost)\n';

describe('PlannerExecutable', () => {

    describe('#createCommand()', () => {

        it('fills in the default syntax', () => {
            // GIVEN
            const { planner } = createPlanner(exited(0), { options: '--search astar' });

            // WHEN
            const command = planner.createCommand('domain.pddl', 'problem.pddl');

            // THEN
            assert.strictEqual(command, 'planner --search astar domain.pddl problem.pddl');
            assert.strictEqual(planner.writesPlanToFile(), false);
        });

        it('quotes paths with spaces', () => {
            const { planner } = createPlanner(exited(0), { path: 'my planner', syntax: '$(planner) $(domain) $(problem) --out $(plan)' });

            const command = planner.createCommand('a b/domain.pddl', 'problem.pddl', 'plan.pddl');

            assert.strictEqual(command, '"my planner" "a b/domain.pddl" problem.pddl --out plan.pddl');
            assert.strictEqual(planner.writesPlanToFile(), true);
        });

        it('keeps replacement patterns in options literal', () => {
            // GIVEN
            const { planner } = createPlanner(exited(0), { options: "--x $& --y $' --z $`" });

            // WHEN
            const command = planner.createCommand('domain.pddl', 'problem.pddl');

            // THEN
            assert.strictEqual(command, "planner --x $& --y $' --z $` domain.pddl problem.pddl");
        });
    });

    describe('quote()', () => {
        it('quotes whitespace on every platform', () => {
            assert.strictEqual(quote('/tmp/my dir/domain.pddl'), '"/tmp/my dir/domain.pddl"');
            assert.strictEqual(quote('tab\there'), '"tab\there"');
        });

        it('leaves plain and quoted paths alone', () => {
            assert.strictEqual(quote('/tmp/domain.pddl'), '/tmp/domain.pddl');
            assert.strictEqual(quote('"my planner"'), '"my planner"');
        });
    });

    describe('#plan()', () => {

        it('returns the validated actions parsed from the output', async () => {
            // GIVEN
            const { planner, runner } = createPlanner(exited(0, LINE_PLAN_OUTPUT));
            const handler = new CollectingResponseHandler();

            // WHEN
            const result = await planner.plan(createProblem(), handler);

            // THEN
            assert.strictEqual(result.error, undefined);
            assert.strictEqual(result.outcome, PlanningOutcome.SUCCESS);
            assert.ok(result.isSuccess());
            assert.deepStrictEqual(result.getPlanOrThrow().map(action => action.id), LINE_PLAN);
            assert.strictEqual(result.plan?.steps.length, LINE_PLAN.length);
            assert.strictEqual(runner.commands.length, 1);
            assert.strictEqual(handler.outputs[0], runner.commands[0] + '\n');
            assert.strictEqual(handler.outputs[1], LINE_PLAN_OUTPUT);
        });

        it('orders timed plan steps by their start time', async () => {
            // GIVEN steps printed with start times
            const timed = LINE_PLAN.map((id, index) => `${index}: (${id})`).join('\n') + '\n';
            const { planner } = createPlanner(exited(0, timed));

            // WHEN
            const result = await planner.plan(createProblem(), new CollectingResponseHandler());

            // THEN
            assert.deepStrictEqual(result.getPlanOrThrow().map(action => action.id), LINE_PLAN);
        });

        it('passes the domain and problem files to the planner', async () => {
            // GIVEN
            let domainText = '';
            let problemText = '';
            const { planner } = createPlanner(async (command, options) => {
                const [, domainPath, problemPath] = command.split(/\s+/);
                domainText = await fs.promises.readFile(domainPath, { encoding: 'utf8' });
                problemText = await fs.promises.readFile(problemPath, { encoding: 'utf8' });
                options.onStdout(LINE_PLAN_OUTPUT);
                return { exitCode: 0, signal: null, timedOut: false };
            });

            // WHEN
            const result = await planner.plan(createProblem(), new CollectingResponseHandler());

            // THEN
            assert.ok(result.isSuccess());
            assert.ok(domainText.startsWith('(define (domain dock-relocation)\n'));
            assert.ok(problemText.startsWith('(define (problem line)\n'));
        });

        it('reads the plan from the plan file', async () => {
            // GIVEN
            const { planner } = createPlanner(async command => {
                const planPath = command.split(' ')[2];
                await fs.promises.writeFile(planPath, LINE_PLAN_OUTPUT, { encoding: 'utf8' });
                return { exitCode: 0, signal: null, timedOut: false };
            }, { syntax: '$(planner) --plan-file $(plan) $(domain) $(problem)' });

            // WHEN
            const result = await planner.plan(createProblem(), new CollectingResponseHandler());

            // THEN
            assert.strictEqual(result.outcome, PlanningOutcome.SUCCESS);
            assert.strictEqual(result.actions.length, 4);
        });

        it('accepts an empty plan when the goal holds initially', async () => {
            const { planner } = createPlanner(exited(0, 'Goal already satisfied.\n'));

            const result = await planner.plan(createProblem([Goal.containerInPile('c1', 'p1')]), new CollectingResponseHandler());

            assert.strictEqual(result.outcome, PlanningOutcome.SUCCESS);
            assert.deepStrictEqual(result.actions, []);
            assert.strictEqual(result.plan?.steps.length, 0);
        });

        it('reports unsolvable problem by the output pattern', async () => {
            // GIVEN
            const { planner } = createPlanner(exited(12, 'Search stopped without finding a solution.\n'));

            // WHEN
            const result = await planner.plan(createProblem(), new CollectingResponseHandler());

            // THEN
            assert.strictEqual(result.outcome, PlanningOutcome.UNSOLVABLE);
            assert.strictEqual(result.error?.kind, 'unsolvable');
            assert.strictEqual(result.error?.message, 'Planner reported that the problem has no solution.');
            assert.strictEqual(result.error?.output, 'Search stopped without finding a solution.\n');
        });

        it('reports unsolvable problem by the exit code', async () => {
            const { planner } = createPlanner(exited(11), { unsolvableExitCodes: [11] });

            const result = await planner.plan(createProblem(), new CollectingResponseHandler());

            assert.strictEqual(result.outcome, PlanningOutcome.UNSOLVABLE);
        });

        it('reports timeout', async () => {
            // GIVEN
            const { planner } = createPlanner(async () => ({ exitCode: null, signal: 'SIGKILL', timedOut: true }), { timeoutMs: 500 });

            // WHEN
            const result = await planner.plan(createProblem(), new CollectingResponseHandler());

            // THEN
            assert.strictEqual(result.outcome, PlanningOutcome.TIMEOUT);
            assert.strictEqual(result.error?.kind, 'timeout');
            assert.strictEqual(result.error?.message, 'Planner exceeded the time budget of 500ms.');
        });

        it('reports the planner that cannot be started', async () => {
            const { planner } = createPlanner(() => Promise.reject(new Error('spawn planner ENOENT')));

            const result = await planner.plan(createProblem(), new CollectingResponseHandler());

            assert.strictEqual(result.outcome, PlanningOutcome.ERROR);
            assert.strictEqual(result.error?.message, 'Planner could not be started: spawn planner ENOENT');
        });

        it('reports non-zero exit code', async () => {
            const { planner } = createPlanner(exited(1, 'Segmentation fault\n'));

            const result = await planner.plan(createProblem(), new CollectingResponseHandler());

            assert.strictEqual(result.outcome, PlanningOutcome.ERROR);
            assert.strictEqual(result.error?.kind, 'adapter-error');
            assert.strictEqual(result.error?.message, 'Planner exited with code 1.');
        });

        it('reports output without a plan', async () => {
            const { planner } = createPlanner(exited(0, 'Done.\n'));

            const result = await planner.plan(createProblem(), new CollectingResponseHandler());

            assert.strictEqual(result.outcome, PlanningOutcome.ERROR);
            assert.strictEqual(result.error?.message, 'Planner output contains no plan.');
        });

        it('rejects a plan that does not reach the goal', async () => {
            const { planner } = createPlanner(exited(0, '(move r1 d1 d2)\n'));

            const result = await planner.plan(createProblem(), new CollectingResponseHandler());

            assert.strictEqual(result.outcome, PlanningOutcome.ERROR);
            assert.strictEqual(result.error?.message, 'Planner returned an invalid plan. Goal not satisfied: (in-pile c1 p3).');
            assert.throws(() => result.getPlanOrThrow(), PlannerFailure);
        });

        it('rejects a plan with an unknown action', async () => {
            const { planner } = createPlanner(exited(0, '(fly r1 d1 d3)\n'));

            const result = await planner.plan(createProblem(), new CollectingResponseHandler());

            assert.strictEqual(result.error?.message, 'Planner returned an invalid plan. Step 1 (fly r1 d1 d3): unknown action.');
        });

        it('reports the stopped planner', async () => {
            // GIVEN
            let planner: PlannerExecutable | undefined;
            const created = createPlanner(async () => {
                planner?.stop();
                return { exitCode: null, signal: 'SIGKILL', timedOut: false };
            });
            planner = created.planner;

            // WHEN
            const result = await planner.plan(createProblem(), new CollectingResponseHandler());

            // THEN
            assert.strictEqual(created.runner.stopped, true);
            assert.strictEqual(result.outcome, PlanningOutcome.ERROR);
            assert.strictEqual(result.error?.message, 'Planner was stopped.');
        });
    });
});
