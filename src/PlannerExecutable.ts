/* --------------------------------------------------------------------------------------------
 * Copyright (c) Jan Dolejsi. All rights reserved.
 * Licensed under the MIT License. See License.txt in the project root for license information.
 * ------------------------------------------------------------------------------------------ */
'use strict';

import * as fs from 'fs';
import {
    DomainInfo, parser, PddlLanguage, PddlWorkspace, Plan, PlanStep, ProblemInfo, SimpleDocumentPositionResolver
} from 'pddl-workspace';
import { URI } from 'vscode-uri';

import { ChildProcessRunner, CommandResult, CommandRunner } from './CommandRunner';
import { PddlWriter } from './PddlWriter';
import { ConsoleResponseHandler, Planner, PlannerResponseHandler } from './Planner';
import { PlanningProblem } from './PlanningProblem';
import { PlanningResult } from './PlanningResult';
import { TempFile, file, toPddlFile } from './asynctmp';
import { PlannerConfiguration } from './configuration';
import { PlannerFailure } from './errors';

/** Plan step times are only used for ordering; the domain has no durative actions. */
const EPSILON = 1e-3;

/**
 * Wraps a path containing whitespace in double quotes, unless it is quoted already.
 */
export function quote(path: string): string {
    return /\s/.test(path) && !path.includes('"') ? `"${path}"` : path;
}

/** Action ids of the plan steps in the order of their start times. */
export function toActionIds(plan: Plan): string[] {
    return [...plan.steps]
        .sort((a: PlanStep, b: PlanStep) => a.getStartTime() - b.getStartTime())
        .map(step => [step.getActionName(), ...step.getObjects()].join(' '));
}

/** Planner implemented as an executable process. */
export class PlannerExecutable extends Planner {

    static readonly DEFAULT_SYNTAX = "$(planner) $(options) $(domain) $(problem)";
    private readonly unsolvablePattern: RegExp;

    constructor(private readonly configuration: PlannerConfiguration,
        private readonly runner: CommandRunner = new ChildProcessRunner()) {
        super();
        this.unsolvablePattern = new RegExp(configuration.unsolvablePattern, 'i');
    }

    /**
     * Builds the planner command line.
     * @param domainPath domain file
     * @param problemPath problem file
     * @param planPath file the planner writes the plan to, if the syntax has the `$(plan)` placeholder
     */
    createCommand(domainPath: string, problemPath: string, planPath?: string): string {
        // replacer functions keep `$&` and similar sequences in the values literal
        let command = (this.configuration.syntax || PlannerExecutable.DEFAULT_SYNTAX)
            .replace('$(planner)', () => quote(this.configuration.path))
            .replace('$(options)', () => this.configuration.options)
            .replace('$(domain)', () => quote(domainPath))
            .replace('$(problem)', () => quote(problemPath));
        if (planPath !== undefined) {
            command = command.replace('$(plan)', () => quote(planPath));
        }
        return command;
    }

    writesPlanToFile(): boolean {
        return this.configuration.syntax.includes('$(plan)');
    }

    async plan(problem: PlanningProblem, callbacks: PlannerResponseHandler = new ConsoleResponseHandler()): Promise<PlanningResult> {
        this.planningProcessKilled = false;
        const startTime = Date.now();
        const elapsed = () => Date.now() - startTime;

        const writer = new PddlWriter(problem);
        const tempFiles: TempFile[] = [];
        try {
            const domainText = writer.writeDomain();
            const domainFile = await toPddlFile(domainText, 'domain');
            tempFiles.push(domainFile);
            const problemText = writer.writeProblem();
            const problemFile = await toPddlFile(problemText, 'problem');
            tempFiles.push(problemFile);

            const workspace = new PddlWorkspace({ epsilon: EPSILON });
            const domainInfo = await workspace.upsertFile(URI.file(domainFile.path), PddlLanguage.PDDL, 1, domainText, new SimpleDocumentPositionResolver(domainText));
            const problemInfo = await workspace.upsertFile(URI.file(problemFile.path), PddlLanguage.PDDL, 1, problemText, new SimpleDocumentPositionResolver(problemText));
            if (!(domainInfo instanceof DomainInfo) || !(problemInfo instanceof ProblemInfo)) {
                return PlanningResult.failure(PlannerFailure.adapterError('Written domain or problem could not be parsed.'), elapsed());
            }
            const planFile = this.writesPlanToFile() ? await file(0o644, 'plan', '.pddl') : undefined;
            if (planFile) { tempFiles.push(planFile); }

            const command = this.createCommand(domainFile.path, problemFile.path, planFile?.path);
            callbacks.handleOutput(command + '\n');

            const planParser = new parser.PddlPlannerOutputParser(domainInfo, problemInfo, { epsilon: EPSILON });
            let output = '';
            let result: CommandResult;
            try {
                result = await this.runner.run(command, {
                    workingDirectory: this.configuration.workingDirectory,
                    timeoutMs: this.configuration.timeoutMs,
                    onStdout: data => {
                        output += data;
                        callbacks.handleOutput(data);
                        planParser.appendBuffer(data);
                    },
                    onStderr: data => {
                        output += data;
                        callbacks.handleOutput("Error: " + data);
                    }
                });
            }
            catch (err) {
                const message = err instanceof Error ? err.message : String(err);
                return PlanningResult.failure(PlannerFailure.adapterError(`Planner could not be started: ${message}`, output), elapsed());
            }
            planParser.onPlanFinished();

            if (result.exitCode) { console.log("Exit code: " + result.exitCode); }
            if (result.signal) { console.log("Exit Signal: " + result.signal); }

            if (result.timedOut) {
                return PlanningResult.failure(PlannerFailure.timeout(this.configuration.timeoutMs, output), elapsed());
            }
            if (this.planningProcessKilled) {
                return PlanningResult.failure(PlannerFailure.adapterError('Planner was stopped.', output), elapsed());
            }
            if (this.isUnsolvable(result, output)) {
                return PlanningResult.failure(PlannerFailure.unsolvable('Planner reported that the problem has no solution.', output), elapsed());
            }
            if (result.exitCode !== 0) {
                return PlanningResult.failure(PlannerFailure.adapterError(
                    `Planner exited with ${result.exitCode !== null ? 'code ' + result.exitCode : 'signal ' + result.signal}.`, output), elapsed());
            }

            const plans = planFile ? await this.readPlans(planFile.path, domainInfo, problemInfo) : planParser.getPlans();
            return this.toResult(problem, plans, output, elapsed());
        }
        catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            return PlanningResult.failure(PlannerFailure.adapterError(`Planner invocation failed: ${message}`), elapsed());
        }
        finally {
            tempFiles.forEach(tempFile => tempFile.remove());
        }
    }

    private isUnsolvable(result: CommandResult, output: string): boolean {
        return (result.exitCode !== null && this.configuration.unsolvableExitCodes.includes(result.exitCode))
            || this.unsolvablePattern.test(output);
    }

    private async readPlans(planPath: string, domainInfo: DomainInfo, problemInfo: ProblemInfo): Promise<Plan[]> {
        const planParser = new parser.PddlPlannerOutputParser(domainInfo, problemInfo, { epsilon: EPSILON });
        planParser.appendBuffer(await fs.promises.readFile(planPath, { encoding: 'utf8' }));
        planParser.onPlanFinished();
        return planParser.getPlans();
    }

    /**
     * Validates the last (best) plan found.
     */
    private toResult(problem: PlanningProblem, plans: Plan[], output: string, elapsedTime: number): PlanningResult {
        // planners print no steps when the goal already holds initially
        const plan = plans.filter(candidate => candidate.steps.length > 0).pop() ?? (problem.isGoalSatisfied(problem.getInitialState()) ? new Plan([]) : undefined);
        if (!plan) {
            return PlanningResult.failure(PlannerFailure.adapterError('Planner output contains no plan.', output), elapsedTime);
        }
        const validation = this.validatePlan(problem, toActionIds(plan));
        if (!validation.valid) {
            return PlanningResult.failure(PlannerFailure.adapterError(`Planner returned an invalid plan. ${validation.error}`, output), elapsedTime);
        }
        return PlanningResult.success(validation.actions, plan, elapsedTime);
    }

    /**
     * Forces the planner to stop.
     */
    stop(): void {
        super.stop();
        this.runner.stop();
    }
}
