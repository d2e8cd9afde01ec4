/* --------------------------------------------------------------------------------------------
 * Copyright (c) Jan Dolejsi. All rights reserved.
 * Licensed under the MIT License. See License.txt in the project root for license information.
 * ------------------------------------------------------------------------------------------ */
'use strict';

import * as fs from 'fs';
import { z } from 'zod';

import { Literal } from './Fluent';
import { Goal } from './Goal';
import { PlanningProblem } from './PlanningProblem';
import { ProblemAssembler } from './ProblemAssembler';
import { Registry } from './Registry';
import { Topology, TopologyDefinition } from './Topology';
import { parseJsonc, toViolations } from './configuration';
import { ConfigurationError } from './errors';

const dockCount = z.number().int().min(1);

const TopologySchema = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('linear'), docks: dockCount }),
    z.object({ kind: z.literal('ring'), docks: dockCount }),
    z.object({ kind: z.literal('star'), docks: dockCount }),
    z.object({ kind: z.literal('complete'), docks: dockCount }),
    z.object({ kind: z.literal('grid'), rows: dockCount, columns: dockCount }),
    z.object({
        kind: z.literal('custom'),
        docks: z.array(z.string()),
        edges: z.array(z.tuple([z.string(), z.string()])),
        directed: z.boolean().default(false),
    }),
]);

const negated = z.boolean().default(false);

const GoalSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('robotAt'), robot: z.string(), dock: z.string(), negated }),
    z.object({ type: z.literal('containerInPile'), container: z.string(), pile: z.string(), negated }),
    z.object({ type: z.literal('containerOn'), container: z.string(), surface: z.string(), negated }),
    z.object({ type: z.literal('containerOnTop'), container: z.string(), pile: z.string(), negated }),
    z.object({ type: z.literal('pileEmpty'), pile: z.string(), negated }),
    z.object({ type: z.literal('containerAtDock'), container: z.string(), dock: z.string(), negated }),
]);

export const ScenarioSchema = z.object({
    name: z.string().regex(/^[a-zA-Z][a-zA-Z0-9_-]*$/, 'Scenario name must be a valid PDDL name.'),
    description: z.string().optional(),
    occupancy: z.enum(['single', 'shared']).default('shared'),
    topology: TopologySchema,
    robots: z.array(z.object({ id: z.string(), slotCapacity: z.number().int(), weightThreshold: z.number().int() })),
    piles: z.array(z.object({ id: z.string(), dock: z.string() })),
    containers: z.array(z.object({ id: z.string(), weight: z.number().int() })),
    placement: z.object({
        robots: z.record(z.object({ at: z.string(), cargo: z.array(z.string()).default([]) })),
        piles: z.record(z.array(z.string())).default({}),
    }),
    goal: z.array(GoalSchema).default([]),
});

export type Scenario = z.infer<typeof ScenarioSchema>;
export type TopologySpecification = z.infer<typeof TopologySchema>;
export type GoalSpecification = z.infer<typeof GoalSchema>;

export function toTopologyDefinition(topology: TopologySpecification): TopologyDefinition {
    switch (topology.kind) {
        case 'linear': return Topology.linear(topology.docks);
        case 'ring': return Topology.ring(topology.docks);
        case 'star': return Topology.star(topology.docks);
        case 'complete': return Topology.complete(topology.docks);
        case 'grid': return Topology.grid(topology.rows, topology.columns);
        case 'custom': return { docks: topology.docks, edges: topology.edges, directed: topology.directed };
    }
}

function toPositiveLiteral(registry: Registry, goal: GoalSpecification): Literal {
    switch (goal.type) {
        case 'robotAt': return Goal.robotAt(goal.robot, goal.dock);
        case 'containerInPile': return Goal.containerInPile(goal.container, goal.pile);
        case 'containerOn': return Goal.containerOn(goal.container, goal.surface);
        case 'containerOnTop': return Goal.containerOnTop(goal.container, goal.pile);
        case 'pileEmpty': return Goal.pileEmpty(goal.pile);
        case 'containerAtDock': return Goal.containerAtDock(registry, goal.container, goal.dock);
    }
}

export function toGoalLiteral(registry: Registry, goal: GoalSpecification): Literal {
    const literal = toPositiveLiteral(registry, goal);
    return goal.negated ? Goal.not(literal) : literal;
}

/**
 * Validates a scenario document.
 * @param input parsed JSON
 * @param source file name for error messages
 */
export function createScenario(input: unknown, source = 'scenario'): Scenario {
    const parsed = ScenarioSchema.safeParse(input);
    if (!parsed.success) {
        throw new ConfigurationError(`Invalid ${source}.`, toViolations(parsed.error));
    }
    return parsed.data;
}

export function parseScenario(text: string, source = 'scenario'): Scenario {
    return createScenario(parseJsonc(text, source), source);
}

export async function loadScenario(path: string): Promise<Scenario> {
    const text = await fs.promises.readFile(path, { encoding: 'utf8' });
    return parseScenario(text, path);
}

/**
 * Builds the registry and assembles the planning problem the scenario describes.
 * @throws ConfigurationError or EncodingError when the scenario is not consistent
 */
export function assembleScenario(scenario: Scenario): PlanningProblem {
    const registry = Registry.create({
        topology: toTopologyDefinition(scenario.topology),
        robots: scenario.robots,
        piles: scenario.piles,
        containers: scenario.containers,
    });
    const assembler = new ProblemAssembler(registry, { occupancy: scenario.occupancy });
    const goal = scenario.goal.map(g => toGoalLiteral(registry, g));
    return assembler.assembleFromPlacement(scenario.name, scenario.placement, goal);
}
