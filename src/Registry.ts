/* --------------------------------------------------------------------------------------------
 * Copyright (c) Jan Dolejsi. All rights reserved.
 * Licensed under the MIT License. See License.txt in the project root for license information.
 * ------------------------------------------------------------------------------------------ */
'use strict';

import { utils } from 'pddl-workspace';
import { TopologyDefinition } from './Topology';
import { ConfigurationError, EncodingError } from './errors';
import {
    isReservedName, isSlotCapacity, isWeightClass, isWeightThreshold,
    SLOT_CAPACITIES, SlotCapacity, WEIGHT_CLASSES, WEIGHT_THRESHOLDS, WeightClass, WeightThreshold
} from './enumerations';

export interface RobotDefinition {
    id: string;
    slotCapacity: number;
    weightThreshold: number;
}

export interface PileDefinition {
    id: string;
    dock: string;
}

export interface ContainerDefinition {
    id: string;
    weight: number;
}

export interface RegistryDefinition {
    topology: TopologyDefinition;
    robots: RobotDefinition[];
    piles: PileDefinition[];
    containers: ContainerDefinition[];
}

export interface Robot {
    readonly id: string;
    readonly slotCapacity: SlotCapacity;
    readonly weightThreshold: WeightThreshold;
}

export interface Pile {
    readonly id: string;
    readonly dock: string;
}

export interface Container {
    readonly id: string;
    readonly weight: WeightClass;
}

export type EntityKind = 'robot' | 'dock' | 'pile' | 'container';

const VALID_NAME = /^[a-zA-Z][a-zA-Z0-9_-]*$/;

/**
 * Immutable set of entities and their static attributes for one problem instance.
 * Create it with `Registry.create()`, which validates the definition.
 */
export class Registry {

    private readonly kinds = new Map<string, EntityKind>();
    private readonly robotMap: ReadonlyMap<string, Robot>;
    private readonly pileMap: ReadonlyMap<string, Pile>;
    private readonly containerMap: ReadonlyMap<string, Container>;

    private constructor(
        public readonly robots: readonly Robot[],
        public readonly docks: readonly string[],
        public readonly piles: readonly Pile[],
        public readonly containers: readonly Container[],
        private readonly adjacency: utils.DirectionalGraph) {
        robots.forEach(r => this.kinds.set(r.id, 'robot'));
        docks.forEach(d => this.kinds.set(d, 'dock'));
        piles.forEach(p => this.kinds.set(p.id, 'pile'));
        containers.forEach(c => this.kinds.set(c.id, 'container'));
        this.robotMap = new Map(robots.map(r => [r.id, r]));
        this.pileMap = new Map(piles.map(p => [p.id, p]));
        this.containerMap = new Map(containers.map(c => [c.id, c]));
    }

    /**
     * Validates the definition and creates the registry.
     * @param definition topology and entities
     * @throws ConfigurationError for malformed topology, missing attributes, duplicate or invalid ids
     * @throws EncodingError for attributes outside the supported enumerations
     */
    static create(definition: RegistryDefinition): Registry {
        const violations: string[] = [];
        const seen = new Set<string>();

        const checkId = (id: unknown, kind: EntityKind): id is string => {
            if (typeof id !== 'string' || id.length === 0) {
                violations.push(`A ${kind} has no id.`);
                return false;
            }
            if (!VALID_NAME.test(id)) {
                violations.push(`Invalid ${kind} id '${id}'.`);
                return false;
            }
            if (isReservedName(id)) {
                violations.push(`The ${kind} id '${id}' is reserved by the encoding.`);
                return false;
            }
            if (seen.has(id.toLowerCase())) {
                violations.push(`Duplicate id '${id}'.`);
                return false;
            }
            seen.add(id.toLowerCase());
            return true;
        };

        const topology = definition.topology;
        const docks = topology.docks.filter(dock => checkId(dock, 'dock'));
        const adjacency = new utils.DirectionalGraph();

        topology.edges.forEach(([from, to]) => {
            if (!docks.includes(from) || !docks.includes(to)) {
                violations.push(`Adjacency ${from} -> ${to} refers to an unknown dock.`);
            }
            else if (from === to) {
                violations.push(`Dock ${from} cannot be adjacent to itself.`);
            }
            else {
                adjacency.addEdge(from, to);
                if (!topology.directed) { adjacency.addEdge(to, from); }
            }
        });

        const robots: Robot[] = [];
        definition.robots.forEach(robot => {
            if (!checkId(robot.id, 'robot')) { return; }
            if (robot.slotCapacity === undefined || robot.weightThreshold === undefined) {
                violations.push(`Robot ${robot.id} is missing its slot capacity or weight threshold.`);
                return;
            }
            if (!isSlotCapacity(robot.slotCapacity)) {
                throw new EncodingError(`Robot ${robot.id} has slot capacity ${robot.slotCapacity}, supported: ${SLOT_CAPACITIES.join(', ')}.`);
            }
            if (!isWeightThreshold(robot.weightThreshold)) {
                throw new EncodingError(`Robot ${robot.id} has weight threshold ${robot.weightThreshold}, supported: ${WEIGHT_THRESHOLDS.join(', ')}.`);
            }
            robots.push(Object.freeze({ id: robot.id, slotCapacity: robot.slotCapacity, weightThreshold: robot.weightThreshold }));
        });

        const piles: Pile[] = [];
        definition.piles.forEach(pile => {
            if (!checkId(pile.id, 'pile')) { return; }
            if (pile.dock === undefined) {
                violations.push(`Pile ${pile.id} is not located at any dock.`);
            }
            else if (!docks.includes(pile.dock)) {
                violations.push(`Pile ${pile.id} is located at unknown dock ${pile.dock}.`);
            }
            else {
                piles.push(Object.freeze({ id: pile.id, dock: pile.dock }));
            }
        });

        const containers: Container[] = [];
        definition.containers.forEach(container => {
            if (!checkId(container.id, 'container')) { return; }
            if (container.weight === undefined) {
                violations.push(`Container ${container.id} has no weight class.`);
                return;
            }
            if (!isWeightClass(container.weight)) {
                throw new EncodingError(`Container ${container.id} has weight ${container.weight}, supported weight classes: ${WEIGHT_CLASSES.join(', ')}.`);
            }
            containers.push(Object.freeze({ id: container.id, weight: container.weight }));
        });

        if (violations.length) {
            throw new ConfigurationError('Invalid registry definition.', violations);
        }

        return new Registry(Object.freeze(robots), Object.freeze([...docks]), Object.freeze(piles), Object.freeze(containers), adjacency);
    }

    getKind(id: string): EntityKind | undefined {
        return this.kinds.get(id);
    }

    findRobot(id: string): Robot | undefined {
        return this.robotMap.get(id);
    }

    getRobot(id: string): Robot {
        const robot = this.robotMap.get(id);
        if (!robot) { throw new ConfigurationError(`Unknown robot '${id}'.`); }
        return robot;
    }

    findPile(id: string): Pile | undefined {
        return this.pileMap.get(id);
    }

    getPile(id: string): Pile {
        const pile = this.pileMap.get(id);
        if (!pile) { throw new ConfigurationError(`Unknown pile '${id}'.`); }
        return pile;
    }

    findContainer(id: string): Container | undefined {
        return this.containerMap.get(id);
    }

    getContainer(id: string): Container {
        const container = this.containerMap.get(id);
        if (!container) { throw new ConfigurationError(`Unknown container '${id}'.`); }
        return container;
    }

    isDock(id: string): boolean {
        return this.kinds.get(id) === 'dock';
    }

    isAdjacent(from: string, to: string): boolean {
        return this.getNeighbours(from).includes(to);
    }

    getNeighbours(dock: string): string[] {
        // docks without any adjacency are not vertices of the graph
        if (!this.adjacency.getVertices().includes(dock)) { return []; }
        return [...(this.adjacency.getVerticesWithEdgesFrom(dock) ?? [])];
    }

    /** Docks reachable from `dock` by a sequence of moves, in breadth-first order. */
    getReachableDocks(dock: string): string[] {
        const visited = [dock];
        for (let index = 0; index < visited.length; index++) {
            this.getNeighbours(visited[index])
                .filter(neighbour => !visited.includes(neighbour))
                .forEach(neighbour => visited.push(neighbour));
        }
        return visited.slice(1);
    }

    getAdjacencyEdges(): [string, string][] {
        return this.docks.flatMap(from => this.getNeighbours(from).map((to): [string, string] => [from, to]));
    }

    getPilesAt(dock: string): Pile[] {
        return this.piles.filter(pile => pile.dock === dock);
    }
}
