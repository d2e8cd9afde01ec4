/* --------------------------------------------------------------------------------------------
 * Copyright (c) Jan Dolejsi. All rights reserved.
 * Licensed under the MIT License. See License.txt in the project root for license information.
 * ------------------------------------------------------------------------------------------ */
'use strict';

import { atom, GroundAtom, State } from './Fluent';
import { FLUENTS, FluentVocabulary } from './FluentVocabulary';
import { Registry } from './Registry';
import { ConfigurationError, EncodingError } from './errors';
import {
    LOAD_LEVELS, loadObject, slotObject, thresholdObject, WEIGHT_CLASSES, WEIGHT_THRESHOLDS, weightObject
} from './enumerations';

export interface RobotPlacement {
    /** Dock the robot is at. */
    at: string;
    /** Held containers, bottom (slot 1) to top. */
    cargo?: string[];
}

/**
 * Structured (non-boolean) view of the dynamic state.
 */
export interface WorldPlacement {
    robots: Record<string, RobotPlacement>;
    /** Containers of each pile, bottom to top. Piles not listed are empty. */
    piles: Record<string, string[]>;
}

/** Admissible (threshold, current load, incoming weight) combination and the resulting load. */
export interface LoadStep {
    threshold: number;
    load: number;
    weight: number;
    next: number;
}

/** Entry of a placement record; members inherited from `Object.prototype` (e.g. `constructor`) are not entries. */
function ownEntry<T>(record: Record<string, T>, id: string): T | undefined {
    return Object.prototype.hasOwnProperty.call(record, id) ? record[id] : undefined;
}

/**
 * Maps the integer and ordered quantities of the world (weights, capacities, stack positions)
 * onto mutually exclusive boolean fluents, and back.
 */
export class ConstraintEncoder {

    private readonly registry: Registry;

    constructor(public readonly vocabulary: FluentVocabulary) {
        this.registry = vocabulary.registry;
    }

    /**
     * All combinations where a robot with the threshold, currently holding `load`,
     * may take a container of `weight`.
     */
    static admissibleSteps(): LoadStep[] {
        const steps: LoadStep[] = [];
        for (const threshold of WEIGHT_THRESHOLDS) {
            for (const load of LOAD_LEVELS.filter(level => level <= threshold)) {
                for (const weight of WEIGHT_CLASSES) {
                    const next = load + weight;
                    if (next <= threshold && LOAD_LEVELS.includes(next)) {
                        steps.push({ threshold, load, weight, next });
                    }
                }
            }
        }
        return steps;
    }

    /**
     * True static facts: topology, pile locations, weight classes, thresholds, slots and admissible load steps.
     */
    staticFacts(): GroundAtom[] {
        const facts: GroundAtom[] = [];
        this.registry.getAdjacencyEdges().forEach(([from, to]) => facts.push(atom(FLUENTS.adjacent, from, to)));
        this.registry.piles.forEach(pile => facts.push(atom(FLUENTS.pileAt, pile.id, pile.dock)));
        this.registry.containers.forEach(c => facts.push(atom(FLUENTS.weight, c.id, weightObject(c.weight))));
        this.registry.robots.forEach(r => {
            facts.push(atom(FLUENTS.capacity, r.id, thresholdObject(r.weightThreshold)));
            this.vocabulary.getSlotsOf(r.id).forEach(slot => facts.push(atom(FLUENTS.slotOf, r.id, slot)));
        });
        const slots = this.vocabulary.objectsOfType('slot');
        for (let index = 1; index < slots.length; index++) {
            facts.push(atom(FLUENTS.slotSucc, slotObject(index - 1), slotObject(index)));
        }
        ConstraintEncoder.admissibleSteps().forEach(step => facts.push(atom(FLUENTS.admits,
            thresholdObject(step.threshold), loadObject(step.load), weightObject(step.weight), loadObject(step.next))));

        const outside = facts.filter(fact => !this.vocabulary.has(fact));
        if (outside.length) {
            throw new EncodingError(`Static facts outside of the vocabulary: ${outside.join(' ')}`);
        }
        return facts;
    }

    /**
     * Explicit value of every dynamic fluent for the placement.
     * @param placement robot locations and cargo, pile stacks
     * @throws ConfigurationError if the placement refers to unknown entities or cannot be represented
     */
    encode(placement: WorldPlacement): Map<string, boolean> {
        const violations: string[] = [];
        const trueAtoms: GroundAtom[] = [];

        Object.keys(placement.robots).filter(id => !this.registry.findRobot(id))
            .forEach(id => violations.push(`Unknown robot '${id}'.`));
        Object.keys(placement.piles).filter(id => !this.registry.findPile(id))
            .forEach(id => violations.push(`Unknown pile '${id}'.`));

        for (const robot of this.registry.robots) {
            const robotPlacement = ownEntry(placement.robots, robot.id);
            if (!robotPlacement?.at) {
                violations.push(`Robot ${robot.id} has no location.`);
                continue;
            }
            if (!this.registry.isDock(robotPlacement.at)) {
                violations.push(`Robot ${robot.id} is at unknown dock '${robotPlacement.at}'.`);
                continue;
            }
            trueAtoms.push(atom(FLUENTS.robotAt, robot.id, robotPlacement.at));
            if (this.vocabulary.options.occupancy === 'single') {
                trueAtoms.push(atom(FLUENTS.occupied, robotPlacement.at));
            }

            const cargo = robotPlacement.cargo ?? [];
            const unknown = cargo.filter(c => !this.registry.findContainer(c));
            if (unknown.length) {
                violations.push(`Robot ${robot.id} holds unknown container(s) ${unknown.join(', ')}.`);
                continue;
            }
            if (cargo.length > robot.slotCapacity) {
                violations.push(`Robot ${robot.id} holds ${cargo.length} container(s) but has ${robot.slotCapacity} slot(s).`);
                continue;
            }
            const load = this.heldWeight(cargo);
            if (load > robot.weightThreshold) {
                violations.push(`Robot ${robot.id} holds ${load}t, above its threshold of ${robot.weightThreshold}t.`);
                continue;
            }
            cargo.forEach((container, index) => {
                trueAtoms.push(atom(FLUENTS.slotOccupied, robot.id, slotObject(index + 1)));
                trueAtoms.push(atom(FLUENTS.inSlot, container, robot.id, slotObject(index + 1)));
            });
            trueAtoms.push(atom(FLUENTS.robotTop, robot.id, slotObject(cargo.length)));
            trueAtoms.push(atom(FLUENTS.load, robot.id, loadObject(load)));
        }

        for (const pile of this.registry.piles) {
            const stack = ownEntry(placement.piles, pile.id) ?? [];
            const unknown = stack.filter(c => !this.registry.findContainer(c));
            if (unknown.length) {
                violations.push(`Pile ${pile.id} holds unknown container(s) ${unknown.join(', ')}.`);
                continue;
            }
            let below = pile.id;
            for (const container of stack) {
                trueAtoms.push(atom(FLUENTS.on, container, below));
                trueAtoms.push(atom(FLUENTS.inPile, container, pile.id));
                below = container;
            }
            trueAtoms.push(atom(FLUENTS.pileTop, pile.id, below));
        }

        trueAtoms.filter(a => !this.vocabulary.has(a))
            .forEach(a => violations.push(`Placement cannot be represented: ${a.toPddl()}.`));

        if (violations.length) {
            throw new ConfigurationError('Initial placement cannot be encoded.', violations);
        }

        const trueKeys = new Set(trueAtoms.map(a => a.key));
        return new Map(this.vocabulary.getDynamicFluents().map(fluent => [fluent.key, trueKeys.has(fluent.key)]));
    }

    /**
     * Reconstructs the placement from a boolean state and checks all invariants.
     * @param state true atoms
     * @throws ConfigurationError listing every violation found
     */
    decode(state: State): WorldPlacement {
        const violations: string[] = [];
        const holds = (predicate: string, ...objects: string[]) => state.has(atom(predicate, ...objects).key);
        const world: WorldPlacement = { robots: {}, piles: {} };
        const containers = this.registry.containers.map(c => c.id);
        const surfaces = this.vocabulary.objectsOfType('surface');

        for (const robot of this.registry.robots) {
            const docks = this.registry.docks.filter(dock => holds(FLUENTS.robotAt, robot.id, dock));
            if (docks.length !== 1) {
                violations.push(`Robot ${robot.id} must be at exactly one dock, found ${ConstraintEncoder.list(docks)}.`);
            }

            const slots = this.vocabulary.getSlotsOf(robot.id);
            const tops = [slotObject(0), ...slots].filter(slot => holds(FLUENTS.robotTop, robot.id, slot));
            if (tops.length !== 1) {
                violations.push(`Robot ${robot.id} must have exactly one top slot, found ${ConstraintEncoder.list(tops)}.`);
            }
            const topIndex = tops.length === 1 ? [slotObject(0), ...slots].indexOf(tops[0]) : undefined;

            const cargo: string[] = [];
            slots.forEach((slot, index) => {
                const occupied = holds(FLUENTS.slotOccupied, robot.id, slot);
                const held = containers.filter(c => holds(FLUENTS.inSlot, c, robot.id, slot));
                if (occupied && index > 0 && !holds(FLUENTS.slotOccupied, robot.id, slots[index - 1])) {
                    violations.push(`Robot ${robot.id} has ${slot} occupied above the empty ${slots[index - 1]}.`);
                }
                if (topIndex !== undefined && occupied !== (index + 1 <= topIndex)) {
                    violations.push(`Robot ${robot.id} occupancy of ${slot} disagrees with its top slot ${tops[0]}.`);
                }
                if (occupied) {
                    if (held.length === 1) {
                        cargo.push(held[0]);
                    }
                    else {
                        violations.push(`Robot ${robot.id} ${slot} must hold exactly one container, found ${ConstraintEncoder.list(held)}.`);
                    }
                }
                else if (held.length) {
                    violations.push(`Robot ${robot.id} ${slot} is not occupied but holds ${held.join(', ')}.`);
                }
            });

            const loads = LOAD_LEVELS.filter(level => holds(FLUENTS.load, robot.id, loadObject(level)));
            if (loads.length !== 1) {
                violations.push(`Robot ${robot.id} must have exactly one load level, found ${ConstraintEncoder.list(loads.map(loadObject))}.`);
            }
            else if (loads[0] !== this.heldWeight(cargo)) {
                violations.push(`Robot ${robot.id} load level ${loads[0]}t differs from the held weight ${this.heldWeight(cargo)}t.`);
            }

            world.robots[robot.id] = { at: docks.length === 1 ? docks[0] : '', cargo };
        }

        const restsOn = new Map<string, string>();
        for (const pile of this.registry.piles) {
            const tops = surfaces.filter(x => holds(FLUENTS.pileTop, pile.id, x));
            const stack: string[] = [];
            if (tops.length !== 1) {
                violations.push(`Pile ${pile.id} must have exactly one top, found ${ConstraintEncoder.list(tops)}.`);
            }
            else {
                let current = tops[0];
                while (current !== pile.id) {
                    if (stack.includes(current)) {
                        violations.push(`Pile ${pile.id} stack contains a cycle at ${current}.`);
                        break;
                    }
                    if (!holds(FLUENTS.inPile, current, pile.id)) {
                        violations.push(`Container ${current} is stacked in pile ${pile.id} but not marked as in it.`);
                    }
                    stack.unshift(current);
                    const below = surfaces.filter(x => holds(FLUENTS.on, current, x));
                    if (below.length !== 1) {
                        violations.push(`Container ${current} must rest on exactly one surface, found ${ConstraintEncoder.list(below)}.`);
                        break;
                    }
                    if (below[0] !== pile.id && this.registry.getKind(below[0]) === 'pile') {
                        violations.push(`Container ${current} in pile ${pile.id} rests on the base of pile ${below[0]}.`);
                        break;
                    }
                    restsOn.set(current, below[0]);
                    current = below[0];
                }
            }
            containers.filter(c => holds(FLUENTS.inPile, c, pile.id) && !stack.includes(c))
                .forEach(c => violations.push(`Container ${c} is marked as in pile ${pile.id} but is not part of its stack.`));
            world.piles[pile.id] = stack;
        }

        for (const container of containers) {
            const onTargets = surfaces.filter(x => holds(FLUENTS.on, container, x));
            const expected = restsOn.get(container);
            const stray = onTargets.filter(x => x !== expected);
            if (stray.length) {
                violations.push(`Container ${container} rests on ${stray.join(', ')} outside of any pile stack.`);
            }
        }

        if (this.vocabulary.options.occupancy === 'single') {
            for (const dock of this.registry.docks) {
                const hosting = Object.values(world.robots).some(r => r.at === dock);
                if (holds(FLUENTS.occupied, dock) !== hosting) {
                    violations.push(`Dock ${dock} occupancy flag disagrees with the robots located there.`);
                }
            }
        }

        violations.push(...this.checkInvariants(world));

        if (violations.length) {
            throw new ConfigurationError('State violates the domain invariants.', violations);
        }
        return world;
    }

    /**
     * Checks the invariants of a structured placement.
     * @returns violation messages, empty if the placement is valid
     */
    checkInvariants(world: WorldPlacement): string[] {
        const violations: string[] = [];
        const locations = new Map<string, string[]>();
        const locate = (container: string, where: string) =>
            locations.set(container, [...(locations.get(container) ?? []), where]);

        for (const robot of this.registry.robots) {
            const cargo = ownEntry(world.robots, robot.id)?.cargo ?? [];
            cargo.forEach(c => locate(c, `robot ${robot.id}`));
            if (cargo.length > robot.slotCapacity) {
                violations.push(`Robot ${robot.id} holds ${cargo.length} container(s) but has ${robot.slotCapacity} slot(s).`);
            }
            const load = this.heldWeight(cargo.filter(c => this.registry.findContainer(c)));
            if (load > robot.weightThreshold) {
                violations.push(`Robot ${robot.id} holds ${load}t, above its threshold of ${robot.weightThreshold}t.`);
            }
        }
        for (const pile of this.registry.piles) {
            (ownEntry(world.piles, pile.id) ?? []).forEach(c => locate(c, `pile ${pile.id}`));
        }
        for (const container of this.registry.containers) {
            const where = locations.get(container.id) ?? [];
            if (where.length === 0) {
                violations.push(`Container ${container.id} is neither in a pile nor held by a robot.`);
            }
            else if (where.length > 1) {
                violations.push(`Container ${container.id} is in several places: ${where.join(', ')}.`);
            }
        }

        if (this.vocabulary.options.occupancy === 'single') {
            for (const dock of this.registry.docks) {
                const hosted = this.registry.robots.filter(r => ownEntry(world.robots, r.id)?.at === dock).map(r => r.id);
                if (hosted.length > 1) {
                    violations.push(`Dock ${dock} hosts several robots: ${hosted.join(', ')}.`);
                }
            }
        }
        return violations;
    }

    /** Sum of the weight classes of the containers. */
    heldWeight(containers: string[]): number {
        return containers.reduce((sum, c) => sum + this.registry.getContainer(c).weight, 0);
    }

    private static list(items: string[] | number[]): string {
        return items.length ? items.join(', ') : 'none';
    }
}
