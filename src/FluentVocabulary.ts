/* --------------------------------------------------------------------------------------------
 * Copyright (c) Jan Dolejsi. All rights reserved.
 * Licensed under the MIT License. See License.txt in the project root for license information.
 * ------------------------------------------------------------------------------------------ */
'use strict';

import { utils } from 'pddl-workspace';
import { FluentDeclaration, FluentKind, GroundAtom, Parameter } from './Fluent';
import { BindingConstraint, constraint, distinct, Grounder, ObjectCatalog } from './Grounder';
import { Registry } from './Registry';
import {
    LOAD_LEVELS, loadObject, loadValue, slotIndex, slotObject, thresholdObject, WEIGHT_CLASSES, WEIGHT_THRESHOLDS, weightObject
} from './enumerations';

/**
 * `single`: a dock hosts at most one robot, tracked by the `occupied` fluent.
 * `shared`: any number of robots may be at a dock; occupancy is not tracked.
 */
export type OccupancyMode = 'single' | 'shared';

export interface EncodingOptions {
    occupancy: OccupancyMode;
}

export const DEFAULT_ENCODING_OPTIONS: EncodingOptions = Object.freeze({ occupancy: 'shared' });

export const TYPES = {
    robot: 'robot',
    dock: 'dock',
    pile: 'pile',
    container: 'container',
    surface: 'surface',
    slot: 'slot',
    loadLevel: 'load-level',
    weightClass: 'weight-class',
    threshold: 'threshold',
} as const;

export const FLUENTS = {
    adjacent: 'adjacent',
    pileAt: 'pile-at',
    weight: 'weight',
    capacity: 'capacity',
    slotOf: 'slot-of',
    slotSucc: 'slot-succ',
    admits: 'admits',
    robotAt: 'robot-at',
    occupied: 'occupied',
    pileTop: 'pile-top',
    on: 'on',
    inPile: 'in-pile',
    robotTop: 'robot-top',
    slotOccupied: 'slot-occupied',
    inSlot: 'in-slot',
    load: 'load',
} as const;

const p = (name: string, type: string) => new Parameter(name, type);

/**
 * The boolean state variables of the domain, lifted and grounded for one registry.
 */
export class FluentVocabulary implements ObjectCatalog {

    readonly declarations: readonly FluentDeclaration[];
    private readonly typeInheritance = new utils.DirectionalGraph();
    private readonly ownObjects = new Map<string, string[]>();
    private readonly relevance = new Map<string, BindingConstraint[]>();
    private readonly groundFluents = new Map<string, GroundAtom>();
    private readonly staticKeys = new Set<string>();

    constructor(public readonly registry: Registry, public readonly options: EncodingOptions = DEFAULT_ENCODING_OPTIONS) {
        this.setUpTypes();
        this.declarations = Object.freeze(this.declareFluents());

        const grounder = new Grounder(this);
        for (const declaration of this.declarations) {
            grounder.ground(declaration.parameters, this.relevance.get(declaration.name))
                .map(objects => declaration.bind(objects))
                .forEach(groundAtom => {
                    this.groundFluents.set(groundAtom.key, groundAtom);
                    if (declaration.isStatic()) { this.staticKeys.add(groundAtom.key); }
                });
        }
    }

    private setUpTypes(): void {
        this.typeInheritance
            .addEdge(TYPES.container, TYPES.surface)
            .addEdge(TYPES.pile, TYPES.surface);
        [TYPES.robot, TYPES.dock, TYPES.surface, TYPES.slot, TYPES.loadLevel, TYPES.weightClass, TYPES.threshold]
            .forEach(type => this.typeInheritance.addEdge(type, 'object'));

        const maxSlots = Math.max(0, ...this.registry.robots.map(r => r.slotCapacity));

        this.ownObjects.set(TYPES.robot, this.registry.robots.map(r => r.id));
        this.ownObjects.set(TYPES.dock, [...this.registry.docks]);
        this.ownObjects.set(TYPES.pile, this.registry.piles.map(pile => pile.id));
        this.ownObjects.set(TYPES.container, this.registry.containers.map(c => c.id));
        this.ownObjects.set(TYPES.slot, Array.from({ length: maxSlots + 1 }, (_, index) => slotObject(index)));
        this.ownObjects.set(TYPES.loadLevel, LOAD_LEVELS.map(loadObject));
        this.ownObjects.set(TYPES.weightClass, WEIGHT_CLASSES.map(weightObject));
        this.ownObjects.set(TYPES.threshold, WEIGHT_THRESHOLDS.map(thresholdObject));
    }

    private declareFluents(): FluentDeclaration[] {
        const S = FluentKind.Static;
        const D = FluentKind.Dynamic;
        const slotCapacity = (robot: string) => this.registry.findRobot(robot)?.slotCapacity ?? 0;
        const threshold = (robot: string) => this.registry.findRobot(robot)?.weightThreshold ?? 0;

        const declarations = [
            new FluentDeclaration(FLUENTS.adjacent, [p('from', TYPES.dock), p('to', TYPES.dock)], S, 'robots may move from one dock to the other'),
            new FluentDeclaration(FLUENTS.pileAt, [p('p', TYPES.pile), p('d', TYPES.dock)], S, 'pile location'),
            new FluentDeclaration(FLUENTS.weight, [p('c', TYPES.container), p('w', TYPES.weightClass)], S, 'container weight class'),
            new FluentDeclaration(FLUENTS.capacity, [p('r', TYPES.robot), p('t', TYPES.threshold)], S, 'robot weight threshold'),
            new FluentDeclaration(FLUENTS.slotOf, [p('r', TYPES.robot), p('s', TYPES.slot)], S, 'slot exists on the robot'),
            new FluentDeclaration(FLUENTS.slotSucc, [p('below', TYPES.slot), p('above', TYPES.slot)], S, 'slot ordering'),
            new FluentDeclaration(FLUENTS.admits, [p('t', TYPES.threshold), p('l', TYPES.loadLevel), p('w', TYPES.weightClass), p('next', TYPES.loadLevel)], S,
                'adding weight w to load l gives load next, within threshold t'),
            new FluentDeclaration(FLUENTS.robotAt, [p('r', TYPES.robot), p('d', TYPES.dock)], D, 'robot location'),
        ];
        if (this.options.occupancy === 'single') {
            declarations.push(new FluentDeclaration(FLUENTS.occupied, [p('d', TYPES.dock)], D, 'a robot is at the dock'));
        }
        declarations.push(
            new FluentDeclaration(FLUENTS.pileTop, [p('p', TYPES.pile), p('x', TYPES.surface)], D, 'top of the pile, the pile itself when empty'),
            new FluentDeclaration(FLUENTS.on, [p('c', TYPES.container), p('x', TYPES.surface)], D, 'container rests directly on x'),
            new FluentDeclaration(FLUENTS.inPile, [p('c', TYPES.container), p('p', TYPES.pile)], D, 'container is stacked in the pile'),
            new FluentDeclaration(FLUENTS.robotTop, [p('r', TYPES.robot), p('s', TYPES.slot)], D, 'highest occupied slot, slot0 when empty'),
            new FluentDeclaration(FLUENTS.slotOccupied, [p('r', TYPES.robot), p('s', TYPES.slot)], D, 'slot holds a container'),
            new FluentDeclaration(FLUENTS.inSlot, [p('c', TYPES.container), p('r', TYPES.robot), p('s', TYPES.slot)], D, 'container held in the slot'),
            new FluentDeclaration(FLUENTS.load, [p('r', TYPES.robot), p('l', TYPES.loadLevel)], D, 'total weight held by the robot'),
        );

        const isContainer = (id: string) => this.registry.getKind(id) === 'container';
        const realSlot = (robot: string, slot: string) => slotIndex(slot) >= 1 && slotIndex(slot) <= slotCapacity(robot);

        this.relevance.set(FLUENTS.pileTop, [constraint(['p', 'x'], (pile, x) => x === pile || isContainer(x))]);
        this.relevance.set(FLUENTS.on, [distinct('c', 'x')]);
        this.relevance.set(FLUENTS.robotTop, [constraint(['r', 's'], (robot, slot) => slotIndex(slot) <= slotCapacity(robot))]);
        this.relevance.set(FLUENTS.slotOccupied, [constraint(['r', 's'], realSlot)]);
        this.relevance.set(FLUENTS.inSlot, [constraint(['r', 's'], realSlot)]);
        this.relevance.set(FLUENTS.load, [constraint(['r', 'l'], (robot, load) => loadValue(load) <= threshold(robot))]);

        return declarations;
    }

    /** Types with their direct parent type, for the PDDL `:types` section. */
    getTypeDeclarations(): [string, string][] {
        return this.typeInheritance.getEdges();
    }

    /**
     * Objects of the type, including objects of its sub-types.
     */
    objectsOfType(typeName: string): string[] {
        const types = [typeName, ...this.typeInheritance.getSubtreePointingTo(typeName)];
        return types.flatMap(type => this.ownObjects.get(type) ?? []);
    }

    /** Objects declared directly with each type (sub-type objects are not repeated). */
    getObjectsPerType(): Map<string, string[]> {
        return new Map([...this.ownObjects.entries()].filter(([, objects]) => objects.length > 0));
    }

    getDeclaration(name: string): FluentDeclaration | undefined {
        return this.declarations.find(declaration => declaration.name === name);
    }

    /** Slots `slot1`..`slotK` of the robot. */
    getSlotsOf(robot: string): string[] {
        const capacity = this.registry.findRobot(robot)?.slotCapacity ?? 0;
        return Array.from({ length: capacity }, (_, index) => slotObject(index + 1));
    }

    /** All ground state variables, static and dynamic. */
    getGroundFluents(): GroundAtom[] {
        return [...this.groundFluents.values()];
    }

    getDynamicFluents(): GroundAtom[] {
        return this.getGroundFluents().filter(a => !this.staticKeys.has(a.key));
    }

    getStaticFluents(): GroundAtom[] {
        return this.getGroundFluents().filter(a => this.staticKeys.has(a.key));
    }

    has(atomOrKey: GroundAtom | string): boolean {
        return this.groundFluents.has(typeof atomOrKey === 'string' ? atomOrKey : atomOrKey.key);
    }

    isStatic(atomOrKey: GroundAtom | string): boolean {
        return this.staticKeys.has(typeof atomOrKey === 'string' ? atomOrKey : atomOrKey.key);
    }

    getAtom(key: string): GroundAtom | undefined {
        return this.groundFluents.get(key);
    }

    get size(): number {
        return this.groundFluents.size;
    }
}
