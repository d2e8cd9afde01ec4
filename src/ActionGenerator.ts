/* --------------------------------------------------------------------------------------------
 * Copyright (c) Jan Dolejsi. All rights reserved.
 * Licensed under the MIT License. See License.txt in the project root for license information.
 * ------------------------------------------------------------------------------------------ */
'use strict';

import { ActionInstance } from './ActionInstance';
import { ConstraintEncoder } from './ConstraintEncoder';
import { atom, Literal, Parameter } from './Fluent';
import { FLUENTS, FluentVocabulary, TYPES } from './FluentVocabulary';
import { BindingConstraint, constraint, Grounder } from './Grounder';
import { EncodingError } from './errors';

/** Lifted literal, e.g. `(not (robot-at ?r ?from))`. */
export interface LiteralTemplate {
    predicate: string;
    parameters: string[];
    positive: boolean;
}

function pos(predicate: string, ...parameters: string[]): LiteralTemplate {
    return { predicate, parameters, positive: true };
}

function neg(predicate: string, ...parameters: string[]): LiteralTemplate {
    return { predicate, parameters, positive: false };
}

/**
 * Lifted action schema. The first `entityCount` parameters name the robot, container, pile and dock
 * the action is about; the remaining ones are encoding objects (slots, weights, load levels).
 */
export class ActionSchema {
    constructor(public readonly name: string,
        public readonly parameters: Parameter[],
        public readonly preconditions: LiteralTemplate[],
        public readonly effects: LiteralTemplate[],
        public readonly constraints: BindingConstraint[] = [],
        public readonly entityCount = parameters.length) {
    }

    /**
     * Grounds the literal template for the binding.
     * @param template literal over the schema parameters
     * @param binding parameter name to object
     */
    static bindLiteral(template: LiteralTemplate, binding: ReadonlyMap<string, string>): Literal {
        const objects = template.parameters.map(name => {
            const object = binding.get(name);
            if (object === undefined) { throw new Error(`Parameter ?${name} of (${template.predicate}) is not bound.`); }
            return object;
        });
        return new Literal(atom(template.predicate, ...objects), template.positive);
    }

    toPddl(): string {
        const literal = (template: LiteralTemplate) => {
            const text = `(${[template.predicate, ...template.parameters.map(name => '?' + name)].join(' ')})`;
            return template.positive ? text : `(not ${text})`;
        };
        const indent = '            ';
        return [
            `    (:action ${this.name}`,
            `        :parameters (${this.parameters.map(par => par.toPddlString()).join(' ')})`,
            `        :precondition (and`,
            ...this.preconditions.map(pre => indent + literal(pre)),
            `        )`,
            `        :effect (and`,
            ...this.effects.map(eff => indent + literal(eff)),
            `        )`,
            `    )`
        ].join('\n');
    }
}

/**
 * Builds the move, pickup and putdown schemas and grounds them into action instances.
 */
export class ActionGenerator {

    private readonly schemas: ActionSchema[];

    constructor(private readonly vocabulary: FluentVocabulary, private readonly encoder: ConstraintEncoder) {
        this.schemas = [this.createMove(), this.createPickup(), this.createPutdown()];
    }

    getSchemas(): ActionSchema[] {
        return this.schemas;
    }

    getSchema(name: string): ActionSchema | undefined {
        return this.schemas.find(schema => schema.name === name);
    }

    private createMove(): ActionSchema {
        const single = this.vocabulary.options.occupancy === 'single';
        const preconditions = [pos(FLUENTS.robotAt, 'r', 'from'), pos(FLUENTS.adjacent, 'from', 'to')];
        const effects = [neg(FLUENTS.robotAt, 'r', 'from'), pos(FLUENTS.robotAt, 'r', 'to')];
        if (single) {
            preconditions.push(neg(FLUENTS.occupied, 'to'));
            effects.push(neg(FLUENTS.occupied, 'from'), pos(FLUENTS.occupied, 'to'));
        }
        return new ActionSchema('move',
            [new Parameter('r', TYPES.robot), new Parameter('from', TYPES.dock), new Parameter('to', TYPES.dock)],
            preconditions, effects);
    }

    private createPickup(): ActionSchema {
        return new ActionSchema('pickup',
            [
                new Parameter('r', TYPES.robot), new Parameter('c', TYPES.container),
                new Parameter('p', TYPES.pile), new Parameter('d', TYPES.dock),
                new Parameter('below', TYPES.surface),
                new Parameter('prev', TYPES.slot), new Parameter('s', TYPES.slot),
                new Parameter('t', TYPES.threshold), new Parameter('w', TYPES.weightClass),
                new Parameter('l', TYPES.loadLevel), new Parameter('next', TYPES.loadLevel),
            ],
            [
                pos(FLUENTS.pileAt, 'p', 'd'),
                pos(FLUENTS.robotAt, 'r', 'd'),
                pos(FLUENTS.pileTop, 'p', 'c'),
                pos(FLUENTS.on, 'c', 'below'),
                pos(FLUENTS.inPile, 'c', 'p'),
                pos(FLUENTS.robotTop, 'r', 'prev'),
                pos(FLUENTS.slotSucc, 'prev', 's'),
                pos(FLUENTS.slotOf, 'r', 's'),
                pos(FLUENTS.capacity, 'r', 't'),
                pos(FLUENTS.weight, 'c', 'w'),
                pos(FLUENTS.load, 'r', 'l'),
                pos(FLUENTS.admits, 't', 'l', 'w', 'next'),
            ],
            [
                neg(FLUENTS.pileTop, 'p', 'c'),
                pos(FLUENTS.pileTop, 'p', 'below'),
                neg(FLUENTS.on, 'c', 'below'),
                neg(FLUENTS.inPile, 'c', 'p'),
                neg(FLUENTS.robotTop, 'r', 'prev'),
                pos(FLUENTS.robotTop, 'r', 's'),
                pos(FLUENTS.slotOccupied, 'r', 's'),
                pos(FLUENTS.inSlot, 'c', 'r', 's'),
                neg(FLUENTS.load, 'r', 'l'),
                pos(FLUENTS.load, 'r', 'next'),
            ],
            [this.restsOnOwnPile('c', 'p', 'below')], 4);
    }

    private createPutdown(): ActionSchema {
        return new ActionSchema('putdown',
            [
                new Parameter('r', TYPES.robot), new Parameter('c', TYPES.container),
                new Parameter('p', TYPES.pile), new Parameter('d', TYPES.dock),
                new Parameter('top', TYPES.surface),
                new Parameter('s', TYPES.slot), new Parameter('prev', TYPES.slot),
                new Parameter('t', TYPES.threshold), new Parameter('w', TYPES.weightClass),
                new Parameter('l', TYPES.loadLevel), new Parameter('next', TYPES.loadLevel),
            ],
            [
                pos(FLUENTS.pileAt, 'p', 'd'),
                pos(FLUENTS.robotAt, 'r', 'd'),
                pos(FLUENTS.robotTop, 'r', 's'),
                pos(FLUENTS.inSlot, 'c', 'r', 's'),
                pos(FLUENTS.slotSucc, 'prev', 's'),
                pos(FLUENTS.pileTop, 'p', 'top'),
                pos(FLUENTS.capacity, 'r', 't'),
                pos(FLUENTS.weight, 'c', 'w'),
                pos(FLUENTS.load, 'r', 'l'),
                pos(FLUENTS.admits, 't', 'next', 'w', 'l'),
            ],
            [
                neg(FLUENTS.robotTop, 'r', 's'),
                pos(FLUENTS.robotTop, 'r', 'prev'),
                neg(FLUENTS.slotOccupied, 'r', 's'),
                neg(FLUENTS.inSlot, 'c', 'r', 's'),
                neg(FLUENTS.pileTop, 'p', 'top'),
                pos(FLUENTS.pileTop, 'p', 'c'),
                pos(FLUENTS.on, 'c', 'top'),
                pos(FLUENTS.inPile, 'c', 'p'),
                neg(FLUENTS.load, 'r', 'l'),
                pos(FLUENTS.load, 'r', 'next'),
            ],
            [this.restsOnOwnPile('c', 'p', 'top')], 4);
    }

    /** The surface is a container other than `c`, or the base of pile `p`. */
    private restsOnOwnPile(container: string, pile: string, surface: string): BindingConstraint {
        const registry = this.vocabulary.registry;
        return constraint([container, pile, surface], (c, p, x) =>
            x === p || (x !== c && registry.getKind(x) === 'container'));
    }

    /**
     * Grounds all schemas.
     * @returns action instances in a deterministic order
     * @throws EncodingError if an instance would affect a fluent outside the vocabulary
     */
    generate(): ActionInstance[] {
        const staticFacts = new Set(this.encoder.staticFacts().map(fact => fact.key));
        const grounder = new Grounder(this.vocabulary);
        return this.schemas.flatMap(schema => this.ground(schema, grounder, staticFacts));
    }

    private ground(schema: ActionSchema, grounder: Grounder, staticFacts: ReadonlySet<string>): ActionInstance[] {
        const isStatic = (template: LiteralTemplate) => this.vocabulary.getDeclaration(template.predicate)?.isStatic() ?? false;

        const staticChecks: BindingConstraint[] = schema.preconditions.filter(isStatic).map(template => ({
            parameters: template.parameters,
            test: binding => ActionSchema.bindLiteral(template, binding).holdsIn(staticFacts)
        }));
        const dynamicPreconditions = schema.preconditions.filter(template => !isStatic(template));

        const instances: ActionInstance[] = [];
        for (const objects of grounder.ground(schema.parameters, [...schema.constraints, ...staticChecks])) {
            const binding = new Map(schema.parameters.map((par, index) => [par.name, objects[index]]));
            const preconditions = dynamicPreconditions.map(template => ActionSchema.bindLiteral(template, binding));
            if (!preconditions.every(pre => this.vocabulary.has(pre.atom))) {
                continue;
            }
            const effects = schema.effects.map(template => ActionSchema.bindLiteral(template, binding));
            const outside = effects.filter(effect => !this.vocabulary.has(effect.atom));
            if (outside.length) {
                throw new EncodingError(`Action (${[schema.name, ...objects].join(' ')}) affects fluents outside of the vocabulary: ${outside.join(' ')}`);
            }
            instances.push(new ActionInstance(schema.name, objects, preconditions, effects, schema.entityCount));
        }
        return instances;
    }
}
