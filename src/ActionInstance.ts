/* --------------------------------------------------------------------------------------------
 * Copyright (c) Jan Dolejsi. All rights reserved.
 * Licensed under the MIT License. See License.txt in the project root for license information.
 * ------------------------------------------------------------------------------------------ */
'use strict';

import { Literal, State } from './Fluent';

/**
 * Fully grounded action: dynamic preconditions and effects over ground fluents.
 * Static preconditions were checked when the instance was generated.
 */
export class ActionInstance {

    /** Action name followed by all the arguments, e.g. `pickup r1 c1 p1 d1 p1 slot0 slot1 t6 w2 load0 load2`. */
    readonly id: string;

    /** Robot, container, pile and dock arguments; the ones `move` takes are all entities. */
    readonly entities: readonly string[];

    /** Action name followed by the entities, e.g. `pickup r1 c1 p1 d1`. */
    readonly step: string;

    constructor(public readonly name: string, public readonly args: readonly string[],
        public readonly preconditions: readonly Literal[], public readonly effects: readonly Literal[],
        entityCount = args.length) {
        this.id = [name, ...args].join(' ');
        this.entities = Object.freeze(args.slice(0, entityCount));
        this.step = [name, ...this.entities].join(' ');
    }

    isApplicable(state: State): boolean {
        return this.preconditions.every(precondition => precondition.holdsIn(state));
    }

    /** Preconditions that do not hold in the state. */
    getUnsatisfiedPreconditions(state: State): Literal[] {
        return this.preconditions.filter(precondition => !precondition.holdsIn(state));
    }

    getAddEffects(): Literal[] {
        return this.effects.filter(effect => effect.positive);
    }

    getDeleteEffects(): Literal[] {
        return this.effects.filter(effect => !effect.positive);
    }

    /**
     * Successor state. Delete effects are applied before add effects.
     * The applicability is not checked here.
     */
    apply(state: State): State {
        const successor = new Set(state);
        this.getDeleteEffects().forEach(effect => successor.delete(effect.atom.key));
        this.getAddEffects().forEach(effect => successor.add(effect.atom.key));
        return successor;
    }

    toPddl(): string {
        return `(${this.id})`;
    }

    toString(): string {
        return this.id;
    }
}
