/* --------------------------------------------------------------------------------------------
* Copyright (c) Jan Dolejsi. All rights reserved.
* Licensed under the MIT License. See License.txt in the project root for license information.
* ------------------------------------------------------------------------------------------ */
'use strict';

/** Typed parameter of a fluent declaration or an action schema. */
export class Parameter {
    constructor(public readonly name: string, public readonly type: string) { }

    toPddlString(): string {
        return `?${this.name} - ${this.type}`;
    }
}

/**
 * Whether the fluent may change during planning.
 * Static fluents encode constants (topology, weights, capacities).
 */
export enum FluentKind { Static, Dynamic }

/**
 * Lifted (parameterized) boolean state variable declaration.
 */
export class FluentDeclaration {

    constructor(public readonly name: string, public readonly parameters: Parameter[],
        public readonly kind: FluentKind, public readonly documentation = '') {
    }

    isStatic(): boolean {
        return this.kind === FluentKind.Static;
    }

    /**
     * Binds the declaration to objects.
     * @param objects object names, one per parameter
     */
    bind(objects: string[]): GroundAtom {
        if (this.parameters.length !== objects.length) {
            throw new Error(`Invalid objects '${objects.join(' ')}' for fluent '${this.getFullName()}' with ${this.parameters.length} parameters.`);
        }
        return new GroundAtom(this.name, objects);
    }

    getFullName(): string {
        return this.name + this.parameters.map(par => " " + par.toPddlString()).join('');
    }

    toPddl(): string {
        return `(${this.getFullName()})`;
    }
}

/**
 * Grounded fluent, e.g. `(pile-top p1 c1)`.
 */
export class GroundAtom {
    readonly key: string;

    constructor(public readonly predicate: string, public readonly objects: readonly string[]) {
        this.key = [predicate, ...objects].join(' ').toLowerCase();
    }

    toPddl(): string {
        return `(${this.key})`;
    }

    toString(): string {
        return this.toPddl();
    }
}

/** Shortcut for `new GroundAtom(predicate, objects)`. */
export function atom(predicate: string, ...objects: string[]): GroundAtom {
    return new GroundAtom(predicate, objects);
}

/**
 * Positive or negated ground atom; used in preconditions, effects and goals.
 */
export class Literal {
    constructor(public readonly atom: GroundAtom, public readonly positive = true) { }

    negate(): Literal {
        return new Literal(this.atom, !this.positive);
    }

    holdsIn(state: State): boolean {
        return state.has(this.atom.key) === this.positive;
    }

    toPddl(): string {
        return this.positive ? this.atom.toPddl() : `(not ${this.atom.toPddl()})`;
    }

    toString(): string {
        return this.toPddl();
    }
}

/**
 * Planning state: the keys of the atoms that are true. Everything else is false.
 */
export type State = ReadonlySet<string>;
