/* --------------------------------------------------------------------------------------------
 * Copyright (c) Jan Dolejsi. All rights reserved.
 * Licensed under the MIT License. See License.txt in the project root for license information.
 * ------------------------------------------------------------------------------------------ */
'use strict';

import { Parameter } from './Fluent';

/** Parameter name to object name. */
export type Binding = ReadonlyMap<string, string>;

/**
 * Restriction on a (partial) binding. It is evaluated as soon as all of its `parameters` are bound,
 * so that failing branches are cut early.
 */
export interface BindingConstraint {
    parameters: string[];
    test(binding: Binding): boolean;
}

export interface ObjectCatalog {
    objectsOfType(typeName: string): string[];
}

/** Constraint that two parameters are bound to different objects. */
export function distinct(parameter1: string, parameter2: string): BindingConstraint {
    return {
        parameters: [parameter1, parameter2],
        test: binding => binding.get(parameter1) !== binding.get(parameter2)
    };
}

/** Builds a constraint over the listed parameters, passed to `test` in the same order. */
export function constraint(parameters: string[], test: (...objects: string[]) => boolean): BindingConstraint {
    return {
        parameters,
        test: binding => test(...parameters.map(name => binding.get(name) ?? ''))
    };
}

export class Grounder {

    constructor(private readonly catalog: ObjectCatalog) {
    }

    getObjectsForType(typeName: string): string[] {
        return this.catalog.objectsOfType(typeName);
    }

    getObjects(typeNames: string[]): string[][] {
        return typeNames.map(typeName => this.getObjectsForType(typeName));
    }

    /**
     * Enumerates all object vectors for the parameters that satisfy the constraints.
     * @param parameters lifted parameters, bound in this order
     * @param constraints binding constraints
     * @returns object vectors in the order of the `parameters`
     */
    ground(parameters: Parameter[], constraints: BindingConstraint[] = []): string[][] {
        if (parameters.length === 0) {
            return constraints.every(c => c.test(new Map())) ? [[]] : [];
        }

        const unknown = constraints.flatMap(c => c.parameters)
            .filter(name => !parameters.some(p => p.name === name));
        if (unknown.length) {
            throw new Error(`Constraint refers to unknown parameter(s): ${unknown.join(', ')}`);
        }

        // constraints are checked at the depth where their last parameter gets bound
        const checksPerDepth = parameters.map((_, depth) => constraints.filter(c =>
            Math.max(...c.parameters.map(name => parameters.findIndex(p => p.name === name))) === depth));

        const domains = this.getObjects(parameters.map(p => p.type));
        const binding = new Map<string, string>();
        const objectVectors: string[][] = [];

        const bindNext = (depth: number): void => {
            if (depth === parameters.length) {
                objectVectors.push(parameters.map(p => binding.get(p.name) ?? ''));
                return;
            }
            for (const object of domains[depth]) {
                binding.set(parameters[depth].name, object);
                if (checksPerDepth[depth].every(c => c.test(binding))) {
                    bindNext(depth + 1);
                }
            }
            binding.delete(parameters[depth].name);
        };

        bindNext(0);
        return objectVectors;
    }
}
