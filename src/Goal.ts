/* --------------------------------------------------------------------------------------------
 * Copyright (c) Jan Dolejsi. All rights reserved.
 * Licensed under the MIT License. See License.txt in the project root for license information.
 * ------------------------------------------------------------------------------------------ */
'use strict';

import { atom, Literal } from './Fluent';
import { FLUENTS } from './FluentVocabulary';
import { Registry } from './Registry';
import { ConfigurationError } from './errors';

/**
 * Builders of goal literals. A goal is a conjunction of literals.
 */
export class Goal {

    static robotAt(robot: string, dock: string): Literal {
        return new Literal(atom(FLUENTS.robotAt, robot, dock));
    }

    static containerInPile(container: string, pile: string): Literal {
        return new Literal(atom(FLUENTS.inPile, container, pile));
    }

    /**
     * Container rests directly on the surface.
     * @param surface another container, or a pile for the bottom position
     */
    static containerOn(container: string, surface: string): Literal {
        return new Literal(atom(FLUENTS.on, container, surface));
    }

    static containerOnTop(container: string, pile: string): Literal {
        return new Literal(atom(FLUENTS.pileTop, pile, container));
    }

    static pileEmpty(pile: string): Literal {
        return new Literal(atom(FLUENTS.pileTop, pile, pile));
    }

    static not(literal: Literal): Literal {
        return literal.negate();
    }

    /**
     * Container ends in the pile located at the dock.
     * @throws ConfigurationError if the dock does not have exactly one pile
     */
    static containerAtDock(registry: Registry, container: string, dock: string): Literal {
        if (!registry.isDock(dock)) {
            throw new ConfigurationError(`Unknown dock '${dock}'.`);
        }
        const piles = registry.getPilesAt(dock);
        if (piles.length !== 1) {
            throw new ConfigurationError(`Dock ${dock} must have exactly one pile to place container ${container} there, it has ${piles.length}.`);
        }
        return Goal.containerInPile(container, piles[0].id);
    }
}
