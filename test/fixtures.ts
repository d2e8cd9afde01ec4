/* --------------------------------------------------------------------------------------------
 * Copyright (c) Jan Dolejsi. All rights reserved.
 * Licensed under the MIT License. See License.txt in the project root for license information.
 * ------------------------------------------------------------------------------------------ */
'use strict';

import { WorldPlacement } from '../src/ConstraintEncoder';
import { Registry } from '../src/Registry';
import { Topology } from '../src/Topology';

/** Two single-slot robots (threshold 6) on docks d1 - d2 - d3, one pile per dock. */
export function createLineRegistry(): Registry {
    return Registry.create({
        topology: Topology.linear(3),
        robots: [
            { id: 'r1', slotCapacity: 1, weightThreshold: 6 },
            { id: 'r2', slotCapacity: 1, weightThreshold: 6 },
        ],
        piles: [
            { id: 'p1', dock: 'd1' },
            { id: 'p2', dock: 'd2' },
            { id: 'p3', dock: 'd3' },
        ],
        containers: [
            { id: 'c1', weight: 2 },
            { id: 'c2', weight: 4 },
            { id: 'c3', weight: 6 },
        ],
    });
}

export function createLinePlacement(): WorldPlacement {
    return {
        robots: {
            r1: { at: 'd1' },
            r2: { at: 'd2' },
        },
        piles: {
            p1: ['c1'],
            p2: ['c2'],
            p3: ['c3'],
        },
    };
}

/** Moves c1 from the pile at d1 to the pile at d3. */
export const LINE_PLAN = [
    'pickup r1 c1 p1 d1 p1 slot0 slot1 t6 w2 load0 load2',
    'move r1 d1 d2',
    'move r1 d2 d3',
    'putdown r1 c1 p3 d3 c3 slot1 slot0 t6 w2 load2 load0',
];
