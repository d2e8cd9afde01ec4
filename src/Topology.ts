/* --------------------------------------------------------------------------------------------
 * Copyright (c) Jan Dolejsi. All rights reserved.
 * Licensed under the MIT License. See License.txt in the project root for license information.
 * ------------------------------------------------------------------------------------------ */
'use strict';

/**
 * Dock network description.
 */
export interface TopologyDefinition {
    docks: string[];
    /** Pairs of adjacent docks. */
    edges: [string, string][];
    /** When false (default), every edge is traversable both ways. */
    directed?: boolean;
}

/** Dock names `d1`..`dN`. */
export function dockNames(count: number, prefix = 'd'): string[] {
    return Array.from({ length: count }, (_, index) => `${prefix}${index + 1}`);
}

export class Topology {

    /** Docks in a line: d1 - d2 - ... - dN. */
    static linear(count: number): TopologyDefinition {
        const docks = dockNames(count);
        const edges = docks.slice(1).map((dock, index): [string, string] => [docks[index], dock]);
        return { docks, edges };
    }

    /** Docks in a circle: the line plus dN - d1. */
    static ring(count: number): TopologyDefinition {
        const line = Topology.linear(count);
        if (count > 2) {
            line.edges.push([line.docks[count - 1], line.docks[0]]);
        }
        return line;
    }

    /** d1 is the hub, every other dock is a spoke connected to the hub only. */
    static star(count: number): TopologyDefinition {
        const docks = dockNames(count);
        const edges = docks.slice(1).map((spoke): [string, string] => [docks[0], spoke]);
        return { docks, edges };
    }

    /** `rows` x `columns` grid, docks numbered row by row. */
    static grid(rows: number, columns: number): TopologyDefinition {
        const docks = dockNames(rows * columns);
        const edges: [string, string][] = [];
        const at = (row: number, column: number) => docks[row * columns + column];
        for (let row = 0; row < rows; row++) {
            for (let column = 0; column < columns; column++) {
                if (column + 1 < columns) { edges.push([at(row, column), at(row, column + 1)]); }
                if (row + 1 < rows) { edges.push([at(row, column), at(row + 1, column)]); }
            }
        }
        return { docks, edges };
    }

    /** Every dock adjacent to every other dock. */
    static complete(count: number): TopologyDefinition {
        const docks = dockNames(count);
        const edges: [string, string][] = [];
        docks.forEach((from, index) => docks.slice(index + 1).forEach(to => edges.push([from, to])));
        return { docks, edges };
    }
}
