/* --------------------------------------------------------------------------------------------
 * Copyright (c) Jan Dolejsi. All rights reserved.
 * Licensed under the MIT License. See License.txt in the project root for license information.
 * ------------------------------------------------------------------------------------------ */
'use strict';

/** Container weight classes [t]. */
export const WEIGHT_CLASSES = [2, 4, 6] as const;
export type WeightClass = typeof WEIGHT_CLASSES[number];

/** Robot weight-capacity thresholds [t]. */
export const WEIGHT_THRESHOLDS = [5, 6, 8, 10] as const;
export type WeightThreshold = typeof WEIGHT_THRESHOLDS[number];

/** Robot slot-capacity levels. Zero means the robot cannot carry anything. */
export const SLOT_CAPACITIES = [0, 1, 2, 3] as const;
export type SlotCapacity = typeof SLOT_CAPACITIES[number];

function includes(values: readonly number[], value: number): boolean {
    return values.includes(value);
}

export function isWeightClass(value: number): value is WeightClass {
    return includes(WEIGHT_CLASSES, value);
}

export function isWeightThreshold(value: number): value is WeightThreshold {
    return includes(WEIGHT_THRESHOLDS, value);
}

export function isSlotCapacity(value: number): value is SlotCapacity {
    return includes(SLOT_CAPACITIES, value);
}

/**
 * Every sum of weight classes that stays within the largest threshold, ascending.
 * These are the only load levels a robot can ever hold.
 */
export const LOAD_LEVELS: readonly number[] = Object.freeze(computeLoadLevels());

function computeLoadLevels(): number[] {
    const limit = Math.max(...WEIGHT_THRESHOLDS);
    const reachable = new Set<number>([0]);
    let frontier = [0];
    while (frontier.length) {
        const next: number[] = [];
        for (const load of frontier) {
            for (const weight of WEIGHT_CLASSES) {
                const sum = load + weight;
                if (sum <= limit && !reachable.has(sum)) {
                    reachable.add(sum);
                    next.push(sum);
                }
            }
        }
        frontier = next;
    }
    return [...reachable].sort((a, b) => a - b);
}

export const MAX_SLOT_CAPACITY = Math.max(...SLOT_CAPACITIES);

// object names of the encoding values

export function weightObject(weight: number): string {
    return `w${weight}`;
}

export function thresholdObject(threshold: number): string {
    return `t${threshold}`;
}

export function loadObject(load: number): string {
    return `load${load}`;
}

/** `slot0` is the base of the robot stack, i.e. the robot holds nothing. */
export function slotObject(index: number): string {
    return `slot${index}`;
}

export function slotIndex(slot: string): number {
    const match = slot.match(/^slot(\d+)$/);
    return match ? parseInt(match[1]) : Number.NaN;
}

export function loadValue(load: string): number {
    const match = load.match(/^load(\d+)$/);
    return match ? parseInt(match[1]) : Number.NaN;
}

/**
 * Names reserved for the encoding objects. Entity ids must not use them.
 */
export function isReservedName(name: string): boolean {
    return /^(w\d+|t\d+|load\d+|slot\d+)$/i.test(name);
}
