/* --------------------------------------------------------------------------------------------
 * Copyright (c) Jan Dolejsi. All rights reserved.
 * Licensed under the MIT License. See License.txt in the project root for license information.
 * ------------------------------------------------------------------------------------------ */
'use strict';

import * as fs from 'fs';
import * as jsonc from 'jsonc-parser';
import { z } from 'zod';
import { ConfigurationError } from './errors';

export const DEFAULT_PLANNER_SYNTAX = "$(planner) $(options) $(domain) $(problem)";
export const DEFAULT_UNSOLVABLE_PATTERN = "(no solution|unsolvable|search stopped without finding a solution)";
export const DEFAULT_TIMEOUT_MS = 60000;

function isValidPattern(pattern: string): boolean {
    try {
        new RegExp(pattern, 'i');
        return true;
    }
    catch {
        return false;
    }
}

export const PlannerConfigurationSchema = z.object({
    /** Planner executable or command. */
    path: z.string().min(1),
    /** Command line template with `$(planner)`, `$(options)`, `$(domain)`, `$(problem)` and optionally `$(plan)`. */
    syntax: z.string().default(DEFAULT_PLANNER_SYNTAX)
        .refine(syntax => syntax.includes('$(domain)') && syntax.includes('$(problem)'),
            'Syntax must contain the $(domain) and $(problem) placeholders.'),
    options: z.string().default(''),
    workingDirectory: z.string().optional(),
    timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
    /** Case-insensitive regular expression matched against the planner output. */
    unsolvablePattern: z.string().default(DEFAULT_UNSOLVABLE_PATTERN)
        .refine(isValidPattern, 'Not a valid regular expression.'),
    unsolvableExitCodes: z.array(z.number().int()).default([]),
});

export type PlannerConfiguration = z.infer<typeof PlannerConfigurationSchema>;
export type PlannerConfigurationInput = z.input<typeof PlannerConfigurationSchema>;

/**
 * Converts zod issues to violation messages.
 */
export function toViolations(error: z.ZodError): string[] {
    return error.issues.map(issue => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`);
}

/**
 * Parses JSON with comments and trailing commas.
 * @param text JSONC text
 * @param source file name for the error message
 * @throws ConfigurationError with the syntax errors
 */
export function parseJsonc(text: string, source: string): unknown {
    const errors: jsonc.ParseError[] = [];
    const value: unknown = jsonc.parse(text, errors, { allowTrailingComma: true });
    if (errors.length) {
        throw new ConfigurationError(`Cannot parse ${source}.`,
            errors.map(e => `${jsonc.printParseErrorCode(e.error)} at offset ${e.offset}`));
    }
    return value;
}

/**
 * Validates the configuration and fills in the defaults.
 * @throws ConfigurationError listing the invalid fields
 */
export function createPlannerConfiguration(input: unknown, source = 'planner configuration'): PlannerConfiguration {
    const parsed = PlannerConfigurationSchema.safeParse(input);
    if (!parsed.success) {
        throw new ConfigurationError(`Invalid ${source}.`, toViolations(parsed.error));
    }
    return parsed.data;
}

export function parsePlannerConfiguration(text: string, source = 'planner configuration'): PlannerConfiguration {
    return createPlannerConfiguration(parseJsonc(text, source), source);
}

/**
 * Reads the planner configuration from a JSONC file.
 * @param path configuration file path
 */
export async function loadPlannerConfiguration(path: string): Promise<PlannerConfiguration> {
    const text = await fs.promises.readFile(path, { encoding: 'utf8' });
    return parsePlannerConfiguration(text, path);
}
