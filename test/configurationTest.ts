/* --------------------------------------------------------------------------------------------
 * Copyright (c) Jan Dolejsi. All rights reserved.
 * Licensed under the MIT License. See License.txt in the project root for license information.
 * ------------------------------------------------------------------------------------------ */
'use strict';

import * as assert from 'assert';
import * as path from 'path';
import { expect } from 'chai';
import {
    DEFAULT_PLANNER_SYNTAX, DEFAULT_TIMEOUT_MS, DEFAULT_UNSOLVABLE_PATTERN,
    createPlannerConfiguration, loadPlannerConfiguration, parsePlannerConfiguration
} from '../src/configuration';
import { ConfigurationError } from '../src/errors';

function catchError(fn: () => unknown): ConfigurationError {
    try {
        fn();
    }
    catch (err) {
        if (err instanceof ConfigurationError) { return err; }
        throw err;
    }
    assert.fail('ConfigurationError expected');
}

describe('Planner configuration', () => {

    it('fills in the defaults', () => {
        // WHEN
        const configuration = createPlannerConfiguration({ path: 'planner' });

        // THEN
        expect(configuration).to.deep.equal({
            path: 'planner',
            syntax: DEFAULT_PLANNER_SYNTAX,
            options: '',
            timeoutMs: DEFAULT_TIMEOUT_MS,
            unsolvablePattern: DEFAULT_UNSOLVABLE_PATTERN,
            unsolvableExitCodes: [],
        });
    });

    it('parses comments and trailing commas', () => {
        // GIVEN
        const text = `{
            // local planner build
            "path": "/opt/planner/plan",
            "timeoutMs": 1000,
            "unsolvableExitCodes": [11, 12,],
        }`;

        // WHEN
        const configuration = parsePlannerConfiguration(text);

        // THEN
        assert.strictEqual(configuration.path, '/opt/planner/plan');
        assert.strictEqual(configuration.timeoutMs, 1000);
        assert.deepStrictEqual(configuration.unsolvableExitCodes, [11, 12]);
    });

    it('lists every invalid field', () => {
        // WHEN
        const error = catchError(() => createPlannerConfiguration({
            path: '',
            syntax: '$(planner) $(domain)',
            timeoutMs: -5,
            unsolvablePattern: '(unclosed',
        }, 'planner.jsonc'));

        // THEN
        assert.ok(error.message.startsWith('Invalid planner.jsonc.\n'));
        assert.deepStrictEqual(error.violations.map(v => v.split(':')[0]), ['path', 'syntax', 'timeoutMs', 'unsolvablePattern']);
        assert.strictEqual(error.violations[1], 'syntax: Syntax must contain the $(domain) and $(problem) placeholders.');
        assert.strictEqual(error.violations[3], 'unsolvablePattern: Not a valid regular expression.');
    });

    it('rejects a document that is not an object', () => {
        const error = catchError(() => createPlannerConfiguration([]));

        assert.deepStrictEqual(error.violations.map(v => v.split(':')[0]), ['(root)']);
    });

    it('reports syntax errors', () => {
        const error = catchError(() => parsePlannerConfiguration('{ "path": "planner" "timeoutMs": 1 }', 'broken.jsonc'));

        assert.ok(error.message.startsWith('Cannot parse broken.jsonc.'));
        assert.strictEqual(error.violations[0], 'CommaExpected at offset 20');
    });

    it('loads the sample configuration', async () => {
        const configuration = await loadPlannerConfiguration(path.join(__dirname, '..', 'config', 'planner.jsonc'));

        assert.strictEqual(configuration.timeoutMs, 120000);
        assert.deepStrictEqual(configuration.unsolvableExitCodes, [11, 12]);
        assert.ok(configuration.syntax.includes('$(plan)'));
    });
});
