/* --------------------------------------------------------------------------------------------
 * Copyright (c) Jan Dolejsi. All rights reserved.
 * Licensed under the MIT License. See License.txt in the project root for license information.
 * ------------------------------------------------------------------------------------------ */
'use strict';

import * as fs from 'fs';
import * as tmp from 'tmp';

export interface TempFile {
    path: string;
    /** Closes and deletes the file. */
    remove(): void;
}

export async function file(mode: number, prefix: string, postfix: string): Promise<TempFile> {
    return new Promise<TempFile>((resolve, reject) => {
        tmp.file({ mode: mode, prefix: prefix, postfix: postfix },
            (err: Error | null, path: string, _fd: number, removeCallback: () => void) => {
                if (err) {
                    reject(err);
                }
                else {
                    resolve({ path: path, remove: removeCallback });
                }
            });
    });
}

/**
 * Writes the PDDL text to a new temporary file.
 * @param text domain or problem text
 * @param prefix file name prefix
 */
export async function toPddlFile(text: string, prefix: string): Promise<TempFile> {
    const tempFile = await file(0o644, prefix, '.pddl');
    await fs.promises.writeFile(tempFile.path, text, { encoding: 'utf8' });
    return tempFile;
}
