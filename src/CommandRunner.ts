/* --------------------------------------------------------------------------------------------
 * Copyright (c) Jan Dolejsi. All rights reserved.
 * Licensed under the MIT License. See License.txt in the project root for license information.
 * ------------------------------------------------------------------------------------------ */
'use strict';

import * as process from 'child_process';
import treeKill = require('tree-kill');

export interface CommandOptions {
    workingDirectory?: string;
    timeoutMs: number;
    onStdout(data: string): void;
    onStderr(data: string): void;
}

export interface CommandResult {
    exitCode: number | null;
    signal: string | null;
    timedOut: boolean;
}

/**
 * Runs a shell command line. The planner executable talks to the process only through this interface.
 */
export interface CommandRunner {
    /**
     * Runs the command and resolves when the process exits.
     * Rejects only when the process could not be started.
     */
    run(command: string, options: CommandOptions): Promise<CommandResult>;

    /** Kills the running process tree, if any. */
    stop(): void;
}

/** Runs the command via `child_process.exec`, kills the whole process tree on timeout. */
export class ChildProcessRunner implements CommandRunner {

    // reference to the child process, while it is running
    private child: process.ChildProcess | undefined;

    run(command: string, options: CommandOptions): Promise<CommandResult> {
        return new Promise<CommandResult>((resolve, reject) => {
            let timedOut = false;
            const child = process.exec(command, { cwd: options.workingDirectory });
            this.child = child;

            const timer = setTimeout(() => {
                timedOut = true;
                this.stop();
            }, options.timeoutMs);

            child.stdout?.on('data', (data: Buffer | string) => options.onStdout(data.toString()));
            child.stderr?.on('data', (data: Buffer | string) => options.onStderr(data.toString()));

            child.on('error', err => {
                clearTimeout(timer);
                this.child = undefined;
                reject(err);
            });
            child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
                clearTimeout(timer);
                this.child = undefined;
                resolve({ exitCode: code, signal: signal, timedOut: timedOut });
            });
        });
    }

    stop(): void {
        const pid = this.child?.pid;
        if (pid !== undefined) {
            treeKill(pid, 'SIGKILL', err => {
                if (err) { console.log(`Failed to kill process ${pid}: ${err.message}`); }
            });
        }
    }
}
