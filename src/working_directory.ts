/**
 * Working Directory - explicit replacement for pushd/popd.
 *
 * The process cwd is never changed. Phases read `current` and source
 * acquisition pushes the checkout, receiving a guard whose release pops it
 * again. Release is idempotent so the driver can call it from `finally`.
 */

import * as path from 'path';

export interface DirectoryGuard {
    readonly path: string;
    readonly released: boolean;
    release(): void;
}

export class WorkingDirectory {
    private readonly stack: string[];

    constructor(root: string) {
        this.stack = [path.resolve(root)];
    }

    get current(): string {
        return this.stack[this.stack.length - 1];
    }

    get depth(): number {
        return this.stack.length;
    }

    /** Enter `dir` (resolved against the current directory). */
    push(dir: string): DirectoryGuard {
        const target = path.resolve(this.current, dir);
        this.stack.push(target);
        const stack = this.stack;
        const depth = stack.length;
        let released = false;

        return {
            path: target,
            get released() { return released; },
            release: () => {
                if (released) return;
                released = true;
                // Anything entered after this guard is unwound with it
                stack.splice(depth - 1);
            },
        };
    }
}
