import path from 'path';

const TAG = '[loader]';

export function parseList(value: string | undefined): string[] {
    return (value ?? '').split(',').map(p => p.trim()).filter(Boolean);
}

/**
 * Requires workflow/activity modules so their `workflow()` and `activity()`
 * calls register on the process-wide registries. Paths resolve against the
 * working directory, not this file.
 *
 * @returns the resolved paths that loaded
 */
export function loadWorkflowModules(modulePaths: string[]): string[] {
    const loaded: string[] = [];
    for (const p of modulePaths) {
        const resolved = path.isAbsolute(p) ? p : path.resolve(process.cwd(), p);
        try {
            require(resolved);
            loaded.push(resolved);
            console.log(`${TAG} loaded workflows from ${resolved}`);
        } catch (err) {
            console.error(`${TAG} failed to load ${resolved}:`, err);
        }
    }
    return loaded;
}
