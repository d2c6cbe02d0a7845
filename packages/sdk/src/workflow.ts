import { WorkflowDefinition, WorkflowHandler, WorkflowLookup } from './types';

export const NAME_PATTERN = /^[a-zA-Z0-9_.-]+$/;
export const MAX_NAME_LENGTH = 100;

export function validateName(kind: string, name: string): void {
    if (!name || name.length === 0) {
        throw new Error(`${kind} name cannot be empty`);
    }
    if (name.length > MAX_NAME_LENGTH) {
        throw new Error(`${kind} name exceeds maximum length of ${MAX_NAME_LENGTH} characters`);
    }
    if (!NAME_PATTERN.test(name)) {
        throw new Error(`${kind} name must contain only alphanumeric characters, dots, dashes, and underscores`);
    }
}

export class WorkflowRegistry implements WorkflowLookup {
    private workflows = new Map<string, WorkflowDefinition>();

    register<I, O>(name: string, handler: WorkflowHandler<I, O>): WorkflowDefinition<I, O> {
        validateName('Workflow', name);
        if (typeof handler !== 'function') {
            throw new Error(`Workflow "${name}" handler must be a function`);
        }
        if (this.workflows.has(name)) {
            throw new Error(`Workflow "${name}" is already registered.`);
        }
        const wf: WorkflowDefinition<I, O> = { name, handler };
        this.workflows.set(name, wf);
        return wf;
    }

    get(name: string): WorkflowDefinition | undefined {
        return this.workflows.get(name);
    }

    has(name: string): boolean {
        return this.workflows.has(name);
    }

    list(): string[] {
        return Array.from(this.workflows.keys());
    }
}

export const globalRegistry = new WorkflowRegistry();

export function workflow<I = unknown, O = unknown>(name: string, handler: WorkflowHandler<I, O>): WorkflowDefinition<I, O> {
    return globalRegistry.register(name, handler);
}
