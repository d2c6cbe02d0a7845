import { deserialize, globalRegistry, replay, serialize, WorkflowEvent } from '@keel/sdk';
import { loadWorkflowModules, parseList } from '../workflow-loader';

// Runs inside a piscina thread: workflow modules register here, in this
// thread's copy of the registry.
loadWorkflowModules(parseList(process.env.KEEL_WORKFLOWS));

export interface DecisionRequest {
    /** serialized WorkflowEvent[] */
    history: string;
}

export type DecisionResponse =
    | { ok: true; result: string }
    | { ok: false; error: { name: string; message: string } };

export default async function decide(request: DecisionRequest): Promise<DecisionResponse> {
    try {
        const history = deserialize<WorkflowEvent[]>(request.history) ?? [];
        const result = await replay(history, globalRegistry);
        return { ok: true, result: serialize(result, Number.MAX_SAFE_INTEGER) };
    } catch (err) {
        return {
            ok: false,
            error: err instanceof Error
                ? { name: err.name, message: err.message }
                : { name: 'Error', message: String(err) },
        };
    }
}
