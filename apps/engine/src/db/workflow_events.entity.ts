/** Row of workflow_events; body holds the whole serialized event. */
export interface WorkflowEventRow {
    run_id: string;
    sequence: number;
    kind: string;
    body: string;
    created_at: string;
}
