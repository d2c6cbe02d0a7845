/**
 * Row of the workflow_runs projection. Timestamps are epoch milliseconds
 * stored as BIGINT, which pg hands back as strings.
 */
export interface WorkflowRunRow {
    run_id: string;
    workflow_id: string;
    workflow_type: string;
    task_queue: string;
    status: string;
    version: number;
    input: string | null;
    result: string | null;
    failure: string | null;
    created_at: string;
    updated_at: string;
    closed_at: string | null;
    execution_deadline: string | null;
}
