/**
 * Row of task_queue. A task is leased while lease_id is set; a lease whose
 * lease_expires_at has passed may be taken over by the next dequeue.
 */
export interface TaskQueueRow {
    task_id: string;
    queue_name: string;
    kind: string;
    body: string;
    created_at: string;
    visible_at: string;
    lease_id: string | null;
    lease_expires_at: string | null;
    delivery_count: number;
}
