/**
 * A Job is a node in a hierarchy of running coroutines with parent child relationships. A running
 * job is active. Canceling a job completes it and all of its children.
 */
export interface Job {
    isActive(): boolean

    cancel(): boolean
}
