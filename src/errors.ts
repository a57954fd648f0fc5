/**
 * Thrown by checked sets when the add/remove call sequence is invalid:
 * adding an element twice, or removing one that was never added.
 * Signals a bug in the caller; not meant to be caught.
 */
export class SetBehaviorError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SetBehaviorError';
    }
}

/** Thrown when a membership checker has to track more elements than it has slots for. */
export class CheckerCapacityError extends Error {
    readonly capacity: number;

    constructor(capacity: number) {
        super(`Cannot handle more than ${capacity} elements when checking. Use the production build or raise the checker capacity`);
        this.name = 'CheckerCapacityError';
        this.capacity = capacity;
    }
}
