export enum EventState {
    EMPTY = "empty",
    POPULATED = "populated",
    DISPOSED = "disposed",
}

/** What an event does when its binding list is mutated from inside a listener. */
export enum ReentrancyPolicy {
    /**
     * Dispatch walks a copy of the list taken when `invoke()` starts.
     * Bindings added meanwhile wait for the next dispatch; bindings removed
     * meanwhile are skipped if not yet reached.
     */
    SNAPSHOT = "snapshot",
    /** `bind`, `unbind`, `unbindAll` and `dispose` throw while a dispatch is running. */
    DISALLOW = "disallow",
}
