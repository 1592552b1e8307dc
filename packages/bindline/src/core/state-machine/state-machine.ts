import type { StateMachineConfig, TransitionListener, TransitionTable } from "./types";

/**
 * Finite state machine over a fixed transition table.
 *
 * Self-transitions are only legal when the table lists them. Listeners run
 * after the state has changed, in subscription order.
 */
export class StateMachine<TState extends string> {
    readonly name: string;
    private _current: TState;
    private readonly _transitions: TransitionTable<TState>;
    private readonly _listeners: Set<TransitionListener<TState>> = new Set();

    constructor(config: StateMachineConfig<TState>) {
        this._current = config.initial;
        this._transitions = config.transitions;
        this.name = config.name ?? "StateMachine";
    }

    get current(): TState {
        return this._current;
    }

    /** True when the current state is one of `states`. */
    is(...states: TState[]): boolean {
        return states.includes(this._current);
    }

    transition(target: TState): void {
        if (!this.canTransition(target)) {
            throw new Error(`Illegal transition: "${this._current}" → "${target}" for "${this.name}"`);
        }
        const from = this._current;
        this._current = target;
        for (const listener of this._listeners) {
            listener(from, target);
        }
    }

    canTransition(target: TState): boolean {
        return this._transitions[this._current].includes(target);
    }

    assertState(...allowed: TState[]): void {
        if (!this.is(...allowed)) {
            const list = allowed.map((s) => `"${s}"`).join(", ");
            throw new Error(`"${this.name}" expected state ${list}, but current is "${this._current}"`);
        }
    }

    onTransition(cb: TransitionListener<TState>): () => void {
        this._listeners.add(cb);
        return () => {
            this._listeners.delete(cb);
        };
    }
}
