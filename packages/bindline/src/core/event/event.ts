import { remove } from "es-toolkit";
import { FunctionBinding, MethodBinding, ReadonlyMethodBinding } from "../binding/binding";
import { BindingKind } from "../binding/enums";
import type { Binding, BindTarget, Listener, MemberFunction, ReadonlyMemberFunction } from "../binding/types";
import type { LoggerContext } from "../logger/types";
import { StateMachine } from "../state-machine/state-machine";
import type { TransitionTable } from "../state-machine/types";
import { EventState, ReentrancyPolicy } from "./enums";
import { resolveEventOptions } from "./options";
import type { EventOptions, StateChangeListener } from "./types";

const EVENT_TRANSITIONS: TransitionTable<EventState> = {
    [EventState.EMPTY]: [EventState.POPULATED, EventState.DISPOSED],
    [EventState.POPULATED]: [EventState.EMPTY, EventState.DISPOSED],
    [EventState.DISPOSED]: [],
};

/**
 * Synchronous, single-threaded multicast over a fixed argument tuple.
 *
 * Bindings fire in insertion order. Every listener of a dispatch receives
 * the same argument values: objects are shared by reference, never copied.
 *
 * Removal matches by identity. A free function matches by reference; a
 * method matches by member reference AND owner reference, and only against
 * bindings of the same kind (`bind` vs `bindReadonly`).
 *
 * Owners are not tracked: unbind a method before discarding its owner.
 *
 * Lifecycle: Empty ⇄ Populated → Disposed.
 */
export class Event<TArgs extends unknown[] = []> {
    readonly name: string;
    readonly reentrancy: ReentrancyPolicy;
    private readonly logger: LoggerContext | null;
    private readonly machine: StateMachine<EventState>;
    private readonly bindings: Binding<TArgs>[] = [];
    private dispatchDepth = 0;

    constructor(options?: EventOptions) {
        const resolved = resolveEventOptions(options);
        this.name = resolved.name;
        this.reentrancy = resolved.reentrancy;
        this.logger = resolved.logger;

        this.machine = new StateMachine<EventState>({
            transitions: EVENT_TRANSITIONS,
            initial: EventState.EMPTY,
            name: this.name,
        });
        this.machine.onTransition((from, to) => {
            this.logger?.debug(this.name, "state changed", { from, to });
        });
    }

    get state(): EventState {
        return this.machine.current;
    }

    get size(): number {
        return this.bindings.length;
    }

    get isEmpty(): boolean {
        return this.bindings.length === 0;
    }

    /** True while at least one `invoke()` is running. */
    get dispatching(): boolean {
        return this.dispatchDepth > 0;
    }

    // ── Binding ─────────────────────────────────────────────────────────

    /** Append a free function. Binding the same function twice makes it fire twice. */
    bind(listener: Listener<TArgs>): void;
    /** Append a method, invoked with `owner` as `this`. `owner` must stay valid until unbound. */
    bind<TOwner extends object>(member: MemberFunction<TOwner, TArgs>, owner: TOwner): void;
    bind<TOwner extends object>(...target: BindTarget<TOwner, TArgs>): void {
        if (target.length === 1) {
            this.append(new FunctionBinding(target[0]));
        } else {
            this.append(MethodBinding.of(target[0], target[1]));
        }
    }

    /** Append a method that only gets a read-only view of `owner`. */
    bindReadonly<TOwner extends object>(member: ReadonlyMemberFunction<TOwner, TArgs>, owner: TOwner): void {
        this.append(ReadonlyMethodBinding.of(member, owner));
    }

    // ── Unbinding ───────────────────────────────────────────────────────

    /** Remove every binding of `listener`. No-op when none match. */
    unbind(listener: Listener<TArgs>): void;
    /** Remove every `bind(member, owner)` binding. Read-only bindings are left alone. */
    unbind<TOwner extends object>(member: MemberFunction<TOwner, TArgs>, owner: TOwner): void;
    unbind<TOwner extends object>(...target: BindTarget<TOwner, TArgs>): void {
        this.removeWhere("unbind", this.predicateFor(target));
    }

    /** Remove every `bindReadonly(member, owner)` binding. */
    unbindReadonly<TOwner extends object>(member: ReadonlyMemberFunction<TOwner, TArgs>, owner: TOwner): void {
        this.removeWhere("unbindReadonly", readonlyPredicate(member, owner));
    }

    unbindAll(): void {
        this.removeWhere("unbindAll", () => true);
    }

    // ── Queries ─────────────────────────────────────────────────────────

    isBound(listener: Listener<TArgs>): boolean;
    isBound<TOwner extends object>(member: MemberFunction<TOwner, TArgs>, owner: TOwner): boolean;
    isBound<TOwner extends object>(...target: BindTarget<TOwner, TArgs>): boolean {
        return this.bindings.some(this.predicateFor(target));
    }

    isBoundReadonly<TOwner extends object>(member: ReadonlyMemberFunction<TOwner, TArgs>, owner: TOwner): boolean {
        return this.bindings.some(readonlyPredicate(member, owner));
    }

    // ── Dispatch ────────────────────────────────────────────────────────

    /**
     * Fire every binding in insertion order, synchronously.
     *
     * A listener that throws ends the dispatch: the error is logged and
     * rethrown to the caller, and later listeners do not run.
     */
    invoke(...args: TArgs): void {
        const snapshot = this.bindings.slice();
        this.dispatchDepth++;
        try {
            for (const binding of snapshot) {
                try {
                    binding.invoke(args);
                } catch (error) {
                    this.logger?.error(this.name, "listener threw during dispatch", {
                        kind: binding.kind,
                        error: error instanceof Error ? error.message : String(error),
                    });
                    throw error;
                }
            }
        } finally {
            this.dispatchDepth--;
        }
    }

    /** The event as a plain callback, for APIs that expect a function. */
    toFunction(): Listener<TArgs> {
        return (...args: TArgs) => this.invoke(...args);
    }

    // ── Lifecycle ───────────────────────────────────────────────────────

    onStateChange(listener: StateChangeListener): () => void {
        return this.machine.onTransition(listener);
    }

    /** Unbind everything and refuse further bindings. Idempotent. */
    dispose(): void {
        if (this.machine.is(EventState.DISPOSED)) return;
        this.assertMutable("dispose");
        const removed = this.bindings.splice(0);
        for (const binding of removed) {
            binding.detach();
        }
        this.machine.transition(EventState.DISPOSED);
        this.logger?.debug(this.name, "dispose", { removed: removed.length });
    }

    // ── Internals ───────────────────────────────────────────────────────

    private append(binding: Binding<TArgs>): void {
        if (this.machine.is(EventState.DISPOSED)) {
            throw new Error(`[bindline] Event "${this.name}" is disposed and cannot bind`);
        }
        this.assertMutable("bind");
        this.bindings.push(binding);
        this.logger?.debug(this.name, "bind", { kind: binding.kind, size: this.bindings.length });
        this.syncState();
    }

    /** Collect every match first, then drop them from the list in one pass. */
    private removeWhere(op: string, predicate: (binding: Binding<TArgs>) => boolean): void {
        if (this.machine.is(EventState.DISPOSED)) return;
        this.assertMutable(op);
        const removed = remove(this.bindings, predicate);
        for (const binding of removed) {
            binding.detach();
        }
        this.logger?.debug(this.name, op, { removed: removed.length, size: this.bindings.length });
        this.syncState();
    }

    private predicateFor<TOwner extends object>(
        target: BindTarget<TOwner, TArgs>,
    ): (binding: Binding<TArgs>) => boolean {
        if (target.length === 1) {
            const [listener] = target;
            return (binding) => binding.kind === BindingKind.FUNCTION && binding.matches(listener);
        }
        const [member, owner] = target;
        return (binding) => binding.kind === BindingKind.METHOD && binding.matchesMemberAndOwner(member, owner);
    }

    private assertMutable(op: string): void {
        if (this.reentrancy !== ReentrancyPolicy.DISALLOW || this.dispatchDepth === 0) return;
        this.logger?.warn(this.name, `${op} rejected during dispatch`);
        throw new Error(`[bindline] Event "${this.name}" cannot ${op} while dispatching`);
    }

    private syncState(): void {
        const target = this.bindings.length > 0 ? EventState.POPULATED : EventState.EMPTY;
        if (this.machine.current !== target) {
            this.machine.transition(target);
        }
    }
}

function readonlyPredicate<TOwner extends object, TArgs extends unknown[]>(
    member: ReadonlyMemberFunction<TOwner, TArgs>,
    owner: TOwner,
): (binding: Binding<TArgs>) => boolean {
    return (binding) => binding.kind === BindingKind.READONLY_METHOD && binding.matchesMemberAndOwner(member, owner);
}
