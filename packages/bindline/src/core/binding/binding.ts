import { BindingKind } from "./enums";
import type { Binding, Listener, MemberFunction, ReadonlyMemberFunction } from "./types";

/**
 * Shared invocation path for every binding variant.
 *
 * A binding starts attached. Once its event removes it, `detach()` makes
 * every later `invoke()` a no-op, so a dispatch already iterating a
 * snapshot skips it.
 */
abstract class BaseBinding<TArgs extends unknown[]> {
    abstract readonly kind: BindingKind;
    private _active = true;

    get active(): boolean {
        return this._active;
    }

    detach(): void {
        this._active = false;
    }

    invoke(args: TArgs): void {
        if (!this._active) return;
        this.call(args);
    }

    abstract equals(other: Binding<TArgs>): boolean;

    protected abstract call(args: TArgs): void;
}

/** Binding for a free function. Identity is reference equality of the function. */
export class FunctionBinding<TArgs extends unknown[]> extends BaseBinding<TArgs> {
    readonly kind = BindingKind.FUNCTION;

    constructor(private readonly listener: Listener<TArgs>) {
        super();
    }

    matches(listener: Listener<TArgs>): boolean {
        return this.listener === listener;
    }

    equals(other: Binding<TArgs>): boolean {
        return other.kind === BindingKind.FUNCTION && other.matches(this.listener);
    }

    protected call(args: TArgs): void {
        this.listener(...args);
    }
}

/**
 * Binding for a method applied through an owner object.
 *
 * The owner is a non-owning back-reference: the binding never keeps it
 * alive on purpose and never checks whether the caller has torn it down.
 * Unbind before discarding the owner.
 *
 * Both `member` and `owner` compare by reference. Two value-equal owners
 * are two different owners.
 */
export abstract class MemberBinding<TArgs extends unknown[]> extends BaseBinding<TArgs> {
    abstract readonly kind: BindingKind.METHOD | BindingKind.READONLY_METHOD;

    protected constructor(
        private readonly member: object,
        private readonly owner: object,
        private readonly dispatch: (args: TArgs) => void,
    ) {
        super();
    }

    matchesOwner(owner: object): boolean {
        return this.owner === owner;
    }

    matchesMember(member: object): boolean {
        return this.member === member;
    }

    matchesMemberAndOwner(member: object, owner: object): boolean {
        return this.matchesMember(member) && this.matchesOwner(owner);
    }

    equals(other: Binding<TArgs>): boolean {
        if (other.kind === BindingKind.FUNCTION) return false;
        return other.kind === this.kind && other.matchesMemberAndOwner(this.member, this.owner);
    }

    protected call(args: TArgs): void {
        this.dispatch(args);
    }
}

export class MethodBinding<TArgs extends unknown[]> extends MemberBinding<TArgs> {
    readonly kind = BindingKind.METHOD;

    static of<TOwner extends object, TArgs extends unknown[]>(
        member: MemberFunction<TOwner, TArgs>,
        owner: TOwner,
    ): MethodBinding<TArgs> {
        return new MethodBinding<TArgs>(member, owner, (args) => member.apply(owner, args));
    }
}

/**
 * Method binding whose member only sees `Readonly<TOwner>`.
 * The read-only guarantee comes from the member's type; nothing is enforced at runtime.
 */
export class ReadonlyMethodBinding<TArgs extends unknown[]> extends MemberBinding<TArgs> {
    readonly kind = BindingKind.READONLY_METHOD;

    static of<TOwner extends object, TArgs extends unknown[]>(
        member: ReadonlyMemberFunction<TOwner, TArgs>,
        owner: TOwner,
    ): ReadonlyMethodBinding<TArgs> {
        return new ReadonlyMethodBinding<TArgs>(member, owner, (args) => member.apply(owner, args));
    }
}
