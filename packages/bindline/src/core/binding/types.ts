import type { FunctionBinding, MethodBinding, ReadonlyMethodBinding } from "./binding";

/** A free function matching an event's argument tuple. */
export type Listener<TArgs extends unknown[]> = (...args: TArgs) => void;

/** A method invoked with its owner as `this`. */
export type MemberFunction<TOwner, TArgs extends unknown[]> = (this: TOwner, ...args: TArgs) => void;

/** A method that only gets a read-only view of its owner. */
export type ReadonlyMemberFunction<TOwner, TArgs extends unknown[]> = (this: Readonly<TOwner>, ...args: TArgs) => void;

/**
 * Closed set of binding variants an event stores.
 * Narrow on `kind` to reach the variant's identity predicates.
 */
export type Binding<TArgs extends unknown[]> =
    | FunctionBinding<TArgs>
    | MethodBinding<TArgs>
    | ReadonlyMethodBinding<TArgs>;

/** Arguments accepted by the `bind` / `unbind` / `isBound` overloads. */
export type BindTarget<TOwner extends object, TArgs extends unknown[]> =
    | [listener: Listener<TArgs>]
    | [member: MemberFunction<TOwner, TArgs>, owner: TOwner];
