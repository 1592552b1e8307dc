// ── Events ──────────────────────────────────────────────────────────
export { EventState, ReentrancyPolicy } from "./core/event/enums";
export { Event } from "./core/event/event";
export { createEvent } from "./core/event/helpers";
export type { EventOptions, StateChangeListener } from "./core/event/types";
// ── Bindings ────────────────────────────────────────────────────────
export { FunctionBinding, MemberBinding, MethodBinding, ReadonlyMethodBinding } from "./core/binding/binding";
export { BindingKind } from "./core/binding/enums";
export type { Binding, Listener, MemberFunction, ReadonlyMemberFunction } from "./core/binding/types";
// ── Logger ──────────────────────────────────────────────────────────
export { createConsoleHandler, formatEntry } from "./core/logger/console-handler";
export { Logger } from "./core/logger/logger";
export type { ConsoleHandlerOptions, LogEntry, LoggerContext, LoggerOptions, LogHandler, LogLevel } from "./core/logger/types";
// ── State machine ───────────────────────────────────────────────────
export { StateMachine } from "./core/state-machine/state-machine";
export type { StateMachineConfig, TransitionListener, TransitionTable } from "./core/state-machine/types";
