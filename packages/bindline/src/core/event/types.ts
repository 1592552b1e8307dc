import type { TransitionListener } from "../state-machine/types";
import type { LoggerContext } from "../logger/types";
import type { EventState, ReentrancyPolicy } from "./enums";

export type EventOptions = {
    /** Used as the log code and in error messages. Defaults to `"Event"`. */
    name?: string;
    /** Receives bind/unbind/dispatch diagnostics. Events without one stay silent. */
    logger?: LoggerContext;
    /** Defaults to {@link ReentrancyPolicy.SNAPSHOT}. */
    reentrancy?: ReentrancyPolicy;
};

export type ResolvedEventOptions = {
    readonly name: string;
    readonly logger: LoggerContext | null;
    readonly reentrancy: ReentrancyPolicy;
};

export type StateChangeListener = TransitionListener<EventState>;
