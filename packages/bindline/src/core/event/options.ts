import { ReentrancyPolicy } from "./enums";
import type { EventOptions, ResolvedEventOptions } from "./types";

export const DEFAULT_EVENT_NAME = "Event";

const POLICIES: readonly string[] = Object.values(ReentrancyPolicy);

function isReentrancyPolicy(value: string): value is ReentrancyPolicy {
    return POLICIES.includes(value);
}

/** Validate user-supplied options and fill in defaults. */
export function resolveEventOptions(options?: EventOptions): ResolvedEventOptions {
    const name = options?.name ?? DEFAULT_EVENT_NAME;
    if (name.trim().length === 0) {
        throw new Error("createEvent: name must not be blank");
    }

    const reentrancy = options?.reentrancy ?? ReentrancyPolicy.SNAPSHOT;
    if (!isReentrancyPolicy(reentrancy)) {
        throw new Error(`createEvent: unknown reentrancy policy "${String(reentrancy)}"`);
    }

    return {
        name,
        logger: options?.logger ?? null,
        reentrancy,
    };
}
