import { Event } from "./event";
import type { EventOptions } from "./types";

/**
 * Creates an event for the argument tuple `TArgs`.
 *
 * @example
 * const resized = createEvent<[width: number, height: number]>({ name: "resized" });
 * resized.bind((w, h) => layout(w, h));
 * resized.invoke(800, 600);
 */
export function createEvent<TArgs extends unknown[] = []>(options?: EventOptions): Event<TArgs> {
    return new Event<TArgs>(options);
}
