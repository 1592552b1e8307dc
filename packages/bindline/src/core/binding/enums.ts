/** Variant tag carried by every binding. Matching dispatches on this, never on `instanceof`. */
export enum BindingKind {
    FUNCTION = "function",
    METHOD = "method",
    READONLY_METHOD = "readonly-method",
}
