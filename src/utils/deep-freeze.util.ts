export type DeepReadonly<T> =
    T extends (infer U)[] ? ReadonlyArray<DeepReadonly<U>> :
    T extends object ? { readonly [K in keyof T]: DeepReadonly<T[K]> } :
    T;

/**
 * Recursively freezes a plain data structure in place and returns it.
 */
export function deepFreeze<T>(value: T): DeepReadonly<T>;
export function deepFreeze(value: unknown): unknown {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
    }
    return value;
}

/**
 * Frozen copy of caller-owned data; the original stays untouched.
 */
export function frozenCopy<T>(value: T): DeepReadonly<T> {
    return deepFreeze(structuredClone(value));
}
