/**
 * Runs an abortable operation under a deadline.
 *
 * On expiry the operation's signal is aborted and the promise rejects with
 * the error built by `onTimeout`; the operation's own late result is ignored.
 * Aborting `parentSignal` aborts the operation as well.
 */
export async function withTimeout<T>(
    operation: (signal: AbortSignal) => Promise<T>,
    ms: number,
    onTimeout: () => Error,
    parentSignal?: AbortSignal
): Promise<T> {
    const controller = new AbortController();
    const abortFromParent = () => controller.abort(parentSignal?.reason);

    if (parentSignal?.aborted) {
        controller.abort(parentSignal.reason);
    } else {
        parentSignal?.addEventListener('abort', abortFromParent, { once: true });
    }

    let timer: ReturnType<typeof setTimeout> | null = null;
    try {
        return await Promise.race([
            operation(controller.signal),
            new Promise<T>((_, reject) => {
                timer = setTimeout(() => {
                    const error = onTimeout();
                    controller.abort(error);
                    reject(error);
                }, Math.max(0, ms));
                timer.unref?.();
            })
        ]);
    } finally {
        if (timer) {
            clearTimeout(timer);
        }
        parentSignal?.removeEventListener('abort', abortFromParent);
    }
}
