type RejectType = (reason?: unknown) => void;
type ResolveType<T> = (value: T | PromiseLike<T>) => void;
type ExecutorType<T> = (resolve: ResolveType<T>, reject: RejectType) => void;

/**
 * Runs `func` as a promise executor and calls `timeout` if it has not settled after `timeoutDelay` ms.
 * A negative delay disables the timer.
 */
export function executeInTimeout<T>(
    timeoutDelay: number,
    func: ExecutorType<T>,
    timeout: (reject: RejectType) => void
): Promise<T> {
    return new Promise<T>((resolve, reject) => {
        if (timeoutDelay >= 0) {
            const timerId = setTimeout(() => {
                timeout(reject);
            }, timeoutDelay);

            const resolveWrapper: ResolveType<T> = (value) => {
                clearTimeout(timerId);
                resolve(value);
            };

            const rejectWrapper: RejectType = (reason) => {
                clearTimeout(timerId);
                reject(reason);
            };
            func(resolveWrapper, rejectWrapper);
        } else {
            func(resolve, reject);
        }
    });
}
