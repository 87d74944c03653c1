/**
 * A request waiting for its reply from the broker, settled at most once.
 */
export class DeferredRequest<T> {
    public readonly promise: Promise<T>;

    private _resolve: (value: T) => void = () => undefined;
    private _reject: (err: Error) => void = () => undefined;
    private _settled = false;

    constructor(public readonly id: string) {
        this.promise = new Promise<T>((resolve, reject) => {
            this._resolve = resolve;
            this._reject = reject;
        });
    }

    isSettled(): boolean {
        return this._settled;
    }

    resolve(value: T): void {
        if (!this._settled) {
            this._settled = true;
            this._resolve(value);
        }
    }

    reject(err: Error): void {
        if (!this._settled) {
            this._settled = true;
            this._reject(err);
        }
    }
}
