/**
 * Serializes connect and close of a connection-like object.
 * A connect issued while closing waits for the close to finish, and the reverse.
 */
export class ConnectionState<T = void> {
    protected _waitForConnected?: Promise<T>;
    protected _waitForClosed: Promise<void> = Promise.resolve();
    protected _connected = false;

    get connected(): boolean {
        return this._connected;
    }

    connect(cb: () => Promise<T>): Promise<T> {
        if (this._waitForConnected) {
            return this._waitForConnected;
        }
        const waitForConnected = this._waitForClosed
            .then(() => {
                return cb();
            })
            .then((t) => {
                this._connected = true;
                return t;
            })
            .catch((err: unknown) => {
                this.shutdown();
                throw err;
            });
        this._waitForConnected = waitForConnected;
        return waitForConnected;
    }

    close(cb: () => Promise<void>): Promise<void> {
        if (this._waitForConnected) {
            const waitForConnected = this._waitForConnected;
            this._waitForConnected = undefined;
            this._waitForClosed = waitForConnected
                .then(() => {
                    return cb();
                })
                .finally(() => {
                    this.shutdown();
                });
        }
        return this._waitForClosed;
    }

    shutdown(): void {
        this._waitForConnected = undefined;
        this._waitForClosed = Promise.resolve();
        this._connected = false;
    }
}
