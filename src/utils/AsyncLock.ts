/**
 * Exclusive token shared by the apply cycle and snapshot capture.
 *
 * Holders queue in FIFO order. `isHeld` lets synchronous callers such as
 * `PatchBus.drain()` refuse to run instead of waiting.
 */
export class AsyncLock {
    private tail: Promise<void> = Promise.resolve();
    private holders = 0;

    public get isHeld(): boolean {
        return this.holders > 0;
    }

    /**
     * Resolves with a release function once every earlier holder has released.
     */
    public acquire(): Promise<() => void> {
        this.holders++;
        let release: () => void = () => undefined;
        const released = new Promise<void>((resolve) => {
            release = resolve;
        });
        const previous = this.tail;
        this.tail = previous.then(() => released);

        let done = false;
        return previous.then(() => () => {
            if (done) return;
            done = true;
            this.holders--;
            release();
        });
    }

    /**
     * Runs `fn` while holding the token.
     */
    public async run<T>(fn: () => Promise<T> | T): Promise<T> {
        const release = await this.acquire();
        try {
            return await fn();
        } finally {
            release();
        }
    }
}
