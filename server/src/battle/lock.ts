/**
 * lock.ts
 *
 * Promise-chain mutex. Each `run` waits for the previous holder to settle, so
 * callbacks execute one at a time in arrival order even across awaits.
 */

export class SerialLock {
    private tail: Promise<void> = Promise.resolve();

    run<T>(fn: () => Promise<T> | T): Promise<T> {
        const holder = this.tail.then(fn);
        // failures reach the caller through `holder`; the chain only needs to know it settled
        this.tail = holder.then(settled, settled);
        return holder;
    }
}

function settled(): void {
}
