/**
 * Promise-chain mutex. Tasks run one at a time in submission order; a failing
 * task releases the lock and its rejection goes to its own caller only.
 */
export class Mutex {
    private tail: Promise<void> = Promise.resolve();

    runExclusive<T>(task: () => Promise<T>): Promise<T> {
        const run = this.tail.then(task);
        this.tail = run.then(
            () => undefined,
            () => undefined,
        );
        return run;
    }
}
