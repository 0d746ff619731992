/**
 * Runs async tasks strictly one after another, in submission order.
 * A failed task rejects its own caller only; the queue keeps draining.
 */
export class SerialQueue {
    private tail: Promise<void> = Promise.resolve();

    public run<T>(task: () => Promise<T>): Promise<T> {
        const result = this.tail.then(task);
        this.tail = result.then(
            () => undefined,
            () => undefined
        );
        return result;
    }
}
