import logger from './logger.js';

export type TaskCallback = (err: Error | null) => void;

export type QueueTask = (callback: TaskCallback) => void;

/**
 * Runs callback-style tasks one at a time, in push order. A failing task is
 * logged and the queue moves on.
 */
export class ProcessingQueue {
    private readonly queue: QueueTask[] = [];
    private processing = false;

    constructor(private readonly name = 'processing-queue') {}

    push(f: QueueTask = (cb) => cb(null)): void {
        this.queue.push(f);
        if (!this.processing) {
            this.processing = true;
            this.execute();
        }
    }

    // Promise wrapper around push for async work
    run(task: () => Promise<void>): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            this.push((callback) => {
                task().then(
                    () => {
                        resolve();
                        callback(null);
                    },
                    (error: unknown) => {
                        const err = error instanceof Error ? error : new Error(String(error));
                        reject(err);
                        callback(err);
                    }
                );
            });
        });
    }

    private execute(): void {
        const first = this.queue.shift();
        if (!first) {
            this.processing = false;
            return;
        }
        first((err) => {
            if (err) {
                logger.error(`[${this.name}] task failed: ${err.message}`);
            }
            if (this.queue.length > 0) {
                this.execute();
            } else {
                this.processing = false;
            }
        });
    }
}

export default ProcessingQueue;
