export class TimeoutError extends Error {
    constructor(public readonly operation: string, public readonly timeoutMs: number) {
        super(`${operation} timed out after ${timeoutMs}ms`);
        this.name = 'TimeoutError';
    }
}

export async function withTimeout<T>(operation: string, timeoutMs: number, task: () => Promise<T>): Promise<T> {
    let timeoutHandle: ReturnType<typeof setTimeout> | null = null;
    const timeoutPromise = new Promise<T>((_resolve, reject) => {
        timeoutHandle = setTimeout(() => {
            reject(new TimeoutError(operation, timeoutMs));
        }, timeoutMs);
    });

    try {
        return await Promise.race([task(), timeoutPromise]);
    } finally {
        if (timeoutHandle) {
            clearTimeout(timeoutHandle);
        }
    }
}
