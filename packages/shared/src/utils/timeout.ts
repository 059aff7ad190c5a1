export class CollaboratorTimeoutError extends Error {
    constructor(readonly label: string, readonly timeoutMs: number) {
        super(`${label} timed out after ${timeoutMs}ms`);
        this.name = 'CollaboratorTimeoutError';
    }
}

export async function withTimeout<T>(task: Promise<T>, timeoutMs: number, label: string): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new CollaboratorTimeoutError(label, timeoutMs)), timeoutMs);
    });

    try {
        return await Promise.race([task, timeout]);
    } finally {
        clearTimeout(timer);
    }
}
