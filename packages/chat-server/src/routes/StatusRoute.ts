import { Router, Request, Response } from 'express';

export interface StatusSource {
    modelName: string;
    activeSessions(): number;
    /** Reachability of backing services, keyed by name. */
    checkDependencies?(): Promise<Record<string, boolean>>;
}

export function StatusRouter(source: StatusSource): Router {
    const router = Router();

    router.get("/health", async (req: Request, res: Response) => {
        const dependencies = source.checkDependencies ? await source.checkDependencies() : {};
        const degraded = Object.values(dependencies).some(ok => !ok);

        res.status(200).json({
            status: degraded ? 'degraded' : 'healthy',
            service: 'careline-chat-server',
            activeSessions: source.activeSessions(),
            model: source.modelName,
            dependencies,
            timestamp: new Date().toISOString()
        });
    });

    return router;
}
