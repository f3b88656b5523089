import { Request, Response } from 'express';
import { IEpochSyncRepository } from '../../../database/repositories/interfaces';

export interface GatewayHealthSource {
    getEndpointHealth(): Array<{ url: string; consecutiveFailures: number; coolingUntil: number | null }>;
}

export class SyncController {
    private readonly epochSync: IEpochSyncRepository;
    private readonly gateway: GatewayHealthSource | null;

    constructor(epochSync: IEpochSyncRepository, gateway: GatewayHealthSource | null = null) {
        this.epochSync = epochSync;
        this.gateway = gateway;
    }

    getStatus = async (_req: Request, res: Response): Promise<void> => {
        const [latest, checkpoints] = await Promise.all([
            this.epochSync.findLatest(),
            this.epochSync.count()
        ]);
        res.json({
            latestCheckpoint: latest,
            checkpoints,
            endpoints: this.gateway ? this.gateway.getEndpointHealth() : []
        });
    };
}
