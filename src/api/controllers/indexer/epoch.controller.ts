import { Request, Response } from 'express';
import { IEpochDataRepository } from '../../../database/repositories/interfaces';
import { NotFoundError } from '../../../types/errors';
import { parsePositiveInt } from '../../middleware';

export class EpochController {
    private readonly epochData: IEpochDataRepository;
    private readonly validatorAccountId: string;

    constructor(epochData: IEpochDataRepository, validatorAccountId: string) {
        this.epochData = epochData;
        this.validatorAccountId = validatorAccountId;
    }

    getEpoch = async (req: Request, res: Response): Promise<void> => {
        const epoch = parsePositiveInt(req.params.epoch, 'epoch', 0);
        const record = await this.epochData.findByEpoch(this.validatorAccountId, epoch);
        if (!record) {
            throw new NotFoundError(`Epoch ${epoch} has no rollup`);
        }
        res.json(record);
    };
}
