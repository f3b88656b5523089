import { Request, Response } from 'express';
import { IValidatorRepository } from '../../../database/repositories/interfaces';
import { DEFAULT_PAGE_LIMIT, MAX_PAGE_LIMIT, parsePositiveInt } from '../../middleware';

export class ValidatorController {
    private readonly validators: IValidatorRepository;
    private readonly validatorAccountId: string;

    constructor(validators: IValidatorRepository, validatorAccountId: string) {
        this.validators = validators;
        this.validatorAccountId = validatorAccountId;
    }

    getMetrics = async (req: Request, res: Response): Promise<void> => {
        const limit = parsePositiveInt(req.query.limit, 'limit', DEFAULT_PAGE_LIMIT, MAX_PAGE_LIMIT);
        const metrics = await this.validators.findMetrics(this.validatorAccountId, limit);
        res.json({ validatorAccountId: this.validatorAccountId, metrics });
    };

    getPerformance = async (req: Request, res: Response): Promise<void> => {
        const limit = parsePositiveInt(req.query.limit, 'limit', DEFAULT_PAGE_LIMIT, MAX_PAGE_LIMIT);
        const performance = await this.validators.findPerformance(this.validatorAccountId, limit);
        res.json({ validatorAccountId: this.validatorAccountId, performance });
    };
}
